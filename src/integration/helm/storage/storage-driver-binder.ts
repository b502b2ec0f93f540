// SPDX-License-Identifier: Apache-2.0

import {CoreV1Api, type KubeConfig} from '@kubernetes/client-node';
import {inject, injectable} from 'tsyringe-neo';
import {type StorageBinding} from './storage-binding.js';
import {StorageDriver, StorageDrivers} from '../../../business/storage/storage-driver.js';
import {IllegalArgumentError} from '../../../business/errors/illegal-argument-error.js';
import {MissingArgumentError} from '../../../business/errors/missing-argument-error.js';
import {EnvironmentEx} from '../../../business/utils/environment-ex.js';
import {type EnvironmentSnapshot} from '../../../types/index.js';
import {type ProviderLogger} from '../../../core/logging/provider-logger.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {EnvironmentVariables} from '../../../core/constants.js';

/**
 * Binds a Helm storage driver to a namespace. Binding makes no network calls.
 */
@injectable()
export class StorageDriverBinder {
  private readonly logger: ProviderLogger;

  public constructor(@inject(InjectTokens.ProviderLogger) logger?: ProviderLogger) {
    this.logger = patchInject(logger, InjectTokens.ProviderLogger, this.constructor.name);
  }

  /**
   * @throws IllegalArgumentError - for an unknown driver name
   * @throws MissingArgumentError - for the sql driver without a connection string
   */
  public async bind(
    kubeConfig: KubeConfig,
    namespace: string,
    driverName: string,
    environment: EnvironmentSnapshot,
  ): Promise<StorageBinding> {
    const driver: StorageDriver | undefined = StorageDrivers.parse(driverName);
    this.logger.debug(`binding helm storage driver ${driverName} to namespace ${namespace}`);

    switch (driver) {
      case StorageDriver.MEMORY: {
        return {driver, namespace, records: new Map<string, string>()};
      }
      case StorageDriver.CONFIGMAP:
      case StorageDriver.SECRET: {
        return {driver, namespace, client: kubeConfig.makeApiClient(CoreV1Api)};
      }
      case StorageDriver.SQL: {
        const connectionString: string | undefined = EnvironmentEx.string(
          environment,
          EnvironmentVariables.HelmDriverSqlConnectionString,
        );
        if (connectionString === undefined) {
          throw new MissingArgumentError(
            `${EnvironmentVariables.HelmDriverSqlConnectionString} must be set to use the sql storage driver`,
          );
        }
        return {driver, namespace, connectionString};
      }
      default: {
        throw new IllegalArgumentError(`unknown driver "${driverName}"`, driverName);
      }
    }
  }
}
