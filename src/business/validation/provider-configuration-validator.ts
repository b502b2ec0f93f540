// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {Diagnostic, DiagnosticCode} from './diagnostic.js';
import {
  type ExecConfiguration,
  type ProviderConfiguration,
} from '../../data/schema/model/provider/provider-configuration.js';
import {type EffectiveClientConfig} from '../../data/configuration/api/effective-client-config.js';
import {type ConfigPathConflictError} from '../../data/configuration/api/config-path-conflict-error.js';
import {ExplicitCredentialSource} from '../../data/configuration/impl/explicit-credential-source.js';
import {EnvironmentCredentialSource} from '../../data/configuration/impl/environment-credential-source.js';
import {InClusterCredentialSource} from '../../data/configuration/impl/in-cluster-credential-source.js';
import {LayeredClientConfig} from '../../data/configuration/impl/layered-client-config.js';
import {ClientConfigResolver} from '../../data/configuration/impl/client-config-resolver.js';
import {AuthenticationMissingError} from '../errors/authentication-missing-error.js';
import {DriverInvalidError} from '../errors/driver-invalid-error.js';
import {StorageDrivers} from '../storage/storage-driver.js';
import {type EnvironmentSnapshot} from '../../types/index.js';
import {EnvironmentEx} from '../utils/environment-ex.js';
import {StringEx} from '../utils/string-ex.js';
import {type ProviderLogger} from '../../core/logging/provider-logger.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import * as constants from '../../core/constants.js';

/**
 * Checks a provider configuration before any client is built. Problems are reported as diagnostics.
 */
@injectable()
export class ProviderConfigurationValidator {
  private readonly serviceAccountDirectory: string;
  private readonly logger: ProviderLogger;

  public constructor(
    @inject(InjectTokens.ServiceAccountDirectory) serviceAccountDirectory?: string,
    @inject(InjectTokens.ProviderLogger) logger?: ProviderLogger,
  ) {
    this.serviceAccountDirectory = patchInject(
      serviceAccountDirectory,
      InjectTokens.ServiceAccountDirectory,
      this.constructor.name,
    );
    this.logger = patchInject(logger, InjectTokens.ProviderLogger, this.constructor.name);
  }

  /**
   * @returns the problems found; empty when the configuration is usable
   */
  public validate(input: ProviderConfiguration, environment: EnvironmentSnapshot): Diagnostic[] {
    const explicit: EffectiveClientConfig = new ExplicitCredentialSource(input.kubernetes).partial;
    const ambient: EffectiveClientConfig = new EnvironmentCredentialSource(environment).partial;

    const diagnostics: Diagnostic[] = [
      ...this.checkAuthentication(LayeredClientConfig.merge([explicit, ambient]), environment),
      ...this.checkConfigPaths(explicit, ambient),
      ...this.checkExec(input.kubernetes?.exec ?? []),
      ...this.checkDriver(input, environment),
    ];

    for (const diagnostic of diagnostics) {
      this.logger.debug(`configuration diagnostic ${diagnostic.code}: ${diagnostic.summary}`);
    }
    return diagnostics;
  }

  /**
   * The lower-cased driver name from the configuration, else `HELM_DRIVER`, else the default.
   */
  public static driverName(input: ProviderConfiguration, environment: EnvironmentSnapshot): string {
    return (
      StringEx.firstNonEmpty(
        input.helmDriver,
        EnvironmentEx.string(environment, constants.EnvironmentVariables.HelmDriver),
      ) ?? constants.DEFAULT_HELM_DRIVER
    ).toLowerCase();
  }

  private checkAuthentication(merged: EffectiveClientConfig, environment: EnvironmentSnapshot): Diagnostic[] {
    if (new InClusterCredentialSource(environment, this.serviceAccountDirectory).isAvailable()) {
      return [];
    }
    if (EnvironmentEx.string(environment, constants.EnvironmentVariables.KubeConfigPaths) !== undefined) {
      return [];
    }

    const configured: boolean = [
      merged.host,
      merged.configPath,
      merged.configPaths,
      merged.clientCertificate,
      merged.token,
      merged.exec,
    ].some((value: EffectiveClientConfig[keyof EffectiveClientConfig]): boolean => LayeredClientConfig.isSet(value));

    return configured ? [] : [Diagnostic.fromError(new AuthenticationMissingError())];
  }

  private checkConfigPaths(explicit: EffectiveClientConfig, ambient: EffectiveClientConfig): Diagnostic[] {
    const conflict: ConfigPathConflictError | undefined = ClientConfigResolver.findConfigPathConflict([explicit, ambient]);
    return conflict ? [Diagnostic.fromError(conflict)] : [];
  }

  private checkExec(exec: readonly ExecConfiguration[]): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    if (exec.length > 1) {
      diagnostics.push(
        Diagnostic.error(
          DiagnosticCode.CONFIGURATION_INVALID,
          'Too many exec blocks',
          `At most one exec block may be configured, found ${exec.length}`,
        ),
      );
    }
    for (const entry of exec) {
      if (StringEx.isBlank(entry.apiVersion) || StringEx.isBlank(entry.command)) {
        diagnostics.push(
          Diagnostic.error(
            DiagnosticCode.CONFIGURATION_INVALID,
            'Invalid exec block',
            'exec requires both api_version and command',
          ),
        );
      }
    }
    return diagnostics;
  }

  private checkDriver(input: ProviderConfiguration, environment: EnvironmentSnapshot): Diagnostic[] {
    const driver: string = ProviderConfigurationValidator.driverName(input, environment);
    return StorageDrivers.parse(driver) ? [] : [Diagnostic.fromError(new DriverInvalidError(driver))];
  }
}
