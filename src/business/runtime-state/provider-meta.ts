// SPDX-License-Identifier: Apache-2.0

import {type KubeConfig} from '@kubernetes/client-node';
import {type ProviderConfiguration} from '../../data/schema/model/provider/provider-configuration.js';
import {type EffectiveClientConfig} from '../../data/configuration/api/effective-client-config.js';
import {ConfigPathConflictError} from '../../data/configuration/api/config-path-conflict-error.js';
import {
  type ClientConfigResolver,
  type PreparedClientConfig,
} from '../../data/configuration/impl/client-config-resolver.js';
import {type KubeConfigBuilder} from '../../integration/kube/kube-config-builder.js';
import {isDns1123Label} from '../../integration/kube/kube-validation.js';
import {ClientConstructionError} from '../../integration/kube/errors/client-construction-error.js';
import {type StorageDriverBinder} from '../../integration/helm/storage/storage-driver-binder.js';
import {type StorageBinding} from '../../integration/helm/storage/storage-binding.js';
import {BackendBindError} from '../../integration/helm/errors/backend-bind-error.js';
import {ActionConfiguration} from '../../integration/helm/action/action-configuration.js';
import {type StorageDriver} from '../storage/storage-driver.js';
import {type HelmSettings} from '../settings/helm-settings.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {StringEx} from '../utils/string-ex.js';
import {ObjectEx} from '../utils/object-ex.js';
import {type EnvironmentSnapshot} from '../../types/index.js';
import {type ProviderLogger} from '../../core/logging/provider-logger.js';
import {type Lock} from '../../core/lock/lock.js';
import {LocalMutex} from '../../core/lock/local-mutex.js';

export interface ProviderMetaCollaborators {
  readonly resolver: ClientConfigResolver;
  readonly kubeConfigBuilder: KubeConfigBuilder;
  readonly binder: StorageDriverBinder;
  readonly logger: ProviderLogger;
}

/**
 * Provider state shared by every resource operation: the raw configuration, the environment it was configured in,
 * the Helm settings and the storage driver. Action configurations are handed out one caller at a time.
 */
export class ProviderMeta {
  public readonly input: Readonly<ProviderConfiguration>;
  private readonly lock: Lock = new LocalMutex();
  private prepared?: PreparedClientConfig;

  public constructor(
    input: ProviderConfiguration,
    public readonly environment: EnvironmentSnapshot,
    public readonly settings: HelmSettings,
    public readonly driver: StorageDriver,
    private readonly collaborators: ProviderMetaCollaborators,
  ) {
    this.input = ObjectEx.deepFreeze(structuredClone(input));
  }

  /**
   * Builds a Kubernetes client configuration and a storage backend bound to the namespace.
   *
   * @throws IllegalArgumentError - when the namespace is empty or not a DNS-1123 label
   * @throws ConfigPathConflictError - when both config_path and config_paths are set
   * @throws ClientConstructionError - when the client configuration cannot be resolved or built
   * @throws BackendBindError - when the storage driver cannot be bound
   */
  public async getActionConfiguration(namespace: string): Promise<ActionConfiguration> {
    if (StringEx.isEmpty(namespace)) {
      throw new IllegalArgumentError('namespace must not be empty', namespace);
    }
    if (!isDns1123Label(namespace)) {
      throw new IllegalArgumentError(`namespace "${namespace}" is not a valid DNS-1123 label`, namespace);
    }

    return this.lock.runExclusive(async (): Promise<ActionConfiguration> => {
      const logger: ProviderLogger = this.collaborators.logger;
      logger.debug('getActionConfiguration start');

      let kubeConfig: KubeConfig;
      try {
        kubeConfig = this.collaborators.kubeConfigBuilder.build(await this.clientConfig(), namespace);
      } catch (error) {
        if (error instanceof ConfigPathConflictError) {
          throw error;
        }
        throw new ClientConstructionError(namespace, error);
      }

      let storage: StorageBinding;
      try {
        storage = await this.collaborators.binder.bind(kubeConfig, namespace, this.driver, this.environment);
      } catch (error) {
        throw new BackendBindError(this.driver, namespace, error);
      }

      const configuration: ActionConfiguration = new ActionConfiguration(
        kubeConfig,
        namespace,
        this.driver,
        storage,
        this.settings,
        (format: string, ...arguments_: unknown[]): void => logger.debug(format, ...arguments_),
      );

      logger.debug('getActionConfiguration success');
      return configuration;
    });
  }

  /**
   * The explicit block and the environment are frozen, so their part of the resolution is kept. Kubeconfig files and
   * the service account mount are read on every call.
   */
  private async clientConfig(): Promise<EffectiveClientConfig> {
    const resolver: ClientConfigResolver = this.collaborators.resolver;
    if (!this.prepared) {
      this.prepared = resolver.prepare(this.input.kubernetes, this.environment);
    }
    return resolver.read(this.prepared);
  }
}
