// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';

export {Container, type InstanceOverrides} from './core/dependency-injection/container-init.js';
export {InjectTokens} from './core/dependency-injection/inject-tokens.js';
export {SingletonContainer} from './core/dependency-injection/singleton-container.js';
export {ValueContainer} from './core/dependency-injection/value-container.js';
export {type ProviderLogger} from './core/logging/provider-logger.js';
export {ProviderPinoLogger} from './core/logging/provider-pino-logger.js';
export {ProviderError} from './core/errors/provider-error.js';
export {type Lock} from './core/lock/lock.js';
export {LocalMutex} from './core/lock/local-mutex.js';

export {
  type ExecConfiguration,
  type KubernetesConfiguration,
  type ProviderConfiguration,
} from './data/schema/model/provider/provider-configuration.js';
export {ProviderConfigurationReader} from './data/mapper/provider-configuration-reader.js';
export {
  type AuthProviderCredential,
  type EffectiveClientConfig,
  type ExecCredential,
} from './data/configuration/api/effective-client-config.js';
export {ConfigurationError} from './data/configuration/api/configuration-error.js';
export {ConfigPathConflictError} from './data/configuration/api/config-path-conflict-error.js';
export {type CredentialSource} from './data/configuration/spi/credential-source.js';
export {ExplicitCredentialSource} from './data/configuration/impl/explicit-credential-source.js';
export {EnvironmentCredentialSource} from './data/configuration/impl/environment-credential-source.js';
export {KubeconfigCredentialSource} from './data/configuration/impl/kubeconfig-credential-source.js';
export {InClusterCredentialSource} from './data/configuration/impl/in-cluster-credential-source.js';
export {LayeredClientConfig} from './data/configuration/impl/layered-client-config.js';
export {ClientConfigResolver, type PreparedClientConfig} from './data/configuration/impl/client-config-resolver.js';

export {StorageDriver, StorageDrivers} from './business/storage/storage-driver.js';
export {HelmSettings} from './business/settings/helm-settings.js';
export {HelmPaths} from './business/settings/helm-paths.js';
export {Diagnostic, DiagnosticCode, DiagnosticSeverity} from './business/validation/diagnostic.js';
export {ProviderConfigurationValidator} from './business/validation/provider-configuration-validator.js';
export {ProviderMeta} from './business/runtime-state/provider-meta.js';
export {type ConfigureResult, ProviderRuntimeState, ProviderState} from './business/runtime-state/provider-runtime-state.js';
export {AuthenticationMissingError} from './business/errors/authentication-missing-error.js';
export {DriverInvalidError} from './business/errors/driver-invalid-error.js';
export {IllegalArgumentError} from './business/errors/illegal-argument-error.js';
export {IllegalStateError} from './business/errors/illegal-state-error.js';
export {MissingArgumentError} from './business/errors/missing-argument-error.js';

export {KubeConfigBuilder} from './integration/kube/kube-config-builder.js';
export {ClientConstructionError} from './integration/kube/errors/client-construction-error.js';
export {StorageDriverBinder} from './integration/helm/storage/storage-driver-binder.js';
export {type StorageBinding} from './integration/helm/storage/storage-binding.js';
export {BackendBindError} from './integration/helm/errors/backend-bind-error.js';
export {ActionConfiguration} from './integration/helm/action/action-configuration.js';
export {HelmExecutionBuilder} from './integration/helm/execution/helm-execution-builder.js';
export {HelmExecution} from './integration/helm/execution/helm-execution.js';
export {HelmExecutionError} from './integration/helm/errors/helm-execution-error.js';
export {type HelmRequest} from './integration/helm/request/helm-request.js';
