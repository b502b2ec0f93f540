// SPDX-License-Identifier: Apache-2.0

export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  LogsDirectory: Symbol.for('LogsDirectory'),
  Environment: Symbol.for('Environment'),
  ServiceAccountDirectory: Symbol.for('ServiceAccountDirectory'),
  HelmExecutable: Symbol.for('HelmExecutable'),
  ProviderLogger: Symbol.for('ProviderLogger'),
  ProviderConfigurationReader: Symbol.for('ProviderConfigurationReader'),
  ProviderConfigurationValidator: Symbol.for('ProviderConfigurationValidator'),
  ClientConfigResolver: Symbol.for('ClientConfigResolver'),
  KubeConfigBuilder: Symbol.for('KubeConfigBuilder'),
  StorageDriverBinder: Symbol.for('StorageDriverBinder'),
  ProviderRuntimeState: Symbol.for('ProviderRuntimeState'),
};
