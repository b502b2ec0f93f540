// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {type ProviderLogger} from '../logging/provider-logger.js';
import {ProviderPinoLogger} from '../logging/provider-pino-logger.js';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {SingletonContainer} from './singleton-container.js';
import {ValueContainer} from './value-container.js';
import {ProviderConfigurationReader} from '../../data/mapper/provider-configuration-reader.js';
import {ClientConfigResolver} from '../../data/configuration/impl/client-config-resolver.js';
import {ProviderConfigurationValidator} from '../../business/validation/provider-configuration-validator.js';
import {ProviderRuntimeState} from '../../business/runtime-state/provider-runtime-state.js';
import {KubeConfigBuilder} from '../../integration/kube/kube-config-builder.js';
import {StorageDriverBinder} from '../../integration/helm/storage/storage-driver-binder.js';
import {EnvironmentEx} from '../../business/utils/environment-ex.js';
import {type EnvironmentSnapshot} from '../../types/index.js';

export type InstanceOverrides = Map<symbol, SingletonContainer | ValueContainer>;

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized: boolean = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param logLevel - the log level to use, defaults to constants.PROVIDER_LOG_LEVEL
   * @param developmentMode - if true, show full stack traces in error messages
   * @param environment - the environment snapshot the provider resolves against, defaults to process.env
   * @param overrides - instances to use instead of the default implementations
   */
  public init(
    logLevel: string = constants.PROVIDER_LOG_LEVEL,
    developmentMode: boolean = false,
    environment: EnvironmentSnapshot = EnvironmentEx.snapshot(),
    overrides: InstanceOverrides = new Map<symbol, SingletonContainer | ValueContainer>(),
  ): void {
    if (Container.isInitialized) {
      container.resolve<ProviderLogger>(InjectTokens.ProviderLogger).debug('Container already initialized');
      return;
    }

    const singletonContainers: SingletonContainer[] = [
      new SingletonContainer(InjectTokens.ProviderLogger, ProviderPinoLogger),
      new SingletonContainer(InjectTokens.ProviderConfigurationReader, ProviderConfigurationReader),
      new SingletonContainer(InjectTokens.ProviderConfigurationValidator, ProviderConfigurationValidator),
      new SingletonContainer(InjectTokens.ClientConfigResolver, ClientConfigResolver),
      new SingletonContainer(InjectTokens.KubeConfigBuilder, KubeConfigBuilder),
      new SingletonContainer(InjectTokens.StorageDriverBinder, StorageDriverBinder),
      new SingletonContainer(InjectTokens.ProviderRuntimeState, ProviderRuntimeState),
    ];

    const valueContainers: ValueContainer[] = [
      new ValueContainer(InjectTokens.LogLevel, logLevel),
      new ValueContainer(InjectTokens.DevelopmentMode, developmentMode),
      new ValueContainer(InjectTokens.LogsDirectory, constants.PROVIDER_LOGS_DIR),
      new ValueContainer(InjectTokens.Environment, environment),
      new ValueContainer(InjectTokens.ServiceAccountDirectory, constants.SERVICE_ACCOUNT_DIR),
      new ValueContainer(InjectTokens.HelmExecutable, constants.HELM),
    ];

    for (const [token, override] of overrides) {
      if (override instanceof SingletonContainer) {
        container.register(token, {useClass: override.useClass}, {lifecycle: override.lifecycle});
      } else {
        container.register(token, {useValue: override.useValue});
      }
    }

    for (const value of valueContainers) {
      if (!overrides.has(value.token)) {
        container.register(value.token, {useValue: value.useValue});
      }
    }

    for (const singleton of singletonContainers) {
      if (!overrides.has(singleton.token)) {
        container.register(singleton.token, {useClass: singleton.useClass}, {lifecycle: singleton.lifecycle});
      }
    }

    container.resolve<ProviderLogger>(InjectTokens.ProviderLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param environment - the environment snapshot the provider resolves against
   * @param overrides - instances to use instead of the default implementations
   */
  public reset(
    logLevel?: string,
    developmentMode?: boolean,
    environment?: EnvironmentSnapshot,
    overrides?: InstanceOverrides,
  ): void {
    if (Container.instance && Container.isInitialized) {
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(logLevel, developmentMode, environment, overrides);
  }

  /**
   * only call dispose when you are about to system exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
  }
}
