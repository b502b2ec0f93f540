// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {ProviderMeta} from './provider-meta.js';
import {type ProviderConfiguration} from '../../data/schema/model/provider/provider-configuration.js';
import {type ClientConfigResolver} from '../../data/configuration/impl/client-config-resolver.js';
import {type KubeConfigBuilder} from '../../integration/kube/kube-config-builder.js';
import {type StorageDriverBinder} from '../../integration/helm/storage/storage-driver-binder.js';
import {ProviderConfigurationValidator} from '../validation/provider-configuration-validator.js';
import {Diagnostic} from '../validation/diagnostic.js';
import {DriverInvalidError} from '../errors/driver-invalid-error.js';
import {IllegalStateError} from '../errors/illegal-state-error.js';
import {HelmSettings} from '../settings/helm-settings.js';
import {type StorageDriver, StorageDrivers} from '../storage/storage-driver.js';
import {type EnvironmentSnapshot} from '../../types/index.js';
import {type ProviderLogger} from '../../core/logging/provider-logger.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';

export enum ProviderState {
  UNINITIALIZED = 'Uninitialized',
  READY = 'Ready',
}

export interface ConfigureResult {
  /** Present only when configuration succeeded. */
  readonly meta?: ProviderMeta;
  readonly diagnostics: Diagnostic[];
}

/**
 * Moves the provider from unconfigured to ready exactly once.
 */
@injectable()
export class ProviderRuntimeState {
  private _state: ProviderState = ProviderState.UNINITIALIZED;
  private _meta?: ProviderMeta;

  private readonly validator: ProviderConfigurationValidator;
  private readonly resolver: ClientConfigResolver;
  private readonly kubeConfigBuilder: KubeConfigBuilder;
  private readonly binder: StorageDriverBinder;
  private readonly logger: ProviderLogger;
  private readonly environment: EnvironmentSnapshot;

  public constructor(
    @inject(InjectTokens.ProviderConfigurationValidator) validator?: ProviderConfigurationValidator,
    @inject(InjectTokens.ClientConfigResolver) resolver?: ClientConfigResolver,
    @inject(InjectTokens.KubeConfigBuilder) kubeConfigBuilder?: KubeConfigBuilder,
    @inject(InjectTokens.StorageDriverBinder) binder?: StorageDriverBinder,
    @inject(InjectTokens.ProviderLogger) logger?: ProviderLogger,
    @inject(InjectTokens.Environment) environment?: EnvironmentSnapshot,
  ) {
    this.validator = patchInject(validator, InjectTokens.ProviderConfigurationValidator, this.constructor.name);
    this.resolver = patchInject(resolver, InjectTokens.ClientConfigResolver, this.constructor.name);
    this.kubeConfigBuilder = patchInject(kubeConfigBuilder, InjectTokens.KubeConfigBuilder, this.constructor.name);
    this.binder = patchInject(binder, InjectTokens.StorageDriverBinder, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.ProviderLogger, this.constructor.name);
    this.environment = patchInject(environment, InjectTokens.Environment, this.constructor.name);
  }

  public get state(): ProviderState {
    return this._state;
  }

  /**
   * @throws IllegalStateError - if the provider has not been configured
   */
  public get meta(): ProviderMeta {
    if (this._state !== ProviderState.READY || !this._meta) {
      throw new IllegalStateError('provider has not been configured');
    }
    return this._meta;
  }

  /**
   * Validates the configuration and, when it has no errors, creates the shared provider state.
   *
   * @throws IllegalStateError - if the provider is already configured
   */
  public configure(input: ProviderConfiguration): ConfigureResult {
    if (this._state === ProviderState.READY) {
      throw new IllegalStateError('provider has already been configured');
    }

    this.logger.nextTraceId();
    const diagnostics: Diagnostic[] = this.validator.validate(input, this.environment);
    if (Diagnostic.hasErrors(diagnostics)) {
      this.logger.debug(`provider configuration rejected with ${diagnostics.length} diagnostic(s)`);
      return {diagnostics};
    }

    const driverName: string = ProviderConfigurationValidator.driverName(input, this.environment);
    const driver: StorageDriver | undefined = StorageDrivers.parse(driverName);
    if (!driver) {
      return {diagnostics: [...diagnostics, Diagnostic.fromError(new DriverInvalidError(driverName))]};
    }

    const settings: HelmSettings = HelmSettings.from(input, this.environment);
    if (settings.debug) {
      this.logger.setDevMode(true);
    }

    this._meta = new ProviderMeta(input, this.environment, settings, driver, {
      resolver: this.resolver,
      kubeConfigBuilder: this.kubeConfigBuilder,
      binder: this.binder,
      logger: this.logger,
    });
    this._state = ProviderState.READY;
    this.logger.debug(`provider configured with storage driver ${driver}`);

    return {meta: this._meta, diagnostics};
  }
}
