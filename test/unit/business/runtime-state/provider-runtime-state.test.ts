// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import os from 'node:os';
import {container} from 'tsyringe-neo';

import {
  type ConfigureResult,
  ProviderRuntimeState,
  ProviderState,
} from '../../../../src/business/runtime-state/provider-runtime-state.js';
import {ProviderConfigurationValidator} from '../../../../src/business/validation/provider-configuration-validator.js';
import {DiagnosticCode, type Diagnostic} from '../../../../src/business/validation/diagnostic.js';
import {ClientConfigResolver} from '../../../../src/data/configuration/impl/client-config-resolver.js';
import {KubeConfigBuilder} from '../../../../src/integration/kube/kube-config-builder.js';
import {StorageDriverBinder} from '../../../../src/integration/helm/storage/storage-driver-binder.js';
import {StorageDriver} from '../../../../src/business/storage/storage-driver.js';
import {IllegalStateError} from '../../../../src/business/errors/illegal-state-error.js';
import {PathEx} from '../../../../src/business/utils/path-ex.js';
import {InjectTokens} from '../../../../src/core/dependency-injection/inject-tokens.js';
import {type EnvironmentSnapshot} from '../../../../src/types/index.js';
import {RecordingLogger} from '../../../fixtures/recording-logger.js';
import {expectThrow} from '../../../fixtures/assertions.js';
import {resetTestContainer} from '../../../test-container.js';

describe('ProviderRuntimeState', (): void => {
  const serviceAccountDirectory: string = PathEx.join(os.tmpdir(), 'helm-provider-no-service-account');
  let logger: RecordingLogger;

  beforeEach((): void => {
    logger = new RecordingLogger();
  });

  function createState(environment: EnvironmentSnapshot = {}): ProviderRuntimeState {
    return new ProviderRuntimeState(
      new ProviderConfigurationValidator(serviceAccountDirectory, logger),
      new ClientConfigResolver(serviceAccountDirectory, logger),
      new KubeConfigBuilder(logger),
      new StorageDriverBinder(logger),
      logger,
      environment,
    );
  }

  it('should start unconfigured', (): void => {
    const state: ProviderRuntimeState = createState();

    expect(state.state).to.equal(ProviderState.UNINITIALIZED);
    const error: IllegalStateError = expectThrow((): unknown => state.meta, IllegalStateError);
    expect(error.message).to.equal('provider has not been configured');
  });

  it('should stay unconfigured when validation fails', (): void => {
    const state: ProviderRuntimeState = createState();

    const result: ConfigureResult = state.configure({helmDriver: 'redis'});

    expect(result.meta).to.be.undefined;
    expect(result.diagnostics.map((diagnostic: Diagnostic): DiagnosticCode => diagnostic.code)).to.deep.equal([
      DiagnosticCode.AUTHENTICATION_MISSING,
      DiagnosticCode.DRIVER_INVALID,
    ]);
    expect(state.state).to.equal(ProviderState.UNINITIALIZED);
  });

  it('should become ready once', (): void => {
    const state: ProviderRuntimeState = createState({HELM_DRIVER: 'memory'});

    const result: ConfigureResult = state.configure({helmDriver: 'ConfigMap', kubernetes: {token: 'test-token'}});

    expect(result.diagnostics).to.deep.equal([]);
    expect(state.state).to.equal(ProviderState.READY);
    expect(result.meta).to.equal(state.meta);
    expect(state.meta.driver).to.equal(StorageDriver.CONFIGMAP);
    expect(state.meta.environment).to.deep.equal({HELM_DRIVER: 'memory'});
    expect(logger.traceIds).to.equal(1);

    const error: IllegalStateError = expectThrow(
      (): unknown => state.configure({kubernetes: {token: 'test-token'}}),
      IllegalStateError,
    );
    expect(error.message).to.equal('provider has already been configured');
  });

  it('should allow a retry after a rejected configuration', (): void => {
    const state: ProviderRuntimeState = createState();

    state.configure({});
    const result: ConfigureResult = state.configure({kubernetes: {host: 'https://api.example.test'}});

    expect(result.meta).to.not.be.undefined;
    expect(state.state).to.equal(ProviderState.READY);
  });

  it('should switch the logger to development mode when debugging', (): void => {
    createState().configure({debug: true, kubernetes: {token: 'test-token'}});

    expect(logger.developmentMode).to.be.true;
  });

  describe('from the container', (): void => {
    afterEach((): void => {
      resetTestContainer();
    });

    it('should resolve against the registered environment', (): void => {
      resetTestContainer({KUBE_TOKEN: 'test-token', HELM_DRIVER: 'Secret'});
      const state: ProviderRuntimeState = container.resolve<ProviderRuntimeState>(InjectTokens.ProviderRuntimeState);

      const result: ConfigureResult = state.configure({});

      expect(result.diagnostics).to.deep.equal([]);
      expect(state.meta.driver).to.equal(StorageDriver.SECRET);
    });
  });
});
