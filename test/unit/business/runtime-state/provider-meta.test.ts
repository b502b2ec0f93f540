// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import sinon, {type SinonSpy, type SinonStub} from 'sinon';
import fs from 'node:fs';
import os from 'node:os';
import {type KubeConfig} from '@kubernetes/client-node';

import {ProviderMeta} from '../../../../src/business/runtime-state/provider-meta.js';
import {type ProviderConfiguration} from '../../../../src/data/schema/model/provider/provider-configuration.js';
import {ClientConfigResolver} from '../../../../src/data/configuration/impl/client-config-resolver.js';
import {ConfigPathConflictError} from '../../../../src/data/configuration/api/config-path-conflict-error.js';
import {ConfigurationError} from '../../../../src/data/configuration/api/configuration-error.js';
import {KubeConfigBuilder} from '../../../../src/integration/kube/kube-config-builder.js';
import {ClientConstructionError} from '../../../../src/integration/kube/errors/client-construction-error.js';
import {StorageDriverBinder} from '../../../../src/integration/helm/storage/storage-driver-binder.js';
import {type StorageBinding} from '../../../../src/integration/helm/storage/storage-binding.js';
import {BackendBindError} from '../../../../src/integration/helm/errors/backend-bind-error.js';
import {type ActionConfiguration} from '../../../../src/integration/helm/action/action-configuration.js';
import {HelmSettings} from '../../../../src/business/settings/helm-settings.js';
import {StorageDriver} from '../../../../src/business/storage/storage-driver.js';
import {IllegalArgumentError} from '../../../../src/business/errors/illegal-argument-error.js';
import {MissingArgumentError} from '../../../../src/business/errors/missing-argument-error.js';
import {PathEx} from '../../../../src/business/utils/path-ex.js';
import {type EnvironmentSnapshot} from '../../../../src/types/index.js';
import {RecordingLogger} from '../../../fixtures/recording-logger.js';
import {makeTemporaryDirectory} from '../../../test-container.js';
import {writeKubeconfig} from '../../../fixtures/kubeconfig.js';
import {expectRejection} from '../../../fixtures/assertions.js';

const tick: () => Promise<void> = (): Promise<void> => new Promise((resolve): NodeJS.Immediate => setImmediate(resolve));

describe('ProviderMeta', (): void => {
  const settings: HelmSettings = HelmSettings.from({}, {}, 'linux', '/home/test');
  const authenticated: ProviderConfiguration = {kubernetes: {host: 'https://api.example.test', token: 'test-token'}};

  let logger: RecordingLogger;
  let resolver: ClientConfigResolver;
  let kubeConfigBuilder: KubeConfigBuilder;
  let binder: StorageDriverBinder;

  beforeEach((): void => {
    logger = new RecordingLogger();
    resolver = new ClientConfigResolver(PathEx.join(os.tmpdir(), 'helm-provider-no-service-account'), logger);
    kubeConfigBuilder = new KubeConfigBuilder(logger);
    binder = new StorageDriverBinder(logger);
  });

  afterEach((): void => {
    sinon.restore();
  });

  function createMeta(
    input: ProviderConfiguration = authenticated,
    driver: StorageDriver = StorageDriver.MEMORY,
    environment: EnvironmentSnapshot = {},
  ): ProviderMeta {
    return new ProviderMeta(input, environment, settings, driver, {resolver, kubeConfigBuilder, binder, logger});
  }

  it('should hand out an action configuration bound to the namespace', async (): Promise<void> => {
    const meta: ProviderMeta = createMeta();

    const configuration: ActionConfiguration = await meta.getActionConfiguration('apps');

    expect(configuration.namespace).to.equal('apps');
    expect(configuration.driver).to.equal(StorageDriver.MEMORY);
    expect(configuration.storage.driver).to.equal(StorageDriver.MEMORY);
    expect(configuration.storage.namespace).to.equal('apps');
    expect(configuration.settings).to.equal(settings);
    expect(configuration.kubeConfig.getCurrentCluster()?.server).to.equal('https://api.example.test');
    expect(configuration.kubeConfig.getContextObject('default')?.namespace).to.equal('apps');

    const debug: string[] = logger.messages('debug');
    expect(debug.indexOf('getActionConfiguration start')).to.be.lessThan(
      debug.indexOf('getActionConfiguration success'),
    );
    expect(debug).to.include('getActionConfiguration start');
  });

  it('should send action logs to the debug level', async (): Promise<void> => {
    const configuration: ActionConfiguration = await createMeta().getActionConfiguration('apps');

    configuration.log('installing %s', 'web');

    expect(logger.messages('debug')).to.include('installing web');
  });

  it('should hand out a new configuration on every call', async (): Promise<void> => {
    const meta: ProviderMeta = createMeta();

    const first: ActionConfiguration = await meta.getActionConfiguration('apps');
    const second: ActionConfiguration = await meta.getActionConfiguration('apps');

    expect(first).to.not.equal(second);
  });

  it('should prepare the explicit and environment layers once and read files on every call', async (): Promise<void> => {
    const prepare: SinonSpy = sinon.spy(resolver, 'prepare');
    const read: SinonSpy = sinon.spy(resolver, 'read');
    const meta: ProviderMeta = createMeta();

    await meta.getActionConfiguration('apps');
    await meta.getActionConfiguration('web');

    expect(prepare).to.have.been.calledOnce;
    expect(read).to.have.been.calledTwice;
  });

  it('should pick up a rotated service account token', async (): Promise<void> => {
    const serviceAccountDirectory: string = makeTemporaryDirectory();
    const tokenFile: string = PathEx.join(serviceAccountDirectory, 'token');
    fs.writeFileSync(tokenFile, 'first-token');
    resolver = new ClientConfigResolver(serviceAccountDirectory, logger);
    const meta: ProviderMeta = createMeta({}, StorageDriver.MEMORY, {
      KUBERNETES_SERVICE_HOST: '10.0.0.1',
      KUBERNETES_SERVICE_PORT: '443',
    });

    const first: ActionConfiguration = await meta.getActionConfiguration('apps');
    fs.writeFileSync(tokenFile, 'second-token');
    const second: ActionConfiguration = await meta.getActionConfiguration('apps');

    expect(first.kubeConfig.getCurrentUser()?.token).to.equal('first-token');
    expect(second.kubeConfig.getCurrentUser()?.token).to.equal('second-token');
    expect(second.kubeConfig.getCurrentCluster()?.server).to.equal('https://10.0.0.1:443');
  });

  it('should pick up an edited kubeconfig', async (): Promise<void> => {
    const directory: string = makeTemporaryDirectory();
    const kubeconfigWithToken: (token: string) => Record<string, unknown> = (token: string): Record<string, unknown> => ({
      apiVersion: 'v1',
      kind: 'Config',
      'current-context': 'edit',
      clusters: [{name: 'edit-cluster', cluster: {server: 'https://edit.example.test'}}],
      users: [{name: 'edit-user', user: {token}}],
      contexts: [{name: 'edit', context: {cluster: 'edit-cluster', user: 'edit-user'}}],
    });
    const kubeconfig: string = writeKubeconfig(directory, 'config', kubeconfigWithToken('first-token'));
    const meta: ProviderMeta = createMeta({kubernetes: {configPath: kubeconfig}});

    const first: ActionConfiguration = await meta.getActionConfiguration('apps');
    writeKubeconfig(directory, 'config', kubeconfigWithToken('second-token'));
    const second: ActionConfiguration = await meta.getActionConfiguration('apps');

    expect(first.kubeConfig.getCurrentUser()?.token).to.equal('first-token');
    expect(second.kubeConfig.getCurrentUser()?.token).to.equal('second-token');
    expect(second.kubeConfig.getCurrentCluster()?.server).to.equal('https://edit.example.test');
  });

  it('should reject an empty namespace', async (): Promise<void> => {
    const error: IllegalArgumentError = await expectRejection(
      (): Promise<unknown> => createMeta().getActionConfiguration(''),
      IllegalArgumentError,
    );
    expect(error.message).to.equal('namespace must not be empty');
  });

  it('should reject a namespace that is not a DNS-1123 label', async (): Promise<void> => {
    const error: IllegalArgumentError = await expectRejection(
      (): Promise<unknown> => createMeta().getActionConfiguration('Apps_1'),
      IllegalArgumentError,
    );
    expect(error.message).to.equal('namespace "Apps_1" is not a valid DNS-1123 label');
  });

  it('should wrap client construction failures', async (): Promise<void> => {
    const meta: ProviderMeta = createMeta({kubernetes: {token: 'test-token'}});

    const error: ClientConstructionError = await expectRejection(
      (): Promise<unknown> => meta.getActionConfiguration('apps'),
      ClientConstructionError,
    );

    expect(error.message).to.equal('failed to get kubernetes client configuration for namespace "apps"');
    expect(error.cause).to.be.instanceOf(ConfigurationError);
  });

  it('should not wrap a config path conflict', async (): Promise<void> => {
    const meta: ProviderMeta = createMeta({kubernetes: {configPath: '/a', configPaths: ['/b']}});

    await expectRejection((): Promise<unknown> => meta.getActionConfiguration('apps'), ConfigPathConflictError);
  });

  it('should wrap storage binding failures', async (): Promise<void> => {
    const meta: ProviderMeta = createMeta(authenticated, StorageDriver.SQL);

    const error: BackendBindError = await expectRejection(
      (): Promise<unknown> => meta.getActionConfiguration('apps'),
      BackendBindError,
    );

    expect(error.message).to.equal('failed to initialize helm storage driver "sql" for namespace "apps"');
    expect(error.cause).to.be.instanceOf(MissingArgumentError);
  });

  it('should release the guard after a failure', async (): Promise<void> => {
    const bind: SinonStub = sinon.stub(binder, 'bind');
    bind.onFirstCall().rejects(new Error('boom'));
    bind.callThrough();
    const meta: ProviderMeta = createMeta();

    await expectRejection((): Promise<unknown> => meta.getActionConfiguration('apps'), BackendBindError);
    const configuration: ActionConfiguration = await meta.getActionConfiguration('apps');

    expect(configuration.namespace).to.equal('apps');
    expect(bind).to.have.been.calledTwice;
  });

  it('should serve concurrent callers one at a time in arrival order', async (): Promise<void> => {
    let active: number = 0;
    let maximum: number = 0;
    const order: string[] = [];

    sinon.stub(binder, 'bind').callsFake(async (_kubeConfig: KubeConfig, namespace: string): Promise<StorageBinding> => {
      active += 1;
      maximum = Math.max(maximum, active);
      order.push(namespace);
      await tick();
      await tick();
      active -= 1;
      return {driver: StorageDriver.MEMORY, namespace, records: new Map<string, string>()};
    });

    const meta: ProviderMeta = createMeta();
    const namespaces: string[] = Array.from({length: 8}, (_value: unknown, index: number): string => `team-${index}`);

    const configurations: ActionConfiguration[] = await Promise.all(
      namespaces.map((namespace: string): Promise<ActionConfiguration> => meta.getActionConfiguration(namespace)),
    );

    expect(maximum).to.equal(1);
    expect(order).to.deep.equal(namespaces);
    expect(configurations.map((configuration: ActionConfiguration): string => configuration.namespace)).to.deep.equal(
      namespaces,
    );
  });

  it('should keep a frozen copy of the configuration', (): void => {
    const input: ProviderConfiguration = {helmDriver: 'memory', kubernetes: {host: 'https://api.example.test'}};
    const meta: ProviderMeta = createMeta(input);

    input.helmDriver = 'secret';

    expect(meta.input.helmDriver).to.equal('memory');
    expect(Object.isFrozen(meta.input)).to.be.true;
    expect(Object.isFrozen(meta.input.kubernetes)).to.be.true;
  });
});
