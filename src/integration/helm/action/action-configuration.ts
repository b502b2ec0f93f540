// SPDX-License-Identifier: Apache-2.0

import {chmod, mkdir, writeFile} from 'node:fs/promises';
import {type KubeConfig} from '@kubernetes/client-node';
import {type HelmRequest} from '../request/helm-request.js';
import {type HelmExecutionBuilder} from '../execution/helm-execution-builder.js';
import {type StorageBinding} from '../storage/storage-binding.js';
import {StorageDriver} from '../../../business/storage/storage-driver.js';
import {type HelmSettings} from '../../../business/settings/helm-settings.js';
import {IllegalStateError} from '../../../business/errors/illegal-state-error.js';
import {PathEx} from '../../../business/utils/path-ex.js';
import {type ActionLogSink} from '../../../types/index.js';
import * as constants from '../../../core/constants.js';

/**
 * Everything a Helm action needs to run against one namespace: the cluster client configuration, the storage
 * backend binding and the shared Helm settings. A new instance is handed out for every request.
 */
export class ActionConfiguration implements HelmRequest {
  private kubeConfigFile?: string;

  public constructor(
    public readonly kubeConfig: KubeConfig,
    public readonly namespace: string,
    public readonly driver: StorageDriver,
    public readonly storage: StorageBinding,
    public readonly settings: HelmSettings,
    public readonly log: ActionLogSink,
  ) {}

  /**
   * Writes the client configuration as a kubeconfig file readable only by the current user.
   *
   * @param directory - created when missing
   * @returns the path of the written file
   */
  public async writeKubeConfig(directory: string): Promise<string> {
    await mkdir(directory, {recursive: true});
    const file: string = PathEx.join(directory, `kubeconfig-${this.namespace}`);
    await writeFile(file, this.kubeConfig.exportConfig(), {mode: constants.KUBECONFIG_FILE_MODE});
    await chmod(file, constants.KUBECONFIG_FILE_MODE);

    this.kubeConfigFile = file;
    this.log('wrote kubeconfig for namespace %s to %s', this.namespace, file);
    return file;
  }

  /**
   * Points a helm command at this configuration through its environment.
   *
   * @throws IllegalStateError - if the kubeconfig has not been written yet
   */
  public apply(builder: HelmExecutionBuilder): void {
    if (!this.kubeConfigFile) {
      throw new IllegalStateError('the kubeconfig must be written before the action configuration is applied');
    }

    const variables: typeof constants.EnvironmentVariables = constants.EnvironmentVariables;
    builder
      .environmentVariable(variables.Kubeconfig, this.kubeConfigFile)
      .environmentVariable(variables.HelmDriver, this.driver)
      .environmentVariable(variables.HelmNamespace, this.namespace)
      .environmentVariable(variables.HelmDebug, String(this.settings.debug))
      .environmentVariable(variables.HelmPlugins, this.settings.pluginsDirectory)
      .environmentVariable(variables.HelmRegistryConfig, this.settings.registryConfig)
      .environmentVariable(variables.HelmRepositoryConfig, this.settings.repositoryConfig)
      .environmentVariable(variables.HelmRepositoryCache, this.settings.repositoryCache);

    if (this.storage.driver === StorageDriver.SQL) {
      builder.environmentVariable(variables.HelmDriverSqlConnectionString, this.storage.connectionString);
    }
  }
}
