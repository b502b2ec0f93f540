// SPDX-License-Identifier: Apache-2.0

import os from 'node:os';
import {type ProviderConfiguration} from '../../data/schema/model/provider/provider-configuration.js';
import {type EnvironmentSnapshot} from '../../types/index.js';
import {EnvironmentEx} from '../utils/environment-ex.js';
import {StringEx} from '../utils/string-ex.js';
import {HelmPaths} from './helm-paths.js';
import {EnvironmentVariables} from '../../core/constants.js';

/**
 * Helm CLI settings shared by every action. Created once and frozen.
 */
export class HelmSettings {
  private constructor(
    public readonly debug: boolean,
    public readonly pluginsDirectory: string,
    public readonly registryConfig: string,
    public readonly repositoryConfig: string,
    public readonly repositoryCache: string,
  ) {}

  /**
   * Each value is taken from the provider configuration, else the environment, else Helm's default location.
   */
  public static from(
    input: ProviderConfiguration,
    environment: EnvironmentSnapshot,
    platform: NodeJS.Platform = process.platform,
    homeDirectory: string = os.homedir(),
  ): HelmSettings {
    const paths: HelmPaths = new HelmPaths(environment, platform, homeDirectory);

    const pick = (explicit: string | undefined, variable: string, fallback: string): string =>
      StringEx.firstNonEmpty(explicit, EnvironmentEx.string(environment, variable)) ?? fallback;

    return Object.freeze(
      new HelmSettings(
        input.debug ?? EnvironmentEx.boolean(environment, EnvironmentVariables.HelmDebug) ?? false,
        pick(input.pluginsPath, EnvironmentVariables.HelmPlugins, paths.dataPath('plugins')),
        pick(input.registryConfigPath, EnvironmentVariables.HelmRegistryConfig, paths.configPath('registry', 'config.json')),
        pick(input.repositoryConfigPath, EnvironmentVariables.HelmRepositoryConfig, paths.configPath('repositories.yaml')),
        pick(input.repositoryCache, EnvironmentVariables.HelmRepositoryCache, paths.cachePath('repository')),
      ),
    );
  }
}
