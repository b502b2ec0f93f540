// SPDX-License-Identifier: Apache-2.0

import os from 'node:os';
import {type EnvironmentSnapshot} from '../../types/index.js';
import {EnvironmentEx} from '../utils/environment-ex.js';
import {PathEx} from '../utils/path-ex.js';
import {EnvironmentVariables} from '../../core/constants.js';

const HELM_DIRECTORY: string = 'helm';

/**
 * Helm's configuration, data and cache home directories. `HELM_*_HOME` is used as is; otherwise the XDG variable or
 * the platform default is suffixed with `helm`.
 */
export class HelmPaths {
  public constructor(
    private readonly environment: EnvironmentSnapshot,
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly homeDirectory: string = os.homedir(),
  ) {}

  public configPath(...elements: string[]): string {
    return this.resolve(
      EnvironmentVariables.HelmConfigHome,
      EnvironmentVariables.XdgConfigHome,
      this.defaultConfigHome(),
      elements,
    );
  }

  public dataPath(...elements: string[]): string {
    return this.resolve(EnvironmentVariables.HelmDataHome, EnvironmentVariables.XdgDataHome, this.defaultDataHome(), elements);
  }

  public cachePath(...elements: string[]): string {
    return this.resolve(
      EnvironmentVariables.HelmCacheHome,
      EnvironmentVariables.XdgCacheHome,
      this.defaultCacheHome(),
      elements,
    );
  }

  private resolve(helmVariable: string, xdgVariable: string, fallback: string, elements: string[]): string {
    const helmHome: string | undefined = EnvironmentEx.string(this.environment, helmVariable);
    if (helmHome !== undefined) {
      return PathEx.join(helmHome, ...elements);
    }
    const base: string = EnvironmentEx.string(this.environment, xdgVariable) ?? fallback;
    return PathEx.join(base, HELM_DIRECTORY, ...elements);
  }

  private defaultConfigHome(): string {
    switch (this.platform) {
      case 'darwin': {
        return PathEx.join(this.homeDirectory, 'Library', 'Preferences');
      }
      case 'win32': {
        return this.windowsVariable(EnvironmentVariables.AppData);
      }
      default: {
        return PathEx.join(this.homeDirectory, '.config');
      }
    }
  }

  private defaultDataHome(): string {
    switch (this.platform) {
      case 'darwin': {
        return PathEx.join(this.homeDirectory, 'Library');
      }
      case 'win32': {
        return this.windowsVariable(EnvironmentVariables.AppData);
      }
      default: {
        return PathEx.join(this.homeDirectory, '.local', 'share');
      }
    }
  }

  private defaultCacheHome(): string {
    switch (this.platform) {
      case 'darwin': {
        return PathEx.join(this.homeDirectory, 'Library', 'Caches');
      }
      case 'win32': {
        return this.windowsVariable(EnvironmentVariables.Temp);
      }
      default: {
        return PathEx.join(this.homeDirectory, '.cache');
      }
    }
  }

  private windowsVariable(name: string): string {
    return EnvironmentEx.string(this.environment, name) ?? this.homeDirectory;
  }
}
