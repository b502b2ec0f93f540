// SPDX-License-Identifier: Apache-2.0

import {existsSync} from 'node:fs';
import {readFile} from 'node:fs/promises';
import os from 'node:os';
import {type Cluster, type Context, KubeConfig, type User} from '@kubernetes/client-node';
import {type CredentialSource} from '../spi/credential-source.js';
import {
  type AuthProviderCredential,
  type EffectiveClientConfig,
  type ExecCredential,
} from '../api/effective-client-config.js';
import {ConfigurationError} from '../api/configuration-error.js';
import {type Mutable} from '../../../types/index.js';
import {PathEx} from '../../../business/utils/path-ex.js';
import {StringEx} from '../../../business/utils/string-ex.js';

export interface KubeconfigOverrides {
  readonly context?: string;
  readonly cluster?: string;
  readonly authInfo?: string;
}

interface LoadedKubeconfig {
  clusters: Cluster[];
  users: User[];
  contexts: Context[];
  currentContext?: string;
}

/**
 * Reads client settings out of one or more kubeconfig files. When several files are given, named entries from an
 * earlier file shadow those of a later one, and the first non-empty `current-context` is used.
 */
export class KubeconfigCredentialSource implements CredentialSource {
  public constructor(
    private readonly configPaths: readonly string[],
    private readonly overrides: KubeconfigOverrides = {},
    private readonly homeDirectory: string = os.homedir(),
  ) {}

  public get name(): string {
    return 'KubeconfigCredentialSource';
  }

  public get ordinal(): number {
    return 200;
  }

  public async read(): Promise<EffectiveClientConfig> {
    if (this.configPaths.length === 0) {
      return {};
    }

    const loaded: LoadedKubeconfig = this.load();

    const contextName: string | undefined = StringEx.firstNonEmpty(this.overrides.context, loaded.currentContext);
    const context: Context | undefined = contextName
      ? loaded.contexts.find((entry: Context): boolean => entry.name === contextName)
      : undefined;
    if (contextName && !context) {
      throw new ConfigurationError(`context "${contextName}" was not found in kubeconfig`, undefined, {
        configPaths: this.configPaths,
      });
    }

    const clusterName: string | undefined = StringEx.firstNonEmpty(this.overrides.cluster, context?.cluster);
    const cluster: Cluster | undefined = loaded.clusters.find((entry: Cluster): boolean => entry.name === clusterName);
    if (this.overrides.cluster && !cluster) {
      throw new ConfigurationError(`cluster "${this.overrides.cluster}" was not found in kubeconfig`);
    }

    const userName: string | undefined = StringEx.firstNonEmpty(this.overrides.authInfo, context?.user);
    const user: User | undefined = loaded.users.find((entry: User): boolean => entry.name === userName);
    if (this.overrides.authInfo && !user) {
      throw new ConfigurationError(`user "${this.overrides.authInfo}" was not found in kubeconfig`);
    }

    const partial: Mutable<EffectiveClientConfig> = {};
    if (cluster) {
      await this.readCluster(cluster, partial);
    }
    if (user) {
      await this.readUser(user, partial);
    }
    return partial;
  }

  private load(): LoadedKubeconfig {
    const loaded: LoadedKubeconfig = {clusters: [], users: [], contexts: []};

    for (const configPath of this.configPaths) {
      const file: string = PathEx.expandHome(configPath, this.homeDirectory);
      if (!existsSync(file)) {
        throw new ConfigurationError(`kubeconfig file not found: ${file}`, undefined, {configPath: file});
      }

      const kubeConfig: KubeConfig = new KubeConfig();
      try {
        kubeConfig.loadFromFile(file);
      } catch (error) {
        throw new ConfigurationError(`unable to load kubeconfig file: ${file}`, error, {configPath: file});
      }

      KubeconfigCredentialSource.mergeNamed(loaded.clusters, kubeConfig.getClusters());
      KubeconfigCredentialSource.mergeNamed(loaded.users, kubeConfig.getUsers());
      KubeconfigCredentialSource.mergeNamed(loaded.contexts, kubeConfig.getContexts());
      loaded.currentContext = StringEx.firstNonEmpty(loaded.currentContext, kubeConfig.getCurrentContext());
    }

    return loaded;
  }

  private static mergeNamed<T extends {readonly name: string}>(target: T[], entries: readonly T[]): void {
    for (const entry of entries) {
      if (!target.some((existing: T): boolean => existing.name === entry.name)) {
        target.push(entry);
      }
    }
  }

  private async readCluster(cluster: Cluster, partial: Mutable<EffectiveClientConfig>): Promise<void> {
    if (!StringEx.isEmpty(cluster.server)) {
      partial.host = cluster.server;
    }
    if (cluster.skipTLSVerify) {
      partial.insecure = true;
    }
    const ca: string | undefined = await KubeconfigCredentialSource.readPem(cluster.caData, cluster.caFile);
    if (ca !== undefined) {
      partial.clusterCaCertificate = ca;
    }
  }

  private async readUser(user: User, partial: Mutable<EffectiveClientConfig>): Promise<void> {
    const certificate: string | undefined = await KubeconfigCredentialSource.readPem(user.certData, user.certFile);
    if (certificate !== undefined) {
      partial.clientCertificate = certificate;
    }
    const key: string | undefined = await KubeconfigCredentialSource.readPem(user.keyData, user.keyFile);
    if (key !== undefined) {
      partial.clientKey = key;
    }
    if (!StringEx.isEmpty(user.token)) {
      partial.token = user.token;
    }
    if (!StringEx.isEmpty(user.username)) {
      partial.username = user.username;
    }
    if (!StringEx.isEmpty(user.password)) {
      partial.password = user.password;
    }
    const exec: ExecCredential | undefined = KubeconfigCredentialSource.toExecCredential(user.exec);
    if (exec) {
      partial.exec = exec;
    }
    const authProvider: AuthProviderCredential | undefined = KubeconfigCredentialSource.toAuthProvider(
      user.authProvider,
    );
    if (authProvider) {
      partial.authProvider = authProvider;
    }
  }

  /**
   * Decodes base64 `*-data` content, or reads the referenced file.
   */
  private static async readPem(data?: string, file?: string): Promise<string | undefined> {
    if (!StringEx.isEmpty(data)) {
      return Buffer.from(data, 'base64').toString('utf8');
    }
    if (!StringEx.isEmpty(file)) {
      try {
        return await readFile(file, 'utf8');
      } catch (error) {
        throw new ConfigurationError(`unable to read file referenced by kubeconfig: ${file}`, error);
      }
    }
    return undefined;
  }

  private static toExecCredential(exec: unknown): ExecCredential | undefined {
    if (exec === null || typeof exec !== 'object') {
      return undefined;
    }

    const apiVersion: unknown = 'apiVersion' in exec ? exec.apiVersion : undefined;
    const command: unknown = 'command' in exec ? exec.command : undefined;
    if (typeof command !== 'string' || command.length === 0) {
      return undefined;
    }

    const arguments_: unknown = 'args' in exec ? exec.args : undefined;
    const environment: unknown = 'env' in exec ? exec.env : undefined;

    const variables: unknown[] = Array.isArray(environment) ? environment : [];
    const env: Record<string, string> = {};
    for (const variable of variables) {
      if (
        variable !== null &&
        typeof variable === 'object' &&
        'name' in variable &&
        typeof variable.name === 'string' &&
        'value' in variable &&
        typeof variable.value === 'string'
      ) {
        env[variable.name] = variable.value;
      }
    }
    const argumentList: unknown[] = Array.isArray(arguments_) ? arguments_ : [];

    return {
      apiVersion: typeof apiVersion === 'string' ? apiVersion : '',
      command,
      args: argumentList.filter((argument: unknown): argument is string => typeof argument === 'string'),
      env,
    };
  }

  private static toAuthProvider(authProvider: unknown): AuthProviderCredential | undefined {
    if (authProvider === null || typeof authProvider !== 'object') {
      return undefined;
    }

    const name: unknown = 'name' in authProvider ? authProvider.name : undefined;
    if (typeof name !== 'string' || name.length === 0) {
      return undefined;
    }

    const settings: unknown = 'config' in authProvider ? authProvider.config : undefined;
    const config: Record<string, string> = {};
    if (settings !== null && typeof settings === 'object') {
      for (const [key, value] of Object.entries(settings)) {
        if (typeof value === 'string') {
          config[key] = value;
        }
      }
    }

    return {name, config};
  }
}
