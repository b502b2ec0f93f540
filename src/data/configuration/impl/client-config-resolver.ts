// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type EffectiveClientConfig} from '../api/effective-client-config.js';
import {type CredentialSource} from '../spi/credential-source.js';
import {ConfigPathConflictError} from '../api/config-path-conflict-error.js';
import {ExplicitCredentialSource} from './explicit-credential-source.js';
import {EnvironmentCredentialSource} from './environment-credential-source.js';
import {KubeconfigCredentialSource, type KubeconfigOverrides} from './kubeconfig-credential-source.js';
import {InClusterCredentialSource} from './in-cluster-credential-source.js';
import {LayeredClientConfig} from './layered-client-config.js';
import {type KubernetesConfiguration} from '../../schema/model/provider/provider-configuration.js';
import {type EnvironmentSnapshot} from '../../../types/index.js';
import {type ProviderLogger} from '../../../core/logging/provider-logger.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';

/**
 * The part of a resolution that depends only on the provider block and the environment snapshot.
 */
export interface PreparedClientConfig {
  readonly explicit: ExplicitCredentialSource;
  readonly ambient: EnvironmentCredentialSource;
  readonly environment: EnvironmentSnapshot;
  readonly configPaths: readonly string[];
  readonly overrides: KubeconfigOverrides;
}

/**
 * Resolves the effective client configuration from the explicit block, kubeconfig files, the environment and the
 * in-cluster service account, in that order of precedence.
 */
@injectable()
export class ClientConfigResolver {
  private readonly serviceAccountDirectory: string;
  private readonly logger: ProviderLogger;

  public constructor(
    @inject(InjectTokens.ServiceAccountDirectory) serviceAccountDirectory?: string,
    @inject(InjectTokens.ProviderLogger) logger?: ProviderLogger,
  ) {
    this.serviceAccountDirectory = patchInject(
      serviceAccountDirectory,
      InjectTokens.ServiceAccountDirectory,
      this.constructor.name,
    );
    this.logger = patchInject(logger, InjectTokens.ProviderLogger, this.constructor.name);
  }

  public static findConfigPathConflict(
    partials: readonly EffectiveClientConfig[],
  ): ConfigPathConflictError | undefined {
    const configPath: string | undefined = partials.find(
      (partial: EffectiveClientConfig): boolean => !!partial.configPath,
    )?.configPath;
    const configPaths: readonly string[] | undefined = partials.find(
      (partial: EffectiveClientConfig): boolean => (partial.configPaths?.length ?? 0) > 0,
    )?.configPaths;

    return configPath && configPaths ? new ConfigPathConflictError(configPath, configPaths) : undefined;
  }

  /**
   * Reads the explicit block and the environment and works out which kubeconfig files and entries to use. Touches no
   * files, so the result stays valid for as long as its inputs do.
   *
   * @throws ConfigPathConflictError
   */
  public prepare(
    kubernetes: KubernetesConfiguration | undefined,
    environment: EnvironmentSnapshot,
  ): PreparedClientConfig {
    const explicit: ExplicitCredentialSource = new ExplicitCredentialSource(kubernetes);
    const ambient: EnvironmentCredentialSource = new EnvironmentCredentialSource(environment);

    const conflict: ConfigPathConflictError | undefined = ClientConfigResolver.findConfigPathConflict([
      explicit.partial,
      ambient.partial,
    ]);
    if (conflict) {
      throw conflict;
    }

    const selectors: EffectiveClientConfig = LayeredClientConfig.merge([explicit.partial, ambient.partial]);
    return {
      explicit,
      ambient,
      environment,
      configPaths: selectors.configPaths ?? (selectors.configPath ? [selectors.configPath] : []),
      overrides: {
        context: selectors.configContext,
        cluster: selectors.configContextCluster,
        authInfo: selectors.configContextAuthInfo,
      },
    };
  }

  /**
   * Layers the prepared sources over the kubeconfig files and the in-cluster service account, reading those files
   * again on every call.
   *
   * @throws ConfigurationError - when a configured kubeconfig or a mounted service account file cannot be read
   */
  public async read(prepared: PreparedClientConfig): Promise<EffectiveClientConfig> {
    const layered: LayeredClientConfig = new LayeredClientConfig([
      prepared.explicit,
      prepared.ambient,
      new KubeconfigCredentialSource(prepared.configPaths, prepared.overrides),
      new InClusterCredentialSource(prepared.environment, this.serviceAccountDirectory),
    ]);

    this.logger.debug('resolving client configuration', {
      sources: layered.sources.map((source: CredentialSource): string => source.name),
      configPaths: prepared.configPaths,
    });

    return layered.resolve();
  }
}
