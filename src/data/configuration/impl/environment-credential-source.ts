// SPDX-License-Identifier: Apache-2.0

import {type CredentialSource} from '../spi/credential-source.js';
import {type EffectiveClientConfig} from '../api/effective-client-config.js';
import {type EnvironmentSnapshot, type Mutable} from '../../../types/index.js';
import {EnvironmentEx} from '../../../business/utils/environment-ex.js';
import {PathEx} from '../../../business/utils/path-ex.js';
import {EnvironmentVariables} from '../../../core/constants.js';

type EnvironmentStringField =
  | 'host'
  | 'username'
  | 'password'
  | 'clientCertificate'
  | 'clientKey'
  | 'clusterCaCertificate'
  | 'configPath'
  | 'configContext'
  | 'configContextAuthInfo'
  | 'configContextCluster'
  | 'token';

const STRING_VARIABLES: ReadonlyArray<[EnvironmentStringField, string]> = [
  ['host', EnvironmentVariables.KubeHost],
  ['username', EnvironmentVariables.KubeUser],
  ['password', EnvironmentVariables.KubePassword],
  ['clientCertificate', EnvironmentVariables.KubeClientCertData],
  ['clientKey', EnvironmentVariables.KubeClientKeyData],
  ['clusterCaCertificate', EnvironmentVariables.KubeClusterCaCertData],
  ['configPath', EnvironmentVariables.KubeConfigPath],
  ['configContext', EnvironmentVariables.KubeCtx],
  ['configContextAuthInfo', EnvironmentVariables.KubeCtxAuthInfo],
  ['configContextCluster', EnvironmentVariables.KubeCtxCluster],
  ['token', EnvironmentVariables.KubeToken],
];

/**
 * Reads the `KUBE_*` variables of an environment snapshot.
 */
export class EnvironmentCredentialSource implements CredentialSource {
  public readonly partial: EffectiveClientConfig;

  public constructor(
    environment: EnvironmentSnapshot,
    pathDelimiter?: string,
  ) {
    this.partial = EnvironmentCredentialSource.toPartial(environment, pathDelimiter);
  }

  public get name(): string {
    return 'EnvironmentCredentialSource';
  }

  public get ordinal(): number {
    return 100;
  }

  public async read(): Promise<EffectiveClientConfig> {
    return this.partial;
  }

  private static toPartial(environment: EnvironmentSnapshot, pathDelimiter?: string): EffectiveClientConfig {
    const partial: Mutable<EffectiveClientConfig> = {};

    for (const [field, variable] of STRING_VARIABLES) {
      const value: string | undefined = EnvironmentEx.string(environment, variable);
      if (value !== undefined) {
        partial[field] = value;
      }
    }

    const insecure: boolean | undefined = EnvironmentEx.boolean(environment, EnvironmentVariables.KubeInsecure);
    if (insecure !== undefined) {
      partial.insecure = insecure;
    }

    const configPaths: string | undefined = EnvironmentEx.string(environment, EnvironmentVariables.KubeConfigPaths);
    if (configPaths !== undefined) {
      const paths: string[] = PathEx.splitList(configPaths, pathDelimiter);
      if (paths.length > 0) {
        partial.configPaths = paths;
      }
    }

    return partial;
  }
}
