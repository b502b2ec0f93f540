// SPDX-License-Identifier: Apache-2.0

import {type CredentialSource} from '../spi/credential-source.js';
import {type EffectiveClientConfig, type ExecCredential} from '../api/effective-client-config.js';
import {
  type ExecConfiguration,
  type KubernetesConfiguration,
} from '../../schema/model/provider/provider-configuration.js';
import {type Mutable} from '../../../types/index.js';
import {StringEx} from '../../../business/utils/string-ex.js';

/**
 * Reads the fields set directly on the `kubernetes` block of the provider configuration.
 */
export class ExplicitCredentialSource implements CredentialSource {
  public readonly partial: EffectiveClientConfig;

  public constructor(kubernetes?: KubernetesConfiguration) {
    this.partial = ExplicitCredentialSource.toPartial(kubernetes);
  }

  public get name(): string {
    return 'ExplicitCredentialSource';
  }

  public get ordinal(): number {
    return 300;
  }

  public async read(): Promise<EffectiveClientConfig> {
    return this.partial;
  }

  private static toPartial(kubernetes?: KubernetesConfiguration): EffectiveClientConfig {
    const partial: Mutable<EffectiveClientConfig> = {};
    if (!kubernetes) {
      return partial;
    }

    for (const key of [
      'host',
      'username',
      'password',
      'clientCertificate',
      'clientKey',
      'clusterCaCertificate',
      'configPath',
      'configContext',
      'configContextAuthInfo',
      'configContextCluster',
      'token',
    ] as const) {
      const value: string | undefined = kubernetes[key];
      if (!StringEx.isEmpty(value)) {
        partial[key] = value;
      }
    }

    if (kubernetes.insecure !== undefined && kubernetes.insecure !== null) {
      partial.insecure = kubernetes.insecure;
    }
    if (kubernetes.configPaths && kubernetes.configPaths.length > 0) {
      partial.configPaths = [...kubernetes.configPaths];
    }

    const exec: ExecConfiguration | undefined = kubernetes.exec?.[0];
    if (exec) {
      partial.exec = ExplicitCredentialSource.toExecCredential(exec);
    }

    return partial;
  }

  private static toExecCredential(exec: ExecConfiguration): ExecCredential {
    return {
      apiVersion: exec.apiVersion,
      command: exec.command,
      args: [...(exec.args ?? [])],
      env: {...exec.env},
    };
  }
}
