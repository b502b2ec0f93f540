// SPDX-License-Identifier: Apache-2.0

import {existsSync} from 'node:fs';
import {readFile} from 'node:fs/promises';
import {type CredentialSource} from '../spi/credential-source.js';
import {type EffectiveClientConfig} from '../api/effective-client-config.js';
import {ConfigurationError} from '../api/configuration-error.js';
import {type EnvironmentSnapshot, type Mutable} from '../../../types/index.js';
import {EnvironmentEx} from '../../../business/utils/environment-ex.js';
import {PathEx} from '../../../business/utils/path-ex.js';
import * as constants from '../../../core/constants.js';

/**
 * Reads the service account identity mounted into a pod.
 */
export class InClusterCredentialSource implements CredentialSource {
  public constructor(
    private readonly environment: EnvironmentSnapshot,
    private readonly serviceAccountDirectory: string = constants.SERVICE_ACCOUNT_DIR,
  ) {}

  public get name(): string {
    return 'InClusterCredentialSource';
  }

  public get ordinal(): number {
    return 0;
  }

  public get tokenFile(): string {
    return PathEx.join(this.serviceAccountDirectory, constants.SERVICE_ACCOUNT_TOKEN_FILE);
  }

  public get caFile(): string {
    return PathEx.join(this.serviceAccountDirectory, constants.SERVICE_ACCOUNT_CA_FILE);
  }

  /**
   * True when the service host and port are set and the service account token is mounted.
   */
  public isAvailable(): boolean {
    return (
      EnvironmentEx.string(this.environment, constants.EnvironmentVariables.KubernetesServiceHost) !== undefined &&
      EnvironmentEx.string(this.environment, constants.EnvironmentVariables.KubernetesServicePort) !== undefined &&
      existsSync(this.tokenFile)
    );
  }

  public async read(): Promise<EffectiveClientConfig> {
    if (!this.isAvailable()) {
      return {};
    }

    const host: string = EnvironmentEx.string(this.environment, constants.EnvironmentVariables.KubernetesServiceHost) ?? '';
    const port: string = EnvironmentEx.string(this.environment, constants.EnvironmentVariables.KubernetesServicePort) ?? '';

    const partial: Mutable<EffectiveClientConfig> = {
      host: `https://${InClusterCredentialSource.joinHostPort(host, port)}`,
    };

    const token: string = (await this.readMounted(this.tokenFile)).trim();
    if (token.length > 0) {
      partial.token = token;
    }
    if (existsSync(this.caFile)) {
      partial.clusterCaCertificate = await this.readMounted(this.caFile);
    }

    return partial;
  }

  public static joinHostPort(host: string, port: string): string {
    return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
  }

  private async readMounted(file: string): Promise<string> {
    try {
      return await readFile(file, 'utf8');
    } catch (error) {
      throw new ConfigurationError(`unable to read service account file: ${file}`, error);
    }
  }
}
