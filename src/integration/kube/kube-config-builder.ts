// SPDX-License-Identifier: Apache-2.0

import {X509Certificate, createPrivateKey} from 'node:crypto';
import {type Cluster, type Context, KubeConfig, type User} from '@kubernetes/client-node';
import {inject, injectable} from 'tsyringe-neo';
import {type EffectiveClientConfig, type ExecCredential} from '../../data/configuration/api/effective-client-config.js';
import {ConfigurationError} from '../../data/configuration/api/configuration-error.js';
import {StringEx} from '../../business/utils/string-ex.js';
import {type ProviderLogger} from '../../core/logging/provider-logger.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import * as constants from '../../core/constants.js';

const PEM_CERTIFICATE_PATTERN: RegExp = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;
const URL_SCHEME_PATTERN: RegExp = /^[a-z][\d+.a-z-]*:\/\//i;

/**
 * Builds a single cluster, single user `KubeConfig` from a resolved client configuration.
 */
@injectable()
export class KubeConfigBuilder {
  private readonly logger: ProviderLogger;

  public constructor(@inject(InjectTokens.ProviderLogger) logger?: ProviderLogger) {
    this.logger = patchInject(logger, InjectTokens.ProviderLogger, this.constructor.name);
  }

  /**
   * @param config - the resolved client configuration
   * @param namespace - default namespace of the generated context
   * @throws ConfigurationError - when the host is missing or malformed, or TLS material is invalid
   */
  public build(config: EffectiveClientConfig, namespace: string): KubeConfig {
    const hasTls: boolean =
      !StringEx.isEmpty(config.clusterCaCertificate) ||
      !StringEx.isEmpty(config.clientCertificate) ||
      config.insecure === true;
    const server: string = KubeConfigBuilder.server(config.host, hasTls);

    if (!StringEx.isEmpty(config.clusterCaCertificate)) {
      KubeConfigBuilder.validateCertificateBundle(config.clusterCaCertificate, 'cluster_ca_certificate');
    }
    KubeConfigBuilder.validateClientCertificate(config.clientCertificate, config.clientKey);

    const name: string = constants.DEFAULT_CONTEXT_NAME;

    const cluster: Cluster = {
      name,
      server,
      skipTLSVerify: config.insecure ?? false,
      caData: KubeConfigBuilder.base64(config.clusterCaCertificate),
    };

    const user: User = {
      name,
      certData: KubeConfigBuilder.base64(config.clientCertificate),
      keyData: KubeConfigBuilder.base64(config.clientKey),
      token: StringEx.firstNonEmpty(config.token),
      username: StringEx.firstNonEmpty(config.username),
      password: StringEx.firstNonEmpty(config.password),
      exec: config.exec ? KubeConfigBuilder.toKubeconfigExec(config.exec) : undefined,
      authProvider: config.authProvider
        ? {name: config.authProvider.name, config: {...config.authProvider.config}}
        : undefined,
    };

    const context: Context = {name, cluster: name, user: name, namespace};

    const kubeConfig: KubeConfig = new KubeConfig();
    kubeConfig.loadFromOptions({clusters: [cluster], users: [user], contexts: [context], currentContext: name});

    this.logger.debug(`built kubernetes client configuration for ${server} in namespace ${namespace}`);
    return kubeConfig;
  }

  /**
   * Adds a scheme to a bare host: https when TLS settings are present, http otherwise.
   */
  public static server(host: string | undefined, hasTls: boolean): string {
    if (StringEx.isBlank(host) || host === undefined) {
      throw new ConfigurationError('no Kubernetes API server host was configured');
    }

    const server: string = URL_SCHEME_PATTERN.test(host) ? host : `${hasTls ? 'https' : 'http'}://${host}`;
    if (!URL.canParse(server)) {
      throw new ConfigurationError(`host is not a valid URL: ${host}`, undefined, {host});
    }
    return server;
  }

  private static validateCertificateBundle(pem: string, field: string): void {
    const blocks: string[] = pem.match(PEM_CERTIFICATE_PATTERN) ?? [];
    if (blocks.length === 0) {
      throw new ConfigurationError(`${field} does not contain a PEM encoded certificate`);
    }
    for (const block of blocks) {
      try {
        new X509Certificate(block);
      } catch (error) {
        throw new ConfigurationError(`${field} contains an invalid X.509 certificate`, error);
      }
    }
  }

  private static validateClientCertificate(certificate?: string, key?: string): void {
    const hasCertificate: boolean = !StringEx.isEmpty(certificate);
    const hasKey: boolean = !StringEx.isEmpty(key);
    if (hasCertificate !== hasKey) {
      throw new ConfigurationError('client_certificate and client_key must be configured together');
    }
    if (certificate === undefined || key === undefined || !hasCertificate) {
      return;
    }

    KubeConfigBuilder.validateCertificateBundle(certificate, 'client_certificate');
    try {
      createPrivateKey(key);
    } catch (error) {
      throw new ConfigurationError('client_key is not a valid PEM encoded private key', error);
    }
  }

  private static base64(pem?: string): string | undefined {
    return StringEx.isEmpty(pem) ? undefined : Buffer.from(pem, 'utf8').toString('base64');
  }

  private static toKubeconfigExec(exec: ExecCredential): {
    apiVersion: string;
    command: string;
    args: string[];
    env: {name: string; value: string}[];
  } {
    return {
      apiVersion: exec.apiVersion,
      command: exec.command,
      args: [...exec.args],
      env: Object.entries(exec.env).map(([name, value]: [string, string]): {name: string; value: string} => ({
        name,
        value,
      })),
    };
  }
}
