// SPDX-License-Identifier: Apache-2.0

/**
 * Exec credential plugin descriptor in the shape the Kubernetes client consumes.
 */
export interface ExecCredential {
  readonly apiVersion: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly env: Readonly<Record<string, string>>;
}

/**
 * Authentication provider entry of a kubeconfig user, such as oidc or azure, handed back to the Kubernetes client.
 */
export interface AuthProviderCredential {
  readonly name: string;
  readonly config: Readonly<Record<string, string>>;
}

/**
 * The client connection configuration after precedence resolution. A credential source reports a partial
 * instance: a field it cannot supply is left undefined.
 */
export interface EffectiveClientConfig {
  readonly host?: string;
  readonly username?: string;
  readonly password?: string;
  readonly insecure?: boolean;
  readonly clientCertificate?: string;
  readonly clientKey?: string;
  readonly clusterCaCertificate?: string;
  readonly configPath?: string;
  readonly configPaths?: readonly string[];
  readonly configContext?: string;
  readonly configContextAuthInfo?: string;
  readonly configContextCluster?: string;
  readonly token?: string;
  readonly exec?: ExecCredential;
  readonly authProvider?: AuthProviderCredential;
}

export type ClientConfigField = keyof EffectiveClientConfig;

export const CLIENT_CONFIG_FIELDS: readonly ClientConfigField[] = [
  'host',
  'username',
  'password',
  'insecure',
  'clientCertificate',
  'clientKey',
  'clusterCaCertificate',
  'configPath',
  'configPaths',
  'configContext',
  'configContextAuthInfo',
  'configContextCluster',
  'token',
  'exec',
  'authProvider',
];
