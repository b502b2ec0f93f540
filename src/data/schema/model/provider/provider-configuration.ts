// SPDX-License-Identifier: Apache-2.0

/**
 * Exec credential plugin invoked by the Kubernetes client to obtain credentials.
 */
export interface ExecConfiguration {
  apiVersion: string;
  command: string;
  args?: string[];
  env?: Record<string, string>;
}

/**
 * The `kubernetes` block of the provider configuration. Every field is optional;
 * unset fields fall back to the environment, kubeconfig files and in-cluster identity.
 */
export interface KubernetesConfiguration {
  host?: string;
  username?: string;
  password?: string;
  insecure?: boolean;
  clientCertificate?: string;
  clientKey?: string;
  clusterCaCertificate?: string;
  configPaths?: string[];
  configPath?: string;
  configContext?: string;
  configContextAuthInfo?: string;
  configContextCluster?: string;
  token?: string;
  /** At most one entry. */
  exec?: ExecConfiguration[];
}

export interface ProviderConfiguration {
  debug?: boolean;
  pluginsPath?: string;
  registryConfigPath?: string;
  repositoryConfigPath?: string;
  repositoryCache?: string;
  helmDriver?: string;
  kubernetes?: KubernetesConfiguration;
}
