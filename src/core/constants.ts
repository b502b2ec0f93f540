// SPDX-License-Identifier: Apache-2.0

import os from 'node:os';
import {PathEx} from '../business/utils/path-ex.js';

export const PROVIDER_HOME_DIR: string = process.env.HELM_PROVIDER_HOME || PathEx.join(os.homedir(), '.helm-provider');
export const PROVIDER_LOGS_DIR: string = PathEx.join(PROVIDER_HOME_DIR, 'logs');
export const PROVIDER_LOG_LEVEL: string = process.env.HELM_PROVIDER_LOG_LEVEL || 'info';
export const PROVIDER_LOG_FILE_BASENAME: string = 'helm-provider';

export const HELM: string = 'helm';
export const DEFAULT_HELM_DRIVER: string = 'secret';

export const AUTHENTICATION_DOCUMENTATION_URL: string =
  'https://registry.terraform.io/providers/hashicorp/helm/latest/docs#authentication';

// -------------------- in-cluster service account ------------------------------------------------------------------
export const SERVICE_ACCOUNT_DIR: string = '/var/run/secrets/kubernetes.io/serviceaccount';
export const SERVICE_ACCOUNT_TOKEN_FILE: string = 'token';
export const SERVICE_ACCOUNT_CA_FILE: string = 'ca.crt';

// -------------------- kubeconfig ------------------------------------------------------------------------------------
export const KUBECONFIG_FILE_MODE: number = 0o600;
export const DEFAULT_CONTEXT_NAME: string = 'default';

/**
 * Environment variables read during credential resolution and helm settings construction.
 */
export const EnvironmentVariables = {
  KubeHost: 'KUBE_HOST',
  KubeUser: 'KUBE_USER',
  KubePassword: 'KUBE_PASSWORD',
  KubeInsecure: 'KUBE_INSECURE',
  KubeClientCertData: 'KUBE_CLIENT_CERT_DATA',
  KubeClientKeyData: 'KUBE_CLIENT_KEY_DATA',
  KubeClusterCaCertData: 'KUBE_CLUSTER_CA_CERT_DATA',
  KubeConfigPath: 'KUBE_CONFIG_PATH',
  KubeConfigPaths: 'KUBE_CONFIG_PATHS',
  KubeCtx: 'KUBE_CTX',
  KubeCtxAuthInfo: 'KUBE_CTX_AUTH_INFO',
  KubeCtxCluster: 'KUBE_CTX_CLUSTER',
  KubeToken: 'KUBE_TOKEN',
  KubernetesServiceHost: 'KUBERNETES_SERVICE_HOST',
  KubernetesServicePort: 'KUBERNETES_SERVICE_PORT',
  HelmDebug: 'HELM_DEBUG',
  HelmPlugins: 'HELM_PLUGINS',
  HelmRegistryConfig: 'HELM_REGISTRY_CONFIG',
  HelmRepositoryConfig: 'HELM_REPOSITORY_CONFIG',
  HelmRepositoryCache: 'HELM_REPOSITORY_CACHE',
  HelmDriver: 'HELM_DRIVER',
  HelmNamespace: 'HELM_NAMESPACE',
  HelmDriverSqlConnectionString: 'HELM_DRIVER_SQL_CONNECTION_STRING',
  HelmConfigHome: 'HELM_CONFIG_HOME',
  HelmDataHome: 'HELM_DATA_HOME',
  HelmCacheHome: 'HELM_CACHE_HOME',
  XdgConfigHome: 'XDG_CONFIG_HOME',
  XdgDataHome: 'XDG_DATA_HOME',
  XdgCacheHome: 'XDG_CACHE_HOME',
  AppData: 'APPDATA',
  Temp: 'TEMP',
  Kubeconfig: 'KUBECONFIG',
} as const;
