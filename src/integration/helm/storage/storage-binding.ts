// SPDX-License-Identifier: Apache-2.0

import {type CoreV1Api} from '@kubernetes/client-node';
import {type StorageDriver} from '../../../business/storage/storage-driver.js';

export interface MemoryStorageBinding {
  readonly driver: StorageDriver.MEMORY;
  readonly namespace: string;
  /** release records kept for the lifetime of this binding only */
  readonly records: Map<string, string>;
}

export interface KubernetesStorageBinding {
  readonly driver: StorageDriver.CONFIGMAP | StorageDriver.SECRET;
  readonly namespace: string;
  readonly client: CoreV1Api;
}

export interface SqlStorageBinding {
  readonly driver: StorageDriver.SQL;
  readonly namespace: string;
  readonly connectionString: string;
}

/**
 * The release storage backend an action configuration is bound to.
 */
export type StorageBinding = MemoryStorageBinding | KubernetesStorageBinding | SqlStorageBinding;
