// SPDX-License-Identifier: Apache-2.0

import {ProviderError} from '../../../core/errors/provider-error.js';

/**
 * Raised when a Kubernetes client configuration cannot be built from the resolved settings.
 */
export class ClientConstructionError extends ProviderError {
  public constructor(namespace: string, cause?: unknown) {
    super(`failed to get kubernetes client configuration for namespace "${namespace}"`, cause, {namespace});
  }
}
