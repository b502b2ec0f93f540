// SPDX-License-Identifier: Apache-2.0

import {ProviderError} from '../../../core/errors/provider-error.js';

/**
 * Raised when the Helm storage backend cannot be bound to a namespace.
 */
export class BackendBindError extends ProviderError {
  public constructor(driver: string, namespace: string, cause?: unknown) {
    super(`failed to initialize helm storage driver "${driver}" for namespace "${namespace}"`, cause, {
      driver,
      namespace,
    });
  }
}
