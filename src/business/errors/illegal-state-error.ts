// SPDX-License-Identifier: Apache-2.0

import {ProviderError} from '../../core/errors/provider-error.js';

/**
 * Raised when an operation is invoked while its owner is not in a state that allows it.
 */
export class IllegalStateError extends ProviderError {
  public constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}
