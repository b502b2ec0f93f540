// SPDX-License-Identifier: Apache-2.0

import {ProviderError} from '../../../core/errors/provider-error.js';

/**
 * Raised when the helm process exits with a non-zero code.
 */
export class HelmExecutionError extends ProviderError {
  public constructor(
    public readonly exitCode: number,
    message: string,
    public readonly standardOutput: string,
    public readonly standardError: string,
    cause?: unknown,
  ) {
    super(message, cause, {exitCode});
  }
}
