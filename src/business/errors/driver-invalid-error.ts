// SPDX-License-Identifier: Apache-2.0

import {ConfigurationError} from '../../data/configuration/api/configuration-error.js';
import {type DiagnosableError, DiagnosticCode} from '../validation/diagnostic.js';
import {StorageDrivers} from '../storage/storage-driver.js';

/**
 * Raised when the configured Helm storage driver is not supported.
 */
export class DriverInvalidError extends ConfigurationError implements DiagnosableError {
  public readonly code: DiagnosticCode = DiagnosticCode.DRIVER_INVALID;
  public readonly summary: string;
  public readonly detail: string =
    `Helm backend storage driver must be set to one of the following values: ${StorageDrivers.names().join(', ')}`;

  public constructor(public readonly driver: string) {
    super(`Invalid storage driver: ${driver} used for helm_driver`, undefined, {driver});
    this.summary = this.message;
  }
}
