// SPDX-License-Identifier: Apache-2.0

import {ConfigurationError} from './configuration-error.js';
import {type DiagnosableError, DiagnosticCode} from '../../../business/validation/diagnostic.js';

/**
 * Raised when both a single kubeconfig path and a list of kubeconfig paths are configured.
 */
export class ConfigPathConflictError extends ConfigurationError implements DiagnosableError {
  public static readonly MESSAGE: string = '"config_path" and "config_paths" cannot be specified together';

  public readonly code: DiagnosticCode = DiagnosticCode.CONFIG_PATH_CONFLICT;
  public readonly summary: string = ConfigPathConflictError.MESSAGE;
  public readonly detail: string;

  public constructor(
    public readonly configPath: string,
    public readonly configPaths: readonly string[],
  ) {
    super(ConfigPathConflictError.MESSAGE, undefined, {configPath, configPaths});
    this.detail = `config_path is "${configPath}" while config_paths is [${configPaths.join(', ')}]; set only one of them`;
  }
}
