// SPDX-License-Identifier: Apache-2.0

import {ConfigurationError} from '../../data/configuration/api/configuration-error.js';
import {type DiagnosableError, DiagnosticCode} from '../validation/diagnostic.js';
import {AUTHENTICATION_DOCUMENTATION_URL} from '../../core/constants.js';

/**
 * Raised when no way to authenticate against a cluster has been configured.
 */
export class AuthenticationMissingError extends ConfigurationError implements DiagnosableError {
  public static readonly CHECKED_MECHANISMS: readonly string[] = [
    'host',
    'config_path',
    'config_paths',
    'client_certificate',
    'token',
    'exec',
  ];

  public static readonly SUMMARY: string =
    'provider not configured: you must configure a path to your kubeconfig or explicitly supply credentials via ' +
    'the provider block or environment variables.';

  public readonly code: DiagnosticCode = DiagnosticCode.AUTHENTICATION_MISSING;
  public readonly summary: string = AuthenticationMissingError.SUMMARY;
  public readonly detail: string =
    `None of the following are set in the kubernetes block or its environment variables: ` +
    `${AuthenticationMissingError.CHECKED_MECHANISMS.join(', ')}.\n\n` +
    `See our documentation at: ${AUTHENTICATION_DOCUMENTATION_URL}`;

  public constructor() {
    super(AuthenticationMissingError.SUMMARY);
  }
}
