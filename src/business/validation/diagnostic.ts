// SPDX-License-Identifier: Apache-2.0

import {ProviderError} from '../../core/errors/provider-error.js';

export enum DiagnosticSeverity {
  ERROR = 'error',
  WARNING = 'warning',
}

export enum DiagnosticCode {
  AUTHENTICATION_MISSING = 'AuthenticationMissing',
  DRIVER_INVALID = 'DriverInvalid',
  CONFIG_PATH_CONFLICT = 'ConfigPathConflict',
  CONFIGURATION_INVALID = 'ConfigurationInvalid',
}

/**
 * An error that carries the fields of the diagnostic it is reported as.
 */
export interface DiagnosableError {
  readonly code: DiagnosticCode;
  readonly summary: string;
  readonly detail: string;
}

/**
 * A problem found while checking provider configuration. Diagnostics are returned, never thrown.
 */
export class Diagnostic {
  public constructor(
    public readonly severity: DiagnosticSeverity,
    public readonly code: DiagnosticCode,
    public readonly summary: string,
    public readonly detail: string = '',
  ) {}

  public static error(code: DiagnosticCode, summary: string, detail?: string): Diagnostic {
    return new Diagnostic(DiagnosticSeverity.ERROR, code, summary, detail);
  }

  public static warning(code: DiagnosticCode, summary: string, detail?: string): Diagnostic {
    return new Diagnostic(DiagnosticSeverity.WARNING, code, summary, detail);
  }

  public static fromError(error: unknown): Diagnostic {
    if (Diagnostic.isDiagnosable(error)) {
      return Diagnostic.error(error.code, error.summary, error.detail);
    }
    if (error instanceof Error) {
      const cause: unknown = error.cause;
      const detail: string = error instanceof ProviderError && cause instanceof Error ? cause.message : '';
      return Diagnostic.error(DiagnosticCode.CONFIGURATION_INVALID, error.message, detail);
    }
    return Diagnostic.error(DiagnosticCode.CONFIGURATION_INVALID, String(error));
  }

  public static hasErrors(diagnostics: readonly Diagnostic[]): boolean {
    return diagnostics.some((diagnostic: Diagnostic): boolean => diagnostic.severity === DiagnosticSeverity.ERROR);
  }

  private static isDiagnosable(error: unknown): error is Error & DiagnosableError {
    if (!(error instanceof Error) || !('code' in error) || !('summary' in error) || !('detail' in error)) {
      return false;
    }
    const code: unknown = error.code;
    return (
      Object.values(DiagnosticCode).some((candidate: DiagnosticCode): boolean => candidate === code) &&
      typeof error.summary === 'string' &&
      typeof error.detail === 'string'
    );
  }
}
