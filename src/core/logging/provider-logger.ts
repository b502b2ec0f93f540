// SPDX-License-Identifier: Apache-2.0

export interface ProviderLogger {
  /**
   * Switches between terse and full (stack trace) error output.
   */
  setDevMode(developmentMode: boolean): void;

  /**
   * Starts a new trace id, attached to every subsequent log entry.
   */
  nextTraceId(): void;

  prepMeta(meta?: Record<string, unknown>): Record<string, unknown>;

  /**
   * Prints to the console and mirrors the message into the log at info level.
   */
  showUser(message: unknown, ...arguments_: unknown[]): void;

  showUserError(error: unknown): void;

  error(message: unknown, ...arguments_: unknown[]): void;

  warn(message: unknown, ...arguments_: unknown[]): void;

  info(message: unknown, ...arguments_: unknown[]): void;

  debug(message: unknown, ...arguments_: unknown[]): void;
}
