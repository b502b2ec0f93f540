// SPDX-License-Identifier: Apache-2.0

/**
 * Read-only view of process environment variables captured at a point in time.
 */
export type EnvironmentSnapshot = Readonly<Record<string, string | undefined>>;

export type Mutable<T> = {-readonly [K in keyof T]: T[K]};

/**
 * Sink used by action configurations to emit diagnostic output.
 */
export type ActionLogSink = (format: string, ...arguments_: unknown[]) => void;
