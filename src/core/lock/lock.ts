// SPDX-License-Identifier: Apache-2.0

export interface Lock {
  /**
   * Acquires the lock, waiting behind earlier callers until it is free.
   */
  acquire(): Promise<void>;

  /**
   * Acquires the lock only if it is currently free.
   *
   * @returns true if the lock was acquired; otherwise, false.
   */
  tryAcquire(): boolean;

  /**
   * Releases the lock and hands it to the next waiting caller, if any.
   *
   * @throws IllegalStateError - if the lock is not held.
   */
  release(): void;

  isAcquired(): boolean;

  /**
   * Runs the task while holding the lock. The lock is released whether the task resolves or rejects.
   */
  runExclusive<T>(task: () => Promise<T> | T): Promise<T>;
}
