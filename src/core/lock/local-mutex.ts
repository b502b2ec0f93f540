// SPDX-License-Identifier: Apache-2.0

import {type Lock} from './lock.js';
import {IllegalStateError} from '../../business/errors/illegal-state-error.js';

/**
 * In-process mutual exclusion lock. Waiters are served in arrival order.
 */
export class LocalMutex implements Lock {
  private acquired: boolean = false;
  private readonly waiters: (() => void)[] = [];

  public async acquire(): Promise<void> {
    if (this.tryAcquire()) {
      return;
    }

    // ownership passes directly from release() to the waiter
    await new Promise<void>((resolve): void => {
      this.waiters.push((): void => resolve());
    });
  }

  public tryAcquire(): boolean {
    if (this.acquired) {
      return false;
    }
    this.acquired = true;
    return true;
  }

  public release(): void {
    if (!this.acquired) {
      throw new IllegalStateError('cannot release a lock that is not held');
    }

    const next: (() => void) | undefined = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.acquired = false;
    }
  }

  public isAcquired(): boolean {
    return this.acquired;
  }

  public get pending(): number {
    return this.waiters.length;
  }

  public async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
