/**
 * AsyncMutex
 *
 * Mutual exclusion for async critical sections. Every NonceSlot owns one, which
 * makes the slot a mutual-exclusion domain for reserve/release/reconcile.
 *
 * @example
 * ```ts
 * const mutex = new AsyncMutex();
 *
 * await mutex.runExclusive(async () => {
 *   // Only one caller can be here at a time
 *   await reconcileSlot();
 * });
 *
 * const release = await mutex.acquire();
 * try {
 *   await doSomething();
 * } finally {
 *   release();
 * }
 * ```
 */

export class AsyncMutex {
  private locked = false;
  private waitQueue: Array<() => void> = [];

  /**
   * Acquire the mutex, waiting in FIFO order if it is held.
   *
   * @returns A release function that MUST be called when done
   */
  async acquire(): Promise<() => void> {
    if (this.locked) {
      await new Promise<void>(resolve => {
        this.waitQueue.push(resolve);
      });
    }
    this.locked = true;

    let released = false;
    return () => {
      if (released) return;
      released = true;

      // Hand the lock directly to the next waiter; it stays held during the
      // handoff so no new caller can slip in between.
      const next = this.waitQueue.shift();
      if (next) {
        setImmediate(next);
      } else {
        this.locked = false;
      }
    };
  }

  /**
   * Run `fn` with exclusive access. Released on success and on error.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
