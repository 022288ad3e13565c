/**
 * FIFO async mutex. The lock is handed straight to the next waiter on
 * release, so it is never observed free while callers are queued.
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  /** Callers waiting for the lock */
  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Wait for the lock. Resolves with a release function; calling it more
   * than once is a no-op.
   */
  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.releaser();
    }

    await new Promise<void>(resolve => this.waiters.push(resolve));
    return this.releaser();
  }

  /**
   * Run fn while holding the lock.
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.locked = false;
      }
    };
  }
}
