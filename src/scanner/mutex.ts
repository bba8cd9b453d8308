/**
 * Async Mutex
 * Serializes updates to shared scan state across workers
 */

export class Mutex {
  private locked = false;
  private queue: Array<() => void> = [];

  /**
   * Waits for the lock and returns the function that releases it
   */
  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return () => this.release();
    }
    return new Promise((resolve) => {
      this.queue.push(() => resolve(() => this.release()));
    });
  }

  /**
   * Runs `fn` while holding the lock
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // Ownership passes straight to the next waiter
      next();
    } else {
      this.locked = false;
    }
  }
}
