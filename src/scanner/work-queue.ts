/**
 * Bounded Work Queue
 * Producer waits while the queue is full; consumers wait while it is empty.
 */

export class QueueClosedError extends Error {
  constructor() {
    super('Work queue is closed');
    this.name = 'QueueClosedError';
  }
}

export class WorkQueue<T> {
  private items: T[] = [];
  private closed = false;
  private takers: Array<(item: T | undefined) => void> = [];
  private putters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Adds an item, waiting for space when the queue is full
   * @throws QueueClosedError if the queue was closed
   */
  async put(item: T): Promise<void> {
    for (;;) {
      if (this.closed) throw new QueueClosedError();

      const taker = this.takers.shift();
      if (taker) {
        taker(item);
        return;
      }

      if (this.items.length < this.capacity) {
        this.items.push(item);
        return;
      }

      await new Promise<void>((resolve) => this.putters.push(resolve));
    }
  }

  /**
   * Removes the next item, waiting while the queue is empty.
   * Resolves to undefined once the queue is closed and drained.
   */
  async take(): Promise<T | undefined> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      this.putters.shift()?.();
      return item;
    }

    if (this.closed) return undefined;

    return new Promise((resolve) => this.takers.push(resolve));
  }

  /**
   * Stops accepting items. Buffered items can still be taken.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const taker of this.takers.splice(0)) taker(undefined);
    for (const putter of this.putters.splice(0)) putter();
  }
}
