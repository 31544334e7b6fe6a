/**
 * Async FIFO Queue
 *
 * Unbounded queue consumed through async iteration. Producers push without
 * waiting; a single consumer awaits the next item. Used for the per-session
 * outbound message queue and for buffering inbound upstream messages.
 */

export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiters: ((result: IteratorResult<T>) => void)[] = [];
  private closed = false;

  /**
   * Append an item. Returns false (and drops the item) once the queue is closed.
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Stop accepting items; consumers still drain what is already queued.
   */
  end(): void {
    this.closed = true;
    if (this.items.length === 0) {
      this.releaseWaiters();
    }
  }

  /**
   * Stop accepting items and drop anything still queued. A consumer blocked
   * on the next item finishes immediately.
   */
  cancel(): void {
    this.closed = true;
    this.items = [];
    this.releaseWaiters();
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        const item = this.items.shift();
        if (item !== undefined) {
          return Promise.resolve({ value: item, done: false });
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<T>>((resolve) => {
          this.waiters.push(resolve);
        });
      },
    };
  }

  private releaseWaiters(): void {
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }
}
