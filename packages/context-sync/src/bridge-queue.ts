/**
 * BridgeQueue - hand-off between filesystem notification callbacks and the
 * reconcile loop.
 *
 * Producers only ever call `push()`, which never blocks and never touches
 * engine state. The single consumer awaits `next()` (or iterates with
 * `for await`). Items are delivered in push order.
 */

export class BridgeQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  /** Number of buffered items not yet taken by the consumer */
  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Hand an item to the consumer. Returns false once the queue is closed.
   */
  push(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
    } else {
      this.items.push(item);
    }
    return true;
  }

  /** Resolve with the next item, or `done` once the queue is closed */
  next(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Stop accepting items and release any waiting consumer.
   * Buffered items are discarded; returns how many were dropped.
   */
  close(): number {
    if (this.closed) return 0;
    this.closed = true;

    const dropped = this.items.length;
    this.items = [];
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
    return dropped;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
    };
  }
}
