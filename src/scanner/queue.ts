/**
 * Bounded async queue between the tree walk and the reader workers.
 *
 * `push` waits while the queue holds `capacity` items, which is what bounds
 * memory use regardless of tree size. Consumers pull with `next()` or
 * `for await`; once the queue is closed they drain what is left and stop.
 */

export class BoundedQueue<T> {
  private readonly items: Array<{ value: T }> = [];
  private readonly spaceWaiters: Array<() => void> = [];
  private readonly itemWaiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`BoundedQueue capacity must be an integer >= 1 (got ${capacity})`);
    }
  }

  /** Number of items waiting for a consumer */
  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Add an item, waiting for space when the queue is full.
   * @throws Error if the queue has been closed
   */
  async push(item: T): Promise<void> {
    while (!this.closed && this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
    }
    if (this.closed) {
      throw new Error('Cannot push to a closed queue');
    }

    const waiter = this.itemWaiters.shift();
    if (waiter) {
      waiter({ done: false, value: item });
      return;
    }
    this.items.push({ value: item });
  }

  /**
   * Take the next item. Resolves `done` once the queue is closed and empty.
   */
  next(): Promise<IteratorResult<T, undefined>> {
    const entry = this.items.shift();
    if (entry) {
      this.spaceWaiters.shift()?.();
      return Promise.resolve({ done: false, value: entry.value });
    }
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => this.itemWaiters.push(resolve));
  }

  /**
   * Stop accepting items. Queued items stay available to consumers;
   * consumers waiting on an empty queue are released.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.itemWaiters.splice(0)) {
      waiter({ done: true, value: undefined });
    }
    for (const waiter of this.spaceWaiters.splice(0)) {
      waiter();
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const result = await this.next();
      if (result.done) return;
      yield result.value;
    }
  }
}
