/**
 * Async Event Queue
 *
 * Turns pushed callbacks into a single-consumer async iterable, so the
 * consumer reads events with `for await` one at a time.
 */

interface Waiter<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: Error) => void;
}

export class AsyncEventQueue<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: Error | null = null;

  /**
   * Queue an item. Returns false once the queue is closed or failed.
   */
  public push(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
    return true;
  }

  /**
   * End the iteration once buffered items are consumed
   */
  public close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  /**
   * Make the consumer throw `error` once buffered items are consumed
   */
  public fail(error: Error): void {
    if (this.closed) return;
    this.closed = true;
    this.failure = error;

    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  public get size(): number {
    return this.buffer.length;
  }

  public next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      return Promise.resolve({ value: item, done: false });
    }

    if (this.failure) {
      return Promise.reject(this.failure);
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  public [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
