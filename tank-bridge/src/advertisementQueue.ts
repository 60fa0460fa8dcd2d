/**
 * Unbounded FIFO with a single async consumer. Producers call `push` from
 * scanner callbacks; the controller drains it with `for await`, so records
 * are handled one at a time in the order they were observed.
 */
export class AdvertisementQueue<T extends object> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiter: ((result: IteratorResult<T>) => void) | null = null;
  private closed = false;
  private consumed = false;

  push(item: T): void {
    if (this.closed) {
      return;
    }
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: item, done: false });
      return;
    }
    this.buffer.push(item);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  get pending(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.consumed) {
      throw new Error('AdvertisementQueue supports a single consumer');
    }
    this.consumed = true;

    return {
      next: (): Promise<IteratorResult<T>> => {
        const item = this.buffer.shift();
        if (item !== undefined) {
          return Promise.resolve({ value: item, done: false });
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
          this.waiter = resolve;
        });
      },
      return: (): Promise<IteratorResult<T>> => {
        this.close();
        this.buffer.length = 0;
        return Promise.resolve({ value: undefined, done: true });
      }
    };
  }
}
