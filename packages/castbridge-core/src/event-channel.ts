/**
 * Unbounded FIFO with a single async reader. `send` never blocks; the reader
 * suspends in `next()` until an item arrives or the channel closes.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private waiter: ((result: IteratorResult<T, undefined>) => void) | undefined;
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get pending(): number {
    return this.items.length;
  }

  send(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ done: false, value: item });
    } else {
      this.items.push(item);
    }
    return true;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.({ done: true, value: undefined });
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      return Promise.resolve({ done: false, value });
    }
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    if (this.waiter) {
      return Promise.reject(new Error("EventChannel supports a single reader"));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { done: true, value: undefined };
      },
    };
  }
}
