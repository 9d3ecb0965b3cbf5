type Waiter<T> = (result: IteratorResult<T>) => void;

/**
 * Unbounded single-consumer channel. Items pushed after `close()` are ignored;
 * items pushed before it are still delivered.
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiter: Waiter<T> | null = null;
  private closed = false;

  public push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ value: item, done: false });
      return true;
    }
    this.buffer.push(item);
    return true;
  }

  public close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ value: undefined, done: true });
    }
  }

  public get size(): number {
    return this.buffer.length;
  }

  public next(): Promise<IteratorResult<T>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error('channel already has a pending reader'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Removes and returns everything currently buffered. */
  public drain(): T[] {
    return this.buffer.splice(0, this.buffer.length);
  }

  public [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}
