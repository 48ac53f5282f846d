const DONE: IteratorReturnResult<undefined> = { value: undefined, done: true };

/**
 * Pull-style view over a bus: an async iterator with its own unbounded queue.
 *
 * Values pushed while nobody is waiting are buffered without limit; a stalled
 * consumer grows its own queue and never slows the publisher or other
 * consumers. After `close()` the remaining buffered values are still handed
 * out, then iteration completes.
 */
export class EventStream<T> implements AsyncIterableIterator<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;

  constructor(private readonly onClose?: () => void) {}

  /** @internal Called by the owning bus for every delivered value. */
  push(value: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
      return;
    }
    this.buffer.push(value);
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      const result: IteratorResult<T> = { value, done: false };
      return Promise.resolve(result);
    }
    if (this.closed) {
      return Promise.resolve(DONE);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Early exit from `for await`: closes the stream and drops anything buffered.
   */
  return(): Promise<IteratorResult<T>> {
    this.close();
    this.buffer.length = 0;
    return Promise.resolve(DONE);
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  /**
   * Stop receiving values. Idempotent.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.onClose?.();
    const waiting = this.waiters.splice(0, this.waiters.length);
    for (const resolve of waiting) {
      resolve(DONE);
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Number of values delivered but not yet read. */
  get pending(): number {
    return this.buffer.length;
  }
}
