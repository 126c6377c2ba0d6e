/**
 * Buffered async feed.
 *
 * Bridges push-style ledger events into a pull-style `for await` loop so
 * the consumer handles exactly one record at a time. Records pushed while
 * the consumer is busy are buffered in arrival order.
 *
 * Termination:
 * - end(): iteration completes after the buffer drains
 * - fail(err): iteration throws `err` after the buffer drains
 */

interface Waiter<T> {
  readonly resolve: (result: IteratorResult<T>) => void;
  readonly reject: (err: unknown) => void;
}

export class FeedQueue<T> implements AsyncIterable<T> {
  private readonly _buffer: { readonly item: T }[] = [];
  private _waiter: Waiter<T> | null = null;
  private _ended = false;
  private _failure: { readonly error: unknown } | null = null;

  /** Whether end() or fail() has been called */
  get closed(): boolean {
    return this._ended || this._failure !== null;
  }

  get buffered(): number {
    return this._buffer.length;
  }

  push(item: T): void {
    if (this.closed) return;

    const waiter = this._waiter;
    if (waiter !== null) {
      this._waiter = null;
      waiter.resolve({ value: item, done: false });
      return;
    }
    this._buffer.push({ item });
  }

  end(): void {
    if (this.closed) return;
    this._ended = true;
    this._settleWaiter();
  }

  fail(error: unknown): void {
    if (this.closed) return;
    this._failure = { error };
    this._settleWaiter();
  }

  next(): Promise<IteratorResult<T>> {
    const entry = this._buffer.shift();
    if (entry !== undefined) {
      return Promise.resolve({ value: entry.item, done: false });
    }
    if (this._failure !== null) {
      return Promise.reject(this._failure.error);
    }
    if (this._ended) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this._waiter = { resolve, reject };
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: () => {
        this.end();
        this._buffer.length = 0;
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private _settleWaiter(): void {
    const waiter = this._waiter;
    if (waiter === null) return;
    this._waiter = null;

    // A waiter only exists when the buffer is empty
    if (this._failure !== null) {
      waiter.reject(this._failure.error);
    } else {
      waiter.resolve({ value: undefined, done: true });
    }
  }
}
