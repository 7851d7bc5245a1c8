type Waiter<T> = {
  resolve(item: T): void;
};

export class AbortError extends Error {
  constructor(message = 'The operation was aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

export const isAbortError = (err: unknown): boolean => err instanceof Error && err.name === 'AbortError';

const abortError = (signal: AbortSignal): Error => (signal.reason instanceof Error ? signal.reason : new AbortError());

/**
 * Unbounded FIFO queue with promise-based `get`. Queued items are handed out
 * before an aborted signal is honoured, so consumers drain on cancellation.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];

  get size(): number {
    return this.items.length;
  }

  put(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve(item);
    else this.items.push(item);
  }

  get(signal?: AbortSignal): Promise<T> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve(item);
    }
    if (signal?.aborted) return Promise.reject(abortError(signal));

    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter<T> = {
        resolve: (item) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(item);
        },
      };
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        if (signal) reject(abortError(signal));
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Remove and return everything currently queued. */
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }
}
