/**
 * Unbounded FIFO with awaitable take
 *
 * `close()` acts as the sentinel: pending and future takes resolve undefined
 * once the buffered items are drained.
 */

type Waiter<T> = (item: T | undefined) => void;

export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;

  push(item: T): void {
    if (this.closed) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }
    this.items.push(item);
  }

  /**
   * Next item; undefined when the queue is closed and empty, when `timeoutMs`
   * elapses, or when `signal` aborts
   */
  take(timeoutMs?: number, signal?: AbortSignal): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>((resolve) => {
      let timer: NodeJS.Timeout | null = null;

      const settle: Waiter<T> = (item) => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(item);
      };
      const cancel = () => {
        this.waiters = this.waiters.filter((waiter) => waiter !== settle);
        settle(undefined);
      };
      const onAbort = () => cancel();

      this.waiters.push(settle);
      if (timeoutMs !== undefined) {
        timer = setTimeout(cancel, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  close(): void {
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(undefined);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

/**
 * Resolves after `ms`, or early when `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
