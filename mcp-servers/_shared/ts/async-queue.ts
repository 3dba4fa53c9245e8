/**
 * Unbounded FIFO with awaitable `shift()`.
 *
 * Feeds POSTed frames into a per-session dispatcher loop. `shift()` resolves
 * to `undefined` once the queue is closed and drained.
 */

export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(value: T | undefined) => void> = [];
  private closed = false;

  isClosed(): boolean {
    return this.closed;
  }

  push(item: T): void {
    if (this.closed) {
      throw new Error('AsyncQueue is closed');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }
    this.items.push(item);
  }

  async shift(): Promise<T | undefined> {
    if (this.items.length > 0) {
      return this.items.shift();
    }
    if (this.closed) {
      return undefined;
    }
    return new Promise<T | undefined>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Iterate until the queue is closed and empty. Items must not be `undefined`. */
  async *drain(): AsyncGenerator<T> {
    for (;;) {
      const item = await this.shift();
      if (item === undefined) return;
      yield item;
    }
  }

  close(): void {
    this.closed = true;
    while (this.waiters.length > 0) {
      const waiter = this.waiters.shift();
      waiter?.(undefined);
    }
  }
}
