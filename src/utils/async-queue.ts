/**
 * FIFO queue with awaitable `shift()`. Once closed, queued items are still
 * handed out, after which `shift()` resolves to null.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(value: T | null) => void> = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }
    this.items.push(item);
    return true;
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }

  async shift(): Promise<T | null> {
    const item = this.items.shift();
    if (item !== undefined) {
      return item;
    }
    if (this.closed) {
      return null;
    }

    return await new Promise<T | null>((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
