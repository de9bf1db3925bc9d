// =============================================================================
// AsyncQueue<T>: push-to-pull bridge with timed receive
// =============================================================================

interface Waiter<T> {
  resolve: (value: T | null) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

/**
 * FIFO queue whose consumer can wait for the next value with an optional
 * timeout. `shift` resolves to null on timeout or once the queue is closed
 * and drained.
 */
export class AsyncQueue<T> {
  private buffer: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;

  push(value: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(value);
    } else {
      this.buffer.push(value);
    }
    return true;
  }

  /** Wait for the next value. Without a timeout this waits until a push or close. */
  shift(timeoutMs?: number): Promise<T | null> {
    if (this.buffer.length > 0) {
      return Promise.resolve(this.buffer.shift() ?? null);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise<T | null>((resolve) => {
      const waiter: Waiter<T> = { resolve, timer: null };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          resolve(null);
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
    this.waiters = [];
  }

  /** Remove and return every buffered value. */
  drain(): T[] {
    const values = this.buffer;
    this.buffer = [];
    return values;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }
}
