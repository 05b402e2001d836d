interface Waiter {
  resolve: (line: string | undefined) => void;
  timer: NodeJS.Timeout;
}

/**
 * FIFO of decoded reply lines.
 *
 * The line reader is the only producer and the correlator the only consumer:
 * taking a line removes it. A pending `take()` is woken as soon as a line is
 * pushed instead of polling.
 */
export class Inbox {
  private lines: string[] = [];
  private waiter: Waiter | null = null;
  private closed = false;
  private droppedCount = 0;

  /** capacity 0 = unbounded; otherwise the oldest line is dropped on overflow */
  constructor(private readonly capacity: number = 0) {}

  get size(): number {
    return this.lines.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  push(line: string): void {
    if (this.closed) return;

    const waiter = this.waiter;
    if (waiter && this.lines.length === 0) {
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.resolve(line);
      return;
    }

    this.lines.push(line);
    if (this.capacity > 0 && this.lines.length > this.capacity) {
      this.lines.shift();
      this.droppedCount++;
    }
  }

  /** Remove and return everything pending. */
  drain(): string[] {
    const pending = this.lines;
    this.lines = [];
    return pending;
  }

  /**
   * Resolve with the next line, or undefined once `timeoutMs` elapses or the
   * inbox is closed.
   */
  take(timeoutMs: number): Promise<string | undefined> {
    const next = this.lines.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed || timeoutMs <= 0) return Promise.resolve(undefined);
    if (this.waiter) {
      return Promise.reject(new Error('Inbox already has a pending consumer'));
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        if (this.waiter?.timer === timer) this.waiter = null;
        resolve(undefined);
      }, timeoutMs);
      this.waiter = { resolve, timer };
    });
  }

  /** Wake a pending consumer and refuse further lines. */
  close(): void {
    this.closed = true;
    this.lines = [];
    const waiter = this.waiter;
    this.waiter = null;
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(undefined);
    }
  }
}
