/**
 * Counting semaphore. Waiters are served in arrival order.
 */
export class Semaphore {
  private permits: number;
  private readonly waiting: Array<() => void> = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new RangeError("Semaphore permits must be a positive integer");
    }
    this.permits = limit;
  }

  /**
   * Acquire a permit, waiting if necessary until one is available.
   * Returns a release function; calling it more than once has no effect.
   */
  async acquire(): Promise<() => void> {
    if (this.permits > 0) {
      this.permits--;
      return this.releaser();
    }

    return new Promise((resolve) => {
      this.waiting.push(() => resolve(this.releaser()));
    });
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    // Hand the permit straight to the next waiter instead of returning it to the pool
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    this.permits = Math.min(this.permits + 1, this.limit);
  }
}
