/**
 * Counting semaphore bounding the worker pool and the suggestion calls.
 * Waiters are served in FIFO order; a released permit passes straight to the
 * next waiter without going back to the pool.
 */
export class Semaphore {
  private held = 0;
  private readonly queue: Array<(release: () => void) => void> = [];

  constructor(private readonly maxConcurrency: number) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new Error(`Semaphore maxConcurrency must be >= 1 (got ${maxConcurrency})`);
    }
  }

  get capacity(): number {
    return this.maxConcurrency;
  }

  get inFlight(): number {
    return this.held;
  }

  get queueDepth(): number {
    return this.queue.length;
  }

  /** Resolves with the permit's release callback; calling it twice is a no-op */
  acquire(): Promise<() => void> {
    if (this.held < this.maxConcurrency) {
      this.held++;
      return Promise.resolve(this.permit());
    }
    return new Promise((resolve) => this.queue.push(resolve));
  }

  /**
   * Run `fn` while holding a permit; the permit is released however `fn` settles.
   */
  async withPermit<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private permit(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.queue.shift();
      if (next) next(this.permit());
      else this.held--;
    };
  }
}
