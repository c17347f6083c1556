/**
 * Concurrency control for API-bound work.
 *
 * @module utils/concurrency
 */

/**
 * ConcurrencyLimiter caps the number of operations in flight.
 *
 * Semaphore with a FIFO queue of waiting callers. Used by the record
 * processing stage to bound enrichment lookups per batch.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(5);
 * const records = await Promise.all(items.map((item) => limiter.run(() => process(item))));
 * ```
 */
export class ConcurrencyLimiter {
  private readonly limit: number;
  private running = 0;
  private queue: Array<() => void> = [];

  /**
   * @throws Error if limit is not a positive integer
   */
  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error('Concurrency limit must be a positive integer');
    }
    this.limit = limit;
  }

  /**
   * Wait for a free slot (FIFO).
   */
  async acquire(): Promise<void> {
    if (this.running < this.limit) {
      this.running++;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Release a slot, handing it straight to the next waiter if any.
   */
  release(): void {
    if (this.running <= 0) {
      throw new Error('ConcurrencyLimiter: release() called without matching acquire()');
    }

    const next = this.queue.shift();
    if (next) {
      next();
      return;
    }
    this.running--;
  }

  /**
   * Run `fn` inside a slot; the slot is released even if `fn` throws.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getRunning(): number {
    return this.running;
  }

  getQueueLength(): number {
    return this.queue.length;
  }
}
