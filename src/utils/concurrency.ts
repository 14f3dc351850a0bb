/**
 * Concurrency limiter for serializing async operations.
 *
 * A limiter with a limit of 1 is the mutual exclusion the framed transport
 * uses to keep a frame's prefix and payload writes contiguous across awaits.
 *
 * @module utils/concurrency
 */

/**
 * Limits the number of concurrent async operations.
 *
 * @example
 * ```typescript
 * const writeLock = new ConcurrencyLimiter(1);
 * await writeLock.run(async () => {
 *   await writeChunk(prefix);
 *   await writeChunk(payload);
 * });
 * ```
 */
export class ConcurrencyLimiter {
  private running = 0;
  private queue: Array<() => void> = [];

  /**
   * @param limit - Maximum number of concurrent operations
   */
  constructor(private readonly limit: number) {
    if (limit < 1) {
      throw new Error('Concurrency limit must be at least 1');
    }
  }

  /**
   * Executes an async function with concurrency control.
   * Waiters are admitted in FIFO order.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    while (this.running >= this.limit) {
      await new Promise<void>((resolve) => this.queue.push(resolve));
    }

    this.running++;
    try {
      return await fn();
    } finally {
      this.running--;
      const next = this.queue.shift();
      if (next) {
        next();
      }
    }
  }

  /**
   * Gets the current number of running operations.
   */
  getRunningCount(): number {
    return this.running;
  }

  /**
   * Gets the current queue size.
   */
  getQueueSize(): number {
    return this.queue.length;
  }
}
