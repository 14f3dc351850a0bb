/**
 * Buffer Pool
 *
 * Reusable fixed-length receive buffers for the framed transport.
 * Checkout never blocks: an empty pool allocates a fresh buffer, and any
 * buffer of the configured length is accepted back on release. Growth is
 * unbounded unless `maxIdle` caps how many idle buffers are retained.
 */

import { DEFAULT_BUFFER_SIZE, DEFAULT_POOL_SIZE } from '@/constants.js';
import { createLogger } from '@/ui/logging/index.js';

const log = createLogger('pool');

export interface BufferPoolOptions {
  /** Length of every buffer handed out by the pool */
  bufferSize?: number | undefined;
  /** Number of buffers allocated up front */
  poolSize?: number | undefined;
  /** Upper bound on retained idle buffers (default: unbounded) */
  maxIdle?: number | undefined;
}

export class BufferPool {
  readonly bufferSize: number;
  readonly targetSize: number;
  private readonly maxIdle: number;
  private readonly idle: Buffer[] = [];
  private readonly idleSet = new Set<Buffer>();
  private allocated = 0;

  constructor(options: BufferPoolOptions = {}) {
    this.bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
    this.targetSize = options.poolSize ?? DEFAULT_POOL_SIZE;
    this.maxIdle = options.maxIdle ?? Infinity;

    if (!Number.isInteger(this.bufferSize) || this.bufferSize < 1) {
      throw new RangeError(`Buffer size must be a positive integer, got ${this.bufferSize}`);
    }

    const initial = Math.min(this.targetSize, this.maxIdle);
    for (let i = 0; i < initial; i++) {
      this.admit(this.allocate());
    }
  }

  /**
   * Take a buffer out of the pool, allocating one when none are idle.
   */
  get(): Buffer {
    const buffer = this.idle.pop();
    if (buffer) {
      this.idleSet.delete(buffer);
      return buffer;
    }
    log.debug(`Pool exhausted, allocating buffer #${this.allocated + 1}`);
    return this.allocate();
  }

  /**
   * Return a buffer to the pool.
   *
   * Buffers of any other length, buffers already idle, and buffers beyond
   * `maxIdle` are dropped.
   */
  release(buffer: Buffer): void {
    if (buffer.length !== this.bufferSize || this.idleSet.has(buffer)) {
      return;
    }
    if (this.idle.length >= this.maxIdle) {
      return;
    }
    this.admit(buffer);
  }

  /** Number of idle buffers. */
  get size(): number {
    return this.idle.length;
  }

  /** Number of buffers this pool has ever allocated. */
  get allocatedCount(): number {
    return this.allocated;
  }

  private allocate(): Buffer {
    this.allocated++;
    return Buffer.alloc(this.bufferSize);
  }

  private admit(buffer: Buffer): void {
    this.idle.push(buffer);
    this.idleSet.add(buffer);
  }
}
