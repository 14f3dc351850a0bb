/**
 * Stream Reader
 *
 * Drains a readable byte stream into an internal chunk queue and serves
 * pull-style reads from it. Reads may be short: `readInto` copies whatever is
 * buffered (at least one byte) and returns the count, or 0 once the stream has
 * ended and the queue is empty.
 */

import type { Readable } from 'node:stream';

import { READER_HIGH_WATER_MARK } from '@/constants.js';

import { ConfigError, IPCStreamError } from './IPCError.js';

export class StreamReader {
  private readonly chunks: Buffer[] = [];
  private head = 0;
  private buffered = 0;
  private ended = false;
  private failure: Error | null = null;
  private paused = false;
  private waiters: Array<() => void> = [];

  constructor(
    private readonly stream: Readable,
    private readonly highWaterMark: number = READER_HIGH_WATER_MARK
  ) {
    if (stream.readableEncoding !== null) {
      throw new ConfigError(
        `Input stream must be in binary mode (encoding is ${stream.readableEncoding})`,
        'TEXT_MODE_STREAM'
      );
    }

    stream.on('data', this.handleData);
    stream.on('end', this.handleEnd);
    stream.on('close', this.handleEnd);
    stream.on('error', this.handleError);
  }

  /** Bytes buffered and not yet consumed. */
  get available(): number {
    return this.buffered;
  }

  /** True once the source has ended or closed. */
  get isEnded(): boolean {
    return this.ended;
  }

  /**
   * Wait until data is buffered, the stream ends, or it fails.
   *
   * @param timeoutMs - Upper bound on the wait; 0 or below waits indefinitely
   * @returns False if the wait timed out, true otherwise. Nothing is consumed.
   */
  waitForData(timeoutMs = 0): Promise<boolean> {
    if (this.isReadable()) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;

      const waiter = (): void => {
        if (timer) clearTimeout(timer);
        resolve(true);
      };
      this.waiters.push(waiter);

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(false);
        }, timeoutMs);
      }
    });
  }

  /**
   * Copy up to `length` buffered bytes into `target` at `offset`.
   *
   * @returns Number of bytes copied; 0 means the stream has ended
   * @throws IPCStreamError if the stream failed and nothing is buffered
   */
  async readInto(target: Buffer, offset: number, length: number): Promise<number> {
    if (length <= 0) {
      return 0;
    }

    await this.waitForData();

    if (this.buffered > 0) {
      return this.take(target, offset, length);
    }
    if (this.failure) {
      throw new IPCStreamError('read', this.failure);
    }
    return 0;
  }

  /**
   * Read `length` bytes into a fresh buffer, looping over short reads.
   *
   * @returns The bytes read; shorter than `length` only if the stream ended
   */
  async read(length: number): Promise<Buffer> {
    const target = Buffer.alloc(length);
    let filled = 0;

    while (filled < length) {
      const count = await this.readInto(target, filled, length - filled);
      if (count === 0) {
        return target.subarray(0, filled);
      }
      filled += count;
    }

    return target;
  }

  /**
   * Stop listening to the source stream.
   */
  detach(): void {
    this.stream.off('data', this.handleData);
    this.stream.off('end', this.handleEnd);
    this.stream.off('close', this.handleEnd);
    this.stream.off('error', this.handleError);
    this.ended = true;
    this.wake();
  }

  private isReadable(): boolean {
    return this.buffered > 0 || this.ended || this.failure !== null;
  }

  private take(target: Buffer, offset: number, length: number): number {
    let copied = 0;

    while (copied < length) {
      const chunk = this.chunks[0];
      if (!chunk) break;

      const count = Math.min(length - copied, chunk.length - this.head);
      chunk.copy(target, offset + copied, this.head, this.head + count);
      copied += count;
      this.head += count;

      if (this.head >= chunk.length) {
        this.chunks.shift();
        this.head = 0;
      }
    }

    this.buffered -= copied;

    if (this.paused && this.buffered < this.highWaterMark) {
      this.paused = false;
      this.stream.resume();
    }

    return copied;
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }

  private readonly handleData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    if (bytes.length === 0) return;

    this.chunks.push(bytes);
    this.buffered += bytes.length;

    if (!this.paused && this.buffered >= this.highWaterMark) {
      this.paused = true;
      this.stream.pause();
    }

    this.wake();
  };

  private readonly handleEnd = (): void => {
    this.ended = true;
    this.wake();
  };

  private readonly handleError = (error: Error): void => {
    this.failure = error;
    this.wake();
  };
}
