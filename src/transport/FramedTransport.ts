/**
 * Framed Transport
 *
 * Turns a readable/writable byte stream pair into discrete messages.
 * Every frame is a 4-byte big-endian unsigned length followed by exactly that
 * many payload bytes. There is no checksum or type tag: the boundary is
 * length-only, so a short or empty read is the only sign of truncation.
 */

import type { Readable, Writable } from 'node:stream';

import {
  DEFAULT_MAX_FRAME_BYTES,
  FRAME_PREFIX_BYTES,
  MAX_PREFIX_LENGTH,
  getBufferSize,
  getPoolSize,
} from '@/constants.js';
import { BufferPool } from '@/pool/BufferPool.js';
import { createLogger } from '@/ui/logging/index.js';
import { ConcurrencyLimiter } from '@/utils/concurrency.js';
import { withDeadline } from '@/utils/deadline.js';

import {
  ClosedConnectionError,
  IPCProtocolError,
  IPCStreamError,
  IPCTimeoutError,
} from './IPCError.js';
import { StreamReader } from './StreamReader.js';

const log = createLogger('transport');

export interface FramedTransportOptions {
  /** Length of pooled receive buffers; larger frames bypass the pool */
  bufferSize?: number | undefined;
  /** Number of pooled buffers allocated up front */
  poolSize?: number | undefined;
  /** Upper bound on retained idle pool buffers */
  maxIdleBuffers?: number | undefined;
  /** Largest payload accepted in either direction */
  maxFrameBytes?: number | undefined;
}

export class FramedTransport {
  readonly pool: BufferPool;
  private readonly reader: StreamReader;
  private readonly maxFrameBytes: number;
  private readonly readLock = new ConcurrencyLimiter(1);
  private readonly writeLock = new ConcurrencyLimiter(1);
  private closed = false;

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
    options: FramedTransportOptions = {}
  ) {
    this.reader = new StreamReader(input);
    this.pool = new BufferPool({
      bufferSize: options.bufferSize ?? getBufferSize(),
      poolSize: options.poolSize ?? getPoolSize(),
      maxIdle: options.maxIdleBuffers,
    });
    this.maxFrameBytes = Math.min(
      options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES,
      MAX_PREFIX_LENGTH
    );

    // Write failures reach callers through write callbacks; without a listener
    // the same failure emitted as 'error' would crash the process.
    this.output.on('error', this.handleOutputError);
  }

  /**
   * Send one frame: length prefix, flush, payload, flush.
   *
   * Frames from concurrent callers never interleave.
   */
  async send(data: Uint8Array): Promise<void> {
    this.assertSendable(data);

    await this.writeLock.run(async () => {
      const prefix = Buffer.alloc(FRAME_PREFIX_BYTES);
      prefix.writeUInt32BE(data.length, 0);

      await this.writeChunk(prefix);
      await this.writeChunk(data);
      log.debug(`Sent frame (${data.length} bytes)`);
    });
  }

  /**
   * Send one frame, failing with IPCTimeoutError if it has not flushed in time.
   *
   * The frame is still written in full after a timeout: bytes handed to the
   * stream cannot be recalled. A stream failure raised after the window has
   * elapsed is also reported as a timeout.
   */
  sendWithTimeout(data: Uint8Array, timeoutMs: number): Promise<void> {
    if (timeoutMs <= 0) {
      return this.send(data);
    }

    const start = Date.now();
    const sending = this.send(data).catch((error: unknown) => {
      throw reclassifyLateFailure(error, 'send', timeoutMs, start);
    });

    return withDeadline(
      sending,
      timeoutMs,
      () => new IPCTimeoutError('send', timeoutMs),
      (message) => log.debug(`Send failed after its deadline: ${message}`)
    );
  }

  /**
   * Receive one frame and return its payload as an independent copy.
   *
   * @throws ClosedConnectionError if the stream ends before a full frame arrives
   * @throws IPCProtocolError if the announced length exceeds the frame limit
   */
  receive(): Promise<Buffer> {
    return this.readLock.run(() => this.readFrame());
  }

  /**
   * Receive one frame, waiting at most `timeoutMs` for it to begin.
   *
   * If no byte of the next frame arrives within the window, fails with
   * IPCTimeoutError and consumes nothing. A frame that has started is read to
   * completion so framing stays aligned. A stream failure raised after the
   * window has elapsed is also reported as a timeout.
   */
  receiveWithTimeout(timeoutMs: number): Promise<Buffer> {
    if (timeoutMs <= 0) {
      return this.receive();
    }

    return this.readLock.run(async () => {
      const start = Date.now();

      const ready = await this.reader.waitForData(timeoutMs);
      if (!ready) {
        throw new IPCTimeoutError('receive', timeoutMs);
      }

      try {
        return await this.readFrame();
      } catch (error) {
        throw reclassifyLateFailure(error, 'receive', timeoutMs, start);
      }
    });
  }

  /**
   * Close both streams. Pending and future receives fail with ClosedConnectionError.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    this.output.end();
    this.reader.detach();
    this.input.destroy();
    log.debug('Transport closed');
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private async readFrame(): Promise<Buffer> {
    const prefix = await this.reader.read(FRAME_PREFIX_BYTES);
    if (prefix.length === 0) {
      throw new ClosedConnectionError('Pipe closed', 'prefix');
    }
    if (prefix.length < FRAME_PREFIX_BYTES) {
      throw new ClosedConnectionError('Pipe closed during length prefix', 'prefix');
    }

    const length = prefix.readUInt32BE(0);
    if (length > this.maxFrameBytes) {
      throw new IPCProtocolError(`Frame length ${length} exceeds limit ${this.maxFrameBytes}`);
    }

    if (length <= this.pool.bufferSize) {
      return this.readPooled(length);
    }

    log.debug(`Frame of ${length} bytes exceeds pool buffer, reading directly`);
    const payload = await this.reader.read(length);
    if (payload.length < length) {
      throw new ClosedConnectionError('Pipe closed during read', 'payload');
    }
    return payload;
  }

  private async readPooled(length: number): Promise<Buffer> {
    const buffer = this.pool.get();

    try {
      let filled = 0;
      while (filled < length) {
        const count = await this.reader.readInto(buffer, filled, length - filled);
        if (count === 0) {
          throw new ClosedConnectionError('Pipe closed during read', 'payload');
        }
        filled += count;
      }

      return Buffer.from(buffer.subarray(0, length));
    } finally {
      this.pool.release(buffer);
    }
  }

  private writeChunk(chunk: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      this.output.write(chunk, (error) => {
        if (error) {
          reject(new IPCStreamError('write', error));
        } else {
          resolve();
        }
      });
    });
  }

  private assertSendable(data: Uint8Array): void {
    if (data.length > this.maxFrameBytes) {
      throw new IPCProtocolError(
        `Payload of ${data.length} bytes exceeds frame limit ${this.maxFrameBytes}`
      );
    }
  }

  private readonly handleOutputError = (error: Error): void => {
    log.debug(`Output stream error: ${error.message}`);
  };
}

function reclassifyLateFailure(
  error: unknown,
  operation: string,
  timeoutMs: number,
  start: number
): unknown {
  if (error instanceof IPCStreamError && Date.now() - start >= timeoutMs) {
    return new IPCTimeoutError(operation, timeoutMs, error);
  }
  return error;
}
