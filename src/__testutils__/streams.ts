/**
 * streams - In-process stream stand-ins for transport and server tests
 *
 * Every test that needs "a pipe" gets PassThrough pairs instead of a real
 * child process: bytes written to one end are readable from the other.
 *
 * Usage:
 * ```typescript
 * const link = createPipeLink();
 * const host = new DispatchServer({ ...link.left, pollIntervalMs: 10 });
 * const peer = new MathService({ ...link.right, pollIntervalMs: 10 });
 * ```
 */

import { PassThrough, Writable } from 'node:stream';

import { FRAME_PREFIX_BYTES } from '@/constants.js';

export interface StreamEnds {
  input: PassThrough;
  output: PassThrough;
}

/**
 * Two connected ends: `left.output` feeds `right.input` and vice versa.
 */
export interface PipeLink {
  left: StreamEnds;
  right: StreamEnds;
}

export function createPipeLink(): PipeLink {
  const leftToRight = new PassThrough();
  const rightToLeft = new PassThrough();
  return {
    left: { input: rightToLeft, output: leftToRight },
    right: { input: leftToRight, output: rightToLeft },
  };
}

/**
 * Encode a payload as a wire frame (4-byte big-endian length + bytes).
 */
export function encodeFrame(payload: Uint8Array | string): Buffer {
  const body = typeof payload === 'string' ? Buffer.from(payload, 'utf-8') : Buffer.from(payload);
  const prefix = Buffer.alloc(FRAME_PREFIX_BYTES);
  prefix.writeUInt32BE(body.length, 0);
  return Buffer.concat([prefix, body]);
}

/**
 * Records everything written to a stream.
 */
export class OutputCollector {
  private readonly chunks: Buffer[] = [];

  constructor(stream: PassThrough) {
    stream.on('data', (chunk: Buffer) => {
      this.chunks.push(chunk);
    });
  }

  get bytes(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

/**
 * Writable whose every write fails, like a pipe whose reader has exited.
 */
export function createFailingWritable(message = 'EPIPE'): Writable {
  return new Writable({
    write(_chunk: unknown, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
      callback(new Error(message));
    },
  });
}

/**
 * Writable that accepts writes but never completes them.
 */
export function createStalledWritable(): Writable {
  return new Writable({
    write() {
      // never calls back
    },
  });
}

/**
 * Let pending stream callbacks and 'data' events run.
 */
export function flushIO(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
