/**
 * Typed Queue
 *
 * Pairs a framed transport with a codec: values go in through `put`, come out
 * of `get` on the other end.
 */

import type { Readable, Writable } from 'node:stream';

import { describeValueType, MsgpackCodec, SerializationError } from '@/codec/index.js';
import type { Codec } from '@/codec/index.js';
import { FramedTransport, type FramedTransportOptions } from '@/transport/FramedTransport.js';
import { createLogger } from '@/ui/logging/index.js';
import { toError } from '@/utils/errors.js';

const log = createLogger('queue');

export interface QueueOptions {
  /**
   * Use the timed transport path (default true). With `block: false` the
   * untimed path is used and `timeoutMs` is ignored.
   */
  block?: boolean | undefined;
  /** Deadline for the timed path; 0 or below means none */
  timeoutMs?: number | undefined;
}

export interface TypedQueueOptions extends FramedTransportOptions {
  codec?: Codec | undefined;
}

export class TypedQueue {
  readonly codec: Codec;

  constructor(
    readonly transport: FramedTransport,
    codec: Codec = new MsgpackCodec()
  ) {
    this.codec = codec;
  }

  /**
   * Build a queue over a raw stream pair.
   */
  static fromStreams(
    input: Readable,
    output: Writable,
    options: TypedQueueOptions = {}
  ): TypedQueue {
    const { codec, ...transportOptions } = options;
    return new TypedQueue(new FramedTransport(input, output, transportOptions), codec);
  }

  /**
   * Encode and send a value.
   *
   * @throws SerializationError if the codec rejects the value
   */
  async put(value: unknown, options: QueueOptions = {}): Promise<void> {
    const { block = true, timeoutMs = 0 } = options;

    let payload: Uint8Array;
    try {
      payload = this.codec.encode(value);
    } catch (error) {
      throw new SerializationError(describeValueType(value), toError(error));
    }

    if (block) {
      await this.transport.sendWithTimeout(payload, timeoutMs);
    } else {
      await this.transport.send(payload);
    }
  }

  /**
   * Receive and decode the next value.
   *
   * Decoding failures propagate unchanged; the frame they came from has
   * already been consumed.
   */
  async get(options: QueueOptions = {}): Promise<unknown> {
    const { block = true, timeoutMs = 0 } = options;

    const payload = block
      ? await this.transport.receiveWithTimeout(timeoutMs)
      : await this.transport.receive();

    log.debug(`Received ${payload.length} byte payload`);
    return this.codec.decode(payload);
  }

  close(): void {
    this.transport.close();
  }
}
