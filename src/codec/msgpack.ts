/**
 * MessagePack codec (default wire encoding).
 */

import { decode, encode } from '@msgpack/msgpack';

import { toError } from '@/utils/errors.js';

import { CodecError } from './errors.js';
import type { Codec } from './types.js';

export class MsgpackCodec implements Codec {
  readonly name = 'msgpack';

  encode(value: unknown): Uint8Array {
    if (typeof value === 'function' || typeof value === 'symbol') {
      throw new CodecError(this.name, 'encode', new TypeError(`Cannot encode ${typeof value}`));
    }
    try {
      return encode(value);
    } catch (error) {
      throw new CodecError(this.name, 'encode', toError(error));
    }
  }

  decode(bytes: Uint8Array): unknown {
    try {
      return decode(bytes);
    } catch (error) {
      throw new CodecError(this.name, 'decode', toError(error));
    }
  }
}
