/**
 * JSON codec.
 *
 * UTF-8 JSON payloads; useful when the peer has no MessagePack library or
 * when frames need to be readable in a hex dump. Byte arrays are not
 * preserved: they encode as objects keyed by index.
 */

import { toError } from '@/utils/errors.js';

import { CodecError } from './errors.js';
import type { Codec } from './types.js';

export class JsonCodec implements Codec {
  readonly name = 'json';

  encode(value: unknown): Uint8Array {
    let text: string | undefined;
    try {
      text = JSON.stringify(value);
    } catch (error) {
      throw new CodecError(this.name, 'encode', toError(error));
    }
    if (text === undefined) {
      throw new CodecError(this.name, 'encode', new TypeError(`Cannot encode ${typeof value}`));
    }
    return Buffer.from(text, 'utf-8');
  }

  decode(bytes: Uint8Array): unknown {
    try {
      const parsed: unknown = JSON.parse(Buffer.from(bytes).toString('utf-8'));
      return parsed;
    } catch (error) {
      throw new CodecError(this.name, 'decode', toError(error));
    }
  }
}
