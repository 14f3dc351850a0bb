/**
 * Codecs
 *
 * Injectable payload encodings for the typed queue.
 */

import { ConfigError } from '@/transport/IPCError.js';

import { JsonCodec } from './json.js';
import { MsgpackCodec } from './msgpack.js';
import type { Codec, CodecName } from './types.js';

export { CodecError, SerializationError, describeValueType } from './errors.js';
export { JsonCodec } from './json.js';
export { MsgpackCodec } from './msgpack.js';
export type { Codec, CodecName } from './types.js';

export const CODEC_NAMES: readonly CodecName[] = ['msgpack', 'json'];

/**
 * Check if a string names a built-in codec.
 */
export function isCodecName(name: string): name is CodecName {
  return CODEC_NAMES.some((known) => known === name);
}

/**
 * Create a built-in codec by name.
 *
 * @throws ConfigError for unknown names
 */
export function createCodec(name: string = 'msgpack'): Codec {
  if (!isCodecName(name)) {
    throw new ConfigError(
      `Unknown codec: ${name}. Expected one of: ${CODEC_NAMES.join(', ')}`,
      'UNKNOWN_CODEC'
    );
  }
  return name === 'json' ? new JsonCodec() : new MsgpackCodec();
}
