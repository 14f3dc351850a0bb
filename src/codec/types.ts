/**
 * Codec contract
 *
 * A codec turns envelope values into payload bytes and back. Both ends of a
 * pipe must use the same codec. Implementations are deterministic for a fixed
 * input and throw CodecError, never anything else, for values outside their
 * model.
 */
export interface Codec {
  /** Short identifier used in logs and CLI options */
  readonly name: string;

  /**
   * Encode a value into payload bytes.
   *
   * @throws CodecError if the value cannot be represented
   */
  encode(value: unknown): Uint8Array;

  /**
   * Decode payload bytes into a value.
   *
   * @throws CodecError if the bytes are not a valid encoding
   */
  decode(bytes: Uint8Array): unknown;
}

export type CodecName = 'msgpack' | 'json';
