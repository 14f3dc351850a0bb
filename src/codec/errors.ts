/**
 * Codec error classes.
 */

import { IPCError } from '@/transport/IPCError.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Error thrown by a codec that cannot encode or decode.
 *
 * @example
 * ```typescript
 * throw new CodecError('msgpack', 'decode', new RangeError('Extra 3 of 7 byte(s) found'));
 * ```
 */
export class CodecError extends IPCError {
  public override readonly name = 'CodecError';
  public readonly codec: string;
  public readonly operation: 'encode' | 'decode';
  public override readonly cause?: Error;

  constructor(codec: string, operation: 'encode' | 'decode', cause?: Error) {
    super(
      `${codec} ${operation} failed${cause ? `: ${cause.message}` : ''}`,
      EXIT_CODES.PROTOCOL_ERROR
    );
    this.codec = codec;
    this.operation = operation;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Error thrown when a value handed to the queue cannot be encoded.
 *
 * @example
 * ```typescript
 * throw new SerializationError('function');
 * // → "Object of type function is not serializable"
 * ```
 */
export class SerializationError extends IPCError {
  public override readonly name = 'SerializationError';
  public readonly valueType: string;
  public override readonly cause?: Error;

  constructor(valueType: string, cause?: Error) {
    super(`Object of type ${valueType} is not serializable`, EXIT_CODES.PROTOCOL_ERROR);
    this.valueType = valueType;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Describe the runtime type of a value for error messages.
 *
 * @example
 * ```typescript
 * describeValueType(null)          // 'null'
 * describeValueType([1, 2])        // 'Array'
 * describeValueType(new Map())     // 'Map'
 * describeValueType(() => 1)       // 'function'
 * ```
 */
export function describeValueType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'Array';
  }
  if (typeof value !== 'object') {
    return typeof value;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (
    typeof proto === 'object' &&
    proto !== null &&
    'constructor' in proto &&
    typeof proto.constructor === 'function' &&
    proto.constructor.name
  ) {
    return proto.constructor.name;
  }
  return 'Object';
}
