/**
 * Structured IPC error classes.
 *
 * Provides type-safe error handling for transport layer failures.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Base class for all IPC-related errors.
 *
 * Extends Error to include exit codes for consistent CLI behavior.
 */
export class IPCError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode: number = EXIT_CODES.SOFTWARE_ERROR) {
    super(message);
    this.name = 'IPCError';
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, IPCError);
    }
  }
}

/**
 * Error thrown when the peer closes its end of the stream.
 *
 * Raised on any zero-byte read where more data was expected, whether that is
 * the 4-byte length prefix or the payload. A truncated frame surfaces here too.
 *
 * @example
 * ```typescript
 * throw new ClosedConnectionError('Pipe closed during read', 'payload');
 * ```
 */
export class ClosedConnectionError extends IPCError {
  public override readonly name = 'ClosedConnectionError';
  public readonly phase: 'prefix' | 'payload';

  constructor(message = 'Pipe closed', phase: 'prefix' | 'payload' = 'prefix') {
    super(message, EXIT_CODES.PEER_CONNECTION_CLOSED);
    this.phase = phase;
  }
}

/**
 * Error thrown when an operation exceeds its wait window.
 *
 * @example
 * ```typescript
 * throw new IPCTimeoutError('add', 5000);
 * // → "add timed out after 5s"
 * ```
 */
export class IPCTimeoutError extends IPCError {
  public override readonly name = 'IPCTimeoutError';
  public readonly operation: string;
  public readonly timeoutMs: number;
  public override readonly cause?: Error;

  constructor(operation: string, timeoutMs: number, cause?: Error) {
    super(`${operation} timed out after ${timeoutMs / 1000}s`, EXIT_CODES.IPC_TIMEOUT);
    this.operation = operation;
    this.timeoutMs = timeoutMs;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Error thrown when the underlying stream fails (emits 'error' or rejects a write).
 *
 * @example
 * ```typescript
 * throw new IPCStreamError('write', new Error('EPIPE'));
 * ```
 */
export class IPCStreamError extends IPCError {
  public override readonly name = 'IPCStreamError';
  public readonly operation: 'read' | 'write';
  public override readonly cause: Error;

  constructor(operation: 'read' | 'write', cause: Error) {
    super(`Stream ${operation} failed: ${cause.message}`, EXIT_CODES.SOFTWARE_ERROR);
    this.operation = operation;
    this.cause = cause;
  }
}

/**
 * Error thrown when a frame violates protocol limits.
 *
 * @example
 * ```typescript
 * throw new IPCProtocolError('Frame length 134217728 exceeds limit 67108864');
 * ```
 */
export class IPCProtocolError extends IPCError {
  public override readonly name = 'IPCProtocolError';

  constructor(message: string) {
    super(message, EXIT_CODES.PROTOCOL_ERROR);
  }
}

/**
 * Error thrown when a component is constructed with unusable settings.
 *
 * @example
 * ```typescript
 * throw new ConfigError('Input stream must not have a string encoding', 'TEXT_MODE_STREAM');
 * ```
 */
export class ConfigError extends IPCError {
  public override readonly name = 'ConfigError';
  public readonly code?: string;

  constructor(message: string, code?: string) {
    super(message, EXIT_CODES.INVALID_ARGUMENTS);
    if (code !== undefined) {
      this.code = code;
    }
  }
}
