/**
 * Dispatch server error classes.
 */

import { IPCError } from '@/transport/IPCError.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Error thrown when an outbound request could not be written to the peer.
 *
 * @example
 * ```typescript
 * throw new IPCRequestError('add', new IPCStreamError('write', new Error('EPIPE')));
 * ```
 */
export class IPCRequestError extends IPCError {
  public override readonly name = 'IPCRequestError';
  public readonly command: string;
  public override readonly cause: Error;

  constructor(command: string, cause: Error) {
    super(`Error sending request ${command}: ${cause.message}`, EXIT_CODES.SOFTWARE_ERROR);
    this.command = command;
    this.cause = cause;
  }
}

/**
 * Error thrown when the peer answers a request with an error envelope.
 *
 * @example
 * ```typescript
 * throw new RemoteCommandError('divide', 'division by zero', 'Error: division by zero\n    at ...');
 * ```
 */
export class RemoteCommandError extends IPCError {
  public override readonly name = 'RemoteCommandError';
  public readonly command: string;
  public readonly remoteMessage: string;
  public readonly remoteTraceback?: string;

  constructor(command: string, remoteMessage: string, remoteTraceback?: string) {
    super(`Remote error from ${command}: ${remoteMessage}`, EXIT_CODES.REMOTE_COMMAND_FAILURE);
    this.command = command;
    this.remoteMessage = remoteMessage;
    if (remoteTraceback !== undefined) {
      this.remoteTraceback = remoteTraceback;
    }
  }
}

/**
 * Error thrown when an exposed method is invoked without a required argument.
 *
 * @example
 * ```typescript
 * throw new HandlerArgumentError('add', 'b');
 * // → "add() missing required argument 'b'"
 * ```
 */
export class HandlerArgumentError extends IPCError {
  public override readonly name = 'HandlerArgumentError';
  public readonly method: string;
  public readonly parameter: string;

  constructor(method: string, parameter: string) {
    super(`${method}() missing required argument '${parameter}'`, EXIT_CODES.INVALID_ARGUMENTS);
    this.method = method;
    this.parameter = parameter;
  }
}

/**
 * Error thrown when an operation is not valid in the server's lifecycle state.
 *
 * @example
 * ```typescript
 * throw new ServerStateError('request', 'stopped');
 * ```
 */
export class ServerStateError extends IPCError {
  public override readonly name = 'ServerStateError';
  public readonly operation: string;
  public readonly state: string;

  constructor(operation: string, state: string) {
    super(
      `Cannot ${operation} while server is ${state.replace('_', ' ')}`,
      EXIT_CODES.SOFTWARE_ERROR
    );
    this.operation = operation;
    this.state = state;
  }
}
