/**
 * CommandError: a user-facing CLI failure with hints and an exit code.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Metadata that can be attached to command errors.
 */
export interface ErrorMetadata {
  /** What the user can do about it */
  suggestion?: string;
  /** Extra context printed after the suggestion */
  note?: string;
}

/**
 * Error class for CLI commands with structured metadata and a specific exit code.
 *
 * @example
 * ```typescript
 * throw new CommandError(
 *   'Peer script not found: ./service.js',
 *   { suggestion: 'Check the path, or build the script first' },
 *   EXIT_CODES.RESOURCE_NOT_FOUND
 * );
 * ```
 */
export class CommandError extends Error {
  public readonly metadata: ErrorMetadata;
  public readonly exitCode: number;

  constructor(
    message: string,
    metadata: ErrorMetadata = {},
    exitCode: number = EXIT_CODES.GENERIC_FAILURE
  ) {
    super(message);
    this.name = 'CommandError';
    this.metadata = metadata;
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CommandError);
    }
  }
}
