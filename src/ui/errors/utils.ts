/**
 * Error utility functions for the CLI layer.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Extract the exit code carried by an error.
 *
 * IPCError and CommandError both carry `exitCode`; anything else maps to
 * UNHANDLED_EXCEPTION.
 *
 * @example
 * ```typescript
 * getExitCode(new IPCTimeoutError('add', 5000)); // 102
 * getExitCode(new Error('boom'));                // 104
 * ```
 */
export function getExitCode(error: unknown): number {
  if (error instanceof Error && 'exitCode' in error && typeof error.exitCode === 'number') {
    return error.exitCode;
  }
  return EXIT_CODES.UNHANDLED_EXCEPTION;
}
