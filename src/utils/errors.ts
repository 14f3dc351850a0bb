/**
 * Error handling utilities.
 *
 * Pure utility functions for error message extraction.
 */

/**
 * Extract error message from unknown error type.
 *
 * - Error instances → error.message
 * - Unknown types → String(error)
 *
 * @example
 * ```typescript
 * try {
 *   await queue.put(envelope);
 * } catch (error) {
 *   log.info(`Failed to send response: ${getErrorMessage(error)}`);
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Extract a diagnostic trace from unknown error type.
 *
 * Falls back to the message when no stack is available.
 */
export function getErrorDetail(error: unknown): string {
  if (error instanceof Error && error.stack) {
    return error.stack;
  }
  return getErrorMessage(error);
}

/**
 * Normalize an unknown thrown value into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
