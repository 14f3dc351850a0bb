/**
 * Deadline helpers for promise-based operations.
 */

import { getErrorMessage } from '@/utils/errors.js';

/**
 * Race an operation against a timer.
 *
 * When the timer wins, the returned promise rejects with `onTimeout()` and the
 * operation keeps running in the background; its eventual failure is passed to
 * `onLateFailure` instead of surfacing as an unhandled rejection.
 *
 * A `timeoutMs` of 0 or below disables the deadline.
 *
 * @example
 * ```typescript
 * await withDeadline(transport.send(frame), 1000, () => new IPCTimeoutError('send', 1000));
 * ```
 */
export function withDeadline<T>(
  operation: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  onLateFailure: (message: string) => void = () => undefined
): Promise<T> {
  if (timeoutMs <= 0) {
    return operation;
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const timer = setTimeout(() => {
      settled = true;
      reject(onTimeout());
    }, timeoutMs);

    operation.then(
      (value) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        if (settled) {
          onLateFailure(getErrorMessage(error));
          return;
        }
        settled = true;
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/**
 * Resolve after `ms` milliseconds.
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
