/**
 * Validation error messages
 *
 * User-facing messages for CLI input validation failures.
 */

import { joinLines } from '@/ui/formatting.js';

/**
 * Options for integer validation error messages.
 */
export interface IntegerValidationOptions {
  /** Minimum allowed value */
  min?: number;
  /** Maximum allowed value */
  max?: number;
  /** Example valid value to show */
  exampleValue?: number;
}

/**
 * Generate invalid integer error message with context.
 *
 * @example
 * ```typescript
 * invalidIntegerError('timeout', 'abc', { min: 0 });
 * // Error: Invalid timeout: "abc" is not a valid integer
 * // Must be at least 0
 * //
 * // Example: --timeout 0
 * ```
 */
export function invalidIntegerError(
  fieldName: string,
  value: string,
  options?: IntegerValidationOptions
): string {
  const header = `Error: Invalid ${fieldName}: "${value}" is not a valid integer`;

  let rangeInfo: string | undefined;
  if (options?.min !== undefined && options?.max !== undefined) {
    rangeInfo = `Valid range: ${options.min} to ${options.max}`;
  } else if (options?.min !== undefined) {
    rangeInfo = `Must be at least ${options.min}`;
  } else if (options?.max !== undefined) {
    rangeInfo = `Must be at most ${options.max}`;
  }

  const example = options?.exampleValue ?? options?.min ?? 5000;

  return joinLines(header, rangeInfo, '', `Example: --${fieldName} ${example}`);
}

/**
 * Generate invalid JSON argument error message.
 */
export function invalidJsonArgumentError(value: string, reason: string): string {
  return `Error: Invalid JSON data ${JSON.stringify(value)}: ${reason}`;
}
