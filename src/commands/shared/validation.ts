/**
 * Validation layer for command arguments and options.
 *
 * Parsers here run inside commander's argParser hooks and command actions;
 * every failure is a CommandError with INVALID_ARGUMENTS.
 */

import { CommandError } from '@/ui/errors/index.js';
import { invalidIntegerError, invalidJsonArgumentError } from '@/ui/messages/validation.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { getErrorMessage } from '@/utils/errors.js';

/**
 * Validation options for integer options
 */
export interface IntegerRuleOptions {
  /** Minimum allowed value */
  min?: number;
  /** Maximum allowed value */
  max?: number;
}

/**
 * Parse an integer option value within optional bounds.
 *
 * @throws CommandError if the value is not an integer or out of range
 *
 * @example
 * ```typescript
 * parseIntegerOption('timeout', '2500', { min: 0 }); // 2500
 * parseIntegerOption('timeout', '-1', { min: 0 });   // throws
 * ```
 */
export function parseIntegerOption(
  fieldName: string,
  value: string,
  options: IntegerRuleOptions = {}
): number {
  const { min, max } = options;
  const strValue = value.trim();

  if (!/^-?\d+$/.test(strValue)) {
    throw new CommandError(
      invalidIntegerError(fieldName, strValue, options),
      {},
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }

  const parsed = parseInt(strValue, 10);
  if ((min !== undefined && parsed < min) || (max !== undefined && parsed > max)) {
    throw new CommandError(
      invalidIntegerError(fieldName, strValue, options),
      {},
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }

  return parsed;
}

/**
 * Parse the optional JSON data argument of `call`.
 *
 * An absent argument means "no data" (sent as null).
 *
 * @throws CommandError if the text is not valid JSON
 *
 * @example
 * ```typescript
 * parseJsonArgument('{"a": 1}'); // { a: 1 }
 * parseJsonArgument(undefined);  // null
 * ```
 */
export function parseJsonArgument(raw: string | undefined): unknown {
  if (raw === undefined || raw.trim() === '') {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new CommandError(
      invalidJsonArgumentError(raw, getErrorMessage(error)),
      { suggestion: `Quote the data for your shell, e.g. '{"a": 1, "b": 2}'` },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
}

/**
 * Commander collector for repeatable options.
 *
 * @example
 * ```typescript
 * program.option('--node-arg <arg>', 'Extra Node.js argument', collectValues, []);
 * ```
 */
export function collectValues(value: string, previous: string[]): string[] {
  return [...previous, value];
}
