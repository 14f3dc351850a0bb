/**
 * Structured output building for CLI commands.
 *
 * Keeps the JSON output of every command in one envelope shape.
 */

import { VERSION } from '@/utils/version.js';

export class OutputBuilder {
  /**
   * Build a JSON error response.
   *
   * @example
   * ```typescript
   * OutputBuilder.buildJsonError('add timed out after 5s', { exitCode: 102 });
   * // { version: '0.3.0', success: false, error: 'add timed out after 5s', exitCode: 102 }
   * ```
   */
  static buildJsonError(
    error: string | Error,
    options?: { exitCode?: number; [key: string]: unknown }
  ): Record<string, unknown> {
    return {
      version: VERSION,
      success: false,
      error: error instanceof Error ? error.message : error,
      ...options,
    };
  }

  /**
   * Build a JSON success response around a command's data.
   */
  static buildJsonSuccess(data: unknown): Record<string, unknown> {
    return {
      version: VERSION,
      success: true,
      data,
    };
  }
}
