/**
 * Filter out undefined values from an object, returning only defined properties.
 *
 * Wire envelopes omit absent keys instead of carrying them as undefined
 * (MessagePack would otherwise encode them as nil).
 *
 * Type safety: Returns Record\<string, unknown\> to maintain soundness, since
 * which properties survive is only known at runtime.
 *
 * @example
 * ```typescript
 * const envelope = filterDefined({
 *   error: 'boom',
 *   traceback: undefined,
 *   request_id: '4812.0-3'
 * });
 * // Result: { error: 'boom', request_id: '4812.0-3' }
 * ```
 */
export function filterDefined<T extends Record<string, unknown>>(obj: T): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, value]) => value !== undefined));
}

/**
 * Check if a value is a plain keyed mapping.
 *
 * Arrays, byte arrays and null are not mappings.
 *
 * @example
 * ```typescript
 * isRecord({ a: 1 })            // true
 * isRecord([1, 2])              // false
 * isRecord(new Uint8Array(2))   // false
 * isRecord(null)                // false
 * ```
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !ArrayBuffer.isView(value)
  );
}
