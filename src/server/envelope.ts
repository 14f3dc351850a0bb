/**
 * Message Envelopes
 *
 * Wire shapes carried inside frames. Keys are snake_case on the wire.
 *
 * - Command: `{ command, data?, request_id? }`
 * - Response: `{ request_id, ...mapping }`, `{ request_id, result }` or
 *   `{ request_id, error, traceback? }`
 */

import { isRecord } from '@/utils/objects.js';

/**
 * Command sent to the peer.
 */
export interface CommandEnvelope {
  command: string;
  data: unknown;
  request_id?: string;
}

/**
 * Response correlated to an earlier command by request_id.
 */
export type ResponseEnvelope = { request_id: string } & Record<string, unknown>;

/**
 * Build an outbound command envelope. `data` defaults to null on the wire.
 */
export function createCommandEnvelope(
  command: string,
  data: unknown,
  requestId?: string
): CommandEnvelope {
  const envelope: CommandEnvelope = { command, data: data ?? null };
  if (requestId !== undefined) {
    envelope.request_id = requestId;
  }
  return envelope;
}

/**
 * Wrap a handler result for the wire.
 *
 * Mapping results are merged with the request_id (without mutating the
 * handler's object); anything else is wrapped as `{ result, request_id }`.
 *
 * @example
 * ```typescript
 * toResultEnvelope({ sum: 3 }, 'r-1') // { sum: 3, request_id: 'r-1' }
 * toResultEnvelope(3, 'r-1')          // { result: 3, request_id: 'r-1' }
 * ```
 */
export function toResultEnvelope(result: unknown, requestId: string): ResponseEnvelope {
  if (isRecord(result)) {
    return { ...result, request_id: requestId };
  }
  return { result: result ?? null, request_id: requestId };
}

/**
 * Build an error response. The traceback key is omitted when absent.
 */
export function toErrorEnvelope(
  message: string,
  requestId: string,
  traceback?: string
): ResponseEnvelope {
  const envelope: ResponseEnvelope = { error: message, request_id: requestId };
  if (traceback !== undefined) {
    envelope['traceback'] = traceback;
  }
  return envelope;
}

/**
 * Read the request_id of a decoded message, if it carries a string one.
 */
export function getRequestId(message: Record<string, unknown>): string | undefined {
  const requestId = message['request_id'];
  return typeof requestId === 'string' ? requestId : undefined;
}

/**
 * Narrow a decoded message that is known to answer one of our requests.
 */
export function asResponseEnvelope(
  message: Record<string, unknown>,
  requestId: string
): ResponseEnvelope {
  return { ...message, request_id: requestId };
}

/**
 * Extract the value a caller asked for from a response.
 *
 * - `error` present → `{ ok: false }` with message and traceback
 * - `result` present → its value
 * - otherwise the merged mapping without request_id
 */
export function extractResult(
  response: ResponseEnvelope
): { ok: true; value: unknown } | { ok: false; message: string; traceback?: string } {
  const { error, traceback } = response;
  if (typeof error === 'string') {
    return typeof traceback === 'string'
      ? { ok: false, message: error, traceback }
      : { ok: false, message: error };
  }

  if ('result' in response) {
    return { ok: true, value: response['result'] };
  }

  const rest: Record<string, unknown> = { ...response };
  delete rest['request_id'];
  return { ok: true, value: rest };
}

export { isRecord };
