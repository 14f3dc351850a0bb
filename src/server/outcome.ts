/**
 * Handler Outcomes
 *
 * Every command invocation produces a tagged outcome instead of throwing.
 * The dispatch boundary converts outcomes into wire responses, so a failing
 * handler can never take down the poll loop.
 */

import { getErrorDetail, getErrorMessage } from '@/utils/errors.js';

import { toErrorEnvelope, toResultEnvelope, type ResponseEnvelope } from './envelope.js';

/**
 * Returned by a handler that has already sent its own reply (or must not send one).
 */
export const NO_REPLY: unique symbol = Symbol('pipe-dispatch.no-reply');
export type NoReply = typeof NO_REPLY;

export type FailureKind = 'unknown_command' | 'invalid_message' | 'handler_error';

export type HandlerOutcome =
  | { status: 'ok'; value: unknown }
  | { status: 'no_reply' }
  | { status: 'failed'; kind: FailureKind; message: string; detail?: string };

/**
 * Run a handler body and capture its result or failure.
 */
export async function invokeHandler(body: () => unknown): Promise<HandlerOutcome> {
  try {
    const value: unknown = await body();
    return value === NO_REPLY ? { status: 'no_reply' } : { status: 'ok', value };
  } catch (error) {
    return {
      status: 'failed',
      kind: 'handler_error',
      message: getErrorMessage(error),
      detail: getErrorDetail(error),
    };
  }
}

export function unknownCommandOutcome(command: string): HandlerOutcome {
  return { status: 'failed', kind: 'unknown_command', message: `Unknown command: ${command}` };
}

export function missingCommandOutcome(): HandlerOutcome {
  return { status: 'failed', kind: 'invalid_message', message: 'Missing command' };
}

/**
 * Convert an outcome into the response for `requestId`, or null when nothing is sent.
 */
export function toWireResponse(
  outcome: HandlerOutcome,
  requestId: string
): ResponseEnvelope | null {
  switch (outcome.status) {
    case 'ok':
      return toResultEnvelope(outcome.value, requestId);
    case 'no_reply':
      return null;
    case 'failed':
      return toErrorEnvelope(outcome.message, requestId, outcome.detail);
  }
}
