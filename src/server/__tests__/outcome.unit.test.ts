/**
 * Unit tests for handler outcomes and response envelopes
 *
 * Tests the contract: handler results and failures become tagged outcomes,
 * and outcomes become the exact wire responses the peer sees.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  createCommandEnvelope,
  extractResult,
  toErrorEnvelope,
  toResultEnvelope,
} from '@/server/envelope.js';
import {
  invokeHandler,
  missingCommandOutcome,
  NO_REPLY,
  toWireResponse,
  unknownCommandOutcome,
} from '@/server/outcome.js';

void describe('invokeHandler', () => {
  void it('captures sync and async results', async () => {
    assert.deepEqual(await invokeHandler(() => 3), { status: 'ok', value: 3 });
    assert.deepEqual(await invokeHandler(() => Promise.resolve('done')), {
      status: 'ok',
      value: 'done',
    });
  });

  void it('recognizes NO_REPLY', async () => {
    assert.deepEqual(await invokeHandler(() => NO_REPLY), { status: 'no_reply' });
  });

  void it('captures thrown errors with their stack as detail', async () => {
    const error = new Error('division by zero');

    const outcome = await invokeHandler(() => {
      throw error;
    });

    assert.deepEqual(outcome, {
      status: 'failed',
      kind: 'handler_error',
      message: 'division by zero',
      detail: error.stack,
    });
  });

  void it('captures rejected promises and non-Error throws', async () => {
    const rejected = await invokeHandler(() => Promise.reject(new Error('async boom')));
    const thrown = await invokeHandler(() => {
      throw 'plain string';
    });

    assert.equal(rejected.status === 'failed' && rejected.message, 'async boom');
    assert.deepEqual(thrown, {
      status: 'failed',
      kind: 'handler_error',
      message: 'plain string',
      detail: 'plain string',
    });
  });
});

void describe('toWireResponse', () => {
  void it('merges mapping results with the request id', () => {
    assert.deepEqual(toWireResponse({ status: 'ok', value: { sum: 3 } }, 'p-1'), {
      sum: 3,
      request_id: 'p-1',
    });
  });

  void it('wraps other results, sending undefined as null', () => {
    assert.deepEqual(toWireResponse({ status: 'ok', value: [1, 2] }, 'p-1'), {
      result: [1, 2],
      request_id: 'p-1',
    });
    assert.deepEqual(toWireResponse({ status: 'ok', value: undefined }, 'p-2'), {
      result: null,
      request_id: 'p-2',
    });
  });

  void it('sends nothing for NO_REPLY', () => {
    assert.equal(toWireResponse({ status: 'no_reply' }, 'p-1'), null);
  });

  void it('renders failures as error envelopes', () => {
    assert.deepEqual(toWireResponse(unknownCommandOutcome('nope'), 'p-1'), {
      error: 'Unknown command: nope',
      request_id: 'p-1',
    });
    assert.deepEqual(toWireResponse(missingCommandOutcome(), 'p-2'), {
      error: 'Missing command',
      request_id: 'p-2',
    });
    assert.deepEqual(
      toWireResponse(
        { status: 'failed', kind: 'handler_error', message: 'boom', detail: 'Error: boom' },
        'p-3'
      ),
      { error: 'boom', traceback: 'Error: boom', request_id: 'p-3' }
    );
  });
});

void describe('envelopes', () => {
  void it('sends null data and omits request_id for notifications', () => {
    assert.deepEqual(createCommandEnvelope('ping', undefined), { command: 'ping', data: null });
    assert.deepEqual(createCommandEnvelope('add', { a: 1 }, 'h-0'), {
      command: 'add',
      data: { a: 1 },
      request_id: 'h-0',
    });
  });

  void it('does not mutate a mapping result', () => {
    const result = { sum: 3 };

    toResultEnvelope(result, 'p-1');

    assert.deepEqual(result, { sum: 3 });
  });

  void it('omits an absent traceback', () => {
    assert.deepEqual(toErrorEnvelope('boom', 'p-1'), { error: 'boom', request_id: 'p-1' });
  });

  void describe('extractResult', () => {
    void it('returns the result key when present', () => {
      assert.deepEqual(extractResult({ request_id: 'h-0', result: null }), {
        ok: true,
        value: null,
      });
    });

    void it('returns the mapping without request_id otherwise', () => {
      assert.deepEqual(extractResult({ request_id: 'h-0', count: 2, total: 6 }), {
        ok: true,
        value: { count: 2, total: 6 },
      });
    });

    void it('reports errors with their traceback', () => {
      assert.deepEqual(extractResult({ request_id: 'h-0', error: 'boom', traceback: 'tb' }), {
        ok: false,
        message: 'boom',
        traceback: 'tb',
      });
      assert.deepEqual(extractResult({ request_id: 'h-0', error: 'boom' }), {
        ok: false,
        message: 'boom',
      });
    });
  });
});
