/**
 * DispatchServer Contract Tests (outbound)
 *
 * Two real servers on one pipe link: a plain host and a MathService peer.
 *
 * Contract:
 * - request() resolves with the full response envelope for its request_id
 * - asyncRequest() resolves with the extracted value or throws RemoteCommandError
 * - notify() sends without a request_id and expects nothing back
 * - Either side can call the other while serving
 *
 * What we test:
 * ✅ Behavior: request → correlated response, across concurrent and nested calls
 * ✅ Invariants: "every pending request settles exactly once"
 * ✅ Edge cases: timeouts, send failures, stopping with requests outstanding
 * ✅ Discovery: discoverMethods(), getMethods(), getMethodInfo()
 *
 * What we DON'T test:
 * ❌ Request id formatting (covered by requestId unit tests)
 */

import assert from 'node:assert/strict';
import { PassThrough } from 'node:stream';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { MathService } from '@/__testfixtures__/MathService.js';
import { createFailingWritable, createPipeLink } from '@/__testutils__/index.js';
import { DispatchServer } from '@/server/DispatchServer.js';
import {
  IPCRequestError,
  RemoteCommandError,
  ServerStateError,
} from '@/server/errors.js';
import { ClosedConnectionError, IPCTimeoutError } from '@/transport/IPCError.js';

void describe('DispatchServer contract (outbound)', () => {
  let host: DispatchServer;
  let peer: MathService;

  beforeEach(() => {
    const link = createPipeLink();
    host = new DispatchServer({ ...link.left, pollIntervalMs: 10, requestIdPrefix: 'host-' });
    peer = new MathService({ ...link.right, pollIntervalMs: 10, requestIdPrefix: 'peer-' });
    host.start();
    peer.start();
  });

  afterEach(async () => {
    await host.close();
    await peer.close();
  });

  void describe('request', () => {
    void it('resolves with the full response envelope', async () => {
      const response = await host.request('stats', { values: [2, 4] });

      assert.deepEqual(response, { count: 2, total: 6, request_id: 'host-0' });
    });

    void it('resolves error replies instead of throwing', async () => {
      const response = await host.request('nope');

      assert.deepEqual(response, { error: 'Unknown command: nope', request_id: 'host-0' });
    });

    void it('correlates concurrent replies that arrive out of order', async () => {
      const results = await Promise.all([
        host.asyncRequest('delayed', { value: 'slow', ms: 60 }),
        host.asyncRequest('delayed', { value: 'fast', ms: 5 }),
        host.asyncRequest('add', { a: 1, b: 2 }),
      ]);

      assert.deepEqual(results, ['slow', 'fast', 3]);
    });

    void it('times out when no reply arrives in time', async () => {
      await assert.rejects(
        host.request('delayed', { value: 1, ms: 200 }, { timeoutMs: 30 }),
        (error: unknown) => {
          assert.ok(error instanceof IPCTimeoutError);
          assert.equal(error.message, 'delayed timed out after 0.03s');
          return true;
        }
      );
    });

    void it('drops a reply that arrives after its request timed out', async () => {
      await assert.rejects(
        host.request('delayed', { value: 'late', ms: 100 }, { timeoutMs: 30 }),
        { name: 'IPCTimeoutError' }
      );
      assert.equal(host.pendingRequestCount, 0);

      // Still waiting when the late reply for host-0 lands
      const next = host.request('delayed', { value: 'next', ms: 150 });
      assert.equal(host.pendingRequestCount, 1);

      assert.deepEqual(await next, { result: 'next', request_id: 'host-1' });
      assert.equal(host.pendingRequestCount, 0);
    });

    void it('rejects outstanding requests when the server stops', async () => {
      const pending = host.request('delayed', { value: 1, ms: 100 }, { timeoutMs: 0 });
      await new Promise((resolve) => setTimeout(resolve, 10));

      const rejection = assert.rejects(pending, (error: unknown) => {
        assert.ok(error instanceof ClosedConnectionError);
        assert.equal(error.message, 'Server stopped (stopped)');
        return true;
      });
      await host.stop();

      await rejection;
    });

    void it('refuses to send before start and after stop', async () => {
      const link = createPipeLink();
      const idle = new DispatchServer(link.left);

      await assert.rejects(idle.request('add'), (error: unknown) => {
        assert.ok(error instanceof ServerStateError);
        assert.equal(error.message, 'Cannot request while server is not started');
        return true;
      });

      await host.stop();
      await assert.rejects(host.request('add'), {
        message: 'Cannot request while server is stopped',
      });
      idle.queue.close();
    });
  });

  void describe('asyncRequest', () => {
    void it('returns the result value', async () => {
      assert.equal(await host.asyncRequest('add', { a: 2, b: 3 }), 5);
    });

    void it('returns mapping replies without request_id', async () => {
      assert.deepEqual(await host.asyncRequest('stats', { values: [1, 2, 3] }), {
        count: 3,
        total: 6,
      });
    });

    void it('throws RemoteCommandError for error replies', async () => {
      await assert.rejects(host.asyncRequest('divide', { a: 1, b: 0 }), (error: unknown) => {
        assert.ok(error instanceof RemoteCommandError);
        assert.equal(error.command, 'divide');
        assert.equal(error.remoteMessage, 'division by zero');
        assert.match(error.remoteTraceback ?? '', /^Error: division by zero/);
        return true;
      });
    });
  });

  void describe('send failures', () => {
    void it('wraps a failed write in IPCRequestError', async () => {
      const broken = new DispatchServer({
        input: new PassThrough(),
        output: createFailingWritable('EPIPE'),
        pollIntervalMs: 10,
      });
      broken.start();

      await assert.rejects(broken.request('add', { a: 1, b: 2 }), (error: unknown) => {
        assert.ok(error instanceof IPCRequestError);
        assert.equal(error.command, 'add');
        assert.equal(error.message, 'Error sending request add: Stream write failed: EPIPE');
        return true;
      });
      await assert.rejects(broken.notify('note', 'x'), IPCRequestError);

      await broken.close();
    });
  });

  void describe('notify', () => {
    void it('runs the command on the peer without a reply', async () => {
      await host.notify('note', { text: 'hello' });
      await host.notify('note', 'world');

      assert.deepEqual(await host.asyncRequest('listNotes'), ['hello', 'world']);
    });

    void it('refuses to send after stop', async () => {
      await host.stop();

      await assert.rejects(host.notify('note', 'x'), ServerStateError);
    });
  });

  void describe('fluent calls', () => {
    void it('collects named arguments and sends one request', async () => {
      const result = await host.on('add').arg('a', 2).arg('b', 5).withTimeout(1000).call();

      assert.equal(result, 7);
    });

    void it('merges argument records', async () => {
      const result = await host.on('scale').args({ value: 3 }).args({ factor: 4 }).call();

      assert.equal(result, 12);
    });

    void it('still subscribes to events when given a listener', async () => {
      const reasons: string[] = [];
      host.on('stopped', (reason) => reasons.push(reason));

      await host.stop();

      assert.deepEqual(reasons, ['stopped']);
    });
  });

  void describe('bidirectional calls', () => {
    void it('lets the peer call the host while answering the host', async () => {
      host.registerHandler('whoami', () => 'host');

      assert.equal(await host.asyncRequest('relay', { command: 'whoami' }), 'host');
    });
  });

  void describe('method discovery', () => {
    void it('starts with an empty catalog', () => {
      assert.deepEqual(host.getMethods(), []);
      assert.equal(host.getMethodInfo('add'), undefined);
    });

    void it('fetches and caches the peer catalog', async () => {
      const catalog = await host.discoverMethods();

      assert.deepEqual(host.getMethods().sort(), Object.keys(catalog).sort());
      assert.ok(host.getMethods().includes('sum'));
      assert.deepEqual(host.getMethodInfo('add'), {
        parameters: [
          { name: 'a', required: true, type: 'number' },
          { name: 'b', required: true, type: 'number' },
        ],
        return: { type: 'number' },
        doc: 'Add two numbers',
      });
      assert.deepEqual(host.getMethodInfo('sum'), {
        parameters: [{ name: 'values', required: false }],
        return: {},
        doc: 'Sum any number of values',
      });
      assert.equal(host.getMethodInfo('missing'), undefined);
    });
  });
});
