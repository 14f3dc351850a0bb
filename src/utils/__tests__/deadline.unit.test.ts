import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { IPCTimeoutError } from '@/transport/IPCError.js';
import { delay, withDeadline } from '@/utils/deadline.js';

void describe('withDeadline', () => {
  void it('resolves with the operation result inside the window', async () => {
    const result = await withDeadline(
      Promise.resolve('done'),
      100,
      () => new IPCTimeoutError('op', 100)
    );

    assert.equal(result, 'done');
  });

  void it('rejects with the timeout error when the window elapses', async () => {
    await assert.rejects(
      withDeadline(delay(200), 20, () => new IPCTimeoutError('op', 20)),
      { name: 'IPCTimeoutError', message: 'op timed out after 0.02s' }
    );
  });

  void it('passes the operation failure through inside the window', async () => {
    await assert.rejects(
      withDeadline(Promise.reject(new Error('EPIPE')), 100, () => new IPCTimeoutError('op', 100)),
      { message: 'EPIPE' }
    );
  });

  void it('hands a failure after the deadline to onLateFailure', async () => {
    const late: string[] = [];
    const operation = delay(40).then(() => {
      throw new Error('late EPIPE');
    });

    await assert.rejects(
      withDeadline(operation, 10, () => new IPCTimeoutError('op', 10), (message) =>
        late.push(message)
      ),
      IPCTimeoutError
    );
    await delay(60);

    assert.deepEqual(late, ['late EPIPE']);
  });

  void it('returns the operation itself when disabled', () => {
    const operation = Promise.resolve(1);

    assert.equal(withDeadline(operation, 0, () => new Error('unused')), operation);
  });
});

void describe('delay', () => {
  void it('waits at least the given time', async () => {
    const start = Date.now();

    await delay(20);

    assert.ok(Date.now() - start >= 15);
  });
});
