/**
 * Unit tests for ConcurrencyLimiter
 *
 * Tests the contract: never more than `limit` operations in flight, waiters
 * admitted in FIFO order, slots released on failure.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ConcurrencyLimiter } from '@/utils/concurrency.js';
import { delay } from '@/utils/deadline.js';

void describe('ConcurrencyLimiter', () => {
  void it('rejects a limit below 1', () => {
    assert.throws(() => new ConcurrencyLimiter(0), {
      message: 'Concurrency limit must be at least 1',
    });
  });

  void it('serializes operations with a limit of 1', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const events: string[] = [];

    const task = (name: string, ms: number) => async (): Promise<string> => {
      events.push(`start ${name}`);
      await delay(ms);
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([
      limiter.run(task('a', 20)),
      limiter.run(task('b', 1)),
      limiter.run(task('c', 1)),
    ]);

    assert.deepEqual(results, ['a', 'b', 'c']);
    assert.deepEqual(events, ['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  void it('runs up to the limit at once', async () => {
    const limiter = new ConcurrencyLimiter(2);
    let running = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 5 }, () =>
        limiter.run(async () => {
          running++;
          peak = Math.max(peak, running);
          await delay(5);
          running--;
        })
      )
    );

    assert.equal(peak, 2);
  });

  void it('reports running and queued counts', async () => {
    const limiter = new ConcurrencyLimiter(1);
    let release: () => void = () => undefined;
    const blocker = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = limiter.run(() => blocker);
    const second = limiter.run(() => Promise.resolve());
    await delay(0);

    assert.equal(limiter.getRunningCount(), 1);
    assert.equal(limiter.getQueueSize(), 1);

    release();
    await Promise.all([first, second]);
    assert.equal(limiter.getRunningCount(), 0);
    assert.equal(limiter.getQueueSize(), 0);
  });

  void it('releases the slot when an operation fails', async () => {
    const limiter = new ConcurrencyLimiter(1);

    await assert.rejects(
      limiter.run(() => Promise.reject(new Error('write failed'))),
      /write failed/
    );

    assert.equal(await limiter.run(() => Promise.resolve('next')), 'next');
  });
});
