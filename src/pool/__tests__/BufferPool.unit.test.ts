/**
 * Unit tests for BufferPool
 *
 * Tests the contract: checkout never blocks, release only takes back buffers
 * of the pool's length, idle retention is capped only by maxIdle.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { BufferPool } from '@/pool/BufferPool.js';

void describe('BufferPool', () => {
  void describe('initialization', () => {
    void it('pre-allocates poolSize buffers', () => {
      const pool = new BufferPool({ bufferSize: 64, poolSize: 3 });

      assert.equal(pool.size, 3);
      assert.equal(pool.allocatedCount, 3);
    });

    void it('pre-allocates no more than maxIdle buffers', () => {
      const pool = new BufferPool({ bufferSize: 64, poolSize: 4, maxIdle: 2 });

      assert.equal(pool.size, 2);
      assert.equal(pool.allocatedCount, 2);
    });

    void it('rejects a non-positive buffer size', () => {
      assert.throws(() => new BufferPool({ bufferSize: 0 }), {
        name: 'RangeError',
        message: 'Buffer size must be a positive integer, got 0',
      });
    });
  });

  void describe('get', () => {
    void it('hands out buffers of the configured length', () => {
      const pool = new BufferPool({ bufferSize: 32, poolSize: 1 });

      const buffer = pool.get();

      assert.equal(buffer.length, 32);
      assert.equal(pool.size, 0);
    });

    void it('allocates when the pool is empty instead of blocking', () => {
      const pool = new BufferPool({ bufferSize: 16, poolSize: 1 });

      const first = pool.get();
      const second = pool.get();

      assert.notEqual(first, second);
      assert.equal(pool.allocatedCount, 2);
    });

    void it('reuses released buffers', () => {
      const pool = new BufferPool({ bufferSize: 16, poolSize: 1 });

      const buffer = pool.get();
      pool.release(buffer);

      assert.equal(pool.get(), buffer);
      assert.equal(pool.allocatedCount, 1);
    });
  });

  void describe('release', () => {
    void it('grows without bound when no maxIdle is set', () => {
      const pool = new BufferPool({ bufferSize: 8, poolSize: 0 });

      const buffers = Array.from({ length: 5 }, () => pool.get());
      buffers.forEach((buffer) => pool.release(buffer));

      assert.equal(pool.allocatedCount, 5);
      assert.equal(pool.size, 5);
    });

    void it('drops buffers beyond maxIdle', () => {
      const pool = new BufferPool({ bufferSize: 8, poolSize: 1, maxIdle: 1 });

      const first = pool.get();
      const second = pool.get();
      pool.release(first);
      pool.release(second);

      assert.equal(pool.size, 1);
    });

    void it('ignores buffers of another length', () => {
      const pool = new BufferPool({ bufferSize: 8, poolSize: 0 });

      pool.release(Buffer.alloc(9));

      assert.equal(pool.size, 0);
    });

    void it('ignores a buffer that is already idle', () => {
      const pool = new BufferPool({ bufferSize: 8, poolSize: 0 });

      const buffer = pool.get();
      pool.release(buffer);
      pool.release(buffer);

      assert.equal(pool.size, 1);
    });
  });
});
