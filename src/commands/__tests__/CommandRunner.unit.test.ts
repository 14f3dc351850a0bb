/**
 * Unit tests for runCommand
 *
 * Tests the contract: every outcome prints once (JSON or text) and exits with
 * the code the result or error carries.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { runCommand, type CommandIO } from '@/commands/shared/CommandRunner.js';
import { IPCTimeoutError } from '@/transport/IPCError.js';
import { CommandError } from '@/ui/errors/index.js';
import { formatCallResult } from '@/ui/formatters/methods.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { VERSION } from '@/utils/version.js';

interface CapturedIO extends CommandIO {
  out: string[];
  err: string[];
  codes: number[];
}

function captureIO(): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  const codes: number[] = [];
  return {
    out,
    err,
    codes,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    exit: (code) => codes.push(code),
  };
}

void describe('runCommand', () => {
  void it('formats successful data and exits 0', async () => {
    const io = captureIO();

    await runCommand(async () => ({ success: true, data: 5 }), {}, formatCallResult, io);

    assert.deepEqual(io.out, ['5']);
    assert.deepEqual(io.err, []);
    assert.deepEqual(io.codes, [EXIT_CODES.SUCCESS]);
  });

  void it('wraps successful data in the JSON envelope with --json', async () => {
    const io = captureIO();

    await runCommand(
      async () => ({ success: true, data: { count: 2 } }),
      { json: true },
      formatCallResult,
      io
    );

    assert.equal(io.out.length, 1);
    assert.deepEqual(JSON.parse(io.out[0] ?? ''), {
      version: VERSION,
      success: true,
      data: { count: 2 },
    });
    assert.deepEqual(io.codes, [0]);
  });

  void it('prints null when there is no data or formatter', async () => {
    const io = captureIO();

    await runCommand(async () => ({ success: true }), {}, undefined, io);

    assert.deepEqual(io.out, ['null']);
  });

  void it('reports failed results with their exit code', async () => {
    const io = captureIO();

    await runCommand(
      async () => ({ success: false, error: 'nothing to do', exitCode: 83 }),
      {},
      undefined,
      io
    );

    assert.deepEqual(io.err, ['Error: nothing to do']);
    assert.deepEqual(io.codes, [83]);
  });

  void it('prints CommandError metadata after the message', async () => {
    const io = captureIO();

    await runCommand(
      async () => {
        throw new CommandError(
          'Peer script not found: ./missing.js',
          { suggestion: 'Check the path, or build the script first' },
          EXIT_CODES.RESOURCE_NOT_FOUND
        );
      },
      {},
      undefined,
      io
    );

    assert.deepEqual(io.err, [
      'Error: Peer script not found: ./missing.js',
      'Check the path, or build the script first',
    ]);
    assert.deepEqual(io.codes, [EXIT_CODES.RESOURCE_NOT_FOUND]);
  });

  void it('does not double the Error: prefix', async () => {
    const io = captureIO();

    await runCommand(
      async () => {
        throw new CommandError('Error: Invalid timeout', {}, EXIT_CODES.INVALID_ARGUMENTS);
      },
      {},
      undefined,
      io
    );

    assert.deepEqual(io.err, ['Error: Invalid timeout']);
    assert.deepEqual(io.codes, [81]);
  });

  void it('maps IPC errors to their exit codes in JSON mode', async () => {
    const io = captureIO();

    await runCommand(
      async () => {
        throw new IPCTimeoutError('add', 5000);
      },
      { json: true },
      undefined,
      io
    );

    assert.deepEqual(JSON.parse(io.out[0] ?? ''), {
      version: VERSION,
      success: false,
      error: 'add timed out after 5s',
      exitCode: EXIT_CODES.IPC_TIMEOUT,
    });
    assert.deepEqual(io.codes, [EXIT_CODES.IPC_TIMEOUT]);
  });

  void it('exits with UNHANDLED_EXCEPTION for unknown errors', async () => {
    const io = captureIO();

    await runCommand(
      async () => {
        throw new Error('boom');
      },
      {},
      undefined,
      io
    );

    assert.deepEqual(io.err, ['Error: boom']);
    assert.deepEqual(io.codes, [EXIT_CODES.UNHANDLED_EXCEPTION]);
  });
});
