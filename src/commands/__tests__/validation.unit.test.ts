import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  collectValues,
  parseIntegerOption,
  parseJsonArgument,
} from '@/commands/shared/validation.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Unit tests for command argument and option parsing
 */
void describe('parseIntegerOption', () => {
  void it('parses integers, trimming whitespace', () => {
    assert.equal(parseIntegerOption('timeout', '2500', { min: 0 }), 2500);
    assert.equal(parseIntegerOption('timeout', ' 42 '), 42);
    assert.equal(parseIntegerOption('offset', '-3'), -3);
  });

  void it('rejects text that is not an integer', () => {
    assert.throws(
      () => parseIntegerOption('timeout', 'abc', { min: 0 }),
      (error: unknown) => {
        assert.ok(error instanceof CommandError);
        assert.equal(error.exitCode, EXIT_CODES.INVALID_ARGUMENTS);
        assert.equal(
          error.message,
          'Error: Invalid timeout: "abc" is not a valid integer\nMust be at least 0\n\nExample: --timeout 0'
        );
        return true;
      }
    );
    assert.throws(() => parseIntegerOption('timeout', '1.5'), CommandError);
  });

  void it('rejects values outside the range', () => {
    assert.throws(() => parseIntegerOption('timeout', '-1', { min: 0 }), {
      message: /^Error: Invalid timeout: "-1" is not a valid integer\nMust be at least 0/,
    });
    assert.throws(() => parseIntegerOption('port', '70000', { min: 1, max: 65535 }), {
      message:
        'Error: Invalid port: "70000" is not a valid integer\nValid range: 1 to 65535\n\nExample: --port 1',
    });
  });
});

void describe('parseJsonArgument', () => {
  void it('treats a missing or blank argument as null', () => {
    assert.equal(parseJsonArgument(undefined), null);
    assert.equal(parseJsonArgument('   '), null);
  });

  void it('parses JSON objects and scalars', () => {
    assert.deepEqual(parseJsonArgument('{"a": 1, "b": [2]}'), { a: 1, b: [2] });
    assert.equal(parseJsonArgument('42'), 42);
    assert.equal(parseJsonArgument('"text"'), 'text');
  });

  void it('rejects invalid JSON with a quoting suggestion', () => {
    assert.throws(
      () => parseJsonArgument('{bad'),
      (error: unknown) => {
        assert.ok(error instanceof CommandError);
        assert.match(error.message, /^Error: Invalid JSON data "\{bad": /);
        assert.equal(error.metadata.suggestion, `Quote the data for your shell, e.g. '{"a": 1, "b": 2}'`);
        assert.equal(error.exitCode, EXIT_CODES.INVALID_ARGUMENTS);
        return true;
      }
    );
  });
});

void describe('collectValues', () => {
  void it('appends repeated option values', () => {
    assert.deepEqual(collectValues('--import', []), ['--import']);
    assert.deepEqual(collectValues('tsx', ['--import']), ['--import', 'tsx']);
  });
});
