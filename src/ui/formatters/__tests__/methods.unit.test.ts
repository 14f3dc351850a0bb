import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import type { MethodCatalog } from '@/server/methodCatalog.js';
import { formatCallResult, formatMethodCatalog, formatSignature } from '@/ui/formatters/methods.js';

const catalog: MethodCatalog = {
  scale: {
    parameters: [
      { name: 'value', required: true },
      { name: 'factor', required: false },
    ],
    return: {},
    doc: '',
  },
  add: {
    parameters: [
      { name: 'a', required: true, type: 'number' },
      { name: 'b', required: true, type: 'number' },
    ],
    return: { type: 'number' },
    doc: 'Add two numbers',
  },
};

void describe('formatSignature', () => {
  void it('marks optional parameters and appends types', () => {
    const { scale } = catalog;
    assert.ok(scale);

    assert.equal(formatSignature('scale', scale), 'scale(value, factor?)');
    assert.equal(
      formatSignature('add', {
        parameters: [{ name: 'a', required: false, type: 'number' }],
        return: { type: 'number' },
        doc: '',
      }),
      'add(a?: number) -> number'
    );
  });
});

void describe('formatMethodCatalog', () => {
  void it('lists sorted signatures with their docs', () => {
    assert.equal(
      formatMethodCatalog(catalog),
      [
        'Peer exposes 2 methods:',
        '  add(a: number, b: number) -> number',
        '      Add two numbers',
        '  scale(value, factor?)',
      ].join('\n')
    );
  });

  void it('uses the singular for one method', () => {
    const { add } = catalog;
    assert.ok(add);

    assert.equal(formatMethodCatalog({ add }).split('\n')[0], 'Peer exposes 1 method:');
  });

  void it('reports an empty catalog', () => {
    assert.equal(formatMethodCatalog({}), 'Peer exposes no methods');
  });
});

void describe('formatCallResult', () => {
  void it('prints strings verbatim and everything else as JSON', () => {
    assert.equal(formatCallResult('host'), 'host');
    assert.equal(formatCallResult({ a: 1 }), '{\n  "a": 1\n}');
    assert.equal(formatCallResult(undefined), 'null');
  });
});
