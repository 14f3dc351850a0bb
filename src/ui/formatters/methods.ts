/**
 * Human-readable formatting for peer method catalogs and call results.
 */

import type { MethodCatalog, MethodInfo } from '@/server/methodCatalog.js';
import { OutputFormatter, pluralize } from '@/ui/formatting.js';

/**
 * Render one method as a signature line.
 *
 * @example
 * ```typescript
 * formatSignature('add', {
 *   parameters: [{ name: 'a', required: true, type: 'number' }, { name: 'b', required: false }],
 *   return: { type: 'number' },
 *   doc: '',
 * });
 * // 'add(a: number, b?) -> number'
 * ```
 */
export function formatSignature(name: string, info: MethodInfo): string {
  const params = info.parameters
    .map((param) => {
      const label = param.required ? param.name : `${param.name}?`;
      return param.type ? `${label}: ${param.type}` : label;
    })
    .join(', ');
  const returns = info.return.type ? ` -> ${info.return.type}` : '';
  return `${name}(${params})${returns}`;
}

/**
 * Render a catalog as a sorted list of signatures with their docs.
 */
export function formatMethodCatalog(catalog: MethodCatalog): string {
  const names = Object.keys(catalog).sort();
  if (names.length === 0) {
    return 'Peer exposes no methods';
  }

  const output = new OutputFormatter().text(`Peer exposes ${pluralize(names.length, 'method')}:`);
  for (const name of names) {
    const info = catalog[name];
    if (!info) continue;
    output.list([formatSignature(name, info)]);
    if (info.doc) {
      output.list([info.doc], 6);
    }
  }
  return output.build();
}

/**
 * Render a call result: strings verbatim, everything else as indented JSON.
 */
export function formatCallResult(result: unknown): string {
  if (typeof result === 'string') {
    return result;
  }
  return JSON.stringify(result ?? null, null, 2);
}
