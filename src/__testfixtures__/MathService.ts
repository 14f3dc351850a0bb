/**
 * MathService - Dispatch server subclass used across server and peer tests
 *
 * Covers every parameter shape method exposure understands: declared specs,
 * plain positional parameters, defaults, rest parameters and destructuring.
 */

import { DispatchServer } from '@/server/DispatchServer.js';
import type { MethodSpecs } from '@/server/exposure.js';
import { delay } from '@/utils/deadline.js';

export class MathService extends DispatchServer {
  static override methodSpecs: MethodSpecs = {
    add: {
      doc: 'Add two numbers',
      returns: 'number',
      parameters: [
        { name: 'a', type: 'number' },
        { name: 'b', type: 'number' },
      ],
    },
    sum: { doc: 'Sum any number of values', parameters: [{ name: 'values', rest: true }] },
  };

  readonly notes: string[] = [];

  add(a: number, b: number): number {
    return a + b;
  }

  scale(value: number, factor = 2): number {
    return value * factor;
  }

  divide(a: number, b: number): number {
    if (b === 0) {
      throw new Error('division by zero');
    }
    return a / b;
  }

  sum(...values: number[]): number {
    return values.reduce((total, value) => total + value, 0);
  }

  stats(values: number[]): { count: number; total: number } {
    return { count: values.length, total: this.sum(...values) };
  }

  label({ name, unit = 'items' }: { name: string; unit?: string }): string {
    return `${name} (${unit})`;
  }

  async delayed(value: unknown, ms = 10): Promise<unknown> {
    await delay(ms);
    return value;
  }

  note(text: string): void {
    this.notes.push(text);
  }

  listNotes(): string[] {
    return [...this.notes];
  }

  /**
   * Ask the other side of the pipe to run `command` and return its answer.
   */
  async relay(command: string): Promise<unknown> {
    return this.asyncRequest(command, null, { timeoutMs: 1000 });
  }

  _internal(): string {
    return 'not exposed';
  }
}
