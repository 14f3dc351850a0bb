/**
 * Text building blocks for CLI output.
 */

/**
 * Accumulates output lines; every method returns `this`.
 *
 * @example
 * ```typescript
 * new OutputFormatter().text('Peer exposes 1 method:').list(['add(a, b)']).build();
 * // 'Peer exposes 1 method:\n  add(a, b)'
 * ```
 */
export class OutputFormatter {
  private readonly lines: string[] = [];

  text(content: string): this {
    this.lines.push(content);
    return this;
  }

  /** Append each item on its own line, indented by `indent` spaces. */
  list(items: readonly string[], indent = 2): this {
    const prefix = ' '.repeat(indent);
    for (const item of items) {
      this.lines.push(prefix + item);
    }
    return this;
  }

  build(): string {
    return this.lines.join('\n');
  }
}

/**
 * Join message parts with newlines, dropping absent parts (empty strings stay).
 */
export function joinLines(...lines: Array<string | null | undefined | false>): string {
  return lines
    .filter((line): line is string => typeof line === 'string')
    .join('\n');
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
