/**
 * Request ID Allocation
 *
 * Outbound request ids are `<prefix><counter>`. The prefix is unique per
 * server so that each side of a pipe can tell replies to its own requests
 * apart from the peer's commands.
 */

let instanceCounter = 0;

/**
 * Default prefix: `<pid>.<instance>-`, unique per server across both processes.
 */
export function defaultRequestIdPrefix(): string {
  return `${process.pid}.${instanceCounter++}-`;
}

export class RequestIdAllocator {
  private next = 0;

  constructor(readonly prefix: string = defaultRequestIdPrefix()) {
    if (prefix.length === 0) {
      throw new RangeError('Request id prefix must not be empty');
    }
  }

  /**
   * Allocate the next id.
   *
   * @example
   * ```typescript
   * const ids = new RequestIdAllocator('host-');
   * ids.allocate(); // 'host-0'
   * ids.allocate(); // 'host-1'
   * ```
   */
  allocate(): string {
    return `${this.prefix}${this.next++}`;
  }

  /**
   * Check whether an id was produced by this allocator's scheme.
   */
  owns(requestId: string): boolean {
    if (!requestId.startsWith(this.prefix)) {
      return false;
    }
    return /^\d+$/.test(requestId.slice(this.prefix.length));
  }

  /** Number of ids allocated so far. */
  get allocatedCount(): number {
    return this.next;
  }
}
