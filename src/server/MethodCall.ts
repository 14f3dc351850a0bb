/**
 * Fluent peer method call.
 *
 * Collects named arguments and a timeout, then sends them as one command.
 */

import type { RequestOptions } from './DispatchServer.js';

/**
 * The part of the dispatch server a fluent call needs.
 */
export interface MethodCallTarget {
  asyncRequest(command: string, data?: unknown, options?: RequestOptions): Promise<unknown>;
}

export class MethodCall {
  private readonly data: Record<string, unknown> = {};
  private timeoutMs: number | undefined;

  constructor(
    private readonly target: MethodCallTarget,
    readonly method: string
  ) {}

  /**
   * Add one named argument. A repeated name overwrites the earlier value.
   */
  arg(name: string, value: unknown): this {
    this.data[name] = value;
    return this;
  }

  /**
   * Add several named arguments at once.
   */
  args(values: Record<string, unknown>): this {
    Object.assign(this.data, values);
    return this;
  }

  /**
   * Wait at most `timeoutMs` for the reply; 0 waits indefinitely.
   */
  withTimeout(timeoutMs: number): this {
    this.timeoutMs = timeoutMs;
    return this;
  }

  /**
   * Send the call and return the peer method's result.
   *
   * @throws RemoteCommandError if the peer method failed
   * @throws IPCTimeoutError if no reply arrived in time
   */
  call(): Promise<unknown> {
    return this.target.asyncRequest(this.method, { ...this.data }, { timeoutMs: this.timeoutMs });
  }
}
