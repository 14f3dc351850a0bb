/**
 * Pending Request Manager
 *
 * Tracks outbound requests waiting for a correlated response.
 * Each id is inserted at most once and removed exactly once: by its response,
 * its timeout, a send failure, or the server stopping.
 */

import type { ResponseEnvelope } from './envelope.js';

/**
 * Outbound request waiting for a response.
 */
export interface PendingRequest {
  command: string;
  resolve: (response: ResponseEnvelope) => void;
  reject: (error: Error) => void;
  timeout?: NodeJS.Timeout | undefined;
}

/**
 * Manages pending requests with timeout cleanup.
 */
export class PendingRequestManager {
  private readonly pending = new Map<string, PendingRequest>();

  /**
   * Register a pending request.
   *
   * @throws Error if the id is already pending
   */
  add(requestId: string, request: PendingRequest): void {
    if (this.pending.has(requestId)) {
      throw new Error(`Request ${requestId} is already pending`);
    }
    this.pending.set(requestId, request);
  }

  /**
   * Get a pending request by ID.
   */
  get(requestId: string): PendingRequest | undefined {
    return this.pending.get(requestId);
  }

  /**
   * Remove a pending request and clear its timeout.
   */
  remove(requestId: string): PendingRequest | undefined {
    const request = this.pending.get(requestId);
    if (request) {
      clearTimeout(request.timeout);
      this.pending.delete(requestId);
    }
    return request;
  }

  /**
   * Remove a pending request and resolve it with its response.
   *
   * @returns False if no request was pending under that id
   */
  resolve(requestId: string, response: ResponseEnvelope): boolean {
    const request = this.remove(requestId);
    if (!request) {
      return false;
    }
    request.resolve(response);
    return true;
  }

  /**
   * Remove a pending request and reject it.
   *
   * @returns False if no request was pending under that id
   */
  reject(requestId: string, error: Error): boolean {
    const request = this.remove(requestId);
    if (!request) {
      return false;
    }
    request.reject(error);
    return true;
  }

  /**
   * Reject every pending request and clear the map.
   */
  rejectAll(error: Error): void {
    const entries = [...this.pending.entries()];
    this.clear();
    for (const [, request] of entries) {
      request.reject(error);
    }
  }

  /**
   * Get number of pending requests.
   */
  get size(): number {
    return this.pending.size;
  }

  /**
   * Check whether an id is pending.
   */
  has(requestId: string): boolean {
    return this.pending.has(requestId);
  }

  /**
   * Clear all pending requests and their timeouts without settling them.
   */
  clear(): void {
    for (const [, request] of this.pending) {
      clearTimeout(request.timeout);
    }
    this.pending.clear();
  }
}
