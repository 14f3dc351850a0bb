/**
 * Peer process error classes.
 */

import { IPCError } from '@/transport/IPCError.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

export type PeerLaunchFailure = 'SPAWN_FAILED' | 'MISSING_STDIO';

/**
 * Error thrown when a peer process cannot be started.
 *
 * @example
 * ```typescript
 * throw new PeerLaunchError('spawn node ENOENT', 'SPAWN_FAILED');
 * ```
 */
export class PeerLaunchError extends IPCError {
  public override readonly name = 'PeerLaunchError';
  public readonly code: PeerLaunchFailure;

  constructor(message: string, code: PeerLaunchFailure) {
    super(message, EXIT_CODES.PEER_LAUNCH_FAILURE);
    this.code = code;
  }
}
