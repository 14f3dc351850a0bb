/**
 * Peer session helper for CLI commands.
 *
 * Launches the peer script, hands it to the command body, and always closes
 * it afterwards so the CLI never leaves a child process behind.
 */

import { access } from 'node:fs/promises';
import { resolve } from 'node:path';

import { createCodec } from '@/codec/index.js';
import { PeerProcess, type PeerLaunchOptions } from '@/peer/PeerProcess.js';
import { CommandError } from '@/ui/errors/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

import type { PeerCommandOptions } from './commonOptions.js';

const log = createLogger('cli');

export type PeerLauncher = (script: string, options: PeerLaunchOptions) => Promise<PeerProcess>;

/**
 * Map CLI options onto peer launch options.
 */
export function toLaunchOptions(options: PeerCommandOptions): PeerLaunchOptions {
  return {
    nodeArgs: options.nodeArg,
    codec: createCodec(options.codec),
    requestTimeoutMs: options.timeout,
    maxFrameBytes: options.maxFrameBytes,
  };
}

/**
 * Run `body` against a freshly launched peer, closing the peer afterwards.
 *
 * @throws CommandError if the script does not exist
 */
export async function withPeer<T>(
  script: string,
  options: PeerCommandOptions,
  body: (peer: PeerProcess) => Promise<T>,
  launch: PeerLauncher = (path, launchOptions) => PeerProcess.launch(path, launchOptions)
): Promise<T> {
  const scriptPath = resolve(script);
  try {
    await access(scriptPath);
  } catch {
    throw new CommandError(
      `Peer script not found: ${script}`,
      { suggestion: 'Check the path, or build the script first' },
      EXIT_CODES.RESOURCE_NOT_FOUND
    );
  }

  const peer = await launch(scriptPath, toLaunchOptions(options));
  try {
    return await body(peer);
  } finally {
    log.debug('Closing peer');
    await peer.close();
  }
}
