import { Option } from 'commander';

import { CODEC_NAMES } from '@/codec/index.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '@/constants.js';

import { collectValues, parseIntegerOption } from './validation.js';

/**
 * Shared --json flag for all commands that support JSON output.
 */
export const jsonOption = new Option('-j, --json', 'Output as JSON').default(false);

/**
 * Shared --timeout <ms> option for replies from the peer (0 = wait indefinitely).
 */
export const timeoutOption = new Option('--timeout <ms>', 'Reply timeout in ms (0 = no limit)')
  .default(DEFAULT_REQUEST_TIMEOUT_MS)
  .argParser((value) => parseIntegerOption('timeout', value, { min: 0 }));

/**
 * Shared --max-frame-bytes option; raises (or lowers) the 64 MiB frame cap.
 */
export const maxFrameBytesOption = new Option(
  '--max-frame-bytes <bytes>',
  'Largest frame payload accepted from the peer'
).argParser((value) => parseIntegerOption('max-frame-bytes', value, { min: 1 }));

/**
 * Shared --codec option; both ends must agree.
 */
export const codecOption = new Option('--codec <name>', 'Payload codec')
  .choices(CODEC_NAMES)
  .default('msgpack');

/**
 * Shared repeatable --node-arg option, passed to Node.js before the script.
 *
 * @example
 * ```
 * pipe-dispatch call service.ts add '{"a":1,"b":2}' --node-arg=--import=tsx
 * ```
 */
export const nodeArgOption = new Option(
  '--node-arg <arg>',
  'Extra Node.js argument for the peer (repeatable)'
)
  .argParser(collectValues)
  .default([]);

/**
 * Options every peer-launching command accepts.
 */
export interface PeerCommandOptions {
  json?: boolean;
  timeout: number;
  codec: string;
  nodeArg: string[];
  maxFrameBytes?: number;
}
