import type { Command } from 'commander';

import { runCommand } from '@/commands/shared/CommandRunner.js';
import {
  codecOption,
  jsonOption,
  maxFrameBytesOption,
  nodeArgOption,
  timeoutOption,
  type PeerCommandOptions,
} from '@/commands/shared/commonOptions.js';
import { withPeer } from '@/commands/shared/peerSession.js';
import { parseJsonArgument } from '@/commands/shared/validation.js';
import { formatCallResult } from '@/ui/formatters/methods.js';

/**
 * Register call command
 *
 * @example
 * ```
 * pipe-dispatch call ./dist/services/math.js add '{"a": 1, "b": 2}'
 * ```
 */
export function registerCallCommand(program: Command): void {
  program
    .command('call')
    .description('Launch a peer script and call one of its methods')
    .argument('<script>', 'Peer script to run with Node.js')
    .argument('<method>', 'Method or command name')
    .argument('[data]', 'JSON data for the call (object for named arguments)')
    .addOption(timeoutOption)
    .addOption(codecOption)
    .addOption(nodeArgOption)
    .addOption(maxFrameBytesOption)
    .addOption(jsonOption)
    .action(
      async (
        script: string,
        method: string,
        data: string | undefined,
        options: PeerCommandOptions
      ) => {
        await runCommand(
          async (opts) => {
            const payload = parseJsonArgument(data);
            const result = await withPeer(script, opts, (peer) =>
              peer.server.asyncRequest(method, payload, { timeoutMs: opts.timeout })
            );
            return { success: true, data: result };
          },
          options,
          formatCallResult
        );
      }
    );
}
