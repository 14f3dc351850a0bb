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
import { formatMethodCatalog } from '@/ui/formatters/methods.js';

/**
 * Register methods command
 */
export function registerMethodsCommand(program: Command): void {
  program
    .command('methods')
    .description("List a peer script's exposed methods")
    .argument('<script>', 'Peer script to run with Node.js')
    .addOption(timeoutOption)
    .addOption(codecOption)
    .addOption(nodeArgOption)
    .addOption(maxFrameBytesOption)
    .addOption(jsonOption)
    .action(async (script: string, options: PeerCommandOptions) => {
      await runCommand(
        async (opts) => {
          const catalog = await withPeer(script, opts, (peer) =>
            peer.server.discoverMethods({ timeoutMs: opts.timeout })
          );
          return { success: true, data: catalog };
        },
        options,
        formatMethodCatalog
      );
    });
}
