#!/usr/bin/env node

import { Command } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { createLogger, enableDebugLogging } from '@/ui/logging/index.js';
import { getExitCode } from '@/ui/errors/index.js';
import { getErrorMessage } from '@/utils/errors.js';
import { VERSION } from '@/utils/version.js';

// Commander Configuration
const CLI_NAME = 'pipe-dispatch';
const CLI_DESCRIPTION = 'Call methods on a peer process over length-prefixed stdio pipes';

const log = createLogger('cli');

/**
 * Main entry point.
 *
 * 1. Enable debug logging early if --debug is present
 * 2. Initialize Commander and register command handlers
 * 3. Parse arguments and route to the command
 */
async function main(): Promise<void> {
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }

  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option('--debug', 'Enable debug logging (verbose output)');

  commandRegistry.forEach((register) => register(program));

  await program.parseAsync();
}

main().catch((error: unknown) => {
  log.info(`Fatal error: ${getErrorMessage(error)}`);
  process.exit(getExitCode(error));
});
