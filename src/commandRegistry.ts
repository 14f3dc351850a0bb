import type { Command } from 'commander';

import { registerCallCommand } from '@/commands/call.js';
import { registerMethodsCommand } from '@/commands/methods.js';

/**
 * Command registration function type
 */
export type CommandRegistrar = (program: Command) => void;

/**
 * Registry of all CLI commands
 * Order matters: it is the order of help output
 */
export const commandRegistry: CommandRegistrar[] = [registerCallCommand, registerMethodsCommand];
