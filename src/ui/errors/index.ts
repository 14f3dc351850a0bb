/**
 * Error handling for the pipe-dispatch CLI.
 */

export { CommandError, type ErrorMetadata } from './CommandError.js';
export { getExitCode } from './utils.js';
