import { CommandError, getExitCode } from '@/ui/errors/index.js';
import { OutputBuilder } from '@/ui/OutputBuilder.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { getErrorMessage } from '@/utils/errors.js';

/**
 * Standard options supported by CommandRunner.
 * All commands that use CommandRunner must extend this interface.
 */
export interface BaseCommandOptions {
  /** Output as JSON instead of human-readable format */
  json?: boolean;
}

/**
 * Result from a command handler.
 */
export interface CommandResult<T = unknown> {
  /** Whether the command succeeded */
  success: boolean;
  /** Data to output (for successful commands) */
  data?: T;
  /** Error message (for failed commands) */
  error?: string;
  /** Optional exit code override (defaults: SUCCESS=0, error codes from EXIT_CODES) */
  exitCode?: number;
}

/**
 * Command logic should be implemented as a function matching this signature.
 */
export type CommandHandler<TOptions extends BaseCommandOptions, TResult = unknown> = (
  options: TOptions
) => Promise<CommandResult<TResult>>;

/**
 * Formatter for human-readable output.
 */
export type CommandFormatter<TResult = unknown> = (data: TResult) => string;

/**
 * Output sink and exit hook; replaced in tests.
 */
export interface CommandIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  exit: (code: number) => void;
}

const processIO: CommandIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  exit: (code) => process.exit(code),
};

/**
 * Run a command with consistent error handling, output formatting, and exit codes.
 *
 * - Wraps command logic in try-catch
 * - Maps CommandError and IPC errors to their exit codes
 * - Formats output as JSON or human-readable based on --json flag
 * - Exits with the resulting code
 *
 * @example
 * ```typescript
 * await runCommand(
 *   async (opts) => {
 *     const result = await peer.server.asyncRequest(method, data);
 *     return { success: true, data: result };
 *   },
 *   options,
 *   formatCallResult
 * );
 * ```
 */
export async function runCommand<TOptions extends BaseCommandOptions, TResult = unknown>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter?: CommandFormatter<TResult>,
  io: CommandIO = processIO
): Promise<void> {
  try {
    const result = await handler(options);

    if (!result.success) {
      const message = result.error ?? 'Unknown error';
      if (options.json) {
        io.stdout(JSON.stringify(OutputBuilder.buildJsonError(message), null, 2));
      } else {
        io.stderr(`Error: ${message}`);
      }
      io.exit(result.exitCode ?? EXIT_CODES.UNHANDLED_EXCEPTION);
      return;
    }

    if (options.json) {
      io.stdout(JSON.stringify(OutputBuilder.buildJsonSuccess(result.data ?? null), null, 2));
    } else if (formatter && result.data !== undefined) {
      io.stdout(formatter(result.data));
    } else {
      io.stdout(JSON.stringify(result.data ?? null, null, 2));
    }

    io.exit(EXIT_CODES.SUCCESS);
  } catch (error) {
    const exitCode = getExitCode(error);
    const message = getErrorMessage(error);

    if (options.json) {
      const metadata = error instanceof CommandError ? error.metadata : {};
      io.stdout(
        JSON.stringify(OutputBuilder.buildJsonError(message, { ...metadata, exitCode }), null, 2)
      );
    } else {
      io.stderr(message.startsWith('Error:') ? message : `Error: ${message}`);
      if (error instanceof CommandError) {
        for (const value of Object.values(error.metadata)) {
          if (value) io.stderr(value);
        }
      }
    }
    io.exit(exitCode);
  }
}
