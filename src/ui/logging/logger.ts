/**
 * Context-prefixed logging on stderr.
 *
 * stdout of a peer process carries protocol frames, so nothing here ever
 * writes to it. 'info' lines always print; 'debug' lines print once
 * enableDebugLogging() has run (the CLI's --debug) or with PIPE_DISPATCH_DEBUG=1.
 */

let debugEnabled = false;

export function enableDebugLogging(): void {
  debugEnabled = true;
}

export function isDebugEnabled(): boolean {
  return debugEnabled || process.env['PIPE_DISPATCH_DEBUG'] === '1';
}

export type LogLevel = 'info' | 'debug';

/** Component names used as line prefixes. */
export type LogContext = 'pool' | 'transport' | 'queue' | 'server' | 'peer' | 'cli';

/**
 * Callable logger; calling it directly logs at debug level.
 */
export interface Logger {
  (message: string): void;
  info: (message: string) => void;
  debug: (message: string) => void;
}

/**
 * Create a logger that prefixes every line with `[context]`.
 *
 * @example
 * ```typescript
 * const log = createLogger('server');
 * log.info('Peer closed the connection');
 * log.debug('Dispatching add (request 4812.0-3)');
 * ```
 */
export function createLogger(context: LogContext): Logger {
  const write = (message: string, level: LogLevel): void => {
    if (level === 'debug' && !isDebugEnabled()) {
      return;
    }
    console.error(`[${context}] ${message}`);
  };

  return Object.assign((message: string) => write(message, 'debug'), {
    info: (message: string) => write(message, 'info'),
    debug: (message: string) => write(message, 'debug'),
  });
}
