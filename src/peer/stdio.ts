/**
 * Stdio peer bootstrap.
 *
 * The child side of PeerProcess: serves a DispatchServer subclass on this
 * process's stdin/stdout. Stdout then carries frames only, so peers must log
 * to stderr (createLogger already does).
 */

import type { Readable, Writable } from 'node:stream';

import type { Codec } from '@/codec/index.js';
import type {
  DispatchServer,
  DispatchServerOptions,
  ServerSettings,
} from '@/server/DispatchServer.js';
import { createLogger } from '@/ui/logging/index.js';

const log = createLogger('peer');

export type ServerConstructor<T extends DispatchServer> = new (
  options: DispatchServerOptions
) => T;

export interface StdioServerOptions extends ServerSettings {
  /** Defaults to process.stdin */
  input?: Readable | undefined;
  /** Defaults to process.stdout */
  output?: Writable | undefined;
  codec?: Codec | undefined;
  maxFrameBytes?: number | undefined;
}

/**
 * Build and start a server on stdio. When the server stops (peer closed the
 * pipe, or a 'shutdown' command), its streams are closed so the process can
 * exit once nothing else keeps it alive.
 *
 * @example
 * ```typescript
 * class MathService extends DispatchServer {
 *   add(a: number, b: number): number {
 *     return a + b;
 *   }
 * }
 *
 * serveStdio(MathService);
 * ```
 */
export function serveStdio<T extends DispatchServer>(
  ServerClass: ServerConstructor<T>,
  options: StdioServerOptions = {}
): T {
  const { input = process.stdin, output = process.stdout, ...settings } = options;

  const server = new ServerClass({ ...settings, input, output, autoStart: false });
  server.once('stopped', (reason) => {
    log.debug(`Stdio server stopped (${reason}), closing streams`);
    server.queue.close();
  });

  if (options.autoStart ?? true) {
    server.start();
  }
  return server;
}
