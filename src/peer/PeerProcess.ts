/**
 * Peer Process
 *
 * Hosts a peer script in a child process and talks to it through a dispatch
 * server wired to the child's stdio: our writes go to its stdin, its stdout
 * carries its replies and commands. The child's stderr is forwarded to ours.
 */

import { spawn as spawnProcess } from 'node:child_process';
import type { SpawnOptions } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';

import type { Codec } from '@/codec/index.js';
import { BUILTIN_COMMANDS, PEER_EXIT_GRACE_MS, PEER_SHUTDOWN_TIMEOUT_MS } from '@/constants.js';
import { DispatchServer, type CommandHandler } from '@/server/DispatchServer.js';
import type { MethodSpecs } from '@/server/exposure.js';
import { IPCTimeoutError } from '@/transport/IPCError.js';
import { createLogger } from '@/ui/logging/index.js';
import { withDeadline } from '@/utils/deadline.js';
import { getErrorMessage } from '@/utils/errors.js';

import { PeerLaunchError } from './errors.js';

const log = createLogger('peer');

/**
 * The parts of a child process the host relies on.
 * `child_process.spawn()` results satisfy it; tests pass an in-process fake.
 */
export interface PeerChild {
  readonly pid?: number | undefined;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: 'spawn', listener: () => void): unknown;
  once(
    event: 'exit',
    listener: (code: number | null, signal: NodeJS.Signals | null) => void
  ): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => PeerChild;

export interface PeerLaunchOptions {
  /** Executable to run (default: the current Node.js binary) */
  command?: string | undefined;
  /** Arguments placed before the script, e.g. `['--import', 'tsx']` */
  nodeArgs?: readonly string[] | undefined;
  /** Arguments placed after the script */
  args?: readonly string[] | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  codec?: Codec | undefined;
  requestTimeoutMs?: number | undefined;
  /** Largest frame payload accepted in either direction */
  maxFrameBytes?: number | undefined;
  /** Object whose public methods the peer may call back into */
  service?: object | undefined;
  /** Parameter and doc metadata for `service` methods */
  serviceSpecs?: MethodSpecs | undefined;
  /** Host-side command handlers, registered before the loop starts */
  handlers?: Readonly<Record<string, CommandHandler>> | undefined;
  /** Replaces child_process.spawn */
  spawn?: SpawnFunction | undefined;
}

export interface PeerExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

const defaultSpawn: SpawnFunction = (command, args, options) =>
  spawnProcess(command, args, options);

export class PeerProcess {
  readonly server: DispatchServer;
  /** Resolves when the child exits or fails */
  readonly exited: Promise<PeerExit>;
  private readonly spawned: Promise<void>;
  private exitInfo: PeerExit | null = null;
  private closing: Promise<void> | null = null;

  private constructor(
    private readonly child: PeerChild,
    options: PeerLaunchOptions
  ) {
    const { stdin, stdout, stderr } = child;
    if (!stdin || !stdout) {
      child.kill();
      throw new PeerLaunchError('Peer process has no piped stdin/stdout', 'MISSING_STDIO');
    }

    if (stderr) {
      stderr.on('data', (chunk: Buffer) => {
        process.stderr.write(chunk);
      });
    }

    this.spawned = new Promise((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.on('error', (error) => {
        reject(new PeerLaunchError(error.message, 'SPAWN_FAILED'));
      });
    });

    this.exited = new Promise((resolve) => {
      child.once('exit', (code, signal) => {
        log.debug(`Peer exited (code: ${code} signal: ${signal ?? 'null'})`);
        this.exitInfo = { code, signal };
        resolve(this.exitInfo);
      });
      child.on('error', (error) => {
        log.info(`Peer process error: ${error.message}`);
        if (!this.exitInfo) {
          this.exitInfo = { code: null, signal: null };
          resolve(this.exitInfo);
        }
      });
    });

    this.server = new DispatchServer({
      input: stdout,
      output: stdin,
      codec: options.codec,
      requestTimeoutMs: options.requestTimeoutMs,
      maxFrameBytes: options.maxFrameBytes,
      exposeMethods: false,
      onExit: () => {
        log.info('Peer asked the host to exit; closing the peer instead');
        void this.close();
      },
    });

    if (options.service) {
      this.server.registerService(options.service, options.serviceSpecs);
    }
    for (const [command, handler] of Object.entries(options.handlers ?? {})) {
      this.server.registerHandler(command, handler);
    }
  }

  /**
   * Spawn a peer script and start talking to it.
   *
   * @throws PeerLaunchError if the process cannot be spawned
   *
   * @example
   * ```typescript
   * const peer = await PeerProcess.launch('dist/services/math.js');
   * const sum = await peer.server.asyncRequest('add', { a: 1, b: 2 });
   * await peer.close();
   * ```
   */
  static async launch(script: string, options: PeerLaunchOptions = {}): Promise<PeerProcess> {
    const command = options.command ?? process.execPath;
    const args = [...(options.nodeArgs ?? []), script, ...(options.args ?? [])];
    const spawnChild = options.spawn ?? defaultSpawn;

    log.debug(`Spawning peer: ${command} ${args.join(' ')}`);
    const child = spawnChild(command, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      env: options.env ?? process.env,
    });

    const peer = new PeerProcess(child, options);
    try {
      await peer.spawned;
    } catch (error) {
      await peer.server.close();
      throw error;
    }

    peer.server.start();
    log.debug(`Peer started (pid ${peer.pid ?? 'unknown'})`);
    return peer;
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get hasExited(): boolean {
    return this.exitInfo !== null;
  }

  /**
   * Tell the peer to exit, then kill it if it has not exited within a short
   * grace period. Idempotent.
   */
  close(): Promise<void> {
    this.closing ??= this.terminate();
    return this.closing;
  }

  /**
   * Ask the peer to shut down gracefully and wait for it to exit.
   * Falls back to close() if the peer is still running after `timeoutMs`.
   */
  async shutdown(timeoutMs: number = PEER_SHUTDOWN_TIMEOUT_MS): Promise<PeerExit> {
    try {
      await this.server.request(BUILTIN_COMMANDS.SHUTDOWN, null, { timeoutMs });
      if (!(await this.waitForExit(timeoutMs))) {
        log.info(`Peer still running ${timeoutMs}ms after shutdown`);
      }
    } finally {
      await this.close();
    }
    return this.exited;
  }

  private async terminate(): Promise<void> {
    if (!this.hasExited && this.server.isRunning) {
      try {
        await this.server.notify(BUILTIN_COMMANDS.EXIT);
      } catch (error) {
        log.debug(`Could not send exit: ${getErrorMessage(error)}`);
      }
      await this.waitForExit(PEER_EXIT_GRACE_MS);
    }

    if (!this.hasExited) {
      log.debug('Killing peer');
      this.child.kill();
    }

    await this.server.close();
  }

  private async waitForExit(timeoutMs: number): Promise<boolean> {
    try {
      await withDeadline(this.exited, timeoutMs, () => new IPCTimeoutError('exit', timeoutMs));
      return true;
    } catch (error) {
      if (error instanceof IPCTimeoutError) {
        return false;
      }
      throw error;
    }
  }
}
