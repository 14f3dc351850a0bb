/**
 * FakeChild - In-process stand-in for a spawned peer process
 *
 * Exposes stdin/stdout/stderr as PassThrough streams and can serve a
 * DispatchServer subclass on them, the way a real peer script would through
 * serveStdio(). The fake "exits" when the served server stops, when the peer
 * handles 'exit', or when it is killed.
 *
 * Usage:
 * ```typescript
 * const fake = createFakeSpawn((child) => child.serve(MathService));
 * const peer = await PeerProcess.launch('math.js', { spawn: fake.spawn });
 * ```
 */

import type { SpawnOptions } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';

import type { PeerChild, SpawnFunction } from '@/peer/PeerProcess.js';
import { serveStdio, type ServerConstructor, type StdioServerOptions } from '@/peer/stdio.js';
import type { DispatchServer } from '@/server/DispatchServer.js';

export class FakeChild extends EventEmitter implements PeerChild {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly killSignals: Array<NodeJS.Signals | number> = [];
  private peer: DispatchServer | null = null;
  private exited = false;

  constructor(readonly pid: number) {
    super();
  }

  /**
   * Serve a dispatch server on this child's stdio.
   */
  serve<T extends DispatchServer>(
    ServerClass: ServerConstructor<T>,
    options: StdioServerOptions = {}
  ): T {
    const server = serveStdio(ServerClass, {
      pollIntervalMs: 10,
      requestIdPrefix: `peer-${this.pid}-`,
      ...options,
      input: this.stdin,
      output: this.stdout,
      onExit: (code) => this.exit(code),
    });
    server.once('stopped', () => this.exit(0));
    this.peer = server;
    return server;
  }

  kill(signal: NodeJS.Signals | number = 'SIGTERM'): boolean {
    this.killSignals.push(signal);
    this.exit(null, typeof signal === 'string' ? signal : 'SIGTERM');
    return true;
  }

  /**
   * Terminate the fake process; 'exit' is emitted on the next turn.
   */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) return;
    this.exited = true;

    if (this.peer) {
      void this.peer.close();
    }
    setImmediate(() => this.emit('exit', code, signal));
  }

  get hasExited(): boolean {
    return this.exited;
  }
}

export interface SpawnCall {
  command: string;
  args: readonly string[];
  options: SpawnOptions;
}

export interface FakeSpawn {
  spawn: SpawnFunction;
  children: FakeChild[];
  calls: SpawnCall[];
}

export interface FakeSpawnOptions {
  /** Emit this 'error' instead of 'spawn', like a missing executable */
  failWith?: Error | undefined;
}

/**
 * Build a spawn function that returns FakeChild instances.
 *
 * @param setup - Runs on every child before it reports 'spawn'
 */
export function createFakeSpawn(
  setup: (child: FakeChild) => void = () => undefined,
  options: FakeSpawnOptions = {}
): FakeSpawn {
  const children: FakeChild[] = [];
  const calls: SpawnCall[] = [];

  const spawn: SpawnFunction = (command, args, spawnOptions) => {
    calls.push({ command, args, options: spawnOptions });
    const child = new FakeChild(4200 + children.length);
    children.push(child);

    const { failWith } = options;
    if (failWith) {
      setImmediate(() => child.emit('error', failWith));
    } else {
      setup(child);
      setImmediate(() => child.emit('spawn'));
    }
    return child;
  };

  return { spawn, children, calls };
}
