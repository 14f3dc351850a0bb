/**
 * Dispatch Server
 *
 * Bidirectional command dispatch over a typed queue. Each side of a pipe runs
 * one server: it answers the peer's commands through registered handlers and
 * exposed methods, and sends its own requests, matching replies back by
 * request_id.
 *
 * Responsibilities:
 * - Poll loop (receive, classify, route)
 * - Handler and method registries
 * - Outbound request correlation and timeouts
 * - Built-in lifecycle commands (exit, shutdown, __get_methods__)
 */

import { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';

import type { Codec } from '@/codec/index.js';
import { CodecError, SerializationError } from '@/codec/index.js';
import {
  BUILTIN_COMMANDS,
  EXIT_FLUSH_TIMEOUT_MS,
  POLL_ERROR_DELAY_MS,
  POLL_IDLE_DELAY_MS,
  POLL_RECEIVE_TIMEOUT_MS,
  getRequestTimeout,
} from '@/constants.js';
import { TypedQueue } from '@/queue/TypedQueue.js';
import { ClosedConnectionError, IPCTimeoutError } from '@/transport/IPCError.js';
import { createLogger } from '@/ui/logging/index.js';
import { delay } from '@/utils/deadline.js';
import { getErrorMessage, toError } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

import {
  asResponseEnvelope,
  createCommandEnvelope,
  extractResult,
  getRequestId,
  isRecord,
  toErrorEnvelope,
  toResultEnvelope,
  type ResponseEnvelope,
} from './envelope.js';
import { IPCRequestError, RemoteCommandError, ServerStateError } from './errors.js';
import {
  bindArguments,
  collectExposedMethods,
  describeMethod,
  toCatalogEntry,
  type ExposableMethod,
  type MethodCatalogEntry,
  type MethodDescriptor,
  type MethodSpec,
  type MethodSpecs,
} from './exposure.js';
import { MethodCall } from './MethodCall.js';
import { parseMethodCatalog, type MethodCatalog, type MethodInfo } from './methodCatalog.js';
import {
  invokeHandler,
  missingCommandOutcome,
  NO_REPLY,
  toWireResponse,
  unknownCommandOutcome,
  type HandlerOutcome,
  type NoReply,
} from './outcome.js';
import { PendingRequestManager } from './pendingRequests.js';
import { RequestIdAllocator } from './requestId.js';

const log = createLogger('server');

/**
 * Handler for one command. Return a value to reply with it, or NO_REPLY
 * when the handler has replied itself.
 */
export type CommandHandler = (data: unknown, requestId: string | undefined) => unknown;

/**
 * Fallback handler for commands with no registered handler or method.
 */
export type DefaultHandler = (
  command: string,
  data: unknown,
  requestId: string | undefined
) => unknown;

export type ServerState = 'not_started' | 'running' | 'stopped';

/**
 * Why the poll loop ended.
 *
 * - 'stopped': stop() or close() was called
 * - 'shutdown': the peer sent 'shutdown'
 * - 'closed': the peer closed the pipe
 * - 'error': the stream failed or a frame violated the protocol
 */
export type StopReason = 'stopped' | 'shutdown' | 'closed' | 'error';

export interface RequestOptions {
  /** Wait for the reply; 0 or below waits indefinitely. Defaults to the server setting. */
  timeoutMs?: number | undefined;
}

export interface ServerSettings {
  /** Expose public subclass methods as commands (default true) */
  exposeMethods?: boolean | undefined;
  /** Start the poll loop during construction (default false) */
  autoStart?: boolean | undefined;
  /** Receive window per poll iteration */
  pollIntervalMs?: number | undefined;
  /** Default wait for replies to outbound requests */
  requestTimeoutMs?: number | undefined;
  /** Prefix for outbound request ids; must differ from the peer's */
  requestIdPrefix?: string | undefined;
  /** Called by the 'exit' command (default: process.exit) */
  onExit?: ((code: number) => void) | undefined;
}

export interface StreamPairOptions {
  input: Readable;
  output: Writable;
  codec?: Codec | undefined;
  bufferSize?: number | undefined;
  poolSize?: number | undefined;
  /** Largest frame payload accepted in either direction (default 64 MiB) */
  maxFrameBytes?: number | undefined;
}

export type DispatchServerOptions = ServerSettings & ({ queue: TypedQueue } | StreamPairOptions);

type DispatchServerEvents = {
  stopped: (reason: StopReason) => void;
};

/**
 * Command dispatch server.
 *
 * Subclass it to expose methods: every method declared below DispatchServer
 * whose name does not start with `_` becomes a command of the same name.
 *
 * @example
 * ```typescript
 * class MathService extends DispatchServer {
 *   static override methodSpecs = { add: { doc: 'Add two numbers', returns: 'number' } };
 *
 *   add(a: number, b: number): number {
 *     return a + b;
 *   }
 * }
 *
 * const server = new MathService({ input: process.stdin, output: process.stdout });
 * server.start();
 * ```
 */
export class DispatchServer extends EventEmitter {
  /** Optional parameter, doc and return metadata for exposed methods */
  static methodSpecs: MethodSpecs = {};

  readonly queue: TypedQueue;
  private readonly handlers = new Map<string, CommandHandler>();
  private readonly methods = new Map<string, MethodDescriptor>();
  private defaultHandler: DefaultHandler | null = null;

  private readonly pending = new PendingRequestManager();
  private readonly requestIds: RequestIdAllocator;
  private readonly inFlight = new Set<Promise<void>>();
  private remoteMethods: MethodCatalog = {};

  private readonly pollIntervalMs: number;
  private readonly requestTimeoutMs: number;
  private readonly onExit: (code: number) => void;

  private currentState: ServerState = 'not_started';
  private loop: Promise<void> | null = null;

  constructor(options: DispatchServerOptions) {
    super();

    this.queue =
      'queue' in options
        ? options.queue
        : TypedQueue.fromStreams(options.input, options.output, {
            codec: options.codec,
            bufferSize: options.bufferSize,
            poolSize: options.poolSize,
            maxFrameBytes: options.maxFrameBytes,
          });
    this.pollIntervalMs = options.pollIntervalMs ?? POLL_RECEIVE_TIMEOUT_MS;
    this.requestTimeoutMs = options.requestTimeoutMs ?? getRequestTimeout();
    this.requestIds = new RequestIdAllocator(options.requestIdPrefix);
    this.onExit = options.onExit ?? ((code) => process.exit(code));

    this.registerBuiltins();

    if (options.exposeMethods ?? true) {
      this.exposeMethods(new.target.methodSpecs);
    }
    if (options.autoStart) {
      this.start();
    }
  }

  /**
   * Subscribe to a server event, or, with a single argument, begin a fluent
   * call to the peer method of that name.
   *
   * @example
   * ```typescript
   * server.on('stopped', (reason) => log.info(`Server stopped: ${reason}`));
   * const sum = await server.on('add').arg('a', 1).arg('b', 2).withTimeout(1000).call();
   * ```
   */
  override on(method: string): MethodCall;
  override on<Event extends keyof DispatchServerEvents>(
    event: Event,
    listener: DispatchServerEvents[Event]
  ): this;
  override on(name: string, listener?: (reason: StopReason) => void): MethodCall | this {
    if (listener === undefined) {
      return new MethodCall(this, name);
    }
    return super.on(name, listener);
  }

  override once<Event extends keyof DispatchServerEvents>(
    event: Event,
    listener: DispatchServerEvents[Event]
  ): this {
    return super.once(event, listener);
  }

  override off<Event extends keyof DispatchServerEvents>(
    event: Event,
    listener: DispatchServerEvents[Event]
  ): this {
    return super.off(event, listener);
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Register (or replace) the handler for a command.
   */
  registerHandler(command: string, handler: CommandHandler): void {
    this.handlers.set(command, handler);
  }

  /**
   * Handle commands that match no handler or method.
   */
  setDefaultHandler(handler: DefaultHandler): void {
    this.defaultHandler = handler;
  }

  /**
   * Expose a function as a command whose data is bound to its parameters.
   *
   * @param spec - Parameter list and labels; parsed from the function when omitted
   */
  registerMethod(name: string, method: ExposableMethod, spec?: MethodSpec): void {
    this.methods.set(name, describeMethod(name, method, this, spec));
    log.debug(`Registered method ${name}`);
  }

  /**
   * Expose the public methods of another object as commands, called with that
   * object as `this`. Registered handlers keep precedence.
   *
   * @example
   * ```typescript
   * host.registerService({ hostName: () => os.hostname() });
   * ```
   */
  registerService(service: object, specs: MethodSpecs = {}): void {
    for (const { name, method } of collectExposedMethods(service, Object.prototype, true)) {
      if (this.handlers.has(name)) {
        continue;
      }
      this.methods.set(name, describeMethod(name, method, service, specs[name]));
      log.debug(`Registered service method ${name}`);
    }
  }

  private exposeMethods(specs: MethodSpecs): void {
    for (const { name, method } of collectExposedMethods(this, DispatchServer.prototype)) {
      if (this.handlers.has(name) || this.methods.has(name)) {
        continue;
      }
      this.registerMethod(name, method, specs[name]);
    }
  }

  private registerBuiltins(): void {
    this.registerHandler(BUILTIN_COMMANDS.EXIT, (_data, requestId) => this.handleExit(requestId));
    this.registerHandler(BUILTIN_COMMANDS.SHUTDOWN, (_data, requestId) =>
      this.handleShutdown(requestId)
    );
    this.registerHandler(BUILTIN_COMMANDS.GET_METHODS, () => this.describeMethods());
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  get state(): ServerState {
    return this.currentState;
  }

  get isRunning(): boolean {
    return this.currentState === 'running';
  }

  /** Outbound requests still waiting for a reply */
  get pendingRequestCount(): number {
    return this.pending.size;
  }

  /**
   * Start the poll loop. Idempotent; does nothing once stopped.
   */
  start(): void {
    if (this.currentState !== 'not_started') {
      return;
    }
    this.currentState = 'running';
    this.loop = this.runLoop();
    log.debug('Server started');
  }

  /**
   * Stop the poll loop and reject pending requests.
   *
   * Resolves once the loop has exited, which may take up to one poll window.
   * Dispatched handlers keep running; await whenIdle() for them.
   */
  async stop(): Promise<void> {
    this.halt('stopped');
    await this.loop;
  }

  /**
   * Stop the server and close the underlying queue.
   */
  async close(): Promise<void> {
    this.halt('stopped');
    this.queue.close();
    await this.loop;
  }

  /**
   * Resolve once every dispatched command has finished (including its reply).
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private halt(reason: StopReason): void {
    if (this.currentState === 'stopped') {
      return;
    }
    this.currentState = 'stopped';
    this.pending.rejectAll(new ClosedConnectionError(`Server stopped (${reason})`));
    log.debug(`Server stopped (${reason})`);
    this.emit('stopped', reason);
  }

  // ==========================================================================
  // Poll loop
  // ==========================================================================

  private async runLoop(): Promise<void> {
    while (this.currentState === 'running') {
      let message: unknown;
      try {
        message = await this.queue.get({ timeoutMs: this.pollIntervalMs });
      } catch (error) {
        if (error instanceof IPCTimeoutError) {
          await delay(POLL_IDLE_DELAY_MS);
          continue;
        }
        if (error instanceof ClosedConnectionError) {
          log.debug('Peer closed the connection');
          this.halt('closed');
          break;
        }
        if (error instanceof CodecError) {
          log.info(`Dropped undecodable frame: ${error.message}`);
          await delay(POLL_ERROR_DELAY_MS);
          continue;
        }
        log.info(`Receive failed, stopping: ${getErrorMessage(error)}`);
        this.halt('error');
        break;
      }

      this.routeMessage(message);
    }
  }

  private routeMessage(message: unknown): void {
    if (!isRecord(message)) {
      log.info('Dropped message that is not a mapping');
      return;
    }

    const requestId = getRequestId(message);
    if (requestId !== undefined && this.requestIds.owns(requestId)) {
      const delivered = this.pending.resolve(requestId, asResponseEnvelope(message, requestId));
      if (!delivered) {
        log.debug(`Dropped response for unknown request ${requestId}`);
      }
      return;
    }

    const command = message['command'];
    if (typeof command !== 'string') {
      if (requestId !== undefined) {
        this.track(this.reply(missingCommandOutcome(), requestId));
      } else {
        log.info('Dropped message without a command');
      }
      return;
    }

    this.track(this.processCommand(command, message['data'], requestId));
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
  }

  // ==========================================================================
  // Command dispatch
  // ==========================================================================

  /**
   * Run one command and, when it carries a request_id, send the reply.
   *
   * Never rejects: handler failures become error replies, send failures are
   * logged.
   */
  async processCommand(command: string, data: unknown, requestId?: string): Promise<void> {
    log.debug(`Dispatching ${command}${requestId ? ` (request ${requestId})` : ''}`);

    const outcome = await this.dispatch(command, data, requestId);
    if (outcome.status === 'failed') {
      log.info(`Command ${command} failed: ${outcome.message}`);
    }

    if (requestId !== undefined) {
      await this.reply(outcome, requestId);
    }
  }

  private dispatch(
    command: string,
    data: unknown,
    requestId: string | undefined
  ): Promise<HandlerOutcome> {
    const handler = this.handlers.get(command);
    if (handler) {
      return invokeHandler(() => handler(data, requestId));
    }

    const method = this.methods.get(command);
    if (method) {
      return invokeHandler(() => method.invoke(bindArguments(method, data)));
    }

    const fallback = this.defaultHandler;
    if (fallback) {
      return invokeHandler(() => fallback(command, data, requestId));
    }

    return Promise.resolve(unknownCommandOutcome(command));
  }

  private async reply(outcome: HandlerOutcome, requestId: string): Promise<void> {
    const response = toWireResponse(outcome, requestId);
    if (response) {
      await this.sendResponse(response);
    }
  }

  private async sendResponse(response: ResponseEnvelope): Promise<void> {
    try {
      await this.queue.put(response);
    } catch (error) {
      if (error instanceof SerializationError && !('error' in response)) {
        await this.sendResponse(toErrorEnvelope(error.message, response.request_id));
        return;
      }
      log.info(`Failed to send response ${response.request_id}: ${getErrorMessage(error)}`);
    }
  }

  private async handleExit(requestId: string | undefined): Promise<NoReply> {
    if (requestId !== undefined) {
      try {
        await this.queue.put(toResultEnvelope({ status: 'exiting' }, requestId), {
          timeoutMs: EXIT_FLUSH_TIMEOUT_MS,
        });
      } catch (error) {
        log.debug(`Exit acknowledgment not delivered: ${getErrorMessage(error)}`);
      }
    }

    log.debug('Exiting on peer request');
    this.onExit(EXIT_CODES.SUCCESS);
    return NO_REPLY;
  }

  private async handleShutdown(requestId: string | undefined): Promise<NoReply> {
    if (requestId !== undefined) {
      await this.sendResponse(toResultEnvelope({ status: 'shutting_down' }, requestId));
    }
    this.halt('shutdown');
    return NO_REPLY;
  }

  private describeMethods(): { methods: Record<string, MethodCatalogEntry> } {
    const methods: Record<string, MethodCatalogEntry> = {};
    for (const [name, descriptor] of this.methods) {
      methods[name] = toCatalogEntry(descriptor);
    }
    return { methods };
  }

  // ==========================================================================
  // Outbound requests
  // ==========================================================================

  /**
   * Send a command to the peer and wait for its full response envelope.
   *
   * @throws ServerStateError if the server is not running
   * @throws IPCTimeoutError if no reply arrives in time
   * @throws IPCRequestError if the command could not be sent
   * @throws ClosedConnectionError if the server stops while waiting
   */
  async request(
    command: string,
    data?: unknown,
    options: RequestOptions = {}
  ): Promise<ResponseEnvelope> {
    if (this.currentState !== 'running') {
      throw new ServerStateError('request', this.currentState);
    }

    const timeoutMs = options.timeoutMs ?? this.requestTimeoutMs;
    const requestId = this.requestIds.allocate();

    const response = new Promise<ResponseEnvelope>((resolve, reject) => {
      const timeout =
        timeoutMs > 0
          ? setTimeout(() => {
              this.pending.reject(requestId, new IPCTimeoutError(command, timeoutMs));
            }, timeoutMs)
          : undefined;
      this.pending.add(requestId, { command, resolve, reject, timeout });
    });

    const sending = this.queue
      .put(createCommandEnvelope(command, data, requestId))
      .catch((error: unknown) => {
        this.pending.reject(requestId, new IPCRequestError(command, toError(error)));
      });

    const [envelope] = await Promise.all([response, sending]);
    return envelope;
  }

  /**
   * Send a command to the peer and return the value it replied with.
   *
   * @throws RemoteCommandError if the peer replied with an error
   */
  async asyncRequest(
    command: string,
    data?: unknown,
    options: RequestOptions = {}
  ): Promise<unknown> {
    const response = await this.request(command, data, options);
    const result = extractResult(response);
    if (!result.ok) {
      throw new RemoteCommandError(command, result.message, result.traceback);
    }
    return result.value;
  }

  /**
   * Send a command that expects no reply.
   *
   * @throws ServerStateError if the server has stopped
   * @throws IPCRequestError if the command could not be sent
   */
  async notify(command: string, data?: unknown): Promise<void> {
    if (this.currentState === 'stopped') {
      throw new ServerStateError('notify', this.currentState);
    }
    try {
      await this.queue.put(createCommandEnvelope(command, data));
    } catch (error) {
      throw new IPCRequestError(command, toError(error));
    }
  }

  // ==========================================================================
  // Peer discovery
  // ==========================================================================

  /**
   * Fetch and cache the peer's method catalog.
   */
  async discoverMethods(options: RequestOptions = {}): Promise<MethodCatalog> {
    const reply = await this.asyncRequest(BUILTIN_COMMANDS.GET_METHODS, null, options);
    this.remoteMethods = parseMethodCatalog(reply);
    return this.remoteMethods;
  }

  /**
   * Names of the peer methods found by the last discoverMethods() call.
   */
  getMethods(): string[] {
    return Object.keys(this.remoteMethods);
  }

  getMethodInfo(name: string): MethodInfo | undefined {
    return this.remoteMethods[name];
  }
}
