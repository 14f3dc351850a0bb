/**
 * pipe-dispatch
 *
 * Length-prefixed binary IPC over byte stream pairs, with a bidirectional
 * command dispatch server on top.
 */

export { BufferPool, type BufferPoolOptions } from '@/pool/BufferPool.js';
export { FramedTransport, type FramedTransportOptions } from '@/transport/FramedTransport.js';
export {
  ClosedConnectionError,
  ConfigError,
  IPCError,
  IPCProtocolError,
  IPCStreamError,
  IPCTimeoutError,
} from '@/transport/IPCError.js';
export {
  CODEC_NAMES,
  CodecError,
  JsonCodec,
  MsgpackCodec,
  SerializationError,
  createCodec,
  isCodecName,
  type Codec,
  type CodecName,
} from '@/codec/index.js';
export { TypedQueue, type QueueOptions, type TypedQueueOptions } from '@/queue/TypedQueue.js';
export {
  DispatchServer,
  type CommandHandler,
  type DefaultHandler,
  type DispatchServerOptions,
  type RequestOptions,
  type ServerSettings,
  type ServerState,
  type StopReason,
  type StreamPairOptions,
} from '@/server/DispatchServer.js';
export type { CommandEnvelope, ResponseEnvelope } from '@/server/envelope.js';
export {
  HandlerArgumentError,
  IPCRequestError,
  RemoteCommandError,
  ServerStateError,
} from '@/server/errors.js';
export type {
  ExposableMethod,
  MethodSpec,
  MethodSpecs,
  ParameterSpec,
} from '@/server/exposure.js';
export { MethodCall } from '@/server/MethodCall.js';
export type { MethodCatalog, MethodInfo, ParameterInfo } from '@/server/methodCatalog.js';
export { NO_REPLY, type NoReply } from '@/server/outcome.js';
export {
  PeerProcess,
  type PeerChild,
  type PeerExit,
  type PeerLaunchOptions,
  type SpawnFunction,
} from '@/peer/PeerProcess.js';
export { PeerLaunchError } from '@/peer/errors.js';
export { serveStdio, type ServerConstructor, type StdioServerOptions } from '@/peer/stdio.js';
export { createLogger, enableDebugLogging, type Logger } from '@/ui/logging/index.js';
export { EXIT_CODES, type ExitCode } from '@/utils/exitCodes.js';
