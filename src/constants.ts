/**
 * Centralized configuration constants for pipe-dispatch
 *
 * Timing, sizing and protocol values used across the transport, queue and
 * dispatch server. Values that operators may need to tune are read through
 * getter functions so environment overrides apply at call time.
 */

// ============================================================================
// WIRE PROTOCOL
// ============================================================================

/**
 * Size of the big-endian length prefix in front of every frame
 */
export const FRAME_PREFIX_BYTES = 4;

/**
 * Largest payload a 4-byte unsigned prefix can describe
 */
export const MAX_PREFIX_LENGTH = 0xffffffff;

/**
 * Default upper bound on a single frame payload (64MB)
 * Guards against allocating from a corrupted length prefix
 */
export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024 * 1024;

// ============================================================================
// BUFFER POOL
// ============================================================================

/**
 * Default length of each pooled receive buffer (8KB)
 * Frames up to this size are read into pooled memory
 */
export const DEFAULT_BUFFER_SIZE = 8192;

/**
 * Default number of buffers pre-allocated per transport
 */
export const DEFAULT_POOL_SIZE = 10;

// ============================================================================
// STREAM READER
// ============================================================================

/**
 * Buffered bytes above which the reader pauses its source stream (1MB)
 */
export const READER_HIGH_WATER_MARK = 1024 * 1024;

// ============================================================================
// DISPATCH SERVER TIMING
// ============================================================================

/**
 * Receive window for each poll loop iteration
 */
export const POLL_RECEIVE_TIMEOUT_MS = 100;

/**
 * Pause after a poll iteration that produced no message
 */
export const POLL_IDLE_DELAY_MS = 10;

/**
 * Pause after an unexpected, non-fatal poll loop failure
 */
export const POLL_ERROR_DELAY_MS = 100;

/**
 * Window for flushing the 'exit' acknowledgment before the process terminates
 */
export const EXIT_FLUSH_TIMEOUT_MS = 250;

/**
 * Default wait for a reply to an outbound request
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

// ============================================================================
// PEER PROCESS
// ============================================================================

/**
 * Grace period between sending 'exit' and killing the peer process
 */
export const PEER_EXIT_GRACE_MS = 50;

/**
 * Default wait for a graceful peer shutdown
 */
export const PEER_SHUTDOWN_TIMEOUT_MS = 5000;

// ============================================================================
// BUILT-IN COMMANDS
// ============================================================================

/**
 * Command names reserved by the dispatch server
 */
export const BUILTIN_COMMANDS = {
  EXIT: 'exit',
  SHUTDOWN: 'shutdown',
  GET_METHODS: '__get_methods__',
} as const;

// ============================================================================
// ENVIRONMENT OVERRIDES
// ============================================================================

function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

/**
 * Pooled buffer length (override with PIPE_DISPATCH_BUFFER_SIZE)
 */
export function getBufferSize(): number {
  return readPositiveInt('PIPE_DISPATCH_BUFFER_SIZE', DEFAULT_BUFFER_SIZE);
}

/**
 * Pool target size (override with PIPE_DISPATCH_POOL_SIZE)
 */
export function getPoolSize(): number {
  return readPositiveInt('PIPE_DISPATCH_POOL_SIZE', DEFAULT_POOL_SIZE);
}

/**
 * Outbound request timeout (override with PIPE_DISPATCH_REQUEST_TIMEOUT_MS)
 * A value of 0 or below waits indefinitely.
 */
export function getRequestTimeout(): number {
  const raw = process.env['PIPE_DISPATCH_REQUEST_TIMEOUT_MS'];
  if (raw === undefined) {
    return DEFAULT_REQUEST_TIMEOUT_MS;
  }
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? DEFAULT_REQUEST_TIMEOUT_MS : parsed;
}
