/**
 * Semantic exit codes for the pipe-dispatch CLI and error classes.
 *
 * Exit codes follow semantic ranges for predictable automation:
 * - **0**: Success
 * - **1**: Generic failure (avoid in new code)
 * - **80-99**: User errors (invalid input, missing resources)
 * - **100-119**: Software errors (peer failures, protocol violations, timeouts)
 *
 * Values are stable; new codes may be added within the existing ranges.
 */
export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Generic failure (use specific codes when possible) */
  GENERIC_FAILURE: 1,

  // User Errors (80-99)

  /** Invalid command-line arguments or options */
  INVALID_ARGUMENTS: 81,

  /** Requested resource not found (peer script, remote method) */
  RESOURCE_NOT_FOUND: 83,

  // Software Errors (100-119)

  /** Peer process failed to launch */
  PEER_LAUNCH_FAILURE: 100,

  /** Peer closed the connection unexpectedly */
  PEER_CONNECTION_CLOSED: 101,

  /** Request or transport operation timed out */
  IPC_TIMEOUT: 102,

  /** Frame or envelope violated the wire protocol */
  PROTOCOL_ERROR: 103,

  /** Unhandled exception in code */
  UNHANDLED_EXCEPTION: 104,

  /** Remote handler reported a failure */
  REMOTE_COMMAND_FAILURE: 105,

  /** Generic software error (use specific codes when possible) */
  SOFTWARE_ERROR: 110,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
