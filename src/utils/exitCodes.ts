/**
 * Semantic exit codes for script-friendly error handling.
 *
 * Exit codes follow semantic ranges:
 * - **0**: Success
 * - **1**: Generic failure
 * - **80-99**: User errors (invalid input, bad credentials)
 * - **100-119**: Software errors (connection failures, timeouts, protocol errors)
 *
 * These values are part of the CLI's public surface and stay stable
 * across minor versions.
 */
export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Generic failure (use specific codes when possible) */
  GENERIC_FAILURE: 1,

  // User Errors (80-99)

  /** Invalid command-line arguments, options or client configuration */
  INVALID_ARGUMENTS: 81,

  /** Authentication against the admin console failed */
  AUTHENTICATION_FAILED: 82,

  // Software Errors (100-119)

  /** Connection to the admin console failed or was lost */
  CONNECTION_FAILURE: 101,

  /** Connect or read timed out */
  TIMEOUT: 102,

  /** Unhandled exception in code */
  UNHANDLED_EXCEPTION: 104,

  /** Server answered with an unexpected status code */
  PROTOCOL_ERROR: 110,
} as const;
