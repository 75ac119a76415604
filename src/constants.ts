/**
 * Centralized configuration constants for varnish-admin.
 *
 * Defaults for the admin console connection and the environment variables
 * the CLI reads them from.
 */

// ============================================================================
// CONNECTION DEFAULTS
// ============================================================================

/**
 * Default admin console host (loopback, where varnishd binds -T by default)
 */
export const DEFAULT_HOST = '127.0.0.1';

/**
 * Default admin console port
 */
export const DEFAULT_ADMIN_PORT = 6082;

/**
 * Default connect/read timeout in seconds
 */
export const DEFAULT_TIMEOUT_SECONDS = 5;

/**
 * Largest timeout in seconds; Node timers hold at most 2^31-1 ms
 */
export const MAX_TIMEOUT_SECONDS = 2147483;

// ============================================================================
// PROTOCOL CONSTANTS
// ============================================================================

/**
 * Number of leading banner bytes used as the authentication challenge
 */
export const AUTH_CHALLENGE_LENGTH = 32;

/**
 * Line terminator for requests and status lines
 */
export const NEW_LINE = '\n';

// ============================================================================
// ENVIRONMENT
// ============================================================================

/**
 * Environment variables consulted by the CLI when a flag is not given
 */
export const ENV_VARS = {
  HOST: 'VARNISH_ADMIN_HOST',
  PORT: 'VARNISH_ADMIN_PORT',
  PROTOCOL: 'VARNISH_ADMIN_PROTOCOL',
  SECRET_FILE: 'VARNISH_ADMIN_SECRET_FILE',
  TIMEOUT: 'VARNISH_ADMIN_TIMEOUT',
} as const;
