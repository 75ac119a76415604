/**
 * Common error messages and suggestions for the CLI.
 */

import {
  AuthenticationError,
  ConfigurationError,
  ProtocolError,
  TransportError,
  TransportTimeoutError,
} from '@/errors.js';

/**
 * Format a one-line error.
 */
export function genericError(message: string): string {
  return `Error: ${message}`;
}

/**
 * Generate "unknown error" message.
 */
export function unknownError(): string {
  return 'Error: Unknown error';
}

/**
 * Suggest a next step for a failed command, if there is a useful one.
 *
 * @param error - Error thrown by the client
 */
export function errorSuggestion(error: unknown): string | undefined {
  if (error instanceof AuthenticationError) {
    return 'Check that --secret-file points at the file varnishd was started with (-S).';
  }
  if (error instanceof ConfigurationError && error.message.startsWith('Authentication required')) {
    return 'The server requires authentication: pass --secret-file <path>.';
  }
  if (error instanceof TransportTimeoutError) {
    return 'Increase --timeout or check that the admin port is reachable.';
  }
  if (error instanceof TransportError) {
    return 'Is varnishd running with its admin interface (-T) on this address?';
  }
  if (error instanceof ProtocolError && error.command === '') {
    return 'The server did not greet like a varnishd admin console.';
  }
  return undefined;
}
