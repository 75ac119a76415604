/**
 * Error classes for the admin console client.
 *
 * Every failure surfaced by the library is a VarnishAdminError carrying a
 * stable code for programmatic handling and a semantic exit code for the CLI.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Base error class for all admin console errors.
 *
 * Extends native Error with error codes, exit codes and cause chaining.
 */
export abstract class VarnishAdminError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Client configuration is unusable.
 *
 * Examples:
 * - Unsupported protocol version
 * - Server demands authentication but no secret was configured
 * - Secret file cannot be read
 */
export class ConfigurationError extends VarnishAdminError {
  override readonly code = 'CONFIGURATION_ERROR';
  override readonly exitCode = EXIT_CODES.INVALID_ARGUMENTS;
}

/**
 * Byte stream failed.
 *
 * Examples:
 * - Connection refused
 * - Write not accepted
 * - Stream ended before a complete response arrived
 */
export class TransportError extends VarnishAdminError {
  override readonly code: string = 'TRANSPORT_ERROR';
  override readonly exitCode: number = EXIT_CODES.CONNECTION_FAILURE;
}

/**
 * Connect or read did not complete within the configured timeout.
 */
export class TransportTimeoutError extends TransportError {
  override readonly code: string = 'TRANSPORT_TIMEOUT';
  override readonly exitCode: number = EXIT_CODES.TIMEOUT;
  readonly operation: 'connect' | 'read';
  readonly timeoutMs: number;

  constructor(operation: 'connect' | 'read', timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs / 1000}s`);
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Server answered a command with an unexpected status code.
 *
 * @example
 * ```typescript
 * try {
 *   await client.purge('req.url ~');
 * } catch (error) {
 *   if (error instanceof ProtocolError) {
 *     console.error(error.status, error.body);
 *   }
 * }
 * ```
 */
export class ProtocolError extends VarnishAdminError {
  override readonly code = 'PROTOCOL_ERROR';
  override readonly exitCode = EXIT_CODES.PROTOCOL_ERROR;
  /** Command text that was sent, empty for the banner */
  readonly command: string;
  /** Status code the server answered with */
  readonly status: number;
  /** Response body as received */
  readonly body: string;

  constructor(message: string, command: string, status: number, body: string) {
    super(message);
    this.command = command;
    this.status = status;
    this.body = body;
  }
}

/**
 * The authentication exchange failed.
 *
 * The message is the same whatever went wrong; the underlying error is kept
 * in `cause` for diagnostics.
 */
export class AuthenticationError extends VarnishAdminError {
  override readonly code = 'AUTHENTICATION_FAILED';
  override readonly exitCode = EXIT_CODES.AUTHENTICATION_FAILED;

  constructor(cause?: unknown) {
    super('Authentication failed', cause);
  }
}
