/**
 * Shared domain types for the admin console client.
 */

/**
 * Address of a varnishd admin console (the -T listen address).
 */
export interface ServerAddress {
  readonly host: string;
  readonly port: number;
}

/**
 * Lifecycle of a client connection.
 *
 * - unconnected: created, transport not opened yet
 * - connected: banner received, no authentication was requested
 * - authenticated: the server challenged and the challenge was satisfied
 * - closed: terminal, the transport has been released
 */
export type ConnectionState = 'unconnected' | 'connected' | 'authenticated' | 'closed';

/**
 * State of the cache child process as reported by the `status` command.
 * `unreachable` means the status command itself failed.
 */
export type ChildState = 'running' | 'stopped' | 'unreachable';

/**
 * One framed response from the admin console.
 */
export interface VarnishResponse {
  /** Three-digit status code from the status line */
  code: number;
  /** Body bytes, exactly as many as the status line declared */
  body: Buffer;
}
