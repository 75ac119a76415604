/**
 * Transport Error Formatting
 *
 * Builds transport-layer errors with connection context.
 */

import { TransportError, TransportTimeoutError } from '@/errors.js';
import type { ServerAddress } from '@/types.js';

export function formatConnectionError(address: ServerAddress, error: Error): TransportError {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  const message = [
    `Connection to ${address.host}:${address.port} failed`,
    ...(code ? [`Code: ${code}`] : []),
    `Details: ${error.message}`,
  ].join(' | ');
  return new TransportError(message, error);
}

export function formatTimeoutError(
  operation: 'connect' | 'read',
  timeoutMs: number
): TransportTimeoutError {
  return new TransportTimeoutError(operation, timeoutMs);
}

export function formatWriteError(error: Error): TransportError {
  return new TransportError(`Write to admin console failed: ${error.message}`, error);
}

export function formatUnavailableError(operation: string, reason: 'closed' | 'not open'): TransportError {
  return new TransportError(`Cannot ${operation}: transport is ${reason}`);
}
