/**
 * Error handling utilities.
 *
 * Pure utility functions for error message extraction.
 */

/**
 * Extract error message from unknown error type.
 *
 * - Error instances → error.message
 * - Unknown types → String(error)
 *
 * @example
 * ```typescript
 * try {
 *   await client.purge('req.url ~ /');
 * } catch (error) {
 *   console.error(`Failed: ${getErrorMessage(error)}`);
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Extract the `exitCode` carried by an error, if it has one.
 *
 * @param error - Error of unknown type
 * @param fallback - Exit code used when the error carries none
 */
export function getExitCode(error: unknown, fallback: number): number {
  if (error instanceof Error && 'exitCode' in error && typeof error.exitCode === 'number') {
    return error.exitCode;
  }
  return fallback;
}
