/**
 * Shared formatting utilities for CLI output.
 */

/**
 * Join lines with newlines, dropping missing ones.
 *
 * @example
 * ```typescript
 * joinLines('Error: refused', verbose && 'Code: ECONNREFUSED', undefined);
 * ```
 */
export function joinLines(...lines: Array<string | null | undefined | false>): string {
  return lines
    .filter((line): line is string => line !== undefined && line !== null && line !== false)
    .join('\n');
}
