/**
 * Structured JSON output for CLI commands.
 */

import { getErrorMessage } from '@/utils/errors.js';
import { VERSION } from '@/utils/version.js';

export class OutputBuilder {
  /**
   * Build a JSON error object for --json output.
   *
   * @param error - Error or message
   * @param options - Extra fields such as the exit code or error code
   */
  static buildJsonError(
    error: unknown,
    options?: { exitCode?: number; code?: string; suggestion?: string }
  ): Record<string, unknown> {
    return {
      version: VERSION,
      success: false,
      error: getErrorMessage(error),
      ...options,
    };
  }

  /**
   * Build a JSON success object for --json output.
   */
  static buildJsonSuccess(data: Record<string, unknown>): Record<string, unknown> {
    return {
      version: VERSION,
      success: true,
      ...data,
    };
  }
}
