/**
 * Logging utilities for consistent formatted output with log level support.
 *
 * By default only 'info' level logs are shown. Set VARNISH_ADMIN_DEBUG=1 or
 * pass --debug to enable verbose 'debug' level logs.
 */

// ============================================================================
// Global Debug State
// ============================================================================

let debugEnabled = false;

/**
 * Enable debug logging globally.
 *
 * Called during CLI initialization when the --debug flag is detected.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Check if debug logging is currently enabled.
 *
 * @returns True if debug mode is active
 */
export function isDebugEnabled(): boolean {
  return debugEnabled || process.env['VARNISH_ADMIN_DEBUG'] === '1';
}

// ============================================================================
// Log Levels
// ============================================================================

/**
 * Log level determines visibility of log messages.
 *
 * - 'info': Always shown (notices, errors, key milestones)
 * - 'debug': Only shown in debug mode (wire traces, connection lifecycle)
 */
export type LogLevel = 'info' | 'debug';

/**
 * Log contexts for different components.
 * Used to prefix log messages with component name.
 */
export type LogContext = 'cli' | 'client' | 'protocol' | 'transport';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Logger instance with support for different log levels.
 */
export interface Logger {
  /** Log an info message (always shown). */
  info: (message: string) => void;

  /** Log a debug message (only shown in debug mode). */
  debug: (message: string) => void;
}

// ============================================================================
// Logger Implementation
// ============================================================================

/**
 * Create a logger instance for a specific context.
 *
 * Messages are written to stderr so stdout stays reserved for command output.
 *
 * @param context - Component context for log prefix
 *
 * @example
 * ```typescript
 * const log = createLogger('transport');
 *
 * // Always shown
 * log.info('varnish host already started on 127.0.0.1:6082');
 *
 * // Only shown with --debug or VARNISH_ADMIN_DEBUG=1
 * log.debug('Connected to 127.0.0.1:6082');
 * ```
 */
export function createLogger(context: LogContext): Logger {
  const logMessage = (message: string, level: LogLevel = 'debug'): void => {
    if (level === 'debug' && !isDebugEnabled()) {
      return;
    }
    console.error(`[${context}] ${message}`);
  };

  return {
    info: (message: string) => logMessage(message, 'info'),
    debug: (message: string) => logMessage(message, 'debug'),
  };
}
