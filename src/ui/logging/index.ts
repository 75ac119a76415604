/**
 * Logging utilities for varnish-admin.
 *
 * Provides consistent log formatting with context-based prefixes and debug mode support.
 */

export {
  createLogger,
  enableDebugLogging,
  isDebugEnabled,
  type LogContext,
  type LogLevel,
  type Logger,
} from './logger.js';
