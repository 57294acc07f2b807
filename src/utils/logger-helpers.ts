/**
 * Logger Helpers
 *
 * Lazy evaluation of log context objects. Per-request paths log at debug
 * level, so the context object is only built when that level is enabled.
 */

import type { Logger } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Log with a context object that is only built when the level is enabled
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ endpoint, statusCode }), 'Request recorded');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
