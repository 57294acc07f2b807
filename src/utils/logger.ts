/**
 * Structured logger
 *
 * Thin factory over pino that tags every entry with the emitting component.
 * Log level can be controlled via OLAH_LOG_LEVEL environment variable.
 *
 * @example
 * ```typescript
 * const logger = createLogger('SystemSampler', 'debug');
 * logger.info({ intervalMs: 5000 }, 'Sampler started');
 * ```
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

const LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLevel(value: string | undefined): value is LevelWithSilent {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

/**
 * Resolve the effective level: explicit override, then OLAH_LOG_LEVEL, then 'info'
 */
export function resolveLogLevel(level?: LevelWithSilent): LevelWithSilent {
  if (level) {
    return level;
  }
  const envLevel = process.env.OLAH_LOG_LEVEL?.toLowerCase();
  return isLevel(envLevel) ? envLevel : 'info';
}

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({ name: 'olah-observability', level: resolveLogLevel() });
  }
  return rootLogger;
}

/**
 * Create a logger instance
 *
 * @param component - Component name (e.g., 'MetricsStore', 'CacheInventory')
 * @param level - Optional log level override (defaults to OLAH_LOG_LEVEL or 'info')
 */
export function createLogger(component: string, level?: LevelWithSilent): Logger {
  const child = getRootLogger().child({ component });
  if (level) {
    child.level = level;
  }
  return child;
}
