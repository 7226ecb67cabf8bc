/**
 * Logger Helpers
 *
 * Lazy evaluation of log context objects: the context is only built when
 * the level is enabled, so per-call debug logging of residual arrays and
 * intervals costs nothing at the default `info` level.
 */

import type { Logger } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @param logger - Pino logger instance (can be undefined)
 * @param level - Log level
 * @param contextBuilder - Builds the context object (only called if logging)
 * @param message - Log message string
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ slope: fit.slope, n: fit.n }), 'Regression fitted');
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
