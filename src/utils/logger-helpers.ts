/**
 * Logger Helpers
 *
 * Root logger construction plus lazy evaluation of log context objects:
 * per-prediction debug context is only built when the level is enabled.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Create the root logger for a serving runtime.
 *
 * @example
 * const logger = createLogger('info', { service: 'model-serving-core' });
 * logger.child({ component: 'ModelCache' }).info('ready');
 */
export function createLogger(level: LevelWithSilent, bindings?: LogContext): Logger {
  const logger = pino({ level });
  return bindings ? logger.child(bindings) : logger;
}

/**
 * Child logger tagged with a component name, or undefined when no parent
 * logger was injected.
 */
export function componentLogger(logger: Logger | undefined, component: string): Logger | undefined {
  return logger?.child({ component });
}

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @example
 * // Before: Context object always created
 * logger?.debug({ model, features }, 'Prediction served');
 *
 * // After: Context only created if debug is enabled
 * lazyLog(logger, 'debug', () => ({ model, features }), 'Prediction served');
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
