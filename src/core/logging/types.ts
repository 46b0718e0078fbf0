import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - matches pino's Logger exactly.
 *
 * No abstraction, use library types directly.
 *
 * API follows pino idiom (data-first):
 *   logger.debug({ waiters: 2 }, 'Lock disposed');
 *   logger.warn({ err: error }, 'Callback failed under lock');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface, so applications and tests can swap the sink.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

/**
 * Log level type.
 */
export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
