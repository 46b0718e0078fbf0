import pino from 'pino';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';

/**
 * Create the root pino logger instance.
 *
 * - Sync output to stderr (stdout belongs to the host application)
 * - JSON format for machine parsing
 * - Default level comes from REFSYNC_LOG_LEVEL (silent unless debugging)
 */
function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,

      // ISO timestamps for consistency
      timestamp: pino.stdTimeFunctions.isoTime,

      // Include error stack traces
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    // Sync output to stderr (fd 2)
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers.
 */
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(level: LogLevel) {
    this._root = createRootLogger(level);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
