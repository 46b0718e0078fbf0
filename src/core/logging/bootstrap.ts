import type { ILoggerFactory, Logger } from './types.js';
import { PinoLoggerFactory } from './create-logger.js';
import { getSyncConfig } from '../../config/sync-config.js';

/**
 * Process-wide logger factory.
 *
 * Created lazily on first use from the validated configuration, so importing the
 * library never touches the environment. Applications may install their own
 * factory (for example one wrapping their pino instance) before creating locks.
 */
let _factory: ILoggerFactory | null = null;

export function getLoggerFactory(): ILoggerFactory {
  if (!_factory) {
    _factory = new PinoLoggerFactory(getSyncConfig().logLevel);
  }
  return _factory;
}

export function setLoggerFactory(factory: ILoggerFactory | null): void {
  _factory = factory;
}

/**
 * Create a logger with component context.
 */
export function createLogger(component: string): Logger {
  return getLoggerFactory().create(component);
}
