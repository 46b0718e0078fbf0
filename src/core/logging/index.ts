// Types
export type { Logger, ILoggerFactory, LogLevel } from './types.js';

// Factory
export { PinoLoggerFactory } from './create-logger.js';

// Process-wide access
export { getLoggerFactory, setLoggerFactory, createLogger } from './bootstrap.js';
