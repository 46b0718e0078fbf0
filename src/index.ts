// Shared ownership and locks
export * from './sync/index.js';

// Error channel
export * from './errors/index.js';
export type { Option, Some, None } from './runtime/option.js';
export {
  some,
  none,
  fromNullable,
  isSome,
  isNone,
  map as mapOption,
  andThen as andThenOption,
  unwrapOr,
  match as matchOption,
  okOr,
  okOrElse,
} from './runtime/option.js';

// Configuration and logging
export {
  loadSyncConfig,
  getSyncConfig,
  resetSyncConfig,
  createValidatedSyncConfig,
  MAX_ACQUIRE_TIMEOUT_MS,
} from './config/sync-config.js';
export type { SyncConfig, ValidatedSyncConfig, AcquireTimeoutMs, LoadSyncConfigOptions } from './config/sync-config.js';
export { PinoLoggerFactory, getLoggerFactory, setLoggerFactory, createLogger } from './core/logging/index.js';
export type { Logger, ILoggerFactory, LogLevel } from './core/logging/index.js';
