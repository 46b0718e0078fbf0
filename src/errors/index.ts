export type { AppError, ConfigIssue, ConfigInvalidError, ValidatedConfig } from './app-error.js';
export type { SyncError, SyncErrorKind } from './sync-error.js';
export { SYNC_ERROR_KINDS, isSyncError, syncErrorEquals } from './sync-error.js';
export { Err, SyncErr } from './factories.js';
export { formatAppError, formatSyncError } from './formatter.js';
export { ContractViolationError, ConfigurationError, requireValue } from './contract-violation.js';
