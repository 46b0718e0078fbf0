/**
 * Error Factories - Consistent Error Construction
 *
 * `Err` builds application errors (configuration), `SyncErr` builds the
 * frozen `SyncError` values the locks return.
 */

import type { AppError, ConfigIssue, ConfigInvalidError } from './app-error.js';
import type { SyncError, SyncErrorKind } from './sync-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;

function make(kind: SyncErrorKind, message?: string, cause?: unknown): SyncError {
  const error: { kind: SyncErrorKind; message?: string; cause?: unknown } = { kind };
  if (message !== undefined) error.message = message;
  if (cause !== undefined) error.cause = cause;
  return Object.freeze(error);
}

export const SyncErr = {
  of: make,

  locked: (message = 'Lock is currently held'): SyncError => make('Locked', message),

  failed: (message?: string, cause?: unknown): SyncError => make('Failed', message, cause),

  disposed: (message = 'Lock has been disposed'): SyncError => make('Disposed', message),

  timeout: (timeoutMs: number): SyncError =>
    make('Timeout', `Timed out after ${timeoutMs}ms waiting for the lock`),

  cancelled: (message = 'Wait for the lock was cancelled', cause?: unknown): SyncError =>
    make('Cancelled', message, cause),

  recursion: (message = 'Lock is already held by the current call chain'): SyncError =>
    make('RecursionError', message),

  unknown: (cause: unknown): SyncError => make('UnknownError', undefined, cause),
} as const;
