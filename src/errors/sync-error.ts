/**
 * Structured error value returned by every locking operation.
 *
 * Errors are data: expected conditions (held lock, disposal, cancellation, re-entry)
 * travel through `Result`, never through `throw`.
 */

export type SyncErrorKind =
  | 'Locked'
  | 'Failed'
  | 'Disposed'
  | 'Timeout'
  | 'Cancelled'
  | 'RecursionError'
  | 'UnknownError';

export const SYNC_ERROR_KINDS: readonly SyncErrorKind[] = [
  'Locked',
  'Failed',
  'Disposed',
  'Timeout',
  'Cancelled',
  'RecursionError',
  'UnknownError',
] as const;

export type SyncError = Readonly<{
  readonly kind: SyncErrorKind;
  readonly message?: string;
  readonly cause?: unknown;
}>;

export function isSyncError(e: unknown): e is SyncError {
  if (typeof e !== 'object' || e === null || !('kind' in e)) return false;
  const kind: unknown = e.kind;
  return typeof kind === 'string' && SYNC_ERROR_KINDS.some((k) => k === kind);
}

/** Equality by kind and message; the cause is diagnostic only. */
export function syncErrorEquals(a: SyncError, b: SyncError): boolean {
  return a.kind === b.kind && a.message === b.message;
}
