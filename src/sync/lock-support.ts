import type { Logger } from '../core/logging/types.js';
import { createLogger } from '../core/logging/bootstrap.js';
import { getSyncConfig } from '../config/sync-config.js';
import { ContractViolationError } from '../errors/contract-violation.js';
import { SyncErr } from '../errors/factories.js';
import type { SyncError } from '../errors/sync-error.js';
import type { AcquireOptions, LockOptions } from './resource.js';
import type { WaitFailure, WaitOptions } from './wait-queue.js';
import { assertNever } from '../runtime/assert-never.js';

export interface LockDefaults {
  readonly logger: Logger;
  readonly acquireTimeoutMs: number | null;
}

export function resolveLockDefaults(component: string, options: LockOptions = {}): LockDefaults {
  const acquireTimeoutMs =
    options.acquireTimeoutMs !== undefined ? options.acquireTimeoutMs : getSyncConfig().acquireTimeoutMs;
  return {
    logger: options.logger ?? createLogger(component),
    acquireTimeoutMs: checkTimeout(acquireTimeoutMs),
  };
}

export function toWaitOptions(defaults: LockDefaults, options: AcquireOptions = {}): WaitOptions {
  const timeoutMs = options.timeoutMs !== undefined ? checkTimeout(options.timeoutMs) : defaults.acquireTimeoutMs;
  return { signal: options.signal, timeoutMs };
}

/**
 * Map a failed wait onto the lock's error taxonomy. `onDisposed` differs per lock:
 * the exclusive lock reports `Failed`, the reader-writer locks `Disposed`.
 */
export function waitFailureToSyncError(failure: WaitFailure, onDisposed: () => SyncError): SyncError {
  switch (failure.kind) {
    case 'cancelled':
      return SyncErr.cancelled(undefined, failure.reason);
    case 'timeout':
      return SyncErr.timeout(failure.timeoutMs);
    case 'disposed':
      return onDisposed();
    default:
      return assertNever(failure);
  }
}

/**
 * Convert a fault raised by user code under a lock. A fault raised while the
 * caller's signal is aborted is treated as the cancellation surfacing.
 */
export function faultToSyncError(fault: unknown, operation: string, signal?: AbortSignal): SyncError {
  if (signal?.aborted) {
    return SyncErr.cancelled(`${operation} was cancelled`, fault);
  }
  const detail = fault instanceof Error ? fault.message : String(fault);
  return SyncErr.failed(`${operation} threw: ${detail}`, fault);
}

/** `0` means no bound, as it does for REFSYNC_ACQUIRE_TIMEOUT_MS. */
function checkTimeout(timeoutMs: number | null): number | null {
  if (timeoutMs === null) return null;
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
    throw new ContractViolationError(`Timeout must be a non-negative finite number of milliseconds, got ${timeoutMs}`);
  }
  return timeoutMs === 0 ? null : timeoutMs;
}
