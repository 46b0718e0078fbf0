/**
 * Capability contracts for protected values, and the options shared by the locks.
 */

import type { Logger } from '../core/logging/types.js';

/** A value with a teardown hook, run once when its owner lets go of it. */
export interface DisposableResource {
  dispose(): void;
}

/** A value that can produce an independent deep copy of itself. */
export interface Cloneable<T> {
  clone(): T;
}

export function isDisposable(value: unknown): value is DisposableResource {
  return (
    typeof value === 'object' &&
    value !== null &&
    'dispose' in value &&
    typeof value.dispose === 'function'
  );
}

/**
 * Options every lock wrapper accepts.
 *
 * Timeouts read the same everywhere (here, per call, and REFSYNC_ACQUIRE_TIMEOUT_MS):
 * a positive number of milliseconds bounds the wait, `0` or `null` waits until granted.
 * Negative or non-finite values throw `ContractViolationError` at the call site.
 */
export interface LockOptions {
  /** Component logger; defaults to a child of the process-wide logger. */
  readonly logger?: Logger;
  /** Default bound for async waits; `0` or `null` waits until granted. Falls back to REFSYNC_ACQUIRE_TIMEOUT_MS. */
  readonly acquireTimeoutMs?: number | null;
}

/** Per-call options for async acquisition. */
export interface AcquireOptions {
  readonly signal?: AbortSignal;
  /**
   * Overrides the lock's default for this call; `0` or `null` waits until granted
   * even when the lock has a default bound. Use a `signal` to give up on demand.
   */
  readonly timeoutMs?: number | null;
}
