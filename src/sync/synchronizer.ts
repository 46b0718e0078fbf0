import type { Result, ResultAsync } from 'neverthrow';
import type { SyncError } from '../errors/sync-error.js';
import type { AcquireOptions } from './resource.js';

/**
 * Contracts shared by the value-holding locks, so callers can depend on the
 * capability rather than on a concrete lock.
 */

export interface Synchronizer<T> {
  getValue(): Result<T, SyncError>;
}

export interface AsyncSynchronizer<T> extends Synchronizer<T> {
  getValueAsync(options?: AcquireOptions): ResultAsync<T, SyncError>;

  /**
   * Outer result: did the lock work. Inner result: what the action decided.
   */
  withLockAsync<U, E>(
    action: (value: T) => PromiseLike<Result<U, E>>,
    options?: AcquireOptions
  ): ResultAsync<Result<U, E>, SyncError>;

  updateValueAsync(f: (value: T) => T, options?: AcquireOptions): ResultAsync<void, SyncError>;
}

export interface AsyncReadWriteSynchronizer<T> extends AsyncSynchronizer<T> {
  withReadLockAsync<U, E>(
    action: (value: T) => PromiseLike<Result<U, E>>,
    options?: AcquireOptions
  ): ResultAsync<Result<U, E>, SyncError>;
}
