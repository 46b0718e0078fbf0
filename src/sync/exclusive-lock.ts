import { err, errAsync, ok, okAsync, ResultAsync, type Result } from 'neverthrow';
import type { Logger } from '../core/logging/types.js';
import { requireValue } from '../errors/contract-violation.js';
import { SyncErr } from '../errors/factories.js';
import type { SyncError } from '../errors/sync-error.js';
import { LockScope } from './lock-scope.js';
import {
  faultToSyncError,
  resolveLockDefaults,
  toWaitOptions,
  waitFailureToSyncError,
  type LockDefaults,
} from './lock-support.js';
import type { AcquireOptions, DisposableResource, LockOptions } from './resource.js';
import { AsyncSemaphore } from './semaphore.js';
import type { AsyncSynchronizer } from './synchronizer.js';
import type { WaitOptions } from './wait-queue.js';

const disposedError = (): SyncError => SyncErr.failed('ExclusiveLock has been disposed');

/**
 * One value behind a binary semaphore.
 *
 * Access is transient: getters copy the reference out and release immediately.
 * Read-modify-write sequences belong in `withLock*` or `updateValue*`, where the
 * lock is held for the whole callback and released on every exit path.
 *
 * Locked behavior:
 * - synchronous calls never wait; a held lock reports `Locked`
 * - async calls queue (FIFO) until granted, cancelled, timed out or disposed
 * - re-entering from inside the lock's own scope reports `RecursionError`
 * - once disposed, every call reports `Failed` without touching the semaphore;
 *   an operation that held the lock when `dispose()` ran also reports `Failed`
 * - an invalid `timeoutMs` throws at the call site, before any waiting
 */
export class ExclusiveLock<T extends NonNullable<unknown>> implements AsyncSynchronizer<T>, DisposableResource {
  private readonly semaphore = new AsyncSemaphore(1);
  private readonly scope = new LockScope();
  private readonly defaults: LockDefaults;
  private value: T;
  private disposed = false;

  constructor(value: T, options: LockOptions = {}) {
    this.value = requireValue(value, 'ExclusiveLock value');
    this.defaults = resolveLockDefaults('ExclusiveLock', options);
  }

  static new<T extends NonNullable<unknown>>(value: T, options?: LockOptions): ExclusiveLock<T> {
    return new ExclusiveLock(value, options);
  }

  get isLocked(): boolean {
    return !this.disposed && this.semaphore.available === 0;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  private get logger(): Logger {
    return this.defaults.logger;
  }

  tryGetValue(): Result<T, SyncError> {
    if (this.disposed) return err(disposedError());
    if (!this.semaphore.tryAcquire()) return err(SyncErr.locked());
    try {
      return ok(this.value);
    } finally {
      this.semaphore.release();
    }
  }

  tryGetValueAsync(options: AcquireOptions = {}): ResultAsync<T, SyncError> {
    if (options.signal?.aborted) return errAsync(SyncErr.cancelled(undefined, options.signal.reason));
    const result = this.tryGetValue();
    return result.isOk() ? okAsync(result.value) : errAsync(result.error);
  }

  getValue(): Result<T, SyncError> {
    return this.runSync('getValue', (value) => value);
  }

  getValueAsync(options: AcquireOptions = {}): ResultAsync<T, SyncError> {
    return this.runAsync<T>('getValueAsync', options, async (value) => value);
  }

  withLock<U, E>(action: (value: T) => Result<U, E>): Result<Result<U, E>, SyncError> {
    return this.runSync('withLock', action);
  }

  withLockAsync<U, E>(
    action: (value: T) => PromiseLike<Result<U, E>>,
    options: AcquireOptions = {}
  ): ResultAsync<Result<U, E>, SyncError> {
    return this.runAsync<Result<U, E>>('withLockAsync', options, async (value) => action(value));
  }

  updateValue(f: (value: T) => T): Result<void, SyncError> {
    return this.runSync('updateValue', (value) => {
      this.value = f(value);
    });
  }

  updateValueAsync(f: (value: T) => T, options: AcquireOptions = {}): ResultAsync<void, SyncError> {
    return this.runAsync<void>('updateValueAsync', options, async (value) => {
      this.value = f(value);
    });
  }

  /**
   * Idempotent. Queued waiters resolve with `Failed`; an in-flight holder runs to
   * completion and then reports `Failed`.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    const failedWaiters = this.semaphore.dispose();
    this.logger.debug({ failedWaiters }, 'ExclusiveLock disposed');
  }

  private runSync<R>(operation: string, body: (value: T) => R): Result<R, SyncError> {
    if (this.disposed) return err(disposedError());
    if (this.scope.isHeld()) return err(SyncErr.recursion(`${operation} called while this lock is already held`));
    if (!this.semaphore.tryAcquire()) return err(SyncErr.locked(`${operation} would block: lock is held`));

    const frame = this.scope.open('exclusive');
    try {
      const produced = this.scope.run(frame, () => body(this.value));
      return this.disposed ? err(this.disposedWhileHeld(operation)) : ok(produced);
    } catch (e) {
      return err(this.fault(e, operation));
    } finally {
      frame.close();
      this.semaphore.release();
    }
  }

  private runAsync<R>(
    operation: string,
    options: AcquireOptions,
    body: (value: T) => Promise<R>
  ): ResultAsync<R, SyncError> {
    const waitOptions = toWaitOptions(this.defaults, options);
    return new ResultAsync(this.holdAsync(operation, waitOptions, body));
  }

  private async holdAsync<R>(
    operation: string,
    options: WaitOptions,
    body: (value: T) => Promise<R>
  ): Promise<Result<R, SyncError>> {
    if (this.disposed) return err(disposedError());
    if (this.scope.isHeld()) return err(SyncErr.recursion(`${operation} called while this lock is already held`));

    const acquired = await this.semaphore.acquire(options);
    if (acquired.isErr()) {
      const error = waitFailureToSyncError(acquired.error, disposedError);
      this.logger.debug({ operation, kind: error.kind }, 'Wait for lock ended without acquiring');
      return err(error);
    }
    if (this.disposed) {
      this.semaphore.release();
      return err(disposedError());
    }

    const frame = this.scope.open('exclusive');
    try {
      const produced = await this.scope.run(frame, () => body(this.value));
      return this.disposed ? err(this.disposedWhileHeld(operation)) : ok(produced);
    } catch (e) {
      return err(this.fault(e, operation, options.signal));
    } finally {
      frame.close();
      this.semaphore.release();
    }
  }

  private disposedWhileHeld(operation: string): SyncError {
    this.logger.debug({ operation }, 'Lock disposed while the operation held it');
    return disposedError();
  }

  private fault(e: unknown, operation: string, signal?: AbortSignal): SyncError {
    const error = faultToSyncError(e, operation, signal);
    if (error.kind === 'Cancelled') {
      this.logger.debug({ operation }, 'Callback aborted under lock');
    } else {
      this.logger.warn({ err: e, operation }, 'Callback failed under lock');
    }
    return error;
  }
}
