import { err, ok, ResultAsync, type Result } from 'neverthrow';
import type { Logger } from '../core/logging/types.js';
import { requireValue } from '../errors/contract-violation.js';
import { SyncErr } from '../errors/factories.js';
import type { SyncError } from '../errors/sync-error.js';
import { LockScope, type LockMode } from './lock-scope.js';
import {
  faultToSyncError,
  resolveLockDefaults,
  toWaitOptions,
  waitFailureToSyncError,
  type LockDefaults,
} from './lock-support.js';
import { isDisposable, type AcquireOptions, type Cloneable, type DisposableResource, type LockOptions } from './resource.js';
import { AsyncSemaphore } from './semaphore.js';
import type { AsyncReadWriteSynchronizer } from './synchronizer.js';
import type { WaitOptions, WaitOutcome } from './wait-queue.js';

const disposedError = (): SyncError => SyncErr.disposed('ReadWriteLock has been disposed');

/**
 * Reader/writer lock whose readers only ever receive deep copies.
 *
 * Classic two-semaphore discipline: the reader count is guarded by its own
 * binary semaphore; the first reader in takes the writer gate on behalf of all
 * readers, the last reader out gives it back. Writers take the writer gate alone.
 *
 * Because readers get `value.clone()`, a copy handed out can never observe a
 * write in progress nor mutate the shared value.
 *
 * Locked behavior:
 * - synchronous calls never wait; contention reports `Locked`
 * - a cancelled or timed-out reader leaves the reader count as it found it
 * - a reader's `timeoutMs` bounds its whole wait (count lock and writer gate together)
 * - re-entering from inside one of this lock's scopes reports `RecursionError`
 * - once disposed, every call reports `Disposed`, including operations that held
 *   the lock when `dispose()` ran; the value is torn down after the last of them leaves
 */
export class ReadWriteLock<T extends Cloneable<T>> implements AsyncReadWriteSynchronizer<T>, DisposableResource {
  private readonly writeGate = new AsyncSemaphore(1);
  private readonly readerCountLock = new AsyncSemaphore(1);
  private readonly scope = new LockScope();
  private readonly defaults: LockDefaults;
  private activeReaders = 0;
  private holders = 0;
  private value: T;
  private disposed = false;
  private tornDown = false;

  /**
   * @throws ContractViolationError when `initialValue` is null or undefined
   */
  constructor(initialValue: T, options: LockOptions = {}) {
    this.value = requireValue(initialValue, 'ReadWriteLock initial value');
    this.defaults = resolveLockDefaults('ReadWriteLock', options);
  }

  static new<T extends Cloneable<T>>(initialValue: T, options?: LockOptions): ReadWriteLock<T> {
    return new ReadWriteLock(initialValue, options);
  }

  get readerCount(): number {
    return this.activeReaders;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  private get logger(): Logger {
    return this.defaults.logger;
  }

  // ==========================================================================
  // Readers (receive clones)
  // ==========================================================================

  getValue(): Result<T, SyncError> {
    return this.readSync('getValue', (value) => value.clone());
  }

  getValueAsync(options: AcquireOptions = {}): ResultAsync<T, SyncError> {
    return this.readAsync<T>('getValueAsync', options, async (value) => value.clone());
  }

  withReadLock<U, E>(action: (copy: T) => Result<U, E>): Result<Result<U, E>, SyncError> {
    return this.readSync('withReadLock', (value) => action(value.clone()));
  }

  withReadLockAsync<U, E>(
    action: (copy: T) => PromiseLike<Result<U, E>>,
    options: AcquireOptions = {}
  ): ResultAsync<Result<U, E>, SyncError> {
    return this.readAsync<Result<U, E>>('withReadLockAsync', options, async (value) => action(value.clone()));
  }

  // ==========================================================================
  // Writers (live value)
  // ==========================================================================

  updateValue(f: (value: T) => T): Result<void, SyncError> {
    return this.writeSync('updateValue', (value) => {
      this.value = f(value);
    });
  }

  updateValueAsync(f: (value: T) => T, options: AcquireOptions = {}): ResultAsync<void, SyncError> {
    return this.writeAsync<void>('updateValueAsync', options, async (value) => {
      this.value = f(value);
    });
  }

  withLock<U, E>(action: (value: T) => Result<U, E>): Result<Result<U, E>, SyncError> {
    return this.writeSync('withLock', action);
  }

  withLockAsync<U, E>(
    action: (value: T) => PromiseLike<Result<U, E>>,
    options: AcquireOptions = {}
  ): ResultAsync<Result<U, E>, SyncError> {
    return this.writeAsync<Result<U, E>>('withLockAsync', options, async (value) => action(value));
  }

  /**
   * Idempotent. Queued waiters resolve with `Disposed`. The value's `dispose()` runs
   * once, here when nobody holds the lock, otherwise when the last holder leaves.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    const failedWaiters = this.writeGate.dispose() + this.readerCountLock.dispose();
    this.logger.debug({ failedWaiters, holders: this.holders }, 'ReadWriteLock disposed');
    this.teardownIfDrained();
  }

  // ==========================================================================
  // Gate bookkeeping
  // ==========================================================================

  private tryAcquireRead(): boolean {
    if (!this.readerCountLock.tryAcquire()) return false;
    try {
      if (this.activeReaders === 0 && !this.writeGate.tryAcquire()) return false;
      this.activeReaders += 1;
      return true;
    } finally {
      this.readerCountLock.release();
    }
  }

  private async acquireRead(options: WaitOptions): Promise<Result<void, SyncError>> {
    const { timeoutMs } = options;
    const deadline = timeoutMs === null || timeoutMs === undefined ? null : Date.now() + timeoutMs;
    const counted = await this.readerCountLock.acquire(options);
    if (counted.isErr()) return err(waitFailureToSyncError(counted.error, disposedError));

    try {
      this.activeReaders += 1;
      if (this.activeReaders === 1) {
        const gated = await this.acquireWriteGateBy(deadline, options);
        if (gated.isErr()) {
          this.activeReaders -= 1;
          return err(waitFailureToSyncError(gated.error, disposedError));
        }
      }
      return ok(undefined);
    } finally {
      this.readerCountLock.release();
    }
  }

  /** The first reader's gate wait gets what is left of the caller's bound, not a fresh one. */
  private async acquireWriteGateBy(deadline: number | null, options: WaitOptions): Promise<WaitOutcome> {
    if (deadline === null) return this.writeGate.acquire(options);

    const timeoutMs = options.timeoutMs ?? 0;
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      if (this.writeGate.isDisposed) return err({ kind: 'disposed' });
      if (options.signal?.aborted) return err({ kind: 'cancelled', reason: options.signal.reason });
      return this.writeGate.tryAcquire() ? ok(undefined) : err({ kind: 'timeout', timeoutMs });
    }

    const outcome = await this.writeGate.acquire({ signal: options.signal, timeoutMs: remaining });
    if (outcome.isErr() && outcome.error.kind === 'timeout') return err({ kind: 'timeout', timeoutMs });
    return outcome;
  }

  private releaseRead(): void {
    // Synchronous: no other turn can observe the count between decrement and gate release.
    this.activeReaders -= 1;
    if (this.activeReaders === 0) this.writeGate.release();
  }

  // ==========================================================================
  // Scoped runners
  // ==========================================================================

  private readSync<R>(operation: string, body: (value: T) => R): Result<R, SyncError> {
    const blocked = this.checkEntry(operation);
    if (blocked !== null) return err(blocked);
    if (!this.tryAcquireRead()) return err(SyncErr.locked(`${operation} would block: a writer holds the lock`));
    return this.runHeld('read', operation, body, () => this.releaseRead());
  }

  private writeSync<R>(operation: string, body: (value: T) => R): Result<R, SyncError> {
    const blocked = this.checkEntry(operation);
    if (blocked !== null) return err(blocked);
    if (!this.writeGate.tryAcquire()) return err(SyncErr.locked(`${operation} would block: lock is held`));
    return this.runHeld('write', operation, body, () => this.writeGate.release());
  }

  private readAsync<R>(
    operation: string,
    options: AcquireOptions,
    body: (value: T) => Promise<R>
  ): ResultAsync<R, SyncError> {
    const waitOptions = toWaitOptions(this.defaults, options);
    return new ResultAsync(
      (async (): Promise<Result<R, SyncError>> => {
        const blocked = this.checkEntry(operation);
        if (blocked !== null) return err(blocked);

        const acquired = await this.acquireRead(waitOptions);
        if (acquired.isErr()) return err(this.waitEnded(operation, acquired.error));
        return this.runHeldAsync('read', operation, waitOptions.signal, body, () => this.releaseRead());
      })()
    );
  }

  private writeAsync<R>(
    operation: string,
    options: AcquireOptions,
    body: (value: T) => Promise<R>
  ): ResultAsync<R, SyncError> {
    const waitOptions = toWaitOptions(this.defaults, options);
    return new ResultAsync(
      (async (): Promise<Result<R, SyncError>> => {
        const blocked = this.checkEntry(operation);
        if (blocked !== null) return err(blocked);

        const acquired = await this.writeGate.acquire(waitOptions);
        if (acquired.isErr()) {
          return err(this.waitEnded(operation, waitFailureToSyncError(acquired.error, disposedError)));
        }
        return this.runHeldAsync('write', operation, waitOptions.signal, body, () => this.writeGate.release());
      })()
    );
  }

  private checkEntry(operation: string): SyncError | null {
    if (this.disposed) return disposedError();
    const held = this.scope.heldMode();
    if (held !== null) {
      return SyncErr.recursion(`${operation} called while this lock is already held for ${held}`);
    }
    return null;
  }

  private runHeld<R>(mode: LockMode, operation: string, body: (value: T) => R, release: () => void): Result<R, SyncError> {
    const frame = this.scope.open(mode);
    this.holders += 1;
    let result: Result<R, SyncError>;
    try {
      result = ok(this.scope.run(frame, () => body(this.value)));
    } catch (e) {
      result = err(this.fault(e, operation));
    } finally {
      frame.close();
      release();
      this.holders -= 1;
    }
    return this.leave(operation, result);
  }

  private async runHeldAsync<R>(
    mode: LockMode,
    operation: string,
    signal: AbortSignal | undefined,
    body: (value: T) => Promise<R>,
    release: () => void
  ): Promise<Result<R, SyncError>> {
    if (this.disposed) {
      release();
      return err(disposedError());
    }
    const frame = this.scope.open(mode);
    this.holders += 1;
    let result: Result<R, SyncError>;
    try {
      result = ok(await this.scope.run(frame, () => body(this.value)));
    } catch (e) {
      result = err(this.fault(e, operation, signal));
    } finally {
      frame.close();
      release();
      this.holders -= 1;
    }
    return this.leave(operation, result);
  }

  /** A holder that outlived `dispose()` reports `Disposed`; the last one out tears the value down. */
  private leave<R>(operation: string, result: Result<R, SyncError>): Result<R, SyncError> {
    if (!this.disposed) return result;
    try {
      this.teardownIfDrained();
    } catch (e) {
      this.logger.error({ err: e, operation }, 'Value teardown threw after dispose');
      return err(SyncErr.failed('Teardown of the protected value threw', e));
    }
    if (result.isErr()) return result;
    this.logger.debug({ operation }, 'Lock disposed while the operation held it');
    return err(disposedError());
  }

  private teardownIfDrained(): void {
    if (!this.disposed || this.holders > 0 || this.tornDown) return;
    this.tornDown = true;
    if (isDisposable(this.value)) this.value.dispose();
  }

  private waitEnded(operation: string, error: SyncError): SyncError {
    this.logger.debug({ operation, kind: error.kind }, 'Wait for lock ended without acquiring');
    return error;
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
