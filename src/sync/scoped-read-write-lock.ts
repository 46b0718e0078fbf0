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
import { ReaderWriterGate } from './reader-writer-gate.js';
import { isDisposable, type AcquireOptions, type DisposableResource, type LockOptions } from './resource.js';

const disposedError = (): SyncError => SyncErr.disposed('ScopedReadWriteLock has been disposed');

/**
 * Reader/writer lock for reference values that never hands the value out.
 *
 * There is no getter: every access happens inside a read- or write-scoped
 * callback, and the lock is released when the callback returns or throws.
 * No deep-copy capability is required of `T`.
 *
 * Locked behavior:
 * - many readers XOR one writer; queued writers hold back new readers
 * - the gate does not allow recursion: any acquisition from inside one of this
 *   lock's own scopes (same call chain, across `await` too) reports `RecursionError`
 * - synchronous calls never wait; contention reports `Locked`
 * - `withReadAsync` reads a reference captured under a short read lock and runs
 *   the callback outside the lock; the write variants hold the write lock until
 *   the callback settles and commit before releasing
 * - once disposed, every call reports `Disposed`, including callbacks that were
 *   running when `dispose()` ran; the value is torn down after the last of them returns
 * - an invalid `timeoutMs` throws at the call site, before any waiting
 */
export class ScopedReadWriteLock<T extends object> implements DisposableResource {
  private readonly gate = new ReaderWriterGate();
  private readonly scope = new LockScope();
  private readonly defaults: LockDefaults;
  private value: T;
  private disposed = false;
  private tornDown = false;
  /** Callbacks currently running against the value, including `withReadAsync` readers outside the gate. */
  private holders = 0;

  /**
   * @throws ContractViolationError when `value` is null or undefined
   */
  constructor(value: T, options: LockOptions = {}) {
    this.value = requireValue(value, 'ScopedReadWriteLock value');
    this.defaults = resolveLockDefaults('ScopedReadWriteLock', options);
  }

  static new<T extends object>(value: T, options?: LockOptions): ScopedReadWriteLock<T> {
    return new ScopedReadWriteLock(value, options);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get readers(): number {
    return this.gate.readers;
  }

  get isWriteLocked(): boolean {
    return this.gate.isWriteLocked;
  }

  private get logger(): Logger {
    return this.defaults.logger;
  }

  withRead<U>(reader: (value: T) => U): Result<U, SyncError> {
    const blocked = this.checkEntry('withRead');
    if (blocked !== null) return err(blocked);
    if (!this.gate.tryEnterRead()) return err(SyncErr.locked('withRead would block: a writer holds the lock'));
    return this.runHeld('read', 'withRead', reader, () => this.gate.exitRead());
  }

  /** Replace the value with what `writer` returns. */
  withWrite(writer: (value: T) => T): Result<void, SyncError> {
    return this.writeSync('withWrite', (value) => {
      this.value = requireValue(writer(value), 'withWrite result');
    });
  }

  /** Modify the value in place. */
  withWriteMutate(mutator: (value: T) => void): Result<void, SyncError> {
    return this.writeSync('withWriteMutate', mutator);
  }

  withReadAsync<U>(reader: (value: T) => PromiseLike<U>, options: AcquireOptions = {}): ResultAsync<U, SyncError> {
    const waitOptions = toWaitOptions(this.defaults, options);
    return new ResultAsync(
      (async (): Promise<Result<U, SyncError>> => {
        const blocked = this.checkEntry('withReadAsync', waitOptions.signal);
        if (blocked !== null) return err(blocked);

        const entered = await this.gate.enterRead(waitOptions);
        if (entered.isErr()) return err(this.waitEnded('withReadAsync', waitFailureToSyncError(entered.error, disposedError)));

        const captured = this.disposed ? null : this.value;
        this.gate.exitRead();
        if (captured === null) return err(disposedError());

        this.holders += 1;
        let result: Result<U, SyncError>;
        try {
          result = ok(await reader(captured));
        } catch (e) {
          result = err(this.fault(e, 'withReadAsync', waitOptions.signal));
        } finally {
          this.holders -= 1;
        }
        return this.leave('withReadAsync', result);
      })()
    );
  }

  withWriteAsync(writer: (value: T) => PromiseLike<T>, options: AcquireOptions = {}): ResultAsync<void, SyncError> {
    return this.writeAsync('withWriteAsync', options, async (value) => {
      const next = await writer(value);
      this.value = requireValue(next, 'withWriteAsync result');
    });
  }

  withWriteMutateAsync(
    mutator: (value: T) => PromiseLike<void>,
    options: AcquireOptions = {}
  ): ResultAsync<void, SyncError> {
    return this.writeAsync('withWriteMutateAsync', options, async (value) => {
      await mutator(value);
    });
  }

  /**
   * Idempotent. Queued waiters resolve with `Disposed`. The value's `dispose()` runs
   * once, here when no callback is running, otherwise when the last one returns.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    const failedWaiters = this.gate.dispose();
    this.logger.debug({ failedWaiters, holders: this.holders }, 'ScopedReadWriteLock disposed');
    this.teardownIfDrained();
  }

  private writeSync(operation: string, body: (value: T) => void): Result<void, SyncError> {
    const blocked = this.checkEntry(operation);
    if (blocked !== null) return err(blocked);
    if (!this.gate.tryEnterWrite()) return err(SyncErr.locked(`${operation} would block: lock is held`));
    return this.runHeld('write', operation, body, () => this.gate.exitWrite());
  }

  private writeAsync(
    operation: string,
    options: AcquireOptions,
    body: (value: T) => Promise<void>
  ): ResultAsync<void, SyncError> {
    const waitOptions = toWaitOptions(this.defaults, options);
    return new ResultAsync(
      (async (): Promise<Result<void, SyncError>> => {
        const blocked = this.checkEntry(operation, waitOptions.signal);
        if (blocked !== null) return err(blocked);

        const entered = await this.gate.enterWrite(waitOptions);
        if (entered.isErr()) return err(this.waitEnded(operation, waitFailureToSyncError(entered.error, disposedError)));
        if (this.disposed) {
          this.gate.exitWrite();
          return err(disposedError());
        }

        const frame = this.scope.open('write');
        this.holders += 1;
        let result: Result<void, SyncError>;
        try {
          await this.scope.run(frame, () => body(this.value));
          result = ok(undefined);
        } catch (e) {
          result = err(this.fault(e, operation, waitOptions.signal));
        } finally {
          frame.close();
          this.gate.exitWrite();
          this.holders -= 1;
        }
        return this.leave(operation, result);
      })()
    );
  }

  private checkEntry(operation: string, signal?: AbortSignal): SyncError | null {
    if (this.disposed) return disposedError();
    const held = this.scope.heldMode();
    if (held !== null) {
      return SyncErr.recursion(`${operation} called while this lock is already held for ${held}`);
    }
    if (signal?.aborted) return SyncErr.cancelled(undefined, signal.reason);
    return null;
  }

  private runHeld<R>(mode: LockMode, operation: string, body: (value: T) => R, exit: () => void): Result<R, SyncError> {
    const frame = this.scope.open(mode);
    this.holders += 1;
    let result: Result<R, SyncError>;
    try {
      result = ok(this.scope.run(frame, () => body(this.value)));
    } catch (e) {
      result = err(this.fault(e, operation));
    } finally {
      frame.close();
      exit();
      this.holders -= 1;
    }
    return this.leave(operation, result);
  }

  private leave<R>(operation: string, result: Result<R, SyncError>): Result<R, SyncError> {
    if (!this.disposed) return result;
    try {
      this.teardownIfDrained();
    } catch (e) {
      this.logger.error({ err: e, operation }, 'Value teardown threw after dispose');
      return err(SyncErr.failed('Teardown of the protected value threw', e));
    }
    if (result.isErr()) return result;
    this.logger.debug({ operation }, 'Lock disposed while the callback held it');
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
