import { ContractViolationError, requireValue } from '../errors/contract-violation.js';
import { createLogger } from '../core/logging/bootstrap.js';
import { isDisposable, type DisposableResource } from './resource.js';
import { WeakHandle } from './weak-handle.js';

/**
 * The record every handle of one value points at.
 *
 * @internal Not part of the public surface; only handles touch it.
 *
 * All mutations happen in synchronous code, so a clone racing a release to zero
 * cannot interleave: whichever runs first decides, and teardown runs once.
 */
export interface SharedRecord<T> {
  value: T | undefined;
  strongCount: number;
  weakCount: number;
  disposed: boolean;
}

/**
 * Reference-counted shared ownership of one value.
 *
 * Each instance is one owning reference. `clone()` adds an owner, `release()`
 * removes one; when the count reaches zero the value's `dispose()` hook (if it
 * has one) runs exactly once and the value becomes unreachable through any handle.
 *
 * @example
 * ```typescript
 * const conn = SharedHandle.new(openConnection());
 * const forWorker = conn.clone();
 * conn.release();       // 1 owner left
 * forWorker.release();  // 0: connection.dispose() runs
 * ```
 */
export class SharedHandle<T extends NonNullable<unknown>> implements DisposableResource {
  private constructor(private readonly record: SharedRecord<T>) {}

  /**
   * @throws ContractViolationError when `value` is null or undefined
   */
  static new<T extends NonNullable<unknown>>(value: T): SharedHandle<T> {
    const record: SharedRecord<T> = {
      value: requireValue(value, 'SharedHandle value'),
      strongCount: 1,
      weakCount: 0,
      disposed: false,
    };
    return new SharedHandle(record);
  }

  /**
   * Add an owner to a live record. Returns null when the record already hit zero,
   * which is how a weak upgrade loses the race against the last release.
   *
   * @internal Used by `clone()` and `WeakHandle.upgrade()`.
   */
  static attach<T extends NonNullable<unknown>>(record: SharedRecord<T>): SharedHandle<T> | null {
    if (record.disposed || record.strongCount <= 0) return null;
    record.strongCount += 1;
    return new SharedHandle(record);
  }

  /**
   * @throws ContractViolationError once the last strong reference is gone
   */
  clone(): SharedHandle<T> {
    const handle = SharedHandle.attach(this.record);
    if (handle === null) {
      throw new ContractViolationError('Cannot clone a disposed SharedHandle');
    }
    return handle;
  }

  /**
   * The shared value. Other owners see the same object; this is not exclusive access.
   *
   * @throws ContractViolationError once the last strong reference is gone
   */
  getValue(): T {
    const { value } = this.record;
    if (this.record.disposed || this.record.strongCount <= 0 || value === undefined) {
      throw new ContractViolationError('SharedHandle value accessed after disposal');
    }
    return value;
  }

  /**
   * Drop one owner and return the remaining count (0 once disposed; never negative).
   * The teardown hook runs on the transition to zero. If it throws, the record is
   * already disposed and the fault propagates.
   */
  release(): number {
    const record = this.record;
    if (record.disposed || record.strongCount <= 0) return 0;

    record.strongCount -= 1;
    if (record.strongCount > 0) return record.strongCount;

    const value = record.value;
    record.value = undefined;
    record.disposed = true;
    if (isDisposable(value)) {
      try {
        value.dispose();
      } catch (e) {
        createLogger('SharedHandle').error({ err: e }, 'Teardown hook threw while releasing the last owner');
        throw e;
      }
    }
    createLogger('SharedHandle').trace({ weakCount: record.weakCount }, 'Shared value torn down');
    return 0;
  }

  dispose(): void {
    this.release();
  }

  /**
   * Create a non-owning observer of this value.
   *
   * @throws ContractViolationError once the last strong reference is gone
   */
  downgrade(): WeakHandle<T> {
    if (this.record.disposed || this.record.strongCount <= 0) {
      throw new ContractViolationError('Cannot downgrade a disposed SharedHandle');
    }
    return new WeakHandle(this.record);
  }

  strongCount(): number {
    return this.record.strongCount;
  }

  weakCount(): number {
    return this.record.weakCount;
  }

  get isDisposed(): boolean {
    return this.record.disposed;
  }

  /** True when both handles own the same record (not merely equal values). */
  ptrEquals(other: SharedHandle<T>): boolean {
    return this.record === other.record;
  }
}
