import { none, some, type Option } from '../runtime/option.js';
import { SharedHandle, type SharedRecord } from './shared-handle.js';

/**
 * Non-owning observer of a {@link SharedHandle}'s value.
 *
 * Holds the shared record through a `WeakRef`, so it never keeps the value alive
 * and does not count as an owner. Created by `SharedHandle.downgrade()`.
 */
export class WeakHandle<T extends NonNullable<unknown>> {
  private readonly ref: WeakRef<SharedRecord<T>>;
  private dropped = false;

  /** @internal Use `SharedHandle.downgrade()`. Counts itself on the record. */
  constructor(record: SharedRecord<T>) {
    this.ref = new WeakRef(record);
    record.weakCount += 1;
  }

  /**
   * Try to become an owner again. The new handle counts as a strong reference
   * and must be released like any other.
   */
  upgrade(): Option<SharedHandle<T>> {
    const record = this.dropped ? undefined : this.ref.deref();
    if (record === undefined) return none();

    const handle = SharedHandle.attach(record);
    return handle === null ? none() : some(handle);
  }

  /**
   * Snapshot only; another owner may release before you act on it. Use `upgrade()`.
   */
  get isAlive(): boolean {
    const record = this.dropped ? undefined : this.ref.deref();
    return record !== undefined && !record.disposed && record.strongCount > 0;
  }

  weakCount(): number {
    return this.ref.deref()?.weakCount ?? 0;
  }

  /** Stop observing. Decrements the weak count once; later calls do nothing. */
  drop(): void {
    if (this.dropped) return;
    this.dropped = true;
    const record = this.ref.deref();
    if (record !== undefined && record.weakCount > 0) record.weakCount -= 1;
  }
}
