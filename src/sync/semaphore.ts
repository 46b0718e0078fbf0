import { err, ok } from 'neverthrow';
import { ContractViolationError } from '../errors/contract-violation.js';
import { WaitQueue, type WaitOptions, type WaitOutcome } from './wait-queue.js';

/**
 * Counting semaphore for the event loop (binary when `capacity` is 1).
 *
 * - `tryAcquire()` never suspends
 * - `acquire()` suspends in FIFO order until granted, aborted, timed out or disposed
 * - a release hands the permit straight to the oldest waiter, so `tryAcquire()`
 *   cannot barge ahead of the queue
 */
export class AsyncSemaphore {
  private permits: number;
  private readonly queue = new WaitQueue();
  private disposed = false;

  constructor(private readonly capacity: number = 1) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ContractViolationError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.permits = capacity;
  }

  get available(): number {
    return this.permits;
  }

  get waiting(): number {
    return this.queue.size;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  tryAcquire(): boolean {
    if (this.disposed || this.permits === 0 || this.queue.size > 0) return false;
    this.permits -= 1;
    return true;
  }

  async acquire(options: WaitOptions = {}): Promise<WaitOutcome> {
    if (this.disposed) return err({ kind: 'disposed' });
    if (options.signal?.aborted) return err({ kind: 'cancelled', reason: options.signal.reason });
    if (this.tryAcquire()) return ok(undefined);

    const outcome = await this.queue.enqueue(options);
    if (outcome.isOk() && options.signal?.aborted) {
      // Granted in the same turn the signal fired: hand the permit back.
      this.release();
      return err({ kind: 'cancelled', reason: options.signal.reason });
    }
    return outcome;
  }

  /**
   * Return one permit. No-op once disposed.
   *
   * @throws ContractViolationError when released more often than acquired
   */
  release(): void {
    if (this.disposed) return;
    if (this.queue.wakeOne()) return;
    if (this.permits >= this.capacity) {
      throw new ContractViolationError('Semaphore released more times than it was acquired');
    }
    this.permits += 1;
  }

  /** Idempotent. Pending waiters resolve with `disposed`; returns how many. */
  dispose(): number {
    if (this.disposed) return 0;
    this.disposed = true;
    return this.queue.failAll({ kind: 'disposed' });
  }
}
