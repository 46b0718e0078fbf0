import { err, ok } from 'neverthrow';
import { ContractViolationError } from '../errors/contract-violation.js';
import { WaitQueue, type WaitOptions, type WaitOutcome } from './wait-queue.js';

/**
 * Reader/writer primitive: many readers XOR one writer.
 *
 * Queued writers block newly arriving readers, so a steady stream of readers
 * cannot starve a writer. When a writer leaves and no other writer is queued,
 * every queued reader is admitted at once.
 */
export class ReaderWriterGate {
  private activeReaders = 0;
  private writerActive = false;
  private readonly waitingReaders = new WaitQueue();
  private readonly waitingWriters = new WaitQueue();
  private disposed = false;

  get readers(): number {
    return this.activeReaders;
  }

  get isWriteLocked(): boolean {
    return this.writerActive;
  }

  get queuedReaders(): number {
    return this.waitingReaders.size;
  }

  get queuedWriters(): number {
    return this.waitingWriters.size;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  tryEnterRead(): boolean {
    if (this.disposed || this.writerActive || this.waitingWriters.size > 0) return false;
    this.activeReaders += 1;
    return true;
  }

  tryEnterWrite(): boolean {
    if (this.disposed || this.writerActive || this.activeReaders > 0) return false;
    this.writerActive = true;
    return true;
  }

  async enterRead(options: WaitOptions = {}): Promise<WaitOutcome> {
    if (this.disposed) return err({ kind: 'disposed' });
    if (options.signal?.aborted) return err({ kind: 'cancelled', reason: options.signal.reason });
    if (this.tryEnterRead()) return ok(undefined);

    const outcome = await this.waitingReaders.enqueue(options);
    if (outcome.isOk() && options.signal?.aborted) {
      this.exitRead();
      return err({ kind: 'cancelled', reason: options.signal.reason });
    }
    return outcome;
  }

  async enterWrite(options: WaitOptions = {}): Promise<WaitOutcome> {
    if (this.disposed) return err({ kind: 'disposed' });
    if (options.signal?.aborted) return err({ kind: 'cancelled', reason: options.signal.reason });
    if (this.tryEnterWrite()) return ok(undefined);

    const outcome = await this.waitingWriters.enqueue(options);
    if (outcome.isErr()) {
      // Readers may have queued behind this writer; let them in if the gate is idle.
      this.admitReadersIfIdle();
      return outcome;
    }
    if (options.signal?.aborted) {
      this.exitWrite();
      return err({ kind: 'cancelled', reason: options.signal.reason });
    }
    return outcome;
  }

  exitRead(): void {
    if (this.disposed) return;
    if (this.activeReaders <= 0) {
      throw new ContractViolationError('Read lock released without acquisition');
    }
    this.activeReaders -= 1;
    if (this.activeReaders === 0) this.promoteWriter();
  }

  exitWrite(): void {
    if (this.disposed) return;
    if (!this.writerActive) {
      throw new ContractViolationError('Write lock released without acquisition');
    }
    this.writerActive = false;
    if (!this.promoteWriter()) this.admitReadersIfIdle();
  }

  /** Idempotent. Every queued reader and writer resolves with `disposed`. */
  dispose(): number {
    if (this.disposed) return 0;
    this.disposed = true;
    return this.waitingWriters.failAll({ kind: 'disposed' }) + this.waitingReaders.failAll({ kind: 'disposed' });
  }

  private promoteWriter(): boolean {
    if (this.disposed || this.writerActive || this.activeReaders > 0 || this.waitingWriters.size === 0) {
      return false;
    }
    this.writerActive = true;
    this.waitingWriters.wakeOne();
    return true;
  }

  private admitReadersIfIdle(): void {
    if (this.disposed || this.writerActive || this.waitingWriters.size > 0) return;
    this.activeReaders += this.waitingReaders.size;
    this.waitingReaders.wakeAll();
  }
}
