export { SharedHandle } from './shared-handle.js';
export { WeakHandle } from './weak-handle.js';
export { ExclusiveLock } from './exclusive-lock.js';
export { ReadWriteLock } from './read-write-lock.js';
export { ScopedReadWriteLock } from './scoped-read-write-lock.js';
export type { Synchronizer, AsyncSynchronizer, AsyncReadWriteSynchronizer } from './synchronizer.js';
export type { AcquireOptions, Cloneable, DisposableResource, LockOptions } from './resource.js';
export { isDisposable } from './resource.js';

// Building blocks
export { AsyncSemaphore } from './semaphore.js';
export { ReaderWriterGate } from './reader-writer-gate.js';
export type { WaitFailure, WaitOptions, WaitOutcome } from './wait-queue.js';
