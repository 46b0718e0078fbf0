import { AsyncLocalStorage } from 'node:async_hooks';

export type LockMode = 'read' | 'write' | 'exclusive';

export interface ScopeFrame {
  readonly mode: LockMode;
  readonly active: boolean;
  close(): void;
}

/**
 * Tracks which logical call chain currently holds a lock.
 *
 * One instance per lock. A frame stays visible to everything started inside
 * `run()` (including continuations after `await`) until it is closed, so a
 * detached promise that outlives the scope is not mistaken for a holder.
 */
export class LockScope {
  private readonly storage = new AsyncLocalStorage<ScopeFrame>();

  heldMode(): LockMode | null {
    const frame = this.storage.getStore();
    return frame !== undefined && frame.active ? frame.mode : null;
  }

  isHeld(): boolean {
    return this.heldMode() !== null;
  }

  open(mode: LockMode): ScopeFrame {
    let active = true;
    return {
      mode,
      get active() {
        return active;
      },
      close: () => {
        active = false;
      },
    };
  }

  run<R>(frame: ScopeFrame, fn: () => R): R {
    return this.storage.run(frame, fn);
  }
}
