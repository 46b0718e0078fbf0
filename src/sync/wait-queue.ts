import { err, ok, type Result } from 'neverthrow';

export type WaitFailure =
  | { readonly kind: 'cancelled'; readonly reason: unknown }
  | { readonly kind: 'timeout'; readonly timeoutMs: number }
  | { readonly kind: 'disposed' };

export type WaitOutcome = Result<void, WaitFailure>;

export interface WaitOptions {
  readonly signal?: AbortSignal;
  /** `null`/`undefined` waits until granted. */
  readonly timeoutMs?: number | null;
}

interface Waiter {
  settle(outcome: WaitOutcome): void;
}

/**
 * FIFO queue of suspended acquirers.
 *
 * A waiter leaves the queue exactly once: granted, aborted, timed out or failed.
 * Abort listeners and timers are removed on every path.
 */
export class WaitQueue {
  private readonly waiters: Waiter[] = [];

  get size(): number {
    return this.waiters.length;
  }

  enqueue(options: WaitOptions = {}): Promise<WaitOutcome> {
    const { signal, timeoutMs } = options;
    if (signal?.aborted) {
      return Promise.resolve(err({ kind: 'cancelled', reason: signal.reason }));
    }

    return new Promise<WaitOutcome>((resolve) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const onAbort = (): void => {
        waiter.settle(err({ kind: 'cancelled', reason: signal?.reason }));
      };

      const waiter: Waiter = {
        settle: (outcome) => {
          if (settled) return;
          settled = true;
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          if (timer !== undefined) clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
          resolve(outcome);
        },
      };

      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
      if (timeoutMs !== undefined && timeoutMs !== null) {
        timer = setTimeout(() => waiter.settle(err({ kind: 'timeout', timeoutMs })), timeoutMs);
      }
    });
  }

  /** Grant the oldest waiter. Returns false when nobody was waiting. */
  wakeOne(): boolean {
    const next = this.waiters[0];
    if (next === undefined) return false;
    next.settle(ok(undefined));
    return true;
  }

  /** Grant every waiter; returns how many were woken. */
  wakeAll(): number {
    const woken = this.waiters.slice();
    for (const waiter of woken) waiter.settle(ok(undefined));
    return woken.length;
  }

  failAll(failure: WaitFailure): number {
    const failed = this.waiters.slice();
    for (const waiter of failed) waiter.settle(err(failure));
    return failed.length;
  }
}
