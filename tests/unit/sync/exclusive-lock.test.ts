import { describe, it, expect, vi, afterEach } from 'vitest';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { SyncError } from '../../../src/errors/sync-error.js';
import { ExclusiveLock } from '../../../src/sync/exclusive-lock.js';
import { ContractViolationError } from '../../../src/errors/contract-violation.js';
import { resetSyncConfig } from '../../../src/config/sync-config.js';
import { expectErr, expectOk, expectSyncErr } from '../../helpers/result-helpers.js';
import { createDeferred, flushAsync } from '../../helpers/deferred.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';

/** Hold the lock from an async callback until the returned release is called. */
function holdLock<T extends NonNullable<unknown>>(lock: ExclusiveLock<T>) {
  const gate = createDeferred();
  const holder = lock.withLockAsync(async () => {
    await gate.promise;
    return ok('held');
  });
  return { holder, release: () => gate.resolve() };
}

describe('ExclusiveLock', () => {
  describe('construction', () => {
    it('rejects null', () => {
      expect(() => new ExclusiveLock(null as unknown as number)).toThrow(ContractViolationError);
      expect(() => ExclusiveLock.new(undefined as unknown as number)).toThrow(
        'ExclusiveLock value must not be null or undefined'
      );
    });

    it('rejects a negative default timeout', () => {
      expect(() => new ExclusiveLock(1, { acquireTimeoutMs: -5 })).toThrow(ContractViolationError);
    });
  });

  describe('uncontended access', () => {
    it('reads the value through every getter', async () => {
      const lock = ExclusiveLock.new(42);

      expect(expectOk(lock.tryGetValue(), 'tryGetValue')).toBe(42);
      expect(expectOk(lock.getValue(), 'getValue')).toBe(42);
      expect(expectOk(await lock.tryGetValueAsync(), 'tryGetValueAsync')).toBe(42);
      expect(expectOk(await lock.getValueAsync(), 'getValueAsync')).toBe(42);
      expect(lock.isLocked).toBe(false);
    });

    it('updates the value', async () => {
      const lock = ExclusiveLock.new(1);

      expectOk(lock.updateValue((v) => v + 1), 'updateValue');
      expectOk(await lock.updateValueAsync((v) => v * 10), 'updateValueAsync');

      expect(expectOk(lock.getValue(), 'read back')).toBe(20);
    });

    it('passes the callback result through untouched', async () => {
      const lock = ExclusiveLock.new(21);

      const doubled = expectOk(lock.withLock((v) => ok(v * 2)), 'withLock');
      expect(expectOk(doubled, 'inner ok')).toBe(42);

      const refused = expectOk(lock.withLock(() => err('nope')), 'withLock inner err');
      expect(expectErr(refused, 'inner err')).toBe('nope');

      const bumped = expectOk(await lock.withLockAsync(async (v) => ok(v + 1)), 'withLockAsync');
      expect(expectOk(bumped, 'inner async ok')).toBe(22);
    });
  });

  describe('contention', () => {
    it('tryGetValue reports Locked while a callback is in flight', async () => {
      const lock = ExclusiveLock.new(7);
      const { holder, release } = holdLock(lock);

      expect(lock.isLocked).toBe(true);
      expect(expectSyncErr(lock.tryGetValue(), 'Locked', 'tryGetValue').message).toBe('Lock is currently held');
      expectSyncErr(await lock.tryGetValueAsync(), 'Locked', 'tryGetValueAsync');
      expect(expectSyncErr(lock.getValue(), 'Locked', 'getValue').message).toBe('getValue would block: lock is held');
      expectSyncErr(lock.updateValue((v) => v + 1), 'Locked', 'updateValue');

      release();
      expect(expectOk(expectOk(await holder, 'holder'), 'holder inner')).toBe('held');
      expect(lock.isLocked).toBe(false);
      expect(expectOk(lock.tryGetValue(), 'after release')).toBe(7);
    });

    it('async callers wait their turn and see earlier updates', async () => {
      const lock = ExclusiveLock.new(0);
      const { holder, release } = holdLock(lock);

      const update = lock.updateValueAsync((v) => v + 5);
      const read = lock.getValueAsync();
      await flushAsync();
      expect(lock.getValue().isErr()).toBe(true);

      release();
      expectOk(await holder, 'holder');
      expectOk(await update, 'queued update');
      expect(expectOk(await read, 'queued read')).toBe(5);
    });

    it('serializes read-modify-write across awaits', async () => {
      const lock = ExclusiveLock.new({ count: 0 });

      const task = async (): Promise<void> => {
        for (let i = 0; i < 100; i++) {
          const result = await lock.withLockAsync(async (state) => {
            const seen = state.count;
            await Promise.resolve();
            state.count = seen + 1;
            return ok(undefined);
          });
          expectOk(result, 'increment');
        }
      };
      await Promise.all(Array.from({ length: 10 }, task));

      expect(expectOk(lock.getValue(), 'final').count).toBe(1000);
    });

    it('ten tasks of a hundred updateValueAsync calls reach 1000', async () => {
      const lock = ExclusiveLock.new(0);

      await Promise.all(
        Array.from({ length: 10 }, async () => {
          for (let i = 0; i < 100; i++) expectOk(await lock.updateValueAsync((v) => v + 1), 'increment');
        })
      );

      expect(expectOk(lock.getValue(), 'final')).toBe(1000);
    });
  });

  describe('cancellation and timeouts', () => {
    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it('a cancelled waiter leaves the lock usable', async () => {
      const logger = new FakeLogger();
      const lock = new ExclusiveLock(1, { logger: logger.asLogger() });
      const { holder, release } = holdLock(lock);
      const controller = new AbortController();

      const pending = lock.getValueAsync({ signal: controller.signal });
      controller.abort();

      expect(expectSyncErr(await pending, 'Cancelled', 'cancelled wait').message).toBe(
        'Wait for the lock was cancelled'
      );
      expect(logger.hasEntry('debug', 'Wait for lock ended without acquiring')).toBe(true);

      release();
      expectOk(await holder, 'holder');
      expect(lock.isLocked).toBe(false);
      expectOk(lock.updateValue((v) => v + 1), 'update after cancel');
      expect(expectOk(lock.getValue(), 'value')).toBe(2);
    });

    it('an already-aborted signal never acquires', async () => {
      const lock = ExclusiveLock.new(1);
      const controller = new AbortController();
      controller.abort();

      expectSyncErr(await lock.getValueAsync({ signal: controller.signal }), 'Cancelled', 'getValueAsync');
      expectSyncErr(await lock.tryGetValueAsync({ signal: controller.signal }), 'Cancelled', 'tryGetValueAsync');
      expect(lock.isLocked).toBe(false);
    });

    it('reports a fault raised after cancellation as Cancelled', async () => {
      const lock = ExclusiveLock.new(1);
      const gate = createDeferred();
      const controller = new AbortController();

      const running = lock.withLockAsync(
        async () => {
          await gate.promise;
          if (controller.signal.aborted) throw new Error('stopped');
          return ok(1);
        },
        { signal: controller.signal }
      );
      await flushAsync();
      controller.abort();
      gate.resolve();

      const error = expectSyncErr(await running, 'Cancelled', 'aborted callback');
      expect(error.message).toBe('withLockAsync was cancelled');
      expect(lock.isLocked).toBe(false);
    });

    it('a per-call timeout reports Timeout', async () => {
      const lock = ExclusiveLock.new(1);
      const { holder, release } = holdLock(lock);

      const error = expectSyncErr(await lock.getValueAsync({ timeoutMs: 10 }), 'Timeout', 'timed wait');
      expect(error.message).toBe('Timed out after 10ms waiting for the lock');

      release();
      expectOk(await holder, 'holder');
    });

    it('uses the lock-wide default timeout', async () => {
      const lock = new ExclusiveLock(1, { acquireTimeoutMs: 15 });
      const { holder, release } = holdLock(lock);

      expect(expectSyncErr(await lock.updateValueAsync((v) => v), 'Timeout', 'default').message).toBe(
        'Timed out after 15ms waiting for the lock'
      );

      release();
      expectOk(await holder, 'holder');
    });

    it('throws on an invalid per-call timeout before returning a result', () => {
      const lock = ExclusiveLock.new(1);

      expect(() => lock.getValueAsync({ timeoutMs: -1 })).toThrow(ContractViolationError);
      expect(() => lock.updateValueAsync((v) => v, { timeoutMs: Infinity })).toThrow(
        'Timeout must be a non-negative finite number of milliseconds, got Infinity'
      );
      expect(() => lock.withLockAsync(async () => ok(1), { timeoutMs: -1 })).toThrow(ContractViolationError);
      expect(lock.isLocked).toBe(false);
    });

    it('a per-call timeout of 0 waits without a bound, overriding the lock default', async () => {
      const lock = new ExclusiveLock(1, { acquireTimeoutMs: 15 });
      const { holder, release } = holdLock(lock);

      let settled = false;
      const unbounded = lock.getValueAsync({ timeoutMs: 0 }).then<Result<number, SyncError>, never>((result) => {
        settled = true;
        return result;
      });
      await new Promise((resolve) => setTimeout(resolve, 40));
      expect(settled).toBe(false);

      release();
      expectOk(await holder, 'holder');
      expect(expectOk(await unbounded, 'unbounded wait')).toBe(1);
    });

    it('a lock default of 0 waits without a bound', async () => {
      vi.stubEnv('REFSYNC_ACQUIRE_TIMEOUT_MS', '10');
      resetSyncConfig();
      const lock = new ExclusiveLock(1, { acquireTimeoutMs: 0 });
      const { holder, release } = holdLock(lock);

      let settled = false;
      const unbounded = lock.getValueAsync().then<Result<number, SyncError>, never>((result) => {
        settled = true;
        return result;
      });
      await new Promise((resolve) => setTimeout(resolve, 30));
      expect(settled).toBe(false);

      release();
      expectOk(await holder, 'holder');
      expect(expectOk(await unbounded, 'unbounded default')).toBe(1);
    });

    it('falls back to REFSYNC_ACQUIRE_TIMEOUT_MS', async () => {
      vi.stubEnv('REFSYNC_ACQUIRE_TIMEOUT_MS', '20');
      resetSyncConfig();
      const lock = ExclusiveLock.new(1);
      const { holder, release } = holdLock(lock);

      expect(expectSyncErr(await lock.getValueAsync(), 'Timeout', 'env default').message).toBe(
        'Timed out after 20ms waiting for the lock'
      );

      release();
      expectOk(await holder, 'holder');
    });
  });

  describe('recursion', () => {
    it('reports RecursionError for a synchronous re-entry', () => {
      const lock = ExclusiveLock.new(1);

      const inner = expectOk(
        lock.withLock(() => ok(lock.getValue())),
        'outer withLock'
      );
      const nested = expectOk(inner, 'inner ok');
      expect(expectSyncErr(nested, 'RecursionError', 'nested getValue').message).toBe(
        'getValue called while this lock is already held'
      );
    });

    it('reports RecursionError across an await', async () => {
      const lock = ExclusiveLock.new(1);

      const outer = await lock.withLockAsync(async () => {
        await Promise.resolve();
        return ok(await lock.getValueAsync());
      });

      const nested = expectOk(expectOk(outer, 'outer'), 'inner ok');
      expect(expectSyncErr(nested, 'RecursionError', 'nested getValueAsync').message).toBe(
        'getValueAsync called while this lock is already held'
      );
      expect(lock.isLocked).toBe(false);
    });

    it('tryGetValue from inside the scope reports Locked', () => {
      const lock = ExclusiveLock.new(1);
      const inner = expectOk(lock.withLock(() => ok(lock.tryGetValue())), 'outer');
      expectSyncErr(expectOk(inner, 'inner'), 'Locked', 'nested tryGetValue');
    });
  });

  describe('faults', () => {
    it('converts a throwing callback into Failed and releases the lock', () => {
      const logger = new FakeLogger();
      const lock = new ExclusiveLock(1, { logger: logger.asLogger() });
      const boom = new Error('boom');

      const error = expectSyncErr(
        lock.withLock(() => {
          throw boom;
        }),
        'Failed',
        'throwing withLock'
      );

      expect(error.message).toBe('withLock threw: boom');
      expect(error.cause).toBe(boom);
      expect(logger.hasEntry('warn', 'Callback failed under lock')).toBe(true);
      expect(lock.isLocked).toBe(false);
    });

    it('leaves the value unchanged when the updater throws', async () => {
      const lock = ExclusiveLock.new(3);

      expectSyncErr(
        await lock.updateValueAsync(() => {
          throw new Error('bad update');
        }),
        'Failed',
        'throwing updater'
      );

      expect(expectOk(lock.getValue(), 'after fault')).toBe(3);
    });

    it('converts a rejected async callback into Failed', async () => {
      const lock = ExclusiveLock.new(3);

      const error = expectSyncErr(
        await lock.withLockAsync(async () => {
          throw new Error('async boom');
        }),
        'Failed',
        'rejected callback'
      );

      expect(error.message).toBe('withLockAsync threw: async boom');
      expect(lock.isLocked).toBe(false);
    });
  });

  describe('dispose', () => {
    it('fails queued waiters and every later call with Failed', async () => {
      const logger = new FakeLogger();
      const lock = new ExclusiveLock(1, { logger: logger.asLogger() });
      const { holder, release } = holdLock(lock);
      const waiter = lock.getValueAsync();

      lock.dispose();
      lock.dispose();

      expect(expectSyncErr(await waiter, 'Failed', 'queued waiter').message).toBe('ExclusiveLock has been disposed');
      expect(logger.getEntries('debug').filter((e) => e.msg === 'ExclusiveLock disposed')).toEqual([
        { level: 'debug', obj: { failedWaiters: 1 }, msg: 'ExclusiveLock disposed' },
      ]);

      release();
      expect(expectSyncErr(await holder, 'Failed', 'in-flight holder').message).toBe('ExclusiveLock has been disposed');
      expect(logger.hasEntry('debug', 'Lock disposed while the operation held it')).toBe(true);

      expect(lock.isDisposed).toBe(true);
      expect(lock.isLocked).toBe(false);
      expectSyncErr(lock.tryGetValue(), 'Failed', 'tryGetValue');
      expectSyncErr(lock.getValue(), 'Failed', 'getValue');
      expectSyncErr(lock.updateValue((v) => v), 'Failed', 'updateValue');
      expectSyncErr(lock.withLock(() => ok(1)), 'Failed', 'withLock');
      expectSyncErr(await lock.getValueAsync(), 'Failed', 'getValueAsync');
    });

    it('a synchronous callback that disposes the lock reports Failed', () => {
      const lock = ExclusiveLock.new(1);

      const result = lock.withLock(() => {
        lock.dispose();
        return ok('done');
      });

      expectSyncErr(result, 'Failed', 'withLock across dispose');
      expect(lock.isLocked).toBe(false);
    });

    it('an update in flight at dispose reports Failed', async () => {
      const lock = ExclusiveLock.new(1);
      const gate = createDeferred();

      const update = lock.withLockAsync(async () => {
        await gate.promise;
        return ok(undefined);
      });
      await flushAsync();
      lock.dispose();
      gate.resolve();

      expectSyncErr(await update, 'Failed', 'update across dispose');
    });
  });
});
