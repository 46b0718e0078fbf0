/**
 * Property-based tests for SharedHandle reference counting using fast-check.
 *
 * Any interleaving of clone/release keeps the strong count equal to a simple
 * model, and the teardown hook runs exactly once, on the step that reaches zero.
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';

import { SharedHandle } from '../../../src/sync/shared-handle.js';
import { ContractViolationError } from '../../../src/errors/contract-violation.js';

class Counted {
  disposeCount = 0;

  dispose(): void {
    this.disposeCount += 1;
  }
}

const arbOps = fc.array(fc.constantFrom('clone' as const, 'release' as const), { maxLength: 60 });

describe('SharedHandle reference counting properties', () => {
  it('strong count follows the model and teardown runs once', () => {
    fc.assert(
      fc.property(arbOps, (ops) => {
        const resource = new Counted();
        const root = SharedHandle.new(resource);
        let expected = 1;

        for (const op of ops) {
          if (op === 'clone') {
            if (expected === 0) {
              expect(() => root.clone()).toThrow(ContractViolationError);
            } else {
              root.clone();
              expected += 1;
            }
          } else {
            expected = Math.max(0, expected - 1);
            expect(root.release()).toBe(expected);
          }

          expect(root.strongCount()).toBe(expected);
          expect(resource.disposeCount).toBe(expected === 0 ? 1 : 0);
        }
      })
    );
  });

  it('n clones need exactly n + 1 releases', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 40 }), (n) => {
        const resource = new Counted();
        const handles = [SharedHandle.new(resource)];
        for (let i = 0; i < n; i++) handles.push(handles[handles.length - 1].clone());

        for (const handle of handles.slice(1)) handle.release();
        expect(resource.disposeCount).toBe(0);

        handles[0].release();
        expect(resource.disposeCount).toBe(1);
      })
    );
  });
});
