import { describe, it, expect, beforeEach } from 'vitest';
import { INT256, UINT128 } from '../parameters';
import type { TestRuntime } from '../test-utils';
import { createTestRuntime } from '../test-utils';
import { decrypt, decryptBool, setPublic, setPublicBool } from './boundary';
import { boolAnd, boolEq, boolNe, boolNot, boolOr, boolSelect, boolXor, select } from './select';

const MIN256 = -(1n << 255n);
const MAX256 = (1n << 255n) - 1n;

describe('select', () => {
  let rt: TestRuntime;

  beforeEach(() => {
    rt = createTestRuntime();
  });

  it('should pick the first operand on true and the second on false', () => {
    const a = setPublic(rt, MIN256, INT256);
    const b = setPublic(rt, MAX256, INT256);
    expect(decrypt(rt, select(rt, setPublicBool(rt, true), a, b))).toBe(MIN256);
    expect(decrypt(rt, select(rt, setPublicBool(rt, false), a, b))).toBe(MAX256);
  });

  it('should issue the same backend calls whichever branch is taken', () => {
    const a = setPublic(rt, 1n << 100n, UINT128);
    const b = setPublic(rt, 3n, UINT128);
    const yes = setPublicBool(rt, true);
    const no = setPublicBool(rt, false);

    rt.backend.resetCounts();
    select(rt, yes, a, b);
    const taken = rt.backend.callCounts();

    rt.backend.resetCounts();
    select(rt, no, a, b);
    const notTaken = rt.backend.callCounts();

    expect(taken).toEqual({ mux: 2 });
    expect(notTaken).toEqual(taken);
  });

  it('should keep the wider span of the two operands', () => {
    const a = setPublic(rt, 1n << 100n, UINT128);
    const b = setPublic(rt, 3n, UINT128);
    expect(select(rt, setPublicBool(rt, false), a, b).spanLimbs).toBe(2);
  });

  describe('secret booleans', () => {
    const table = [
      [false, false],
      [false, true],
      [true, false],
      [true, true],
    ] as const;

    it('should follow the truth tables', () => {
      for (const [p, q] of table) {
        const x = setPublicBool(rt, p);
        const y = setPublicBool(rt, q);
        expect(decryptBool(rt, boolAnd(rt, x, y))).toBe(p && q);
        expect(decryptBool(rt, boolOr(rt, x, y))).toBe(p || q);
        expect(decryptBool(rt, boolXor(rt, x, y))).toBe(p !== q);
        expect(decryptBool(rt, boolEq(rt, x, y))).toBe(p === q);
        expect(decryptBool(rt, boolNe(rt, x, y))).toBe(p !== q);
        expect(decryptBool(rt, boolSelect(rt, x, y, boolNot(rt, y)))).toBe(p ? q : !q);
      }
    });

    it('should negate', () => {
      expect(decryptBool(rt, boolNot(rt, setPublicBool(rt, true)))).toBe(false);
      expect(decryptBool(rt, boolNot(rt, setPublicBool(rt, false)))).toBe(true);
    });
  });
});
