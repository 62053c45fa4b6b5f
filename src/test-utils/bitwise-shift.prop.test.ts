/**
 * Property-Based Tests for Bitwise Operations and Shifts
 *
 * Property: bitwise operations act on the width-bit pattern, shifts are
 * logical, and amounts at or past the width clear the value.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { not } from '../integer/arithmetic';
import { and, or, shl, shr, xor } from '../integer/bitwise';
import { decrypt, setPublic } from '../integer/boundary';
import {
  PROPERTY_TEST_CONFIG,
  arbitraryIntegerType,
  arbitraryShiftAmount,
  arbitraryTypedPair,
  arbitraryValue,
} from './property-test-config';
import { refAnd, refNot, refOr, refShl, refShr, refXor } from './reference-arithmetic';
import { createTestRuntime } from './runtime';

describe('Property: bitwise operations', () => {
  const rt = createTestRuntime();

  it('and, or, xor and not match the reference', () => {
    fc.assert(
      fc.property(arbitraryTypedPair(), ([type, a, b]) => {
        const x = setPublic(rt, a, type);
        const y = setPublic(rt, b, type);
        expect(decrypt(rt, and(rt, x, y))).toBe(refAnd(a, b, type));
        expect(decrypt(rt, or(rt, x, y))).toBe(refOr(a, b, type));
        expect(decrypt(rt, xor(rt, x, y))).toBe(refXor(a, b, type));
        expect(decrypt(rt, not(rt, x))).toBe(refNot(a, type));
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('shl and shr match the reference', () => {
    const shiftCase = arbitraryIntegerType().chain((type) =>
      fc.tuple(fc.constant(type), arbitraryValue(type), arbitraryShiftAmount(type.width))
    );
    fc.assert(
      fc.property(shiftCase, ([type, a, amount]) => {
        const x = setPublic(rt, a, type);
        expect(decrypt(rt, shl(rt, x, amount))).toBe(refShl(a, amount, type));
        expect(decrypt(rt, shr(rt, x, amount))).toBe(refShr(a, amount, type));
      }),
      PROPERTY_TEST_CONFIG
    );
  });
});
