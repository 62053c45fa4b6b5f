/**
 * Property-Based Tests for Division
 *
 * Property: quotients truncate toward zero and remainders take the
 * dividend's sign, so that a == div(a, b) * b + rem(a, b) for every
 * non-zero divisor within the supported range.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import type { IntegerType } from '../api/types';
import { add, mul } from '../integer/arithmetic';
import { decrypt, setPublic } from '../integer/boundary';
import { div, rem } from '../integer/division';
import {
  FAST_PROPERTY_TEST_CONFIG,
  PROPERTY_TEST_CONFIG,
  arbitraryIntegerType,
  arbitraryTypedPair,
} from './property-test-config';
import { refDiv, refRem } from './reference-arithmetic';
import { createTestRuntime } from './runtime';

/** 256-bit operands whose magnitudes fit in the low 128 bits */
function arbitraryHalfRangeCase(): fc.Arbitrary<[IntegerType, bigint, bigint]> {
  return arbitraryIntegerType([256]).chain((type) => {
    const value = type.signed
      ? fc.bigInt({ min: -(1n << 127n) + 1n, max: (1n << 127n) - 1n })
      : fc.bigInt({ min: 0n, max: (1n << 128n) - 1n });
    return fc.tuple(fc.constant(type), value, value.filter((b) => b !== 0n));
  });
}

describe('Property: division', () => {
  const rt = createTestRuntime();

  it('matches truncating division up to 128 bits', () => {
    fc.assert(
      fc.property(
        arbitraryTypedPair([8, 16, 32, 64, 128]).filter(([, , b]) => b !== 0n),
        ([type, a, b]) => {
          const x = setPublic(rt, a, type);
          const y = setPublic(rt, b, type);
          expect(decrypt(rt, div(rt, x, y))).toBe(refDiv(a, b, type));
          expect(decrypt(rt, rem(rt, x, y))).toBe(refRem(a, b, type));
        }
      ),
      PROPERTY_TEST_CONFIG
    );
  });

  it('matches truncating division for 256-bit operands within 128 bits', () => {
    fc.assert(
      fc.property(arbitraryHalfRangeCase(), ([type, a, b]) => {
        const x = setPublic(rt, a, type);
        const y = setPublic(rt, b, type);
        expect(decrypt(rt, div(rt, x, y))).toBe(refDiv(a, b, type));
        expect(decrypt(rt, rem(rt, x, y))).toBe(refRem(a, b, type));
      }),
      FAST_PROPERTY_TEST_CONFIG
    );
  });

  it('recombines quotient and remainder into the dividend', () => {
    fc.assert(
      fc.property(
        arbitraryTypedPair([8, 16, 32, 64, 128]).filter(([, , b]) => b !== 0n),
        ([type, a, b]) => {
          const x = setPublic(rt, a, type);
          const y = setPublic(rt, b, type);
          const back = add(rt, mul(rt, div(rt, x, y), y), rem(rt, x, y));
          expect(decrypt(rt, back)).toBe(a);
        }
      ),
      FAST_PROPERTY_TEST_CONFIG
    );
  });
});
