/**
 * Property-based testing configuration and utilities
 *
 * This module provides configuration and arbitraries for property-based
 * testing using fast-check. All property tests should use these
 * configurations to ensure consistency across the test suite.
 */

import * as fc from 'fast-check';
import type { IntegerType, OperandPrivacy, Width } from '../api/types';
import { SUPPORTED_WIDTHS, typeRange } from '../integer/limbs';

/**
 * Standard configuration for property-based tests
 * - 100 iterations per property test
 * - Seed logging for reproducibility
 */
export const PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 100,
  verbose: true,
  seed: Date.now(), // Can be overridden for reproducibility
  endOnFailure: false,
};

/**
 * Configuration for properties whose cases issue many backend calls
 */
export const FAST_PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 25,
  verbose: false,
  seed: Date.now(),
};

/**
 * Arbitrary generator for integer types
 */
export function arbitraryIntegerType(widths: readonly Width[] = SUPPORTED_WIDTHS): fc.Arbitrary<IntegerType> {
  return fc.record({ width: fc.constantFrom(...widths), signed: fc.boolean() });
}

/**
 * Any representable plaintext of the type, extremes included
 */
export function arbitraryValue(type: IntegerType): fc.Arbitrary<bigint> {
  const { min, max } = typeRange(type);
  return fc.oneof(fc.bigInt({ min, max }), fc.constantFrom(min, max, 0n, type.signed ? -1n : 1n));
}

/**
 * Non-negative plaintexts that fit in one 64-bit limb
 */
export function arbitrarySmallValue(type: IntegerType): fc.Arbitrary<bigint> {
  const { max } = typeRange(type);
  const limit = max < 0xffffffffffffffffn ? max : 0xffffffffffffffffn;
  return fc.bigInt({ min: 0n, max: limit });
}

/**
 * Plaintexts needing more than one limb (multi-limb types only)
 */
export function arbitraryLargeValue(type: IntegerType): fc.Arbitrary<bigint> {
  const { min, max } = typeRange(type);
  const positive = fc.bigInt({ min: 1n << 64n, max });
  if (!type.signed) {
    return positive;
  }
  return fc.oneof(positive, fc.bigInt({ min, max: -(1n << 64n) }));
}

/**
 * Value of a given magnitude regime
 */
export function arbitraryRegimeValue(type: IntegerType, regime: 'small' | 'large'): fc.Arbitrary<bigint> {
  return regime === 'small' ? arbitrarySmallValue(type) : arbitraryLargeValue(type);
}

/**
 * Arbitrary generator for multiplication calling conventions
 */
export function arbitraryOperandPrivacy(): fc.Arbitrary<OperandPrivacy> {
  return fc.constantFrom<OperandPrivacy>('both-private', 'lhs-private', 'rhs-private');
}

/**
 * Arbitrary generator for shift amounts, past the width included
 */
export function arbitraryShiftAmount(width: Width): fc.Arbitrary<number> {
  return fc.integer({ min: 0, max: width + 8 });
}

/**
 * A type together with two of its values
 */
export function arbitraryTypedPair(
  widths: readonly Width[] = SUPPORTED_WIDTHS
): fc.Arbitrary<[IntegerType, bigint, bigint]> {
  return arbitraryIntegerType(widths).chain((type) =>
    fc.tuple(fc.constant(type), arbitraryValue(type), arbitraryValue(type))
  );
}
