/**
 * @file integer/arithmetic.ts
 * @brief Wide addition, subtraction, negation and multiplication
 *
 * Addition and subtraction ripple a carry/borrow word from limb 0 upward.
 * The backend only returns the low 64 bits of a product, so multiplication
 * works on 32-bit half limbs whose products are exact, and accumulates each
 * output limb with a counted carry that seeds the next limb.
 */

import type { IntegerType, OperandPrivacy, SecretWord, WideValue } from '../api/types';
import type { WordBackend } from '../backend/word-backend';
import type { IntegerRuntime } from './runtime';
import {
  HALF_BITS,
  HALF_MASK,
  WORD_BITS,
  WORD_MASK,
  assertSameType,
  canonicalize,
  constantLimbs,
  limbAt,
  makeWide,
  topLimbMask,
} from './limbs';

// ============================================================================
// Carry Chains
// ============================================================================

export interface LimbChain {
  limbs: SecretWord[];
  /** Carry or borrow out of the top bit of the width, 0 or 1 */
  out: SecretWord;
}

export function addWithCarry(
  backend: WordBackend,
  type: IntegerType,
  a: readonly SecretWord[],
  b: readonly SecretWord[]
): LimbChain {
  const a0 = limbAt(a, 0);
  const sum0 = backend.add(a0, limbAt(b, 0));
  if (type.width < WORD_BITS) {
    return { limbs: canonicalize(backend, type, [sum0]), out: backend.shr(sum0, type.width) };
  }
  const limbs = [sum0];
  let carry = backend.lt(sum0, a0);
  for (let i = 1; i < a.length; i++) {
    const ai = limbAt(a, i);
    const partial = backend.add(ai, limbAt(b, i));
    const carryPartial = backend.lt(partial, ai);
    const sum = backend.add(partial, carry);
    const carrySum = backend.lt(sum, partial);
    limbs.push(sum);
    carry = backend.or(carryPartial, carrySum);
  }
  return { limbs, out: carry };
}

export function subWithBorrow(
  backend: WordBackend,
  type: IntegerType,
  a: readonly SecretWord[],
  b: readonly SecretWord[]
): LimbChain {
  const a0 = limbAt(a, 0);
  const b0 = limbAt(b, 0);
  const diff0 = backend.sub(a0, b0);
  let borrow = backend.lt(a0, b0);
  if (type.width < WORD_BITS) {
    return { limbs: canonicalize(backend, type, [diff0]), out: borrow };
  }
  const limbs = [diff0];
  for (let i = 1; i < a.length; i++) {
    const ai = limbAt(a, i);
    const bi = limbAt(b, i);
    const partial = backend.sub(ai, bi);
    const borrowPartial = backend.lt(ai, bi);
    const diff = backend.sub(partial, borrow);
    const borrowDiff = backend.lt(partial, borrow);
    limbs.push(diff);
    borrow = backend.or(borrowPartial, borrowDiff);
  }
  return { limbs, out: borrow };
}

// ============================================================================
// Add / Sub / Negate
// ============================================================================

export function not(rt: IntegerRuntime, value: WideValue): WideValue {
  const { backend } = rt;
  const last = value.limbs.length - 1;
  const limbs = value.limbs.map((limb, i) =>
    backend.xor(limb, backend.setPublic(i === last ? topLimbMask(value.width) : WORD_MASK))
  );
  return makeWide(value, limbs);
}

/** Two's-complement negation: bitwise not plus one */
export function negate(rt: IntegerRuntime, value: WideValue): WideValue {
  const inverted = not(rt, value);
  const one = constantLimbs(rt.backend, value, 1n);
  return makeWide(value, addWithCarry(rt.backend, value, inverted.limbs, one).limbs);
}

export function add(rt: IntegerRuntime, a: WideValue, b: WideValue): WideValue {
  assertSameType(a, b);
  return makeWide(a, addWithCarry(rt.backend, a, a.limbs, b.limbs).limbs);
}

export function sub(rt: IntegerRuntime, a: WideValue, b: WideValue): WideValue {
  assertSameType(a, b);
  if (a.signed) {
    return add(rt, a, negate(rt, b));
  }
  return makeWide(a, subWithBorrow(rt.backend, a, a.limbs, b.limbs).limbs);
}

// ============================================================================
// Multiplication
// ============================================================================

/**
 * One multiplication operand: secret limbs (only the low `span` of which
 * may be non-zero) or limbs revealed as public constants
 */
export type Factor =
  | { kind: 'secret'; limbs: readonly SecretWord[]; span: number }
  | { kind: 'public'; limbs: readonly bigint[] };

/** Half limbs, least significant first; null marks a known zero half */
function halves(backend: WordBackend, factor: Factor): (SecretWord | null)[] {
  const out: (SecretWord | null)[] = [];
  if (factor.kind === 'public') {
    for (const limb of factor.limbs) {
      for (const half of [limb & HALF_MASK, limb >> BigInt(HALF_BITS)]) {
        out.push(half === 0n ? null : backend.setPublic(half));
      }
    }
    return out;
  }
  const mask = backend.setPublic(HALF_MASK);
  factor.limbs.forEach((limb, i) => {
    if (i < factor.span) {
      out.push(backend.and(limb, mask), backend.shr(limb, HALF_BITS));
    } else {
      out.push(null, null);
    }
  });
  return out;
}

function pushTerm(terms: SecretWord[][], index: number, term: SecretWord): void {
  const bucket = terms[index];
  if (bucket !== undefined) {
    bucket.push(term);
  }
}

/**
 * Schoolbook product of two limb vectors, truncated to `outLimbs` limbs
 */
export function multiplyLimbs(backend: WordBackend, x: Factor, y: Factor, outLimbs: number): SecretWord[] {
  const xs = halves(backend, x);
  const ys = halves(backend, y);
  const terms: SecretWord[][] = Array.from({ length: outLimbs }, () => []);
  const lastHalf = 2 * outLimbs - 1;

  xs.forEach((hx, i) => {
    ys.forEach((hy, j) => {
      const k = i + j;
      if (hx === null || hy === null || k > lastHalf) {
        return;
      }
      const product = backend.mul(hx, hy);
      if (k % 2 === 0) {
        pushTerm(terms, k / 2, product);
      } else {
        const limb = (k - 1) / 2;
        pushTerm(terms, limb, backend.shl(product, HALF_BITS));
        pushTerm(terms, limb + 1, backend.shr(product, HALF_BITS));
      }
    });
  });

  const out: SecretWord[] = [];
  let carryIn: SecretWord | undefined;
  for (const bucket of terms) {
    let acc = carryIn;
    let carries: SecretWord | undefined;
    for (const term of bucket) {
      if (acc === undefined) {
        acc = term;
        continue;
      }
      const next = backend.add(acc, term);
      const wrapped = backend.lt(next, term);
      carries = carries === undefined ? wrapped : backend.add(carries, wrapped);
      acc = next;
    }
    out.push(acc ?? backend.setPublic(0n));
    carryIn = carries;
  }
  return out;
}

/**
 * Reveal an operand's limbs for use as public constants
 */
function revealFactor(rt: IntegerRuntime, value: WideValue, side: 'lhs' | 'rhs'): Factor {
  rt.logger.debug({ side, width: value.width }, 'operand revealed for public-constant multiplication');
  return { kind: 'public', limbs: value.limbs.map((limb) => rt.backend.decrypt(limb)) };
}

function secretFactor(value: WideValue): Factor {
  return { kind: 'secret', limbs: value.limbs, span: value.spanLimbs };
}

/**
 * Wrapping multiplication. The calling convention picks which operand stays
 * secret; it changes the backend calls issued, not the result.
 */
export function mul(
  rt: IntegerRuntime,
  a: WideValue,
  b: WideValue,
  privacy: OperandPrivacy = 'both-private'
): WideValue {
  assertSameType(a, b);
  const { backend } = rt;
  const x = privacy === 'rhs-private' ? revealFactor(rt, a, 'lhs') : secretFactor(a);
  const y = privacy === 'lhs-private' ? revealFactor(rt, b, 'rhs') : secretFactor(b);

  if (a.width < WORD_BITS) {
    const product = backend.mul(narrowOperand(backend, x), narrowOperand(backend, y));
    return makeWide(a, canonicalize(backend, a, [product]));
  }
  return makeWide(a, multiplyLimbs(backend, x, y, a.limbs.length));
}

function narrowOperand(backend: WordBackend, factor: Factor): SecretWord {
  if (factor.kind === 'secret') {
    return limbAt(factor.limbs, 0);
  }
  return backend.setPublic(factor.limbs[0] ?? 0n);
}

// ============================================================================
// Extension
// ============================================================================

/**
 * Limb that sign- or zero-extends a value of width 64 or more
 */
export function extensionLimb(backend: WordBackend, value: WideValue): SecretWord {
  if (!value.signed) {
    return backend.setPublic(0n);
  }
  const top = limbAt(value.limbs, value.limbs.length - 1);
  return backend.sub(backend.setPublic(0n), backend.shr(top, WORD_BITS - 1));
}
