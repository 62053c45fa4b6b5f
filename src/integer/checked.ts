/**
 * @file integer/checked.ts
 * @brief Overflow-reporting and overflow-aborting arithmetic
 *
 * Each operation computes the wrapped result together with a secret
 * overflow flag. The `WithOverflowBit` variants hand both back; the plain
 * checked variants reveal the flag and abort when it is set.
 */

import type { OverflowResult, SecretWord, WideValue } from '../api/types';
import { MpcError, MpcErrorCode } from '../api/types';
import type { WordBackend } from '../backend/word-backend';
import type { IntegerRuntime } from './runtime';
import { addWithCarry, extensionLimb, multiplyLimbs, negate, subWithBorrow } from './arithmetic';
import type { Factor } from './arithmetic';
import { setPublic } from './boundary';
import {
  WORD_BITS,
  assertSameType,
  canonicalize,
  limbAt,
  makeWide,
  signBit,
  typeName,
} from './limbs';
import { toBool } from './select';

function not01(backend: WordBackend, word: SecretWord): SecretWord {
  return backend.xor(word, backend.setPublic(1n));
}

function anyNonZero(backend: WordBackend, limbs: readonly SecretWord[], reference: SecretWord): SecretWord {
  let differs = backend.ne(limbAt(limbs, 0), reference);
  for (let i = 1; i < limbs.length; i++) {
    differs = backend.or(differs, backend.ne(limbAt(limbs, i), reference));
  }
  return differs;
}

// ============================================================================
// Overflow Bit Variants
// ============================================================================

export function checkedAddWithOverflowBit(rt: IntegerRuntime, a: WideValue, b: WideValue): OverflowResult {
  assertSameType(a, b);
  const { backend } = rt;
  const chain = addWithCarry(backend, a, a.limbs, b.limbs);
  const result = makeWide(a, chain.limbs);
  if (!a.signed) {
    return { result, overflow: toBool(chain.out) };
  }
  // operands agree in sign and the result does not
  const signA = signBit(backend, a);
  const signB = signBit(backend, b);
  const signR = signBit(backend, result);
  const sameSign = not01(backend, backend.xor(signA, signB));
  const flipped = backend.xor(signR, signA);
  return { result, overflow: toBool(backend.and(sameSign, flipped)) };
}

export function checkedSubWithOverflowBit(rt: IntegerRuntime, a: WideValue, b: WideValue): OverflowResult {
  assertSameType(a, b);
  const { backend } = rt;
  if (!a.signed) {
    const chain = subWithBorrow(backend, a, a.limbs, b.limbs);
    return { result: makeWide(a, chain.limbs), overflow: toBool(chain.out) };
  }
  const negated = negate(rt, b);
  const result = makeWide(a, addWithCarry(backend, a, a.limbs, negated.limbs).limbs);
  // operands differ in sign and the result took the subtrahend's sign
  const signA = signBit(backend, a);
  const signB = signBit(backend, b);
  const signR = signBit(backend, result);
  const signsDiffer = backend.xor(signA, signB);
  const flipped = backend.xor(signR, signA);
  return { result, overflow: toBool(backend.and(signsDiffer, flipped)) };
}

function narrowMulWithOverflowBit(rt: IntegerRuntime, a: WideValue, b: WideValue): OverflowResult {
  const { backend } = rt;
  const w = BigInt(a.width);
  const a0 = limbAt(a.limbs, 0);
  const b0 = limbAt(b.limbs, 0);
  if (!a.signed) {
    const product = backend.mul(a0, b0);
    const high = backend.shr(product, a.width);
    return {
      result: makeWide(a, canonicalize(backend, a, [product])),
      overflow: toBool(backend.ne(high, backend.setPublic(0n))),
    };
  }
  // sign-extend to 64 bits: (x ^ 2^(w-1)) - 2^(w-1)
  const bias = 1n << (w - 1n);
  const extend = (x: SecretWord): SecretWord =>
    backend.sub(backend.xor(x, backend.setPublic(bias)), backend.setPublic(bias));
  const product = backend.mul(extend(a0), extend(b0));
  // in range iff product + 2^(w-1) lands in [0, 2^w)
  const shifted = backend.add(product, backend.setPublic(bias));
  const overflow = backend.ge(shifted, backend.setPublic(1n << w));
  return { result: makeWide(a, canonicalize(backend, a, [product])), overflow: toBool(overflow) };
}

export function checkedMulWithOverflowBit(rt: IntegerRuntime, a: WideValue, b: WideValue): OverflowResult {
  assertSameType(a, b);
  if (a.width < WORD_BITS) {
    return narrowMulWithOverflowBit(rt, a, b);
  }
  const { backend } = rt;
  const count = a.limbs.length;
  const widen = (value: WideValue): Factor => {
    const ext = extensionLimb(backend, value);
    return {
      kind: 'secret',
      limbs: [...value.limbs, ...Array.from({ length: count }, () => ext)],
      span: value.signed ? 2 * count : value.spanLimbs,
    };
  };
  const full = multiplyLimbs(backend, widen(a), widen(b), 2 * count);
  const result = makeWide(a, full.slice(0, count));
  const high = full.slice(count);
  // the high half must repeat the result's sign (zero when unsigned)
  const expectedHigh = extensionLimb(backend, result);
  return { result, overflow: toBool(anyNonZero(backend, high, expectedHigh)) };
}

// ============================================================================
// Aborting Variants
// ============================================================================

function abortOnOverflow(rt: IntegerRuntime, op: string, outcome: OverflowResult): WideValue {
  if (rt.backend.decrypt(outcome.overflow.word) !== 0n) {
    rt.logger.debug({ op, type: typeName(outcome.result) }, 'arithmetic overflow');
    throw new MpcError(`${op} overflowed ${typeName(outcome.result)}`, MpcErrorCode.ARITHMETIC_OVERFLOW, { op });
  }
  return outcome.result;
}

export function checkedAdd(rt: IntegerRuntime, a: WideValue, b: WideValue): WideValue {
  return abortOnOverflow(rt, 'checkedAdd', checkedAddWithOverflowBit(rt, a, b));
}

export function checkedSub(rt: IntegerRuntime, a: WideValue, b: WideValue): WideValue {
  return abortOnOverflow(rt, 'checkedSub', checkedSubWithOverflowBit(rt, a, b));
}

export function checkedMul(rt: IntegerRuntime, a: WideValue, b: WideValue): WideValue {
  return abortOnOverflow(rt, 'checkedMul', checkedMulWithOverflowBit(rt, a, b));
}

/** Left operand given as a public plaintext */
export function checkedAddLHS(rt: IntegerRuntime, a: bigint, b: WideValue): WideValue {
  return checkedAdd(rt, setPublic(rt, a, b), b);
}

/** Right operand given as a public plaintext */
export function checkedAddRHS(rt: IntegerRuntime, a: WideValue, b: bigint): WideValue {
  return checkedAdd(rt, a, setPublic(rt, b, a));
}

export function checkedSubLHS(rt: IntegerRuntime, a: bigint, b: WideValue): WideValue {
  return checkedSub(rt, setPublic(rt, a, b), b);
}

export function checkedSubRHS(rt: IntegerRuntime, a: WideValue, b: bigint): WideValue {
  return checkedSub(rt, a, setPublic(rt, b, a));
}

export function checkedMulLHS(rt: IntegerRuntime, a: bigint, b: WideValue): WideValue {
  return checkedMul(rt, setPublic(rt, a, b), b);
}

export function checkedMulRHS(rt: IntegerRuntime, a: WideValue, b: bigint): WideValue {
  return checkedMul(rt, a, setPublic(rt, b, a));
}
