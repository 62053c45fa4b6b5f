/**
 * @file integer/division.ts
 * @brief Quotient and remainder by width
 *
 * Widths up to 64 bits map onto a single backend division. At 128 bits the
 * word path is used when both operands fit in the low limb; every other
 * regime goes through {@link revealingDivide}, which opens both operands and
 * re-injects the result as a public value. 256-bit division delegates the
 * low 128-bit halves and clears the high half of the result; a divisor whose
 * low half is zero gives zero.
 */

import type { SecretWord, WideValue } from '../api/types';
import { MpcError, MpcErrorCode } from '../api/types';
import type { IntegerRuntime } from './runtime';
import { negate } from './arithmetic';
import { decrypt, setPublic } from './boundary';
import {
  WORD_BITS,
  assertSameType,
  constantLimbs,
  decodePlaintext,
  limbAt,
  makeWide,
  signBit,
  typeName,
} from './limbs';
import { select, toBool } from './select';

export type DivisionOp = 'div' | 'rem';

function wordOp(rt: IntegerRuntime, op: DivisionOp, a: SecretWord, b: SecretWord): SecretWord {
  return op === 'div' ? rt.backend.div(a, b) : rt.backend.rem(a, b);
}

function negateIf(rt: IntegerRuntime, sign: SecretWord, value: WideValue): WideValue {
  return select(rt, toBool(sign), negate(rt, value), value);
}

/** Sign of a signed result: quotients take sign(a) ^ sign(b), remainders sign(a) */
function resultSign(rt: IntegerRuntime, op: DivisionOp, signA: SecretWord, signB: SecretWord): SecretWord {
  return op === 'div' ? rt.backend.xor(signA, signB) : signA;
}

function bothNonNegative(a: WideValue, b: WideValue): boolean {
  const count = a.limbs.length;
  return a.spanLimbs < count && b.spanLimbs < count;
}

// ============================================================================
// Reduced-Privacy Fallback
// ============================================================================

/**
 * Divide by revealing both operands.
 *
 * The result is computed on plaintexts and injected back as a public value,
 * so both operands become known to the network. Quotients truncate toward
 * zero, remainders take the dividend's sign, and a zero divisor yields zero.
 */
export function revealingDivide(rt: IntegerRuntime, a: WideValue, b: WideValue, op: DivisionOp): WideValue {
  assertSameType(a, b);
  const type = typeName(a);
  if (!rt.config.allowRevealFallback) {
    throw new MpcError(`${op} on ${type} requires revealing its operands`, MpcErrorCode.REVEAL_NOT_PERMITTED, {
      op,
      type,
    });
  }
  rt.logger.warn({ op, type }, 'operands revealed for division');
  const x = decrypt(rt, a);
  const y = decrypt(rt, b);
  let exact = 0n;
  if (y !== 0n) {
    exact = op === 'div' ? x / y : x % y;
  }
  return setPublic(rt, decodePlaintext(BigInt.asUintN(a.width, exact), a), a);
}

// ============================================================================
// Width Regimes
// ============================================================================

function divideWord(rt: IntegerRuntime, a: WideValue, b: WideValue, op: DivisionOp): WideValue {
  const a0 = limbAt(a.limbs, 0);
  const b0 = limbAt(b.limbs, 0);
  if (!a.signed || bothNonNegative(a, b)) {
    return makeWide(a, [wordOp(rt, op, a0, b0)], 1);
  }
  const { backend } = rt;
  const signA = signBit(backend, a);
  const signB = signBit(backend, b);
  // magnitudes fit the width's unsigned reading, MIN included
  const magA = limbAt(negateIf(rt, signA, a).limbs, 0);
  const magB = limbAt(negateIf(rt, signB, b).limbs, 0);
  const magnitude = makeWide(a, [wordOp(rt, op, magA, magB)]);
  return negateIf(rt, resultSign(rt, op, signA, signB), magnitude);
}

/**
 * Whether both upper limbs are zero, from the span hints or by opening a
 * single secret bit
 */
function fitsLowLimb(rt: IntegerRuntime, a: WideValue, b: WideValue): boolean {
  if (a.spanLimbs === 1 && b.spanLimbs === 1) {
    return true;
  }
  const { backend } = rt;
  const zero = backend.setPublic(0n);
  const small = backend.and(backend.eq(limbAt(a.limbs, 1), zero), backend.eq(limbAt(b.limbs, 1), zero));
  const fits = backend.decrypt(small) !== 0n;
  rt.logger.debug({ type: typeName(a), fits }, 'division regime opened');
  return fits;
}

function divide128(rt: IntegerRuntime, a: WideValue, b: WideValue, op: DivisionOp): WideValue {
  if (!fitsLowLimb(rt, a, b)) {
    return revealingDivide(rt, a, b, op);
  }
  const low = wordOp(rt, op, limbAt(a.limbs, 0), limbAt(b.limbs, 0));
  return makeWide(a, [low, rt.backend.setPublic(0n)], 1);
}

function lowHalf(value: WideValue): WideValue {
  return makeWide({ width: 128, signed: false }, value.limbs.slice(0, 2), Math.min(value.spanLimbs, 2));
}

function extendHalf(rt: IntegerRuntime, like: WideValue, half: WideValue): WideValue {
  const zero = rt.backend.setPublic(0n);
  return makeWide(like, [...half.limbs, zero, zero], half.spanLimbs);
}

/**
 * Whether a 128-bit half is zero, by opening a single secret bit
 */
function isZeroHalf(rt: IntegerRuntime, half: WideValue): boolean {
  const { backend } = rt;
  const zero = backend.setPublic(0n);
  const isZero = backend.and(backend.eq(limbAt(half.limbs, 0), zero), backend.eq(limbAt(half.limbs, 1), zero));
  const opened = backend.decrypt(isZero) !== 0n;
  rt.logger.debug({ type: 'uint128', zero: opened }, 'divisor half opened');
  return opened;
}

/** Low-half division; a zero low divisor yields zero like the reveal fallback */
function divideHalves(rt: IntegerRuntime, like: WideValue, a: WideValue, b: WideValue, op: DivisionOp): WideValue {
  const divisor = lowHalf(b);
  if (isZeroHalf(rt, divisor)) {
    return makeWide(like, constantLimbs(rt.backend, like, 0n), 1);
  }
  return extendHalf(rt, like, divide128(rt, lowHalf(a), divisor, op));
}

function divide256(rt: IntegerRuntime, a: WideValue, b: WideValue, op: DivisionOp): WideValue {
  if (!a.signed || bothNonNegative(a, b)) {
    return divideHalves(rt, a, a, b, op);
  }
  const { backend } = rt;
  const signA = signBit(backend, a);
  const signB = signBit(backend, b);
  const magA = negateIf(rt, signA, a);
  const magB = negateIf(rt, signB, b);
  const magnitude = divideHalves(rt, a, magA, magB, op);
  return negateIf(rt, resultSign(rt, op, signA, signB), magnitude);
}

function divide(rt: IntegerRuntime, a: WideValue, b: WideValue, op: DivisionOp): WideValue {
  assertSameType(a, b);
  if (a.width <= WORD_BITS) {
    return divideWord(rt, a, b, op);
  }
  if (a.width === 128) {
    return divide128(rt, a, b, op);
  }
  return divide256(rt, a, b, op);
}

export function div(rt: IntegerRuntime, a: WideValue, b: WideValue): WideValue {
  return divide(rt, a, b, 'div');
}

export function rem(rt: IntegerRuntime, a: WideValue, b: WideValue): WideValue {
  return divide(rt, a, b, 'rem');
}
