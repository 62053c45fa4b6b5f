/**
 * @file integer/bitwise.ts
 * @brief Limb-wise logic and public-amount shifts
 *
 * Shifts move whole limbs first, then spill the remaining bits across the
 * adjacent limb boundary. Right shifts are logical for both signednesses;
 * amounts of at least the width give zero.
 */

import type { SecretWord, WideValue } from '../api/types';
import { MpcError, MpcErrorCode } from '../api/types';
import type { WordBackend } from '../backend/word-backend';
import type { IntegerRuntime } from './runtime';
import { WORD_BITS, assertSameType, canonicalize, constantLimbs, limbAt, makeWide } from './limbs';

type WordOp = (a: SecretWord, b: SecretWord) => SecretWord;

function limbwise(a: WideValue, b: WideValue, op: WordOp, span: number): WideValue {
  assertSameType(a, b);
  return makeWide(
    a,
    a.limbs.map((limb, i) => op(limb, limbAt(b.limbs, i))),
    span
  );
}

export function and(rt: IntegerRuntime, a: WideValue, b: WideValue): WideValue {
  return limbwise(a, b, (x, y) => rt.backend.and(x, y), Math.min(a.spanLimbs, b.spanLimbs));
}

export function or(rt: IntegerRuntime, a: WideValue, b: WideValue): WideValue {
  return limbwise(a, b, (x, y) => rt.backend.or(x, y), Math.max(a.spanLimbs, b.spanLimbs));
}

export function xor(rt: IntegerRuntime, a: WideValue, b: WideValue): WideValue {
  return limbwise(a, b, (x, y) => rt.backend.xor(x, y), Math.max(a.spanLimbs, b.spanLimbs));
}

function checkAmount(amount: number): void {
  if (!Number.isInteger(amount) || amount < 0) {
    throw new MpcError(`Shift amount must be a non-negative integer, got ${amount}`, MpcErrorCode.VALUE_OUT_OF_RANGE);
  }
}

function zeroOf(backend: WordBackend, value: WideValue): WideValue {
  return makeWide(value, constantLimbs(backend, value, 0n), 1);
}

export function shl(rt: IntegerRuntime, value: WideValue, amount: number): WideValue {
  checkAmount(amount);
  const { backend } = rt;
  if (amount >= value.width) {
    return zeroOf(backend, value);
  }
  if (value.width < WORD_BITS) {
    return makeWide(value, canonicalize(backend, value, [backend.shl(limbAt(value.limbs, 0), amount)]));
  }
  const limbShift = Math.floor(amount / WORD_BITS);
  const bits = amount % WORD_BITS;
  const limbs = value.limbs.map((_, i) => {
    const src = i - limbShift;
    if (src < 0) {
      return backend.setPublic(0n);
    }
    const source = limbAt(value.limbs, src);
    if (bits === 0) {
      return source;
    }
    const shifted = backend.shl(source, bits);
    if (src === 0) {
      return shifted;
    }
    return backend.or(shifted, backend.shr(limbAt(value.limbs, src - 1), WORD_BITS - bits));
  });
  return makeWide(value, limbs);
}

export function shr(rt: IntegerRuntime, value: WideValue, amount: number): WideValue {
  checkAmount(amount);
  const { backend } = rt;
  if (amount >= value.width) {
    return zeroOf(backend, value);
  }
  if (value.width < WORD_BITS) {
    return makeWide(value, [backend.shr(limbAt(value.limbs, 0), amount)]);
  }
  const count = value.limbs.length;
  const limbShift = Math.floor(amount / WORD_BITS);
  const bits = amount % WORD_BITS;
  const limbs = value.limbs.map((_, i) => {
    const src = i + limbShift;
    if (src >= count) {
      return backend.setPublic(0n);
    }
    const source = limbAt(value.limbs, src);
    if (bits === 0) {
      return source;
    }
    const shifted = backend.shr(source, bits);
    if (src === count - 1) {
      return shifted;
    }
    return backend.or(shifted, backend.shl(limbAt(value.limbs, src + 1), WORD_BITS - bits));
  });
  return makeWide(value, limbs, Math.min(value.spanLimbs, count - limbShift));
}
