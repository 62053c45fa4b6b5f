/**
 * @file integer/comparator.ts
 * @brief Equality and ordering of wide values
 *
 * Unsigned ordering walks the limbs from the most significant one down,
 * carrying an "all higher limbs equal" flag; the outcome equals stopping at
 * the first unequal limb. Signed ordering resolves differing sign bits first
 * and otherwise reuses the unsigned walk, since two's-complement patterns of
 * equal sign order like their unsigned readings.
 *
 * Operands whose upper limbs are publicly known to be zero are compared on
 * their low limbs only.
 */

import type { EncryptedBool, SecretWord, WideValue } from '../api/types';
import type { WordBackend } from '../backend/word-backend';
import type { IntegerRuntime } from './runtime';
import { assertSameType, boundedSpan, limbAt, signBit } from './limbs';
import { boolNot, select, toBool } from './select';

function unsignedLessThan(
  backend: WordBackend,
  a: readonly SecretWord[],
  b: readonly SecretWord[],
  count: number
): SecretWord {
  const top = count - 1;
  let less = backend.lt(limbAt(a, top), limbAt(b, top));
  if (count === 1) {
    return less;
  }
  let higherEqual = backend.eq(limbAt(a, top), limbAt(b, top));
  for (let i = top - 1; i >= 0; i--) {
    const ai = limbAt(a, i);
    const bi = limbAt(b, i);
    less = backend.or(less, backend.and(higherEqual, backend.lt(ai, bi)));
    if (i > 0) {
      higherEqual = backend.and(higherEqual, backend.eq(ai, bi));
    }
  }
  return less;
}

function lessThan(rt: IntegerRuntime, a: WideValue, b: WideValue): SecretWord {
  assertSameType(a, b);
  const { backend } = rt;
  const count = a.limbs.length;
  const span = boundedSpan(a, b);
  // a reduced span means a zero top limb, so both operands are non-negative
  if (!a.signed || span < count) {
    return unsignedLessThan(backend, a.limbs, b.limbs, span);
  }
  const signA = signBit(backend, a);
  const signB = signBit(backend, b);
  const signsDiffer = backend.xor(signA, signB);
  const magnitudeLess = unsignedLessThan(backend, a.limbs, b.limbs, count);
  return backend.mux(signsDiffer, signA, magnitudeLess);
}

export function eq(rt: IntegerRuntime, a: WideValue, b: WideValue): EncryptedBool {
  assertSameType(a, b);
  const { backend } = rt;
  const span = boundedSpan(a, b);
  let equal = backend.eq(limbAt(a.limbs, 0), limbAt(b.limbs, 0));
  for (let i = 1; i < span; i++) {
    equal = backend.and(equal, backend.eq(limbAt(a.limbs, i), limbAt(b.limbs, i)));
  }
  return toBool(equal);
}

export function ne(rt: IntegerRuntime, a: WideValue, b: WideValue): EncryptedBool {
  assertSameType(a, b);
  const { backend } = rt;
  const span = boundedSpan(a, b);
  let differ = backend.ne(limbAt(a.limbs, 0), limbAt(b.limbs, 0));
  for (let i = 1; i < span; i++) {
    differ = backend.or(differ, backend.ne(limbAt(a.limbs, i), limbAt(b.limbs, i)));
  }
  return toBool(differ);
}

export function lt(rt: IntegerRuntime, a: WideValue, b: WideValue): EncryptedBool {
  return toBool(lessThan(rt, a, b));
}

export function gt(rt: IntegerRuntime, a: WideValue, b: WideValue): EncryptedBool {
  return toBool(lessThan(rt, b, a));
}

export function le(rt: IntegerRuntime, a: WideValue, b: WideValue): EncryptedBool {
  return boolNot(rt, gt(rt, a, b));
}

export function ge(rt: IntegerRuntime, a: WideValue, b: WideValue): EncryptedBool {
  return boolNot(rt, lt(rt, a, b));
}

export function min(rt: IntegerRuntime, a: WideValue, b: WideValue): WideValue {
  return select(rt, le(rt, a, b), a, b);
}

export function max(rt: IntegerRuntime, a: WideValue, b: WideValue): WideValue {
  return select(rt, ge(rt, a, b), a, b);
}
