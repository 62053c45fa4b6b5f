/**
 * @file integer/select.ts
 * @brief Branchless selection and secret boolean algebra
 */

import type { EncryptedBool, SecretWord, WideValue } from '../api/types';
import type { IntegerRuntime } from './runtime';
import { assertSameType, limbAt, makeWide } from './limbs';

export function toBool(word: SecretWord): EncryptedBool {
  return { __brand: 'EncryptedBool', word };
}

/**
 * `cond ? a : b`, one backend mux per limb whichever branch is taken
 */
export function select(rt: IntegerRuntime, cond: EncryptedBool, a: WideValue, b: WideValue): WideValue {
  assertSameType(a, b);
  const limbs = a.limbs.map((limb, i) => rt.backend.mux(cond.word, limb, limbAt(b.limbs, i)));
  return makeWide(a, limbs, Math.max(a.spanLimbs, b.spanLimbs));
}

export function boolAnd(rt: IntegerRuntime, a: EncryptedBool, b: EncryptedBool): EncryptedBool {
  return toBool(rt.backend.and(a.word, b.word));
}

export function boolOr(rt: IntegerRuntime, a: EncryptedBool, b: EncryptedBool): EncryptedBool {
  return toBool(rt.backend.or(a.word, b.word));
}

export function boolXor(rt: IntegerRuntime, a: EncryptedBool, b: EncryptedBool): EncryptedBool {
  return toBool(rt.backend.xor(a.word, b.word));
}

export function boolNot(rt: IntegerRuntime, a: EncryptedBool): EncryptedBool {
  return toBool(rt.backend.xor(a.word, rt.backend.setPublic(1n)));
}

export function boolEq(rt: IntegerRuntime, a: EncryptedBool, b: EncryptedBool): EncryptedBool {
  return boolNot(rt, boolXor(rt, a, b));
}

export function boolNe(rt: IntegerRuntime, a: EncryptedBool, b: EncryptedBool): EncryptedBool {
  return boolXor(rt, a, b);
}

export function boolSelect(
  rt: IntegerRuntime,
  cond: EncryptedBool,
  a: EncryptedBool,
  b: EncryptedBool
): EncryptedBool {
  return toBool(rt.backend.mux(cond.word, a.word, b.word));
}
