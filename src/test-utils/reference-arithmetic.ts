/**
 * Plaintext reference semantics for integer operations
 *
 * Every function computes the exact result on bigints and wraps it into the
 * type, giving the expected value for the secret computation.
 */

import type { IntegerType } from '../api/types';
import { typeRange } from '../integer/limbs';

export function wrap(value: bigint, type: IntegerType): bigint {
  return type.signed ? BigInt.asIntN(type.width, value) : BigInt.asUintN(type.width, value);
}

export function inRange(value: bigint, type: IntegerType): boolean {
  const { min, max } = typeRange(type);
  return value >= min && value <= max;
}

export function refAdd(a: bigint, b: bigint, type: IntegerType): bigint {
  return wrap(a + b, type);
}

export function refSub(a: bigint, b: bigint, type: IntegerType): bigint {
  return wrap(a - b, type);
}

export function refMul(a: bigint, b: bigint, type: IntegerType): bigint {
  return wrap(a * b, type);
}

/** Truncating quotient; callers exclude zero divisors */
export function refDiv(a: bigint, b: bigint, type: IntegerType): bigint {
  return wrap(a / b, type);
}

export function refRem(a: bigint, b: bigint, type: IntegerType): bigint {
  return wrap(a % b, type);
}

export function refShl(a: bigint, amount: number, type: IntegerType): bigint {
  if (amount >= type.width) {
    return 0n;
  }
  return wrap(a << BigInt(amount), type);
}

/** Logical shift of the width-bit pattern */
export function refShr(a: bigint, amount: number, type: IntegerType): bigint {
  if (amount >= type.width) {
    return 0n;
  }
  return wrap(BigInt.asUintN(type.width, a) >> BigInt(amount), type);
}

export function refNot(a: bigint, type: IntegerType): bigint {
  return wrap(~a, type);
}

export function refAnd(a: bigint, b: bigint, type: IntegerType): bigint {
  return wrap(a & b, type);
}

export function refOr(a: bigint, b: bigint, type: IntegerType): bigint {
  return wrap(a | b, type);
}

export function refXor(a: bigint, b: bigint, type: IntegerType): bigint {
  return wrap(a ^ b, type);
}
