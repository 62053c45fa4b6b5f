/**
 * @file integer/limbs.ts
 * @brief Little-endian limb representation of fixed-width values
 *
 * A value of width w is held in ceil(w/64) secret words, limb 0 least
 * significant. Widths below 64 keep their w-bit two's-complement pattern in
 * the low bits of the single limb with the bits above w cleared.
 */

import type { IntegerType, SecretWord, WideValue, Width } from '../api/types';
import { MpcError, MpcErrorCode } from '../api/types';
import type { WordBackend } from '../backend/word-backend';

export const WORD_BITS = 64;
export const WORD_MASK = (1n << 64n) - 1n;
export const HALF_BITS = 32;
export const HALF_MASK = (1n << 32n) - 1n;

export const SUPPORTED_WIDTHS: readonly Width[] = [8, 16, 32, 64, 128, 256];

export function isWidth(n: number): n is Width {
  return SUPPORTED_WIDTHS.some((width) => width === n);
}

export function limbCount(width: Width): number {
  return Math.ceil(width / WORD_BITS);
}

/** Bits used in the most significant limb */
export function topLimbBits(width: Width): number {
  return width < WORD_BITS ? width : WORD_BITS;
}

/** Mask of the meaningful bits of the most significant limb */
export function topLimbMask(width: Width): bigint {
  return (1n << BigInt(topLimbBits(width))) - 1n;
}

export function sameType(a: IntegerType, b: IntegerType): boolean {
  return a.width === b.width && a.signed === b.signed;
}

export function typeName(type: IntegerType): string {
  return `${type.signed ? 'int' : 'uint'}${type.width}`;
}

export function assertSameType(a: IntegerType, b: IntegerType): void {
  if (!sameType(a, b)) {
    throw new MpcError(`Operand types differ: ${typeName(a)} vs ${typeName(b)}`, MpcErrorCode.TYPE_MISMATCH);
  }
}

// ============================================================================
// Plaintext Encoding
// ============================================================================

/** Inclusive range of plaintexts representable by a type */
export function typeRange(type: IntegerType): { min: bigint; max: bigint } {
  const w = BigInt(type.width);
  if (type.signed) {
    return { min: -(1n << (w - 1n)), max: (1n << (w - 1n)) - 1n };
  }
  return { min: 0n, max: (1n << w) - 1n };
}

/**
 * Encode a plaintext as its width-bit two's-complement bit pattern
 */
export function encodePlaintext(value: bigint, type: IntegerType): bigint {
  const { min, max } = typeRange(type);
  if (value < min || value > max) {
    throw new MpcError(`${value} is not representable as ${typeName(type)}`, MpcErrorCode.VALUE_OUT_OF_RANGE, {
      value: value.toString(),
      type: typeName(type),
    });
  }
  return BigInt.asUintN(type.width, value);
}

/**
 * Interpret a width-bit pattern as a plaintext of the type
 */
export function decodePlaintext(pattern: bigint, type: IntegerType): bigint {
  return type.signed ? BigInt.asIntN(type.width, pattern) : BigInt.asUintN(type.width, pattern);
}

export function splitLimbs(pattern: bigint, count: number): bigint[] {
  const limbs: bigint[] = [];
  for (let i = 0; i < count; i++) {
    limbs.push((pattern >> BigInt(i * WORD_BITS)) & WORD_MASK);
  }
  return limbs;
}

export function joinLimbs(limbs: readonly bigint[]): bigint {
  let pattern = 0n;
  for (let i = limbs.length - 1; i >= 0; i--) {
    pattern = (pattern << BigInt(WORD_BITS)) | (limbs[i] ?? 0n);
  }
  return pattern;
}

/**
 * Number of low limbs needed to hold a non-negative pattern (at least one)
 */
export function significantLimbs(pattern: bigint, count: number): number {
  let span = count;
  while (span > 1 && (pattern >> BigInt((span - 1) * WORD_BITS)) === 0n) {
    span--;
  }
  return span;
}

// ============================================================================
// Wide Values
// ============================================================================

export function makeWide(type: IntegerType, limbs: readonly SecretWord[], spanLimbs?: number): WideValue {
  const count = limbCount(type.width);
  if (limbs.length !== count) {
    throw new MpcError(`${typeName(type)} needs ${count} limbs, got ${limbs.length}`, MpcErrorCode.VALUE_OUT_OF_RANGE);
  }
  const span = spanLimbs === undefined ? count : Math.min(Math.max(spanLimbs, 1), count);
  return { width: type.width, signed: type.signed, limbs: [...limbs], spanLimbs: span };
}

export function limbAt(limbs: readonly SecretWord[], index: number): SecretWord {
  const limb = limbs[index];
  if (limb === undefined) {
    throw new MpcError(`Limb ${index} out of range`, MpcErrorCode.VALUE_OUT_OF_RANGE, { limbs: limbs.length });
  }
  return limb;
}

export function topLimb(value: WideValue): SecretWord {
  return limbAt(value.limbs, value.limbs.length - 1);
}

/**
 * Limbs that may be non-zero in either operand
 */
export function boundedSpan(a: WideValue, b: WideValue): number {
  return Math.max(a.spanLimbs, b.spanLimbs);
}

// ============================================================================
// Backend Helpers
// ============================================================================

export function zeroWord(backend: WordBackend): SecretWord {
  return backend.setPublic(0n);
}

/** Sign bit of the value as a secret 0/1 word */
export function signBit(backend: WordBackend, value: WideValue): SecretWord {
  return backend.shr(topLimb(value), topLimbBits(value.width) - 1);
}

/**
 * Clear the bits above the width in the most significant limb
 */
export function canonicalize(backend: WordBackend, type: IntegerType, limbs: SecretWord[]): SecretWord[] {
  if (type.width >= WORD_BITS) {
    return limbs;
  }
  const masked = [...limbs];
  masked[0] = backend.and(limbAt(limbs, 0), backend.setPublic(topLimbMask(type.width)));
  return masked;
}

/**
 * Inject a constant bit pattern of the type, one limb per backend call
 */
export function constantLimbs(backend: WordBackend, type: IntegerType, pattern: bigint): SecretWord[] {
  return splitLimbs(pattern, limbCount(type.width)).map((limb) => backend.setPublic(limb));
}
