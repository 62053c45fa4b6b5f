/**
 * @file integer/boundary.ts
 * @brief Conversions between plaintexts, ciphertexts and wide values
 */

import type {
  CombinedCiphertext,
  EncryptedBool,
  IntegerType,
  RecipientKey,
  WideCiphertext,
  WideInputProof,
  WideUserCiphertext,
  WideValue,
} from '../api/types';
import { MpcError, MpcErrorCode } from '../api/types';
import type { IntegerRuntime } from './runtime';
import { extensionLimb } from './arithmetic';
import {
  WORD_BITS,
  canonicalize,
  decodePlaintext,
  encodePlaintext,
  joinLimbs,
  limbAt,
  limbCount,
  makeWide,
  significantLimbs,
  splitLimbs,
  typeName,
} from './limbs';
import { toBool } from './select';

function checkLimbCount(type: IntegerType, count: number): void {
  const expected = limbCount(type.width);
  if (count !== expected) {
    throw new MpcError(`${typeName(type)} expects ${expected} limbs, got ${count}`, MpcErrorCode.INVALID_PROOF, {
      expected,
      actual: count,
    });
  }
}

// ============================================================================
// Plaintext Boundary
// ============================================================================

/**
 * Inject a public plaintext; small non-negative values keep a reduced span
 */
export function setPublic(rt: IntegerRuntime, value: bigint, type: IntegerType): WideValue {
  const pattern = encodePlaintext(value, type);
  const count = limbCount(type.width);
  const limbs = splitLimbs(pattern, count).map((limb) => rt.backend.setPublic(limb));
  return makeWide(type, limbs, significantLimbs(pattern, count));
}

export function decrypt(rt: IntegerRuntime, value: WideValue): bigint {
  const pattern = joinLimbs(value.limbs.map((limb) => rt.backend.decrypt(limb)));
  return decodePlaintext(pattern, value);
}

export function setPublicBool(rt: IntegerRuntime, value: boolean): EncryptedBool {
  return toBool(rt.backend.setPublic(value ? 1n : 0n));
}

export function decryptBool(rt: IntegerRuntime, value: EncryptedBool): boolean {
  return rt.backend.decrypt(value.word) !== 0n;
}

// ============================================================================
// Ciphertext Boundary
// ============================================================================

/**
 * Validate every limb's proof; one failing limb fails the whole value
 */
export function validateCiphertext(rt: IntegerRuntime, proof: WideInputProof): WideValue {
  checkLimbCount(proof, proof.limbs.length);
  const limbs = proof.limbs.map((limbProof, i) => {
    try {
      return rt.backend.validateCiphertext(limbProof);
    } catch (err) {
      if (err instanceof MpcError && err.code === MpcErrorCode.INVALID_PROOF) {
        rt.logger.warn({ limb: i, type: typeName(proof) }, 'input proof rejected');
        throw new MpcError(`Limb ${i} of ${typeName(proof)} failed validation`, MpcErrorCode.INVALID_PROOF, {
          limb: i,
          ...err.details,
        });
      }
      throw err;
    }
  });
  return makeWide(proof, canonicalize(rt.backend, proof, limbs));
}

export function offboard(rt: IntegerRuntime, value: WideValue): WideCiphertext {
  return {
    width: value.width,
    signed: value.signed,
    limbs: value.limbs.map((limb) => rt.backend.offboard(limb)),
  };
}

export function onboard(rt: IntegerRuntime, ciphertext: WideCiphertext): WideValue {
  checkLimbCount(ciphertext, ciphertext.limbs.length);
  const limbs = ciphertext.limbs.map((ct) => rt.backend.onboard(ct));
  return makeWide(ciphertext, canonicalize(rt.backend, ciphertext, limbs));
}

export function offboardToUser(rt: IntegerRuntime, value: WideValue, recipient: RecipientKey): WideUserCiphertext {
  return {
    width: value.width,
    signed: value.signed,
    limbs: value.limbs.map((limb) => rt.backend.offboardToUser(limb, recipient)),
  };
}

/** Network and recipient forms of the same value */
export function offboardCombined(rt: IntegerRuntime, value: WideValue, recipient: RecipientKey): CombinedCiphertext {
  return { network: offboard(rt, value), user: offboardToUser(rt, value, recipient) };
}

/**
 * Reassemble a user ciphertext on the recipient side, given a per-limb
 * decryption function
 */
export function joinUserCiphertext(
  ciphertext: WideUserCiphertext,
  decryptLimb: (limb: WideUserCiphertext['limbs'][number]) => bigint
): bigint {
  return decodePlaintext(joinLimbs(ciphertext.limbs.map(decryptLimb)), ciphertext);
}

// ============================================================================
// Randomness
// ============================================================================

/**
 * Uniform over [0, 2^bits); limbs above the requested bits are zero
 */
export function randomBounded(rt: IntegerRuntime, type: IntegerType, bits: number): WideValue {
  if (!Number.isInteger(bits) || bits < 1 || bits > type.width) {
    throw new MpcError(`Random bits must be in [1, ${type.width}], got ${bits}`, MpcErrorCode.VALUE_OUT_OF_RANGE);
  }
  const count = limbCount(type.width);
  const limbs = Array.from({ length: count }, (_, i) => {
    const remaining = bits - i * WORD_BITS;
    if (remaining <= 0) {
      return rt.backend.setPublic(0n);
    }
    return rt.backend.random(Math.min(remaining, WORD_BITS));
  });
  return makeWide(type, limbs, Math.ceil(bits / WORD_BITS));
}

export function random(rt: IntegerRuntime, type: IntegerType): WideValue {
  return randomBounded(rt, type, type.width);
}

// ============================================================================
// Type Conversion
// ============================================================================

/**
 * Convert to another integer type: sign-extend signed sources, zero-extend
 * unsigned ones, truncate when narrowing
 */
export function resize(rt: IntegerRuntime, value: WideValue, target: IntegerType): WideValue {
  const { backend } = rt;
  let source = value;
  if (value.width < WORD_BITS && value.signed) {
    // widen the narrow pattern to a full 64-bit two's-complement word
    const bias = backend.setPublic(1n << BigInt(value.width - 1));
    const widened = backend.sub(backend.xor(limbAt(value.limbs, 0), bias), bias);
    source = { width: 64, signed: true, limbs: [widened], spanLimbs: 1 };
  }
  const count = limbCount(target.width);
  const ext = count > source.limbs.length ? extensionLimb(backend, source) : undefined;
  const limbs = Array.from({ length: count }, (_, i) => source.limbs[i] ?? ext ?? backend.setPublic(0n));
  const span = value.signed ? count : Math.min(value.spanLimbs, count);
  return makeWide(target, canonicalize(backend, target, limbs), span);
}
