/**
 * @file api/types.ts
 * @brief Core TypeScript type definitions for secret fixed-width integers
 *
 * This module provides the handle, ciphertext and value types shared by the
 * word backend, the limb composer and the high-level context, together with
 * the typed error used throughout the library.
 */

// ============================================================================
// Opaque Handle Types
// ============================================================================

/**
 * Opaque handle to one 64-bit secret value held by the backend
 */
export interface SecretWord {
  readonly __brand: 'SecretWord';
  readonly handle: bigint;
}

/**
 * Durable encrypted form of a secret word under the network key
 */
export interface Ciphertext {
  readonly __brand: 'Ciphertext';
  readonly data: Uint8Array;
}

/**
 * Ciphertext re-encrypted to a single recipient's key
 */
export interface UserCiphertext {
  readonly __brand: 'UserCiphertext';
  readonly data: Uint8Array;
  readonly recipientId: string;
}

/**
 * Externally supplied ciphertext with a correctness proof
 */
export interface InputProof {
  readonly __brand: 'InputProof';
  readonly ciphertext: Ciphertext;
  /** Caller-chosen binding, e.g. the consuming function */
  readonly context: string;
  readonly signature: Uint8Array;
}

/**
 * An individual recipient's key for offboarding to a user
 */
export interface RecipientKey {
  readonly __brand: 'RecipientKey';
  readonly id: string;
  readonly key: Uint8Array;
}

/**
 * Secret boolean: a secret word holding 0 or 1
 */
export interface EncryptedBool {
  readonly __brand: 'EncryptedBool';
  readonly word: SecretWord;
}

// ============================================================================
// Integer Types
// ============================================================================

/**
 * Supported integer widths in bits
 */
export type Width = 8 | 16 | 32 | 64 | 128 | 256;

/**
 * Width and signedness of an integer type
 */
export interface IntegerType {
  readonly width: Width;
  readonly signed: boolean;
}

/**
 * Fixed-width secret integer as little-endian 64-bit limbs
 */
export interface WideValue extends IntegerType {
  readonly limbs: readonly SecretWord[];
  /**
   * Public bound on the number of low limbs that may be non-zero.
   * Limbs at or above this index are publicly known to be zero.
   */
  readonly spanLimbs: number;
}

/**
 * Per-limb network ciphertexts of a wide value
 */
export interface WideCiphertext extends IntegerType {
  readonly limbs: readonly Ciphertext[];
}

/**
 * Per-limb user ciphertexts of a wide value
 */
export interface WideUserCiphertext extends IntegerType {
  readonly limbs: readonly UserCiphertext[];
}

/**
 * Per-limb input proofs of a wide value
 */
export interface WideInputProof extends IntegerType {
  readonly limbs: readonly InputProof[];
}

/**
 * Result of an overflow-reporting operation
 */
export interface OverflowResult {
  result: WideValue;
  overflow: EncryptedBool;
}

/**
 * Network and user forms produced together
 */
export interface CombinedCiphertext {
  network: WideCiphertext;
  user: WideUserCiphertext;
}

/**
 * Calling convention for operations that can reveal one operand.
 *
 * `lhs-private` keeps the left operand secret and feeds the right one to the
 * backend as public constants; `rhs-private` is the mirror image.
 */
export type OperandPrivacy = 'both-private' | 'lhs-private' | 'rhs-private';

// ============================================================================
// Error Types
// ============================================================================

/**
 * MPC integer error codes
 */
export enum MpcErrorCode {
  INVALID_PROOF = 'INVALID_PROOF',
  KEY_MISMATCH = 'KEY_MISMATCH',
  DIVISION_BY_ZERO = 'DIVISION_BY_ZERO',
  ARITHMETIC_OVERFLOW = 'ARITHMETIC_OVERFLOW',
  BACKEND_FAILURE = 'BACKEND_FAILURE',
  TYPE_MISMATCH = 'TYPE_MISMATCH',
  VALUE_OUT_OF_RANGE = 'VALUE_OUT_OF_RANGE',
  REVEAL_NOT_PERMITTED = 'REVEAL_NOT_PERMITTED',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/**
 * MPC integer error class with typed error codes
 */
export class MpcError extends Error {
  constructor(
    message: string,
    public readonly code: MpcErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MpcError';
    Object.setPrototypeOf(this, MpcError.prototype);
  }
}
