/**
 * @file backend/word-backend.ts
 * @brief Contract of the secure-computation backend
 *
 * The backend only understands single 64-bit secret words. Arithmetic
 * results wrap modulo 2^64, comparisons are unsigned and yield a secret 0/1
 * word. Every call is synchronous: it returns or throws.
 */

import type {
  SecretWord,
  Ciphertext,
  UserCiphertext,
  InputProof,
  RecipientKey,
} from '../api/types';

/**
 * Names of the backend primitives, used for call accounting
 */
export type WordOperation =
  | 'add'
  | 'sub'
  | 'mul'
  | 'div'
  | 'rem'
  | 'and'
  | 'or'
  | 'xor'
  | 'shl'
  | 'shr'
  | 'eq'
  | 'ne'
  | 'lt'
  | 'le'
  | 'gt'
  | 'ge'
  | 'mux'
  | 'decrypt'
  | 'setPublic'
  | 'random'
  | 'validateCiphertext'
  | 'offboard'
  | 'onboard'
  | 'offboardToUser';

export interface WordBackend {
  add(a: SecretWord, b: SecretWord): SecretWord;
  sub(a: SecretWord, b: SecretWord): SecretWord;
  /** Low 64 bits of the product */
  mul(a: SecretWord, b: SecretWord): SecretWord;
  /** Unsigned; a zero divisor throws DIVISION_BY_ZERO */
  div(a: SecretWord, b: SecretWord): SecretWord;
  /** Unsigned; a zero divisor throws DIVISION_BY_ZERO */
  rem(a: SecretWord, b: SecretWord): SecretWord;
  and(a: SecretWord, b: SecretWord): SecretWord;
  or(a: SecretWord, b: SecretWord): SecretWord;
  xor(a: SecretWord, b: SecretWord): SecretWord;
  /** Shift by a public amount in [0, 63] */
  shl(a: SecretWord, bits: number): SecretWord;
  shr(a: SecretWord, bits: number): SecretWord;
  eq(a: SecretWord, b: SecretWord): SecretWord;
  ne(a: SecretWord, b: SecretWord): SecretWord;
  lt(a: SecretWord, b: SecretWord): SecretWord;
  le(a: SecretWord, b: SecretWord): SecretWord;
  gt(a: SecretWord, b: SecretWord): SecretWord;
  ge(a: SecretWord, b: SecretWord): SecretWord;
  /** `cond` non-zero selects `a`, otherwise `b` */
  mux(cond: SecretWord, a: SecretWord, b: SecretWord): SecretWord;
  decrypt(word: SecretWord): bigint;
  setPublic(value: bigint): SecretWord;
  /** Uniform over [0, 2^bits), bits in [1, 64] */
  random(bits: number): SecretWord;
  /** Throws INVALID_PROOF when the proof does not verify */
  validateCiphertext(proof: InputProof): SecretWord;
  offboard(word: SecretWord): Ciphertext;
  onboard(ciphertext: Ciphertext): SecretWord;
  offboardToUser(word: SecretWord, recipient: RecipientKey): UserCiphertext;
}
