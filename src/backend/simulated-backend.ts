/**
 * @file backend/simulated-backend.ts
 * @brief In-process word backend
 *
 * Holds secret words as plain 64-bit values behind opaque handles. Network
 * ciphertexts are single AES-128 blocks under the network key, user
 * ciphertexts are blocks under the recipient's key and input proofs are
 * HMAC-SHA256 signatures over the context and ciphertext. It stands in for
 * the secure-computation network in tests and local runs.
 */

import { createCipheriv, createDecipheriv, createHmac, randomBytes, timingSafeEqual } from 'crypto';
import type {
  SecretWord,
  Ciphertext,
  UserCiphertext,
  InputProof,
  IntegerType,
  RecipientKey,
  WideInputProof,
} from '../api/types';
import { MpcError, MpcErrorCode } from '../api/types';
import { encodePlaintext, limbCount, splitLimbs } from '../integer/limbs';
import type { WordBackend } from './word-backend';

const WORD_MASK = (1n << 64n) - 1n;
const KEY_BYTES = 16;
const BLOCK_BYTES = 16;

export interface SimulatedBackendOptions {
  /** 16-byte AES key; random when omitted */
  networkKey?: Uint8Array;
  /** Source of randomness for `random(bits)` */
  randomWord?: (bits: number) => bigint;
}

function defaultRandomWord(bits: number): bigint {
  const word = BigInt('0x' + randomBytes(8).toString('hex'));
  return word >> BigInt(64 - bits);
}

function checkKey(key: Uint8Array): void {
  if (key.length !== KEY_BYTES) {
    throw new MpcError(`Key must be ${KEY_BYTES} bytes, got ${key.length}`, MpcErrorCode.INVALID_CONFIG);
  }
}

function seal(value: bigint, key: Uint8Array): Uint8Array {
  const plain = Buffer.alloc(BLOCK_BYTES);
  randomBytes(8).copy(plain, 0);
  plain.writeBigUInt64BE(value, 8);
  const cipher = createCipheriv('aes-128-ecb', key, null);
  cipher.setAutoPadding(false);
  return new Uint8Array(Buffer.concat([cipher.update(plain), cipher.final()]));
}

function open(data: Uint8Array, key: Uint8Array): bigint {
  if (data.length !== BLOCK_BYTES) {
    throw new MpcError(`Malformed ciphertext of ${data.length} bytes`, MpcErrorCode.BACKEND_FAILURE);
  }
  const decipher = createDecipheriv('aes-128-ecb', key, null);
  decipher.setAutoPadding(false);
  const plain = Buffer.concat([decipher.update(data), decipher.final()]);
  return plain.readBigUInt64BE(8);
}

function sign(key: Uint8Array, context: string, data: Uint8Array): Uint8Array {
  return new Uint8Array(createHmac('sha256', key).update(context).update(data).digest());
}

function checkShift(bits: number): void {
  if (!Number.isInteger(bits) || bits < 0 || bits > 63) {
    throw new MpcError(`Word shift must be in [0, 63], got ${bits}`, MpcErrorCode.VALUE_OUT_OF_RANGE);
  }
}

function checkWordValue(value: bigint): void {
  if (value < 0n || value > WORD_MASK) {
    throw new MpcError('Plaintext does not fit in a 64-bit word', MpcErrorCode.VALUE_OUT_OF_RANGE, {
      value: value.toString(),
    });
  }
}

/**
 * Create a recipient key for offboarding to a user
 */
export function createRecipientKey(id: string, key: Uint8Array = randomBytes(KEY_BYTES)): RecipientKey {
  checkKey(key);
  return { __brand: 'RecipientKey', id, key: new Uint8Array(key) };
}

/**
 * Recipient-side decryption of a user ciphertext (runs off-system)
 */
export function decryptUserCiphertext(ct: UserCiphertext, recipient: RecipientKey): bigint {
  if (ct.recipientId !== recipient.id) {
    throw new MpcError('Ciphertext was issued to another recipient', MpcErrorCode.KEY_MISMATCH, {
      expected: ct.recipientId,
      actual: recipient.id,
    });
  }
  return open(ct.data, recipient.key);
}

export class SimulatedWordBackend implements WordBackend {
  // entries go away with the words that own them
  private readonly values = new WeakMap<SecretWord, bigint>();
  private readonly networkKey: Uint8Array;
  private readonly randomWord: (bits: number) => bigint;
  private nextHandle = 1n;

  constructor(options: SimulatedBackendOptions = {}) {
    const networkKey = options.networkKey ?? randomBytes(KEY_BYTES);
    checkKey(networkKey);
    this.networkKey = new Uint8Array(networkKey);
    this.randomWord = options.randomWord ?? defaultRandomWord;
  }

  /** Number of secret words created so far */
  get wordCount(): number {
    return Number(this.nextHandle - 1n);
  }

  private store(value: bigint): SecretWord {
    const word: SecretWord = { __brand: 'SecretWord', handle: this.nextHandle };
    this.nextHandle += 1n;
    this.values.set(word, value & WORD_MASK);
    return word;
  }

  private load(word: SecretWord): bigint {
    const value = this.values.get(word);
    if (value === undefined) {
      throw new MpcError('Unknown secret word handle', MpcErrorCode.BACKEND_FAILURE, {
        handle: word.handle.toString(),
      });
    }
    return value;
  }

  private flag(condition: boolean): SecretWord {
    return this.store(condition ? 1n : 0n);
  }

  add(a: SecretWord, b: SecretWord): SecretWord {
    return this.store(this.load(a) + this.load(b));
  }

  sub(a: SecretWord, b: SecretWord): SecretWord {
    return this.store(this.load(a) - this.load(b));
  }

  mul(a: SecretWord, b: SecretWord): SecretWord {
    return this.store(this.load(a) * this.load(b));
  }

  div(a: SecretWord, b: SecretWord): SecretWord {
    const divisor = this.load(b);
    if (divisor === 0n) {
      throw new MpcError('Division by zero', MpcErrorCode.DIVISION_BY_ZERO);
    }
    return this.store(this.load(a) / divisor);
  }

  rem(a: SecretWord, b: SecretWord): SecretWord {
    const divisor = this.load(b);
    if (divisor === 0n) {
      throw new MpcError('Division by zero', MpcErrorCode.DIVISION_BY_ZERO);
    }
    return this.store(this.load(a) % divisor);
  }

  and(a: SecretWord, b: SecretWord): SecretWord {
    return this.store(this.load(a) & this.load(b));
  }

  or(a: SecretWord, b: SecretWord): SecretWord {
    return this.store(this.load(a) | this.load(b));
  }

  xor(a: SecretWord, b: SecretWord): SecretWord {
    return this.store(this.load(a) ^ this.load(b));
  }

  shl(a: SecretWord, bits: number): SecretWord {
    checkShift(bits);
    return this.store(this.load(a) << BigInt(bits));
  }

  shr(a: SecretWord, bits: number): SecretWord {
    checkShift(bits);
    return this.store(this.load(a) >> BigInt(bits));
  }

  eq(a: SecretWord, b: SecretWord): SecretWord {
    return this.flag(this.load(a) === this.load(b));
  }

  ne(a: SecretWord, b: SecretWord): SecretWord {
    return this.flag(this.load(a) !== this.load(b));
  }

  lt(a: SecretWord, b: SecretWord): SecretWord {
    return this.flag(this.load(a) < this.load(b));
  }

  le(a: SecretWord, b: SecretWord): SecretWord {
    return this.flag(this.load(a) <= this.load(b));
  }

  gt(a: SecretWord, b: SecretWord): SecretWord {
    return this.flag(this.load(a) > this.load(b));
  }

  ge(a: SecretWord, b: SecretWord): SecretWord {
    return this.flag(this.load(a) >= this.load(b));
  }

  mux(cond: SecretWord, a: SecretWord, b: SecretWord): SecretWord {
    const ifTrue = this.load(a);
    const ifFalse = this.load(b);
    return this.store(this.load(cond) !== 0n ? ifTrue : ifFalse);
  }

  decrypt(word: SecretWord): bigint {
    return this.load(word);
  }

  setPublic(value: bigint): SecretWord {
    checkWordValue(value);
    return this.store(value);
  }

  random(bits: number): SecretWord {
    if (!Number.isInteger(bits) || bits < 1 || bits > 64) {
      throw new MpcError(`Random word bits must be in [1, 64], got ${bits}`, MpcErrorCode.VALUE_OUT_OF_RANGE);
    }
    return this.store(this.randomWord(bits) & ((1n << BigInt(bits)) - 1n));
  }

  validateCiphertext(proof: InputProof): SecretWord {
    const expected = sign(this.networkKey, proof.context, proof.ciphertext.data);
    if (
      proof.signature.length !== expected.length ||
      !timingSafeEqual(proof.signature, expected)
    ) {
      throw new MpcError('Input proof failed verification', MpcErrorCode.INVALID_PROOF, {
        context: proof.context,
      });
    }
    return this.store(open(proof.ciphertext.data, this.networkKey));
  }

  offboard(word: SecretWord): Ciphertext {
    return { __brand: 'Ciphertext', data: seal(this.load(word), this.networkKey) };
  }

  onboard(ciphertext: Ciphertext): SecretWord {
    return this.store(open(ciphertext.data, this.networkKey));
  }

  offboardToUser(word: SecretWord, recipient: RecipientKey): UserCiphertext {
    return {
      __brand: 'UserCiphertext',
      data: seal(this.load(word), recipient.key),
      recipientId: recipient.id,
    };
  }

  /**
   * Client-side encryption of one word with a proof bound to `context`
   */
  encryptInput(value: bigint, context: string): InputProof {
    checkWordValue(value);
    const data = seal(value, this.networkKey);
    return {
      __brand: 'InputProof',
      ciphertext: { __brand: 'Ciphertext', data },
      context,
      signature: sign(this.networkKey, context, data),
    };
  }

  /**
   * Client-side encryption of a plaintext of any supported type, one proof
   * per limb
   */
  encryptWideInput(value: bigint, type: IntegerType, context: string): WideInputProof {
    const pattern = encodePlaintext(value, type);
    return {
      width: type.width,
      signed: type.signed,
      limbs: splitLimbs(pattern, limbCount(type.width)).map((limb) => this.encryptInput(limb, context)),
    };
  }
}
