/**
 * @file backend/metered-backend.ts
 * @brief Call accounting wrapper around a word backend
 *
 * Counts every primitive call, optionally traces it through pino, and turns
 * foreign errors thrown by the wrapped backend into BACKEND_FAILURE so the
 * enclosing operation aborts with a typed error.
 */

import type { Logger } from 'pino';
import type {
  SecretWord,
  Ciphertext,
  UserCiphertext,
  InputProof,
  RecipientKey,
} from '../api/types';
import { MpcError, MpcErrorCode } from '../api/types';
import type { WordBackend, WordOperation } from './word-backend';

export interface MeteredBackendOptions {
  logger: Logger;
  /** Log each call at trace level */
  trace?: boolean;
}

export class MeteredBackend implements WordBackend {
  private readonly inner: WordBackend;
  private readonly logger: Logger;
  private readonly trace: boolean;
  private readonly counts = new Map<WordOperation, number>();

  constructor(inner: WordBackend, options: MeteredBackendOptions) {
    this.inner = inner;
    this.logger = options.logger;
    this.trace = options.trace ?? false;
  }

  /** Calls to one primitive, or to all of them */
  callCount(op?: WordOperation): number {
    if (op !== undefined) {
      return this.counts.get(op) ?? 0;
    }
    let total = 0;
    for (const n of this.counts.values()) {
      total += n;
    }
    return total;
  }

  /** Snapshot of the per-primitive counters */
  callCounts(): Partial<Record<WordOperation, number>> {
    return Object.fromEntries(this.counts);
  }

  resetCounts(): void {
    this.counts.clear();
  }

  private call<T>(op: WordOperation, fn: () => T): T {
    this.counts.set(op, (this.counts.get(op) ?? 0) + 1);
    if (this.trace) {
      this.logger.trace({ op }, 'backend call');
    }
    try {
      return fn();
    } catch (err) {
      if (err instanceof MpcError) {
        throw err;
      }
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ op, err: message }, 'backend failure');
      throw new MpcError(`Backend ${op} failed: ${message}`, MpcErrorCode.BACKEND_FAILURE, { op });
    }
  }

  add(a: SecretWord, b: SecretWord): SecretWord {
    return this.call('add', () => this.inner.add(a, b));
  }

  sub(a: SecretWord, b: SecretWord): SecretWord {
    return this.call('sub', () => this.inner.sub(a, b));
  }

  mul(a: SecretWord, b: SecretWord): SecretWord {
    return this.call('mul', () => this.inner.mul(a, b));
  }

  div(a: SecretWord, b: SecretWord): SecretWord {
    return this.call('div', () => this.inner.div(a, b));
  }

  rem(a: SecretWord, b: SecretWord): SecretWord {
    return this.call('rem', () => this.inner.rem(a, b));
  }

  and(a: SecretWord, b: SecretWord): SecretWord {
    return this.call('and', () => this.inner.and(a, b));
  }

  or(a: SecretWord, b: SecretWord): SecretWord {
    return this.call('or', () => this.inner.or(a, b));
  }

  xor(a: SecretWord, b: SecretWord): SecretWord {
    return this.call('xor', () => this.inner.xor(a, b));
  }

  shl(a: SecretWord, bits: number): SecretWord {
    return this.call('shl', () => this.inner.shl(a, bits));
  }

  shr(a: SecretWord, bits: number): SecretWord {
    return this.call('shr', () => this.inner.shr(a, bits));
  }

  eq(a: SecretWord, b: SecretWord): SecretWord {
    return this.call('eq', () => this.inner.eq(a, b));
  }

  ne(a: SecretWord, b: SecretWord): SecretWord {
    return this.call('ne', () => this.inner.ne(a, b));
  }

  lt(a: SecretWord, b: SecretWord): SecretWord {
    return this.call('lt', () => this.inner.lt(a, b));
  }

  le(a: SecretWord, b: SecretWord): SecretWord {
    return this.call('le', () => this.inner.le(a, b));
  }

  gt(a: SecretWord, b: SecretWord): SecretWord {
    return this.call('gt', () => this.inner.gt(a, b));
  }

  ge(a: SecretWord, b: SecretWord): SecretWord {
    return this.call('ge', () => this.inner.ge(a, b));
  }

  mux(cond: SecretWord, a: SecretWord, b: SecretWord): SecretWord {
    return this.call('mux', () => this.inner.mux(cond, a, b));
  }

  decrypt(word: SecretWord): bigint {
    return this.call('decrypt', () => this.inner.decrypt(word));
  }

  setPublic(value: bigint): SecretWord {
    return this.call('setPublic', () => this.inner.setPublic(value));
  }

  random(bits: number): SecretWord {
    return this.call('random', () => this.inner.random(bits));
  }

  validateCiphertext(proof: InputProof): SecretWord {
    return this.call('validateCiphertext', () => this.inner.validateCiphertext(proof));
  }

  offboard(word: SecretWord): Ciphertext {
    return this.call('offboard', () => this.inner.offboard(word));
  }

  onboard(ciphertext: Ciphertext): SecretWord {
    return this.call('onboard', () => this.inner.onboard(ciphertext));
  }

  offboardToUser(word: SecretWord, recipient: RecipientKey): UserCiphertext {
    return this.call('offboardToUser', () => this.inner.offboardToUser(word, recipient));
  }
}
