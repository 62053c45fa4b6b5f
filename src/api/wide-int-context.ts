/**
 * @file api/wide-int-context.ts
 * @brief High-level convenience API for secret integer operations
 *
 * This module provides WideIntContext, which binds a word backend, a logger
 * and a validated configuration once and exposes every integer operation as
 * a method.
 */

import type { Logger } from 'pino';
import type {
  CombinedCiphertext,
  EncryptedBool,
  IntegerType,
  OperandPrivacy,
  OverflowResult,
  RecipientKey,
  WideCiphertext,
  WideInputProof,
  WideUserCiphertext,
  WideValue,
} from './types';
import { MpcError, MpcErrorCode } from './types';
import type { WordBackend, WordOperation } from '../backend/word-backend';
import { MeteredBackend } from '../backend/metered-backend';
import type { MpcConfig, MpcConfigInput } from '../config';
import { resolveConfig } from '../config';
import { createLogger } from '../logging';
import type { IntegerRuntime } from '../integer/runtime';
import * as ops from '../integer';

/**
 * WideIntContext configuration options
 */
export interface WideIntContextOptions extends MpcConfigInput {
  /** Parent logger; a new root logger is created when omitted */
  logger?: Logger;
}

/**
 * High-level context for secret fixed-width integers
 *
 * @example
 * ```typescript
 * const ctx = WideIntContext.create(new SimulatedWordBackend());
 * const a = ctx.setPublic(200n, UINT8);
 * const b = ctx.setPublic(100n, UINT8);
 * ctx.decrypt(ctx.add(a, b)); // 44n
 * ```
 */
export class WideIntContext {
  private readonly rt: IntegerRuntime;
  private readonly metered: MeteredBackend;
  private disposed = false;

  private constructor(metered: MeteredBackend, logger: Logger, config: MpcConfig) {
    this.metered = metered;
    this.rt = { backend: metered, logger, config };
  }

  /**
   * Create a context over a backend. The backend is wrapped for call
   * accounting and failure conversion.
   */
  static create(backend: WordBackend, options: WideIntContextOptions = {}): WideIntContext {
    const { logger: parent, ...input } = options;
    const config = resolveConfig(input);
    const root = parent ?? createLogger(config);
    const logger = root.child({ component: 'wide-int' });
    const metered = new MeteredBackend(backend, {
      logger: logger.child({ component: 'backend' }),
      trace: config.traceBackendCalls,
    });
    logger.debug({ config }, 'context created');
    return new WideIntContext(metered, logger, config);
  }

  private runtime(): IntegerRuntime {
    if (this.disposed) {
      throw new MpcError('WideIntContext has been disposed', MpcErrorCode.INVALID_CONFIG);
    }
    return this.rt;
  }

  get config(): MpcConfig {
    return this.rt.config;
  }

  // ========================================================================
  // Call Accounting
  // ========================================================================

  /** Backend calls issued so far, in total or for one primitive */
  backendCalls(op?: WordOperation): number {
    return this.metered.callCount(op);
  }

  backendCallCounts(): Partial<Record<WordOperation, number>> {
    return this.metered.callCounts();
  }

  resetBackendCalls(): void {
    this.metered.resetCounts();
  }

  // ========================================================================
  // Boundary
  // ========================================================================

  setPublic(value: bigint, type: IntegerType): WideValue {
    return ops.setPublic(this.runtime(), value, type);
  }

  decrypt(value: WideValue): bigint {
    return ops.decrypt(this.runtime(), value);
  }

  setPublicBool(value: boolean): EncryptedBool {
    return ops.setPublicBool(this.runtime(), value);
  }

  decryptBool(value: EncryptedBool): boolean {
    return ops.decryptBool(this.runtime(), value);
  }

  validateCiphertext(proof: WideInputProof): WideValue {
    return ops.validateCiphertext(this.runtime(), proof);
  }

  onboard(ciphertext: WideCiphertext): WideValue {
    return ops.onboard(this.runtime(), ciphertext);
  }

  offboard(value: WideValue): WideCiphertext {
    return ops.offboard(this.runtime(), value);
  }

  offboardToUser(value: WideValue, recipient: RecipientKey): WideUserCiphertext {
    return ops.offboardToUser(this.runtime(), value, recipient);
  }

  offboardCombined(value: WideValue, recipient: RecipientKey): CombinedCiphertext {
    return ops.offboardCombined(this.runtime(), value, recipient);
  }

  random(type: IntegerType): WideValue {
    return ops.random(this.runtime(), type);
  }

  randomBounded(type: IntegerType, bits: number): WideValue {
    return ops.randomBounded(this.runtime(), type, bits);
  }

  resize(value: WideValue, target: IntegerType): WideValue {
    return ops.resize(this.runtime(), value, target);
  }

  // ========================================================================
  // Arithmetic
  // ========================================================================

  add(a: WideValue, b: WideValue): WideValue {
    return ops.add(this.runtime(), a, b);
  }

  sub(a: WideValue, b: WideValue): WideValue {
    return ops.sub(this.runtime(), a, b);
  }

  mul(a: WideValue, b: WideValue, privacy: OperandPrivacy = 'both-private'): WideValue {
    return ops.mul(this.runtime(), a, b, privacy);
  }

  div(a: WideValue, b: WideValue): WideValue {
    return ops.div(this.runtime(), a, b);
  }

  rem(a: WideValue, b: WideValue): WideValue {
    return ops.rem(this.runtime(), a, b);
  }

  negate(value: WideValue): WideValue {
    return ops.negate(this.runtime(), value);
  }

  // ========================================================================
  // Checked Arithmetic
  // ========================================================================

  checkedAdd(a: WideValue, b: WideValue): WideValue {
    return ops.checkedAdd(this.runtime(), a, b);
  }

  checkedSub(a: WideValue, b: WideValue): WideValue {
    return ops.checkedSub(this.runtime(), a, b);
  }

  checkedMul(a: WideValue, b: WideValue): WideValue {
    return ops.checkedMul(this.runtime(), a, b);
  }

  checkedAddLHS(a: bigint, b: WideValue): WideValue {
    return ops.checkedAddLHS(this.runtime(), a, b);
  }

  checkedAddRHS(a: WideValue, b: bigint): WideValue {
    return ops.checkedAddRHS(this.runtime(), a, b);
  }

  checkedSubLHS(a: bigint, b: WideValue): WideValue {
    return ops.checkedSubLHS(this.runtime(), a, b);
  }

  checkedSubRHS(a: WideValue, b: bigint): WideValue {
    return ops.checkedSubRHS(this.runtime(), a, b);
  }

  checkedMulLHS(a: bigint, b: WideValue): WideValue {
    return ops.checkedMulLHS(this.runtime(), a, b);
  }

  checkedMulRHS(a: WideValue, b: bigint): WideValue {
    return ops.checkedMulRHS(this.runtime(), a, b);
  }

  checkedAddWithOverflowBit(a: WideValue, b: WideValue): OverflowResult {
    return ops.checkedAddWithOverflowBit(this.runtime(), a, b);
  }

  checkedSubWithOverflowBit(a: WideValue, b: WideValue): OverflowResult {
    return ops.checkedSubWithOverflowBit(this.runtime(), a, b);
  }

  checkedMulWithOverflowBit(a: WideValue, b: WideValue): OverflowResult {
    return ops.checkedMulWithOverflowBit(this.runtime(), a, b);
  }

  // ========================================================================
  // Bitwise
  // ========================================================================

  and(a: WideValue, b: WideValue): WideValue {
    return ops.and(this.runtime(), a, b);
  }

  or(a: WideValue, b: WideValue): WideValue {
    return ops.or(this.runtime(), a, b);
  }

  xor(a: WideValue, b: WideValue): WideValue {
    return ops.xor(this.runtime(), a, b);
  }

  not(value: WideValue): WideValue {
    return ops.not(this.runtime(), value);
  }

  shl(value: WideValue, amount: number): WideValue {
    return ops.shl(this.runtime(), value, amount);
  }

  shr(value: WideValue, amount: number): WideValue {
    return ops.shr(this.runtime(), value, amount);
  }

  // ========================================================================
  // Comparison and Selection
  // ========================================================================

  eq(a: WideValue, b: WideValue): EncryptedBool {
    return ops.eq(this.runtime(), a, b);
  }

  ne(a: WideValue, b: WideValue): EncryptedBool {
    return ops.ne(this.runtime(), a, b);
  }

  lt(a: WideValue, b: WideValue): EncryptedBool {
    return ops.lt(this.runtime(), a, b);
  }

  le(a: WideValue, b: WideValue): EncryptedBool {
    return ops.le(this.runtime(), a, b);
  }

  gt(a: WideValue, b: WideValue): EncryptedBool {
    return ops.gt(this.runtime(), a, b);
  }

  ge(a: WideValue, b: WideValue): EncryptedBool {
    return ops.ge(this.runtime(), a, b);
  }

  min(a: WideValue, b: WideValue): WideValue {
    return ops.min(this.runtime(), a, b);
  }

  max(a: WideValue, b: WideValue): WideValue {
    return ops.max(this.runtime(), a, b);
  }

  select(cond: EncryptedBool, a: WideValue, b: WideValue): WideValue {
    return ops.select(this.runtime(), cond, a, b);
  }

  // ========================================================================
  // Secret Booleans
  // ========================================================================

  boolAnd(a: EncryptedBool, b: EncryptedBool): EncryptedBool {
    return ops.boolAnd(this.runtime(), a, b);
  }

  boolOr(a: EncryptedBool, b: EncryptedBool): EncryptedBool {
    return ops.boolOr(this.runtime(), a, b);
  }

  boolXor(a: EncryptedBool, b: EncryptedBool): EncryptedBool {
    return ops.boolXor(this.runtime(), a, b);
  }

  boolNot(a: EncryptedBool): EncryptedBool {
    return ops.boolNot(this.runtime(), a);
  }

  boolEq(a: EncryptedBool, b: EncryptedBool): EncryptedBool {
    return ops.boolEq(this.runtime(), a, b);
  }

  boolNe(a: EncryptedBool, b: EncryptedBool): EncryptedBool {
    return ops.boolNe(this.runtime(), a, b);
  }

  boolSelect(cond: EncryptedBool, a: EncryptedBool, b: EncryptedBool): EncryptedBool {
    return ops.boolSelect(this.runtime(), cond, a, b);
  }

  /**
   * Release the context; later calls fail
   */
  dispose(): void {
    this.disposed = true;
  }
}
