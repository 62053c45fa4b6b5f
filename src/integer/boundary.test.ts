import { describe, it, expect, beforeEach } from 'vitest';
import { MpcErrorCode } from '../api/types';
import { createRecipientKey, decryptUserCiphertext } from '../backend/simulated-backend';
import { INT8, INT16, INT64, INT128, INT256, UINT8, UINT16, UINT64, UINT128, UINT256 } from '../parameters';
import type { TestRuntime } from '../test-utils';
import { captureError, createTestRuntime } from '../test-utils';
import {
  decrypt,
  joinUserCiphertext,
  offboard,
  offboardCombined,
  offboardToUser,
  onboard,
  random,
  randomBounded,
  resize,
  setPublic,
  validateCiphertext,
} from './boundary';

const ALICE = createRecipientKey('alice', new Uint8Array(16).fill(1));

describe('boundary', () => {
  let rt: TestRuntime;

  beforeEach(() => {
    rt = createTestRuntime({}, { randomWord: (bits) => (1n << BigInt(bits)) - 1n });
  });

  describe('setPublic / decrypt', () => {
    it('should round-trip the extremes of every width', () => {
      for (const type of [INT8, INT64, INT128, INT256, UINT8, UINT64, UINT256]) {
        const lo = type.signed ? -(1n << BigInt(type.width - 1)) : 0n;
        const hi = type.signed ? (1n << BigInt(type.width - 1)) - 1n : (1n << BigInt(type.width)) - 1n;
        expect(decrypt(rt, setPublic(rt, lo, type))).toBe(lo);
        expect(decrypt(rt, setPublic(rt, hi, type))).toBe(hi);
      }
    });

    it('should issue one backend call per limb', () => {
      rt.backend.resetCounts();
      setPublic(rt, 1n, UINT256);
      expect(rt.backend.callCount('setPublic')).toBe(4);
    });

    it('should record the span of the plaintext', () => {
      expect(setPublic(rt, 5n, UINT256).spanLimbs).toBe(1);
      expect(setPublic(rt, 1n << 64n, UINT128).spanLimbs).toBe(2);
      expect(setPublic(rt, -1n, INT256).spanLimbs).toBe(4);
    });

    it('should reject unrepresentable plaintexts', () => {
      expect(captureError(() => setPublic(rt, 1n << 128n, UINT128)).code).toBe(MpcErrorCode.VALUE_OUT_OF_RANGE);
      expect(captureError(() => setPublic(rt, -129n, INT8)).code).toBe(MpcErrorCode.VALUE_OUT_OF_RANGE);
    });
  });

  describe('validateCiphertext', () => {
    it('should accept client-encrypted inputs', () => {
      const proof = rt.simulated.encryptWideInput(-(1n << 100n), INT128, 'ledger.credit');
      const value = validateCiphertext(rt, proof);
      expect(decrypt(rt, value)).toBe(-(1n << 100n));
      expect(value.spanLimbs).toBe(2);
    });

    it('should fail the whole value when one limb fails', () => {
      const proof = rt.simulated.encryptWideInput(7n, UINT256, 'ledger.credit');
      const tampered = {
        ...proof,
        limbs: proof.limbs.map((limb, i) => (i === 2 ? { ...limb, signature: new Uint8Array(32) } : limb)),
      };
      const error = captureError(() => validateCiphertext(rt, tampered));

      expect(error.code).toBe(MpcErrorCode.INVALID_PROOF);
      expect(error.message).toBe('Limb 2 of uint256 failed validation');
      expect(error.details).toEqual({ limb: 2, context: 'ledger.credit' });
    });

    it('should reject a limb count that does not match the type', () => {
      const proof = rt.simulated.encryptWideInput(7n, UINT128, 'ledger.credit');
      const error = captureError(() => validateCiphertext(rt, { ...proof, limbs: proof.limbs.slice(0, 1) }));

      expect(error.code).toBe(MpcErrorCode.INVALID_PROOF);
      expect(error.details).toEqual({ expected: 2, actual: 1 });
    });
  });

  describe('offboard / onboard', () => {
    it('should round-trip through network ciphertexts', () => {
      const value = setPublic(rt, -12345n, INT256);
      const ct = offboard(rt, value);
      expect(ct.limbs).toHaveLength(4);
      expect(ct.width).toBe(256);
      expect(ct.signed).toBe(true);
      expect(decrypt(rt, onboard(rt, ct))).toBe(-12345n);
    });

    it('should reject a limb count that does not match the type', () => {
      const ct = offboard(rt, setPublic(rt, 1n, UINT128));
      expect(captureError(() => onboard(rt, { ...ct, width: 256 })).code).toBe(MpcErrorCode.INVALID_PROOF);
    });

    it('should let the recipient decrypt a user ciphertext', () => {
      const plain = (1n << 200n) + 77n;
      const ct = offboardToUser(rt, setPublic(rt, plain, UINT256), ALICE);
      expect(ct.limbs.every((limb) => limb.recipientId === 'alice')).toBe(true);
      expect(joinUserCiphertext(ct, (limb) => decryptUserCiphertext(limb, ALICE))).toBe(plain);
    });

    it('should produce both forms of the same value', () => {
      const { network, user } = offboardCombined(rt, setPublic(rt, -3n, INT16), ALICE);
      expect(decrypt(rt, onboard(rt, network))).toBe(-3n);
      expect(joinUserCiphertext(user, (limb) => decryptUserCiphertext(limb, ALICE))).toBe(-3n);
    });
  });

  describe('random', () => {
    it('should fill every bit of the type', () => {
      expect(decrypt(rt, random(rt, UINT128))).toBe((1n << 128n) - 1n);
      expect(decrypt(rt, random(rt, INT8))).toBe(-1n);
    });

    it('should leave limbs above the requested bits zero', () => {
      const value = randomBounded(rt, UINT256, 70);
      expect(decrypt(rt, value)).toBe((1n << 70n) - 1n);
      expect(value.spanLimbs).toBe(2);
    });

    it('should reject bit counts outside the width', () => {
      expect(captureError(() => randomBounded(rt, UINT64, 0)).code).toBe(MpcErrorCode.VALUE_OUT_OF_RANGE);
      expect(captureError(() => randomBounded(rt, UINT8, 9)).code).toBe(MpcErrorCode.VALUE_OUT_OF_RANGE);
    });
  });

  describe('resize', () => {
    it('should sign-extend signed sources', () => {
      expect(decrypt(rt, resize(rt, setPublic(rt, -1n, INT8), INT256))).toBe(-1n);
      expect(decrypt(rt, resize(rt, setPublic(rt, -300n, INT16), INT128))).toBe(-300n);
      expect(decrypt(rt, resize(rt, setPublic(rt, -(1n << 100n), INT128), INT256))).toBe(-(1n << 100n));
    });

    it('should zero-extend unsigned sources', () => {
      const widened = resize(rt, setPublic(rt, 255n, UINT8), INT128);
      expect(decrypt(rt, widened)).toBe(255n);
      expect(widened.spanLimbs).toBe(1);
      expect(decrypt(rt, resize(rt, setPublic(rt, (1n << 64n) - 1n, UINT64), UINT256))).toBe((1n << 64n) - 1n);
    });

    it('should truncate when narrowing', () => {
      expect(decrypt(rt, resize(rt, setPublic(rt, 300n, INT16), INT8))).toBe(44n);
      expect(decrypt(rt, resize(rt, setPublic(rt, (1n << 128n) + 9n, UINT256), UINT64))).toBe(9n);
      expect(decrypt(rt, resize(rt, setPublic(rt, -1n, INT128), UINT16))).toBe(65535n);
    });
  });
});
