import { describe, it, expect } from 'vitest';
import { MpcErrorCode } from '../api/types';
import { INT8, INT128, UINT8, UINT64, UINT128, UINT256 } from '../parameters';
import { captureError } from '../test-utils';
import {
  assertSameType,
  decodePlaintext,
  encodePlaintext,
  isWidth,
  joinLimbs,
  limbCount,
  significantLimbs,
  splitLimbs,
  topLimbMask,
  typeName,
  typeRange,
} from './limbs';

describe('limbs', () => {
  describe('widths', () => {
    it('should count limbs per width', () => {
      expect([8, 16, 32, 64, 128, 256].map((w) => (isWidth(w) ? limbCount(w) : 0))).toEqual([1, 1, 1, 1, 2, 4]);
    });

    it('should reject unsupported widths', () => {
      expect(isWidth(24)).toBe(false);
      expect(isWidth(512)).toBe(false);
    });

    it('should mask the top limb of narrow widths only', () => {
      expect(topLimbMask(8)).toBe(0xffn);
      expect(topLimbMask(32)).toBe(0xffffffffn);
      expect(topLimbMask(128)).toBe(0xffffffffffffffffn);
    });
  });

  describe('typeRange', () => {
    it('should give two\'s-complement bounds', () => {
      expect(typeRange(INT8)).toEqual({ min: -128n, max: 127n });
      expect(typeRange(UINT8)).toEqual({ min: 0n, max: 255n });
      expect(typeRange(INT128)).toEqual({ min: -(1n << 127n), max: (1n << 127n) - 1n });
    });
  });

  describe('encodePlaintext / decodePlaintext', () => {
    it('should encode negatives as bit patterns', () => {
      expect(encodePlaintext(-1n, INT8)).toBe(0xffn);
      expect(encodePlaintext(-128n, INT8)).toBe(0x80n);
      expect(decodePlaintext(0x80n, INT8)).toBe(-128n);
      expect(decodePlaintext(0x80n, UINT8)).toBe(128n);
    });

    it('should reject values outside the type', () => {
      const error = captureError(() => encodePlaintext(256n, UINT8));
      expect(error.code).toBe(MpcErrorCode.VALUE_OUT_OF_RANGE);
      expect(error.details).toEqual({ value: '256', type: 'uint8' });
      expect(captureError(() => encodePlaintext(-1n, UINT64)).code).toBe(MpcErrorCode.VALUE_OUT_OF_RANGE);
      expect(captureError(() => encodePlaintext(128n, INT8)).code).toBe(MpcErrorCode.VALUE_OUT_OF_RANGE);
    });
  });

  describe('splitLimbs / joinLimbs', () => {
    it('should split little-endian', () => {
      const value = (3n << 128n) | (2n << 64n) | 1n;
      expect(splitLimbs(value, 4)).toEqual([1n, 2n, 3n, 0n]);
      expect(joinLimbs([1n, 2n, 3n, 0n])).toBe(value);
    });

    it('should count significant limbs, at least one', () => {
      expect(significantLimbs(0n, 4)).toBe(1);
      expect(significantLimbs(5n, 4)).toBe(1);
      expect(significantLimbs(1n << 64n, 4)).toBe(2);
      expect(significantLimbs(1n << 255n, 4)).toBe(4);
    });
  });

  describe('type checks', () => {
    it('should name types', () => {
      expect(typeName(UINT256)).toBe('uint256');
      expect(typeName(INT8)).toBe('int8');
    });

    it('should reject mixed types', () => {
      expect(captureError(() => assertSameType(UINT128, INT128)).code).toBe(MpcErrorCode.TYPE_MISMATCH);
      expect(() => assertSameType(UINT128, { width: 128, signed: false })).not.toThrow();
    });
  });
});
