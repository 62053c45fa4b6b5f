import { describe, it, expect, beforeEach } from 'vitest';
import { MpcErrorCode } from '../api/types';
import { INT8, INT16, INT64, INT128, INT256, UINT8, UINT32, UINT64, UINT128, UINT256 } from '../parameters';
import type { TestRuntime } from '../test-utils';
import { captureError, createTestRuntime, fullSpan } from '../test-utils';
import { add, mul, negate, not, sub } from './arithmetic';
import { decrypt, setPublic } from './boundary';

const MIN256 = -(1n << 255n);
const MAX256 = (1n << 255n) - 1n;

describe('arithmetic', () => {
  let rt: TestRuntime;

  beforeEach(() => {
    rt = createTestRuntime();
  });

  describe('add', () => {
    it('should wrap unsigned 8-bit sums', () => {
      expect(decrypt(rt, add(rt, setPublic(rt, 200n, UINT8), setPublic(rt, 100n, UINT8)))).toBe(44n);
    });

    it('should ripple the carry across limbs', () => {
      const a = setPublic(rt, (1n << 64n) - 1n, UINT128);
      expect(decrypt(rt, add(rt, a, setPublic(rt, 1n, UINT128)))).toBe(1n << 64n);

      const max = setPublic(rt, (1n << 256n) - 1n, UINT256);
      expect(decrypt(rt, add(rt, max, setPublic(rt, 2n, UINT256)))).toBe(1n);
    });

    it('should add signed values of different limbs', () => {
      const sum = add(rt, setPublic(rt, -8000000000n, INT64), setPublic(rt, 3000000000n, INT64));
      expect(decrypt(rt, sum)).toBe(-5000000000n);
    });

    it('should wrap signed overflow', () => {
      expect(decrypt(rt, add(rt, setPublic(rt, 127n, INT8), setPublic(rt, 1n, INT8)))).toBe(-128n);
      expect(decrypt(rt, add(rt, setPublic(rt, -1n, INT128), setPublic(rt, 1n, INT128)))).toBe(0n);
    });

    it('should reject operands of different types', () => {
      const error = captureError(() => add(rt, setPublic(rt, 1n, UINT8), setPublic(rt, 1n, INT8)));
      expect(error.code).toBe(MpcErrorCode.TYPE_MISMATCH);
    });
  });

  describe('sub', () => {
    it('should wrap unsigned 8-bit differences', () => {
      expect(decrypt(rt, sub(rt, setPublic(rt, 30n, UINT8), setPublic(rt, 100n, UINT8)))).toBe(186n);
    });

    it('should ripple the borrow across limbs', () => {
      expect(decrypt(rt, sub(rt, setPublic(rt, 1n << 128n, UINT256), setPublic(rt, 1n, UINT256)))).toBe(
        (1n << 128n) - 1n
      );
      expect(decrypt(rt, sub(rt, setPublic(rt, 0n, UINT128), setPublic(rt, 1n, UINT128)))).toBe((1n << 128n) - 1n);
    });

    it('should wrap MIN - MAX at 256 bits', () => {
      expect(decrypt(rt, sub(rt, setPublic(rt, MIN256, INT256), setPublic(rt, MAX256, INT256)))).toBe(1n);
    });

    it('should subtract signed narrow values', () => {
      expect(decrypt(rt, sub(rt, setPublic(rt, -30000n, INT16), setPublic(rt, 5000n, INT16)))).toBe(30536n);
      expect(decrypt(rt, sub(rt, setPublic(rt, 5n, INT8), setPublic(rt, 9n, INT8)))).toBe(-4n);
    });
  });

  describe('negate / not', () => {
    it('should negate within the width', () => {
      expect(decrypt(rt, negate(rt, setPublic(rt, 5n, INT128)))).toBe(-5n);
      expect(decrypt(rt, negate(rt, setPublic(rt, -128n, INT8)))).toBe(-128n);
      expect(decrypt(rt, negate(rt, setPublic(rt, 1n, UINT32)))).toBe(0xffffffffn);
    });

    it('should complement within the width', () => {
      expect(decrypt(rt, not(rt, setPublic(rt, 0n, UINT8)))).toBe(255n);
      expect(decrypt(rt, not(rt, setPublic(rt, 0n, INT256)))).toBe(-1n);
      expect(decrypt(rt, not(rt, setPublic(rt, 1n << 64n, UINT128)))).toBe((1n << 128n) - 1n - (1n << 64n));
    });
  });

  describe('mul', () => {
    it('should truncate 2^128 * 2^128 at 256 bits', () => {
      const a = setPublic(rt, 1n << 128n, UINT256);
      expect(decrypt(rt, mul(rt, a, a))).toBe(0n);
    });

    it('should carry between half limbs', () => {
      const max64 = (1n << 64n) - 1n;
      const a = setPublic(rt, max64, UINT128);
      expect(decrypt(rt, mul(rt, a, a))).toBe(max64 * max64);

      const b = setPublic(rt, max64, UINT64);
      expect(decrypt(rt, mul(rt, b, b))).toBe(1n);
    });

    it('should multiply signed values', () => {
      expect(decrypt(rt, mul(rt, setPublic(rt, -3n, INT256), setPublic(rt, 1n << 200n, INT256)))).toBe(
        -(3n << 200n)
      );
      expect(decrypt(rt, mul(rt, setPublic(rt, -12n, INT8), setPublic(rt, 11n, INT8)))).toBe(-132n + 256n);
    });

    it('should give the same product under every calling convention', () => {
      const a = setPublic(rt, (1n << 100n) + 7n, UINT128);
      const b = setPublic(rt, 12345n, UINT128);
      const expected = BigInt.asUintN(128, ((1n << 100n) + 7n) * 12345n);

      expect(decrypt(rt, mul(rt, a, b))).toBe(expected);
      expect(decrypt(rt, mul(rt, a, b, 'lhs-private'))).toBe(expected);
      expect(decrypt(rt, mul(rt, a, b, 'rhs-private'))).toBe(expected);
    });

    it('should skip partial products of zero public halves', () => {
      const a = setPublic(rt, (1n << 100n) + 7n, UINT128);
      const b = setPublic(rt, 3n, UINT128);

      rt.backend.resetCounts();
      mul(rt, a, b);
      expect(rt.backend.callCount('mul')).toBe(7);

      rt.backend.resetCounts();
      mul(rt, a, b, 'lhs-private');
      expect(rt.backend.callCount('mul')).toBe(4);

      rt.backend.resetCounts();
      mul(rt, a, b, 'rhs-private');
      expect(rt.backend.callCount('mul')).toBe(3);
    });

    it('should match the full-width path for reduced spans', () => {
      const small = setPublic(rt, 99n, INT128);
      const wide = fullSpan(rt, 99n, INT128);
      const factor = setPublic(rt, -(1n << 70n), INT128);
      expect(decrypt(rt, mul(rt, small, factor))).toBe(decrypt(rt, mul(rt, wide, factor)));
      expect(decrypt(rt, mul(rt, small, factor))).toBe(-(99n << 70n));
    });
  });
});
