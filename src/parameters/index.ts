/**
 * @file parameters/index.ts
 * @brief Integer type presets for TypeScript
 *
 * This module names the twelve supported integer types (six widths, signed
 * and unsigned) and parses type names such as `uint128` or `int8` into
 * {@link IntegerType} descriptors.
 */

import type { IntegerType, Width } from '../api/types';
import { MpcError, MpcErrorCode } from '../api/types';
import { SUPPORTED_WIDTHS, isWidth, typeName } from '../integer/limbs';

/**
 * Names of the supported integer types
 */
export type IntegerTypeName = `${'uint' | 'int'}${Width}`;

// ========== Presets ==========

export const UINT8: IntegerType = { width: 8, signed: false };
export const UINT16: IntegerType = { width: 16, signed: false };
export const UINT32: IntegerType = { width: 32, signed: false };
export const UINT64: IntegerType = { width: 64, signed: false };
export const UINT128: IntegerType = { width: 128, signed: false };
export const UINT256: IntegerType = { width: 256, signed: false };

export const INT8: IntegerType = { width: 8, signed: true };
export const INT16: IntegerType = { width: 16, signed: true };
export const INT32: IntegerType = { width: 32, signed: true };
export const INT64: IntegerType = { width: 64, signed: true };
export const INT128: IntegerType = { width: 128, signed: true };
export const INT256: IntegerType = { width: 256, signed: true };

const TYPE_PATTERN = /^(u?)int(\d+)$/;

// ========== Lookup ==========

/**
 * Parse a type name, rejecting unsupported widths
 */
export function parseIntegerType(name: string): IntegerType {
  const match = TYPE_PATTERN.exec(name);
  const digits = match?.[2];
  const width = digits === undefined ? NaN : Number(digits);
  if (match === null || !isWidth(width)) {
    throw new MpcError(`Unknown integer type: ${name}`, MpcErrorCode.TYPE_MISMATCH, {
      supported: getAvailableTypes(),
    });
  }
  return { width, signed: match[1] !== 'u' };
}

export function integerType(name: IntegerTypeName): IntegerType {
  return parseIntegerType(name);
}

/**
 * Get all supported type names, unsigned first, by ascending width
 */
export function getAvailableTypes(): IntegerTypeName[] {
  const unsigned = SUPPORTED_WIDTHS.map((width): IntegerTypeName => `uint${width}`);
  const signed = SUPPORTED_WIDTHS.map((width): IntegerTypeName => `int${width}`);
  return [...unsigned, ...signed];
}

/**
 * Human-readable summary of a type
 */
export function integerTypeToString(type: IntegerType): string {
  const limbs = Math.ceil(type.width / 64);
  return `${typeName(type)} (${limbs} limb${limbs === 1 ? '' : 's'})`;
}
