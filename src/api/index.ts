/**
 * @file api/index.ts
 * @brief Main API exports for secret integer operations
 *
 * This module re-exports all API types and the high-level context for
 * convenient access.
 */

// Core types
export * from './types';

// High-level convenience API
export { WideIntContext } from './wide-int-context';
export type { WideIntContextOptions } from './wide-int-context';
