/**
 * Test utilities for mpc-wide-integers
 *
 * This module exports all test utilities including:
 * - Property-based testing configuration and arbitraries
 * - Plaintext reference arithmetic
 * - Runtime fixtures over the simulated backend
 */

// Property-based testing utilities
export * from './property-test-config';

// Reference semantics
export * from './reference-arithmetic';

// Runtime fixtures
export * from './runtime';
