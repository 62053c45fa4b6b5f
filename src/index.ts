/**
 * mpc-wide-integers
 *
 * Secret fixed-width integers (8 to 256 bits, signed and unsigned) composed
 * from the 64-bit secret words of a secure multi-party computation backend.
 *
 * @module mpc-wide-integers
 */

export const version = '0.1.0';

export * from './api';
export * from './backend';
export * from './integer';
export * from './parameters';
export { MpcConfigSchema, LOG_LEVELS, loadConfig, resolveConfig } from './config';
export type { MpcConfig, MpcConfigInput, LogLevel } from './config';
export { createLogger, createSilentLogger, LOGGER_NAME } from './logging';
