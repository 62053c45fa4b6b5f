/**
 * @file config/index.ts
 * @brief Runtime configuration for the integer layer
 *
 * Reads configuration from environment variables with sensible defaults:
 * MPC_LOG_LEVEL, MPC_TRACE_BACKEND_CALLS, MPC_ALLOW_REVEAL_FALLBACK.
 */

import { z } from 'zod';
import { MpcError, MpcErrorCode } from '../api/types';

// ============================================================================
// Schema
// ============================================================================

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const MpcConfigSchema = z.object({
  /** pino level of the root logger */
  logLevel: z.enum(LOG_LEVELS).default('info'),
  /** Log every backend primitive call at trace level */
  traceBackendCalls: z.boolean().default(false),
  /** Permit the reduced-privacy reveal fallback of 128/256-bit division */
  allowRevealFallback: z.boolean().default(true),
});

export type MpcConfig = z.infer<typeof MpcConfigSchema>;
export type MpcConfigInput = z.input<typeof MpcConfigSchema>;
export type LogLevel = (typeof LOG_LEVELS)[number];

// ============================================================================
// Environment Variables
// ============================================================================

const ENV_VARS = {
  LOG_LEVEL: 'MPC_LOG_LEVEL',
  TRACE_BACKEND_CALLS: 'MPC_TRACE_BACKEND_CALLS',
  ALLOW_REVEAL_FALLBACK: 'MPC_ALLOW_REVEAL_FALLBACK',
} as const;

const envFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((raw) => raw === 'true' || raw === '1');

/**
 * Validate a partial configuration and fill in defaults
 */
export function resolveConfig(input: MpcConfigInput = {}): MpcConfig {
  const parsed = MpcConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new MpcError('Invalid configuration', MpcErrorCode.INVALID_CONFIG, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

function readFlag(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const parsed = envFlag.safeParse(raw.toLowerCase());
  if (!parsed.success) {
    throw new MpcError(`${name} must be true/false/1/0`, MpcErrorCode.INVALID_CONFIG, { value: raw });
  }
  return parsed.data;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MpcConfig {
  const input: MpcConfigInput = {};
  const logLevel = env[ENV_VARS.LOG_LEVEL];
  if (logLevel !== undefined && logLevel !== '') {
    const parsed = z.enum(LOG_LEVELS).safeParse(logLevel);
    if (!parsed.success) {
      throw new MpcError(`${ENV_VARS.LOG_LEVEL} must be one of ${LOG_LEVELS.join(', ')}`, MpcErrorCode.INVALID_CONFIG, {
        value: logLevel,
      });
    }
    input.logLevel = parsed.data;
  }
  const trace = readFlag(env, ENV_VARS.TRACE_BACKEND_CALLS);
  if (trace !== undefined) {
    input.traceBackendCalls = trace;
  }
  const allowReveal = readFlag(env, ENV_VARS.ALLOW_REVEAL_FALLBACK);
  if (allowReveal !== undefined) {
    input.allowRevealFallback = allowReveal;
  }
  return resolveConfig(input);
}
