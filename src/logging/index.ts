/**
 * @file logging/index.ts
 * @brief pino logger factory
 */

import pino from 'pino';
import type { Logger } from 'pino';
import type { MpcConfig } from '../config';

export const LOGGER_NAME = 'mpc-wide-int';

export function createLogger(config: Pick<MpcConfig, 'logLevel'>): Logger {
  return pino({ name: LOGGER_NAME, level: config.logLevel });
}

/** Logger that drops everything */
export function createSilentLogger(): Logger {
  return pino({ name: LOGGER_NAME, level: 'silent' });
}
