/**
 * @file integer/runtime.ts
 * @brief Capabilities passed explicitly to every integer operation
 */

import type { Logger } from 'pino';
import type { MpcConfig } from '../config';
import type { WordBackend } from '../backend/word-backend';

export interface IntegerRuntime {
  readonly backend: WordBackend;
  readonly logger: Logger;
  readonly config: MpcConfig;
}
