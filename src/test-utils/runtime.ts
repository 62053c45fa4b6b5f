/**
 * Runtime fixtures for tests
 *
 * Builds an IntegerRuntime over the simulated backend, wrapped in the
 * metered backend so tests can count primitive calls.
 */

import type { IntegerType, WideValue } from '../api/types';
import { MpcError } from '../api/types';
import { MeteredBackend } from '../backend/metered-backend';
import { SimulatedWordBackend } from '../backend/simulated-backend';
import type { SimulatedBackendOptions } from '../backend/simulated-backend';
import type { MpcConfigInput } from '../config';
import { resolveConfig } from '../config';
import { createSilentLogger } from '../logging';
import type { IntegerRuntime } from '../integer/runtime';
import { setPublic } from '../integer/boundary';
import { makeWide } from '../integer/limbs';

/** Fixed 16-byte key for reproducible ciphertexts */
export const TEST_NETWORK_KEY = new Uint8Array(16).fill(7);

export interface TestRuntime extends IntegerRuntime {
  readonly backend: MeteredBackend;
  readonly simulated: SimulatedWordBackend;
}

export function createTestRuntime(
  config: MpcConfigInput = {},
  backendOptions: SimulatedBackendOptions = {}
): TestRuntime {
  const simulated = new SimulatedWordBackend({ networkKey: TEST_NETWORK_KEY, ...backendOptions });
  const logger = createSilentLogger();
  return {
    simulated,
    backend: new MeteredBackend(simulated, { logger }),
    logger,
    config: resolveConfig(config),
  };
}

/**
 * Inject a plaintext with every limb treated as possibly non-zero, so
 * operations take their general full-width path
 */
export function fullSpan(rt: IntegerRuntime, value: bigint, type: IntegerType): WideValue {
  const injected = setPublic(rt, value, type);
  return makeWide(injected, injected.limbs);
}

/**
 * Run a function expected to fail with an MpcError and return the error
 */
export function captureError(fn: () => unknown): MpcError {
  try {
    fn();
  } catch (err) {
    if (err instanceof MpcError) {
      return err;
    }
    throw err;
  }
  throw new Error('Expected an MpcError to be thrown');
}
