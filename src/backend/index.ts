/**
 * @file backend/index.ts
 * @brief Word backend contract and implementations
 */

export type { WordBackend, WordOperation } from './word-backend';
export { SimulatedWordBackend, createRecipientKey, decryptUserCiphertext } from './simulated-backend';
export type { SimulatedBackendOptions } from './simulated-backend';
export { MeteredBackend } from './metered-backend';
export type { MeteredBackendOptions } from './metered-backend';
