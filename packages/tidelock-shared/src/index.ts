/**
 * @tidelock/shared
 *
 * Shared types, errors and fixed-point math for the Tidelock staking ledger.
 * Used by the ledger services and the CLI.
 */

export * from './constants.js';
export * from './types/index.js';
export * from './errors/index.js';
export * from './utils/index.js';
