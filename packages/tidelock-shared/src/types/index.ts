/**
 * Type exports
 */

export * from './position.js';
export * from './ledger.js';
