/**
 * Tidelock - Staking Ledger Services
 *
 * Lockup policy, position ledger, yield pool accounting, exit settlement
 * and parameter store behind a single staking ledger facade.
 */

// Re-export shared types from @tidelock/shared
export * from '@tidelock/shared';

// Export configuration
export * from './config/index.js';

// Export logging utilities
export * from './logging/index.js';

// Export runtime plumbing
export * from './clock/index.js';
export * from './transaction/index.js';
export * from './collaborators/index.js';

// Export services
export * from './services/parameter-store/index.js';
export * from './services/lockup-policy/index.js';
export * from './services/position-ledger/index.js';
export * from './services/yield-pool/index.js';
export * from './services/settlement/index.js';
export * from './services/staking-ledger/index.js';

// Export domain events
export * from './events/index.js';
