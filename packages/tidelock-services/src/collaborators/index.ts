/**
 * Ledger collaborators
 */

export type {
  ClaimToken,
  PositionShareToken,
  BaseAssetWrapper,
  YieldSink,
  LedgerCollaborators,
} from './types.js';
export * from './memory/index.js';
