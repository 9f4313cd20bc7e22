/**
 * Ledger Domain Event Type Definitions
 *
 * Unified event schema for everything the staking ledger commits.
 * Events are buffered inside a ledger transaction and published only
 * after it commits.
 */

// ============================================================
// Event Type Discriminators
// ============================================================

/**
 * Position event types - emitted when a position changes
 */
export type PositionEventType =
  | 'position.staked'
  | 'position.unstaked'
  | 'position.lock.extended';

/**
 * Yield pool event types
 */
export type YieldEventType = 'yield.accrued' | 'yield.withdrawn';

/**
 * Configuration event types
 */
export type ParameterEventType = 'parameter.changed';

export type LedgerEventType = PositionEventType | YieldEventType | ParameterEventType;

/**
 * Entity types for routing and filtering
 */
export type LedgerEntityType = 'position' | 'yield-pool' | 'parameters';

// ============================================================
// Event Envelope
// ============================================================

export interface LedgerEventMetadata {
  /** Ledger operation that produced the event (stake, unstake, ...) */
  operation: string;
  /** Address that triggered the operation */
  caller: string;
}

/**
 * Base ledger event interface - the envelope for all events
 *
 * @template TPayload - Event-specific payload type
 */
export interface LedgerEvent<TPayload = unknown> {
  /** Unique event ID (CUID) */
  id: string;

  /** Event type discriminator */
  type: LedgerEventType;

  /** Aggregate/entity ID (position id, parameter name, 'pool') */
  entityId: string;

  /** Entity type for routing and filtering */
  entityType: LedgerEntityType;

  /** Ledger time of the event (unix seconds, as string for bigint) */
  ledgerTime: string;

  /** Wall-clock timestamp (ISO 8601 string) */
  timestamp: string;

  /** Schema version for evolution (start at 1) */
  version: number;

  /** Event-specific payload */
  payload: TPayload;

  metadata: LedgerEventMetadata;
}

// ============================================================
// Payloads (all amounts in smallest units as strings)
// ============================================================

export interface PositionStakedPayload {
  positionId: string;
  model: string;
  owner: string;
  principalAmount: string;
  principalClaimMinted: string;
  yieldClaimMinted: string;
  lockupDays: string;
  deadline: string;
}

export interface PositionUnstakedPayload {
  positionId: string;
  share: string;
  principalShare: string;
  early: boolean;
  yieldClaimBurned: string;
  fee: string;
  payout: string;
  closed: boolean;
}

export interface PositionLockExtendedPayload {
  positionId: string;
  extendDays: string;
  previousDeadline: string;
  newDeadline: string;
  yieldClaimMinted: string;
}

export interface YieldAccruedPayload {
  amount: string;
  totalYieldPoolAfter: string;
}

export interface YieldWithdrawnPayload {
  yieldClaimBurned: string;
  yieldAmount: string;
  totalYieldPoolAfter: string;
}

export interface ParameterChangedPayload {
  name: string;
  previousValue: string;
  newValue: string;
}

// ============================================================
// Typed Event Aliases
// ============================================================

export type PositionStakedEvent = LedgerEvent<PositionStakedPayload>;
export type PositionUnstakedEvent = LedgerEvent<PositionUnstakedPayload>;
export type PositionLockExtendedEvent = LedgerEvent<PositionLockExtendedPayload>;
export type YieldAccruedEvent = LedgerEvent<YieldAccruedPayload>;
export type YieldWithdrawnEvent = LedgerEvent<YieldWithdrawnPayload>;
export type ParameterChangedEvent = LedgerEvent<ParameterChangedPayload>;

/**
 * Maps each event type to its payload for type-safe construction
 */
export interface LedgerEventPayloadMap {
  'position.staked': PositionStakedPayload;
  'position.unstaked': PositionUnstakedPayload;
  'position.lock.extended': PositionLockExtendedPayload;
  'yield.accrued': YieldAccruedPayload;
  'yield.withdrawn': YieldWithdrawnPayload;
  'parameter.changed': ParameterChangedPayload;
}
