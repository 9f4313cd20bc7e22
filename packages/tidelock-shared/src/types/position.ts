/**
 * Position Types
 *
 * Type definitions for staked positions, model discrimination
 * and JSON serialization.
 */

import type { Address } from 'viem';

// ============================================================================
// MODEL DISCRIMINATORS
// ============================================================================

/**
 * Position models.
 * atomic     = single owner, all-or-nothing exit, closed exactly once
 * fractional = multi-owner via position shares, partially redeemable
 */
export type PositionModel = 'atomic' | 'fractional';

/**
 * Lifecycle status of a position
 */
export type PositionStatus = 'open' | 'closed';

// ============================================================================
// POSITION RECORDS
// ============================================================================

interface BasePosition {
  /** Monotonically increasing id, never reused */
  id: bigint;
  /** Base-asset units still locked in the position */
  principalAmount: bigint;
  /** Principal Claim units outstanding against the position */
  principalClaimAmount: bigint;
  /** Unix seconds after which no early-exit penalty applies */
  deadline: bigint;
  /** Unix seconds at creation */
  createdAt: bigint;
  /** Terminal flag; a closed position is never mutated again */
  closed: boolean;
}

export interface AtomicPosition extends BasePosition {
  model: 'atomic';
  /** Only address allowed to unstake or extend the position */
  owner: Address;
}

/**
 * Share balances live in the external position-share token,
 * keyed by position id.
 */
export interface FractionalPosition extends BasePosition {
  model: 'fractional';
}

export type Position = AtomicPosition | FractionalPosition;

export function isAtomicPosition(position: Position): position is AtomicPosition {
  return position.model === 'atomic';
}

export function getPositionStatus(position: Position): PositionStatus {
  return position.closed ? 'closed' : 'open';
}

// ============================================================================
// JSON SERIALIZATION
// ============================================================================

/**
 * JSON representation of a Position.
 * All bigint fields are decimal strings.
 */
export interface PositionJSON {
  id: string;
  model: PositionModel;
  status: PositionStatus;
  principalAmount: string;
  principalClaimAmount: string;
  deadline: string;
  createdAt: string;
  owner: Address | null;
}

export function positionToJSON(position: Position): PositionJSON {
  return {
    id: position.id.toString(),
    model: position.model,
    status: getPositionStatus(position),
    principalAmount: position.principalAmount.toString(),
    principalClaimAmount: position.principalClaimAmount.toString(),
    deadline: position.deadline.toString(),
    createdAt: position.createdAt.toString(),
    owner: isAtomicPosition(position) ? position.owner : null,
  };
}
