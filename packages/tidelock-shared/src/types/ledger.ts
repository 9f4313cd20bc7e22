/**
 * Ledger Types
 *
 * Parameters, issuance results, settlement plans and state snapshots
 * shared by the ledger services and the CLI.
 */

import type { Address } from 'viem';
import type { PositionModel } from './position.js';

/**
 * How many Principal Claim units a stake mints.
 * additive-yield = depositor pre-pays for the pooled yield its Yield Claims share
 * share-ratio    = vault share price over the custody balance
 */
export type IssuancePolicyName = 'additive-yield' | 'share-ratio';

/**
 * Owner-mutable ledger parameters
 */
export interface LedgerParameters {
  minLockupDays: bigint;
  maxLockupDays: bigint;
  /** Minimum principal per stake, in smallest units */
  minStake: bigint;
  /** Principal fee on early exit, basis points */
  forceUnstakeFeeRate: bigint;
  /** Extra Yield Claim clawback on early exit (fractional model), basis points */
  burnedYieldClaimFeeRate: bigint;
  /** Sink for collected exit fees */
  revenuePool: Address;
  /** The only caller allowed to accrue yield */
  yieldReporter: Address;
}

export type LedgerParameterName = keyof LedgerParameters;

/**
 * Result of applying an issuance policy to a stake
 */
export interface Issuance {
  principalClaimMinted: bigint;
  yieldClaimMinted: bigint;
}

/**
 * Everything an exit moves, computed before anything is moved
 */
export interface ExitPlan {
  positionId: bigint;
  model: PositionModel;
  /** Principal Claim / position-share units being redeemed */
  share: bigint;
  /** Base-asset units released from the position */
  principalShare: bigint;
  /** True when the exit happens before the deadline */
  early: boolean;
  /** Whole days left on the lock, rounded up */
  remainingDays: bigint;
  /** Yield Claim units clawed back */
  yieldClaimBurned: bigint;
  /** Base-asset units routed to the revenue pool */
  fee: bigint;
  /** Base-asset units paid to the caller */
  payout: bigint;
  /** Position deadline after the exit */
  deadlineAfter: bigint;
  /** True when the exit leaves nothing outstanding */
  closesPosition: boolean;
}

/**
 * Point-in-time view of the whole ledger
 */
export interface LedgerState {
  positionModel: PositionModel;
  issuancePolicy: IssuancePolicyName;
  totalStaked: bigint;
  totalYieldPool: bigint;
  principalClaimSupply: bigint;
  yieldClaimSupply: bigint;
  custodyBalance: bigint;
  nextPositionId: bigint;
  openPositions: number;
  parameters: LedgerParameters;
}
