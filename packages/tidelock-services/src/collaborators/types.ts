/**
 * Collaborator Interfaces
 *
 * The narrow surfaces through which the ledger drives the token contracts
 * and the base-asset wrapper. The revenue pool is an opaque payable
 * address configured in the parameter store. Every mutating call either
 * completes or throws without side effects; the ledger compensates calls
 * that completed before a later failure.
 */

import type { Address } from 'viem';

/**
 * Fungible claim token (Principal Claim or Yield Claim)
 */
export interface ClaimToken {
  readonly symbol: string;
  mint(to: Address, amount: bigint): void;
  /** @throws InsufficientBalanceError when `from` holds less than `amount` */
  burn(from: Address, amount: bigint): void;
  balanceOf(account: Address): bigint;
  totalSupply(): bigint;
}

/**
 * Semi-fungible position-share token, one id per fractional position
 */
export interface PositionShareToken {
  mint(to: Address, positionId: bigint, amount: bigint): void;
  /** @throws InsufficientBalanceError when `from` holds less than `amount` of the id */
  burn(from: Address, positionId: bigint, amount: bigint): void;
  balanceOf(account: Address, positionId: bigint): bigint;
  totalSupply(positionId: bigint): bigint;
}

/**
 * Wrapped, depositable form of the yield-bearing base asset
 */
export interface BaseAssetWrapper {
  readonly address: Address;
  readonly symbol: string;
  balanceOf(account: Address): bigint;
  totalSupply(): bigint;
  /** Move wrapped balance between accounts */
  transfer(from: Address, to: Address, amount: bigint): void;
  /**
   * Burn `amount` of the holder's wrapped balance and pay the raw asset to
   * `recipient` (the holder itself, or a payable sink such as the revenue
   * pool). Not reversible.
   */
  withdraw(holder: Address, amount: bigint, recipient: Address): void;
}

/**
 * Ledger-side yield callback, called by the wrapper
 */
export interface YieldSink {
  accumYieldPool(caller: Address, amount: bigint): void;
}

/**
 * All collaborators of one deployment
 */
export interface LedgerCollaborators {
  baseAsset: BaseAssetWrapper;
  principalClaim: ClaimToken;
  yieldClaim: ClaimToken;
  /** Required by the fractional position model */
  positionShares?: PositionShareToken;
}
