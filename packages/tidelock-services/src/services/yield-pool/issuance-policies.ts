/**
 * Issuance Policies
 *
 * Decide how many Principal Claim and Yield Claim units a stake mints.
 * Both policies mint Yield Claims as day-weighted principal
 * (`principal * lockupDays`); they differ in the Principal Claim count.
 */

import {
  checkedMul,
  checkedSub,
  mulDiv,
  type Issuance,
  type IssuancePolicyName,
} from '@tidelock/shared';

/**
 * Ledger quantities an issuance policy may read
 */
export interface IssuanceContext {
  principal: bigint;
  lockupDays: bigint;
  totalYieldPool: bigint;
  yieldClaimSupply: bigint;
  principalClaimSupply: bigint;
  /** Base-asset balance held in custody by the ledger, before this stake */
  custodyBalance: bigint;
}

export interface IssuancePolicy {
  readonly name: IssuancePolicyName;
  computeIssuance(context: IssuanceContext): Issuance;
}

/**
 * Yield Claims minted for a principal locked for `days`
 */
export function dayWeightedYieldClaim(principal: bigint, days: bigint): bigint {
  return checkedMul(principal, days, 'yield claim issuance');
}

/**
 * Depositor pre-pays for a pro-rata share of the pooled yield: the new
 * Yield Claims are immediately worth `yieldClaim * pool / supply`, and that
 * amount is deducted from the Principal Claims minted.
 */
export class AdditiveYieldIssuance implements IssuancePolicy {
  readonly name = 'additive-yield' as const;

  computeIssuance(context: IssuanceContext): Issuance {
    const yieldClaimMinted = dayWeightedYieldClaim(context.principal, context.lockupDays);
    const prepaidYield =
      context.yieldClaimSupply === 0n
        ? 0n
        : mulDiv(yieldClaimMinted, context.totalYieldPool, context.yieldClaimSupply, 'prepaid yield');

    return {
      principalClaimMinted: checkedSub(context.principal, prepaidYield, 'principal claim issuance'),
      yieldClaimMinted,
    };
  }
}

/**
 * Vault share price: Principal Claims are minted at
 * `principalClaimSupply / custodyBalance`, 1:1 while either is zero.
 */
export class ShareRatioIssuance implements IssuancePolicy {
  readonly name = 'share-ratio' as const;

  computeIssuance(context: IssuanceContext): Issuance {
    const yieldClaimMinted = dayWeightedYieldClaim(context.principal, context.lockupDays);
    const principalClaimMinted =
      context.principalClaimSupply === 0n || context.custodyBalance === 0n
        ? context.principal
        : mulDiv(context.principal, context.principalClaimSupply, context.custodyBalance, 'share-ratio issuance');

    return { principalClaimMinted, yieldClaimMinted };
  }
}

export function createIssuancePolicy(name: IssuancePolicyName): IssuancePolicy {
  switch (name) {
    case 'additive-yield':
      return new AdditiveYieldIssuance();
    case 'share-ratio':
      return new ShareRatioIssuance();
  }
}
