import { formatAssetAmount, type AssetProfile, type ExitPlan, type LedgerState } from '@tidelock/services';

/**
 * JSON.stringify replacer that writes bigints as decimal strings
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, bigintReplacer, 2);
}

export function formatState(state: LedgerState, asset: AssetProfile): string[] {
  return [
    `   Model:            ${state.positionModel} / ${state.issuancePolicy}`,
    `   Total staked:     ${formatAssetAmount(state.totalStaked, asset)}`,
    `   Yield pool:       ${formatAssetAmount(state.totalYieldPool, asset)}`,
    `   Custody:          ${formatAssetAmount(state.custodyBalance, asset)}`,
    `   Principal claims: ${state.principalClaimSupply}`,
    `   Yield claims:     ${state.yieldClaimSupply}`,
    `   Open positions:   ${state.openPositions}`,
  ];
}

export function formatExitPlan(plan: ExitPlan, asset: AssetProfile): string[] {
  return [
    `   Position:         #${plan.positionId} (${plan.model})`,
    `   Exit:             ${plan.early ? `early, ${plan.remainingDays} day(s) left` : 'on time'}`,
    `   Principal:        ${formatAssetAmount(plan.principalShare, asset)}`,
    `   Yield claims burned: ${plan.yieldClaimBurned}`,
    `   Fee:              ${formatAssetAmount(plan.fee, asset)}`,
    `   Payout:           ${formatAssetAmount(plan.payout, asset)}`,
  ];
}
