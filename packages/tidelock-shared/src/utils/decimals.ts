/**
 * Asset profile and decimal utilities
 *
 * A deployment stakes exactly one base asset. The profile fixes its
 * decimals and the default minimum stake used when none is configured.
 */

import { formatUnits, parseUnits } from 'viem';

/**
 * Supported base-asset profiles
 */
export type AssetProfileName = 'eth' | 'usd';

export interface AssetProfile {
  name: AssetProfileName;
  /** Display symbol of the wrapped base asset */
  symbol: string;
  /** Decimals of the base asset */
  decimals: number;
  /** Default minimum stake, in smallest units */
  defaultMinStake: bigint;
}

/**
 * Both profiles use 18 decimals; the ETH deployment accepts stakes down to
 * 0.001 ETH (1e15), the USD deployment down to 1 USD (1e18).
 */
export const ASSET_PROFILES: Record<AssetProfileName, AssetProfile> = {
  eth: {
    name: 'eth',
    symbol: 'ETH',
    decimals: 18,
    defaultMinStake: 10n ** 15n,
  },
  usd: {
    name: 'usd',
    symbol: 'USD',
    decimals: 18,
    defaultMinStake: 10n ** 18n,
  },
};

/**
 * Format an amount in smallest units for display
 *
 * @example
 * formatAssetAmount(1_500_000_000_000_000_000n, ASSET_PROFILES.eth);
 * // Returns: '1.5 ETH'
 */
export function formatAssetAmount(value: bigint, profile: AssetProfile): string {
  return `${formatUnits(value, profile.decimals)} ${profile.symbol}`;
}

/**
 * Parse a human-readable decimal string into smallest units
 *
 * @example
 * parseAssetAmount('0.25', ASSET_PROFILES.usd);
 * // Returns: 250_000_000_000_000_000n
 */
export function parseAssetAmount(value: string, profile: AssetProfile): bigint {
  return parseUnits(value, profile.decimals);
}
