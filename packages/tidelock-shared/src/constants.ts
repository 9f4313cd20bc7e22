/**
 * Ledger constants
 */

/** Basis-point denominator for every fee rate */
export const RATIO = 10_000n;

/** Seconds in one lockup day */
export const SECONDS_PER_DAY = 86_400n;

/** Upper bound of the numeric domain every ledger amount lives in */
export const UINT256_MAX = (1n << 256n) - 1n;

/** Sentinel address used for "no address configured" */
export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000' as const;
