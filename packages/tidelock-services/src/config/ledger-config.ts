/**
 * Ledger Configuration
 *
 * Environment-based configuration for a ledger deployment,
 * validated with zod.
 */

import { z } from 'zod';
import { getAddress, isAddress, type Address } from 'viem';
import {
  ASSET_PROFILES,
  RATIO,
  ZERO_ADDRESS,
  type AssetProfile,
  type IssuancePolicyName,
  type LedgerParameters,
  type PositionModel,
} from '@tidelock/shared';
import { LOG_LEVELS, type LogLevel } from '../logging/index.js';

export interface LedgerConfig {
  /** Base asset profile (decimals, default minimum stake) */
  asset: AssetProfile;

  /** atomic or fractional positions */
  positionModel: PositionModel;

  /** How Principal Claims are issued on stake */
  issuancePolicy: IssuancePolicyName;

  /** Initial owner-mutable parameters */
  parameters: LedgerParameters;

  /** Owner allowed to change parameters */
  owner: Address;

  /** Check ledger invariants before every commit */
  assertInvariants: boolean;

  /** Root log level, applied when a deployment is built */
  logLevel: LogLevel;
}

const uintString = z
  .string()
  .regex(/^\d+$/, 'Must be a non-negative integer')
  .transform((val) => BigInt(val));

const addressString = z
  .string()
  .refine((val) => isAddress(val), { message: 'Invalid address' })
  .transform((val) => getAddress(val));

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((val) => val === 'true' || val === '1');

/**
 * Environment variable schema
 */
export const LedgerEnvSchema = z
  .object({
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    TIDELOCK_ASSET_PROFILE: z.enum(['eth', 'usd']).default('eth'),
    TIDELOCK_POSITION_MODEL: z.enum(['atomic', 'fractional']).default('atomic'),
    TIDELOCK_ISSUANCE_POLICY: z.enum(['additive-yield', 'share-ratio']).default('additive-yield'),
    TIDELOCK_MIN_LOCKUP_DAYS: uintString.default('7'),
    TIDELOCK_MAX_LOCKUP_DAYS: uintString.default('365'),
    TIDELOCK_MIN_STAKE: uintString.optional(),
    TIDELOCK_FORCE_UNSTAKE_FEE_RATE: uintString.default('0'),
    TIDELOCK_BURNED_YIELD_CLAIM_FEE_RATE: uintString.default('0'),
    TIDELOCK_OWNER: addressString.default(ZERO_ADDRESS),
    TIDELOCK_REVENUE_POOL: addressString.default(ZERO_ADDRESS),
    TIDELOCK_YIELD_REPORTER: addressString.default(ZERO_ADDRESS),
    TIDELOCK_ASSERT_INVARIANTS: booleanString.default('true'),
  })
  .refine((env) => env.TIDELOCK_MIN_LOCKUP_DAYS > 0n, {
    message: 'TIDELOCK_MIN_LOCKUP_DAYS must be positive',
    path: ['TIDELOCK_MIN_LOCKUP_DAYS'],
  })
  .refine((env) => env.TIDELOCK_MIN_LOCKUP_DAYS <= env.TIDELOCK_MAX_LOCKUP_DAYS, {
    message: 'TIDELOCK_MIN_LOCKUP_DAYS must not exceed TIDELOCK_MAX_LOCKUP_DAYS',
    path: ['TIDELOCK_MIN_LOCKUP_DAYS'],
  })
  .refine((env) => env.TIDELOCK_FORCE_UNSTAKE_FEE_RATE <= RATIO, {
    message: `TIDELOCK_FORCE_UNSTAKE_FEE_RATE must be at most ${RATIO}`,
    path: ['TIDELOCK_FORCE_UNSTAKE_FEE_RATE'],
  })
  .refine((env) => env.TIDELOCK_BURNED_YIELD_CLAIM_FEE_RATE <= RATIO, {
    message: `TIDELOCK_BURNED_YIELD_CLAIM_FEE_RATE must be at most ${RATIO}`,
    path: ['TIDELOCK_BURNED_YIELD_CLAIM_FEE_RATE'],
  })
  .refine((env) => env.TIDELOCK_MIN_STAKE === undefined || env.TIDELOCK_MIN_STAKE > 0n, {
    message: 'TIDELOCK_MIN_STAKE must be positive',
    path: ['TIDELOCK_MIN_STAKE'],
  });

/**
 * Load configuration from environment variables
 *
 * @throws Error listing every invalid variable
 */
export function loadLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const result = LedgerEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ledger configuration: ${issues}`);
  }

  const parsed = result.data;
  const asset = ASSET_PROFILES[parsed.TIDELOCK_ASSET_PROFILE];

  return {
    asset,
    positionModel: parsed.TIDELOCK_POSITION_MODEL,
    issuancePolicy: parsed.TIDELOCK_ISSUANCE_POLICY,
    parameters: {
      minLockupDays: parsed.TIDELOCK_MIN_LOCKUP_DAYS,
      maxLockupDays: parsed.TIDELOCK_MAX_LOCKUP_DAYS,
      minStake: parsed.TIDELOCK_MIN_STAKE ?? asset.defaultMinStake,
      forceUnstakeFeeRate: parsed.TIDELOCK_FORCE_UNSTAKE_FEE_RATE,
      burnedYieldClaimFeeRate: parsed.TIDELOCK_BURNED_YIELD_CLAIM_FEE_RATE,
      revenuePool: parsed.TIDELOCK_REVENUE_POOL,
      yieldReporter: parsed.TIDELOCK_YIELD_REPORTER,
    },
    owner: parsed.TIDELOCK_OWNER,
    assertInvariants: parsed.TIDELOCK_ASSERT_INVARIANTS,
    logLevel: parsed.LOG_LEVEL,
  };
}
