/**
 * Scenario Schema
 *
 * A scenario is a JSON script of ledger operations replayed against an
 * in-memory deployment. Amounts, ids and durations are decimal strings in
 * smallest units so that they survive JSON without losing precision.
 */

import { z } from 'zod';
import { getAddress, isAddress } from 'viem';
import type { LedgerErrorCode } from '@tidelock/services';

const uint = z
  .string()
  .regex(/^\d+$/, 'Must be a non-negative integer string')
  .transform((val) => BigInt(val));

const address = z
  .string()
  .refine((val) => isAddress(val), { message: 'Invalid address' })
  .transform((val) => getAddress(val));

const LEDGER_ERROR_CODES = [
  'ZeroInput',
  'MinStakeInsufficient',
  'InvalidLockupDays',
  'InvalidExtendDays',
  'InvalidLockupBounds',
  'InvalidShareAmount',
  'InvalidAddress',
  'FeeRateOverflow',
  'ForceUnstakeFeeOverflow',
  'PermissionDenied',
  'PositionClosed',
  'PositionNotFound',
  'ReachedDeadline',
  'WrongPositionModel',
  'ReentrantCall',
  'ArithmeticOverflow',
  'ArithmeticUnderflow',
  'InsufficientYieldClaim',
  'InsufficientBalance',
  'LedgerInvariantViolation',
] as const satisfies readonly LedgerErrorCode[];

/** Fields every step may carry */
const stepBase = {
  /** Error code the step is expected to fail with */
  expectError: z.enum(LEDGER_ERROR_CODES).optional(),
};

const StakeStepSchema = z.object({
  ...stepBase,
  op: z.literal('stake'),
  caller: address,
  amount: uint,
  lockupDays: uint,
  positionOwner: address.optional(),
  principalRecipient: address.optional(),
  yieldRecipient: address.optional(),
});

const UnstakeStepSchema = z.object({
  ...stepBase,
  op: z.literal('unstake'),
  caller: address,
  positionId: uint,
});

const RedeemStepSchema = z.object({
  ...stepBase,
  op: z.literal('redeem'),
  caller: address,
  positionId: uint,
  share: uint,
});

const ExtendStepSchema = z.object({
  ...stepBase,
  op: z.literal('extend'),
  caller: address,
  positionId: uint,
  extendDays: uint,
});

const WithdrawYieldStepSchema = z.object({
  ...stepBase,
  op: z.literal('withdrawYield'),
  caller: address,
  yieldClaim: uint,
});

const ReportYieldStepSchema = z.object({
  ...stepBase,
  op: z.literal('reportYield'),
  amount: uint,
});

const AdvanceStepSchema = z.object({
  ...stepBase,
  op: z.literal('advance'),
  days: uint.optional(),
  seconds: uint.optional(),
});

const SetParameterStepSchema = z.object({
  ...stepBase,
  op: z.literal('setParameter'),
  caller: address,
  name: z.enum([
    'minLockupDays',
    'maxLockupDays',
    'minStake',
    'forceUnstakeFeeRate',
    'burnedYieldClaimFeeRate',
    'revenuePool',
    'yieldReporter',
  ]),
  value: z.string(),
});

const TransferStepSchema = z.object({
  ...stepBase,
  op: z.literal('transfer'),
  token: z.enum(['baseAsset', 'principalClaim', 'yieldClaim']),
  from: address,
  to: address,
  amount: uint,
});

export const ScenarioStepSchema = z.discriminatedUnion('op', [
  StakeStepSchema,
  UnstakeStepSchema,
  RedeemStepSchema,
  ExtendStepSchema,
  WithdrawYieldStepSchema,
  ReportYieldStepSchema,
  AdvanceStepSchema,
  SetParameterStepSchema,
  TransferStepSchema,
]);

export const ScenarioSchema = z.object({
  name: z.string().default('scenario'),
  /** Ledger environment overrides (TIDELOCK_* variables) */
  env: z.record(z.string()).default({}),
  startTime: uint.default('0'),
  /** Wrapped base asset credited before the first step */
  funding: z.array(z.object({ account: address, amount: uint })).default([]),
  steps: z.array(ScenarioStepSchema),
});

export type ScenarioStep = z.infer<typeof ScenarioStepSchema>;
export type Scenario = z.infer<typeof ScenarioSchema>;

/**
 * Validate raw JSON into a scenario
 *
 * @throws Error listing every schema violation
 */
export function parseScenario(raw: unknown): Scenario {
  const result = ScenarioSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid scenario: ${issues}`);
  }
  return result.data;
}
