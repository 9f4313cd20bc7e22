/**
 * Ledger Service Test Fixtures
 *
 * Addresses, parameters and configurations shared by the service tests.
 */

import type { Address } from 'viem';
import { ASSET_PROFILES, type LedgerParameters } from '@tidelock/shared';
import type { LedgerConfig } from '../config/index.js';
import { ManualClock } from '../clock/index.js';
import { InMemoryEventPublisher } from '../events/index.js';
import { TransactionManager } from '../transaction/index.js';

// ============================================================================
// MOCK ADDRESSES
// ============================================================================

export const MOCK_ALICE: Address = '0x1111111111111111111111111111111111111111';
export const MOCK_BOB: Address = '0x2222222222222222222222222222222222222222';
export const MOCK_CAROL: Address = '0x3333333333333333333333333333333333333333';
export const MOCK_REVENUE_POOL: Address = '0x7777777777777777777777777777777777777777';
export const MOCK_OWNER: Address = '0x9999999999999999999999999999999999999999';

export const DAY = 86_400n;

// ============================================================================
// PARAMETER FIXTURES
// ============================================================================

export function createMockParameters(overrides: Partial<LedgerParameters> = {}): LedgerParameters {
  return {
    minLockupDays: 1n,
    maxLockupDays: 365n,
    minStake: 100n,
    forceUnstakeFeeRate: 500n,
    burnedYieldClaimFeeRate: 0n,
    revenuePool: MOCK_REVENUE_POOL,
    yieldReporter: '0x0000000000000000000000000000000000000000',
    ...overrides,
  };
}

export function createMockConfig(
  overrides: Partial<Omit<LedgerConfig, 'parameters'>> = {},
  parameters: Partial<LedgerParameters> = {}
): LedgerConfig {
  return {
    asset: ASSET_PROFILES.eth,
    positionModel: 'atomic',
    issuancePolicy: 'additive-yield',
    owner: MOCK_OWNER,
    assertInvariants: true,
    logLevel: 'silent',
    ...overrides,
    parameters: createMockParameters(parameters),
  };
}

// ============================================================================
// PLUMBING
// ============================================================================

export function createMockRuntime(start = 0n) {
  const publisher = new InMemoryEventPublisher();
  return {
    publisher,
    clock: new ManualClock(start),
    transactions: new TransactionManager({ publisher }),
  };
}
