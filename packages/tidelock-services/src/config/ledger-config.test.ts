import { describe, it, expect } from 'vitest';
import { loadLedgerConfig } from './ledger-config.js';

describe('loadLedgerConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadLedgerConfig({});

    expect(config.asset.name).toBe('eth');
    expect(config.positionModel).toBe('atomic');
    expect(config.issuancePolicy).toBe('additive-yield');
    expect(config.assertInvariants).toBe(true);
    expect(config.logLevel).toBe('info');
    expect(config.parameters).toEqual({
      minLockupDays: 7n,
      maxLockupDays: 365n,
      minStake: 1_000_000_000_000_000n,
      forceUnstakeFeeRate: 0n,
      burnedYieldClaimFeeRate: 0n,
      revenuePool: '0x0000000000000000000000000000000000000000',
      yieldReporter: '0x0000000000000000000000000000000000000000',
    });
  });

  it('should take the USD default minimum stake', () => {
    const config = loadLedgerConfig({ TIDELOCK_ASSET_PROFILE: 'usd' });
    expect(config.parameters.minStake).toBe(1_000_000_000_000_000_000n);
  });

  it('should parse every variable', () => {
    const config = loadLedgerConfig({
      LOG_LEVEL: 'debug',
      TIDELOCK_POSITION_MODEL: 'fractional',
      TIDELOCK_ISSUANCE_POLICY: 'share-ratio',
      TIDELOCK_MIN_LOCKUP_DAYS: '1',
      TIDELOCK_MAX_LOCKUP_DAYS: '30',
      TIDELOCK_MIN_STAKE: '100',
      TIDELOCK_FORCE_UNSTAKE_FEE_RATE: '500',
      TIDELOCK_BURNED_YIELD_CLAIM_FEE_RATE: '2000',
      TIDELOCK_OWNER: '0x9999999999999999999999999999999999999999',
      TIDELOCK_ASSERT_INVARIANTS: '0',
    });

    expect(config.logLevel).toBe('debug');
    expect(config.positionModel).toBe('fractional');
    expect(config.issuancePolicy).toBe('share-ratio');
    expect(config.owner).toBe('0x9999999999999999999999999999999999999999');
    expect(config.assertInvariants).toBe(false);
    expect(config.parameters).toMatchObject({
      minLockupDays: 1n,
      maxLockupDays: 30n,
      minStake: 100n,
      forceUnstakeFeeRate: 500n,
      burnedYieldClaimFeeRate: 2_000n,
    });
  });

  it('should reject lockup bounds with min above max', () => {
    expect(() =>
      loadLedgerConfig({ TIDELOCK_MIN_LOCKUP_DAYS: '40', TIDELOCK_MAX_LOCKUP_DAYS: '30' })
    ).toThrowError(
      'Invalid ledger configuration: TIDELOCK_MIN_LOCKUP_DAYS: TIDELOCK_MIN_LOCKUP_DAYS must not exceed TIDELOCK_MAX_LOCKUP_DAYS'
    );
  });

  it('should reject fee rates above the basis-point ratio', () => {
    expect(() => loadLedgerConfig({ TIDELOCK_FORCE_UNSTAKE_FEE_RATE: '10001' })).toThrowError(
      /TIDELOCK_FORCE_UNSTAKE_FEE_RATE must be at most 10000/
    );
  });

  it('should reject non-numeric amounts and unknown models', () => {
    expect(() => loadLedgerConfig({ TIDELOCK_MIN_STAKE: '1e18' })).toThrowError(
      /TIDELOCK_MIN_STAKE: Must be a non-negative integer/
    );
    expect(() => loadLedgerConfig({ TIDELOCK_POSITION_MODEL: 'pooled' })).toThrowError(
      /TIDELOCK_POSITION_MODEL/
    );
    expect(() => loadLedgerConfig({ LOG_LEVEL: 'loud' })).toThrowError(/LOG_LEVEL/);
  });

  it('should reject malformed addresses', () => {
    expect(() => loadLedgerConfig({ TIDELOCK_REVENUE_POOL: '0x12' })).toThrowError(
      /TIDELOCK_REVENUE_POOL: Invalid address/
    );
  });
});
