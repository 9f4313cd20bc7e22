import { describe, it, expect } from 'vitest';
import { quoteExit } from './quote-exit.js';

const DAY = 86_400n;
const ONE = 10n ** 18n;

describe('quoteExit', () => {
  it('should price an early atomic exit from the remaining days', () => {
    const plan = quoteExit(
      { amount: '1', lockupDays: 30n, elapsedSeconds: 10n * DAY },
      { LOG_LEVEL: 'silent', TIDELOCK_FORCE_UNSTAKE_FEE_RATE: '500' }
    );

    expect(plan).toMatchObject({
      positionId: 1n,
      model: 'atomic',
      early: true,
      remainingDays: 20n,
      yieldClaimBurned: 20n * ONE,
      fee: ONE / 20n,
      payout: ONE - ONE / 20n,
    });
  });

  it('should price a partial fractional exit with the burn fee', () => {
    const plan = quoteExit({
      amount: '1',
      lockupDays: 10n,
      elapsedSeconds: 0n,
      share: ONE / 4n,
      env: { TIDELOCK_POSITION_MODEL: 'fractional', TIDELOCK_BURNED_YIELD_CLAIM_FEE_RATE: '2000' },
    });

    // 0.25 * 10 days * 1.2
    expect(plan.yieldClaimBurned).toBe(3n * ONE);
    expect(plan.closesPosition).toBe(false);
  });

  it('should charge nothing once the lock has run out', () => {
    const plan = quoteExit({ amount: '2.5', lockupDays: 7n, elapsedSeconds: 7n * DAY });

    expect(plan).toMatchObject({ early: false, yieldClaimBurned: 0n, fee: 0n, payout: 2_500_000_000_000_000_000n });
  });
});
