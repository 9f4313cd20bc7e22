import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  ArithmeticUnderflowError,
  InsufficientBalanceError,
  InvalidLockupDaysError,
  InvalidShareAmountError,
  MinStakeInsufficientError,
  PermissionDeniedError,
  PositionClosedError,
  WrongPositionModelError,
  ZeroInputError,
  isLedgerError,
} from '@tidelock/shared';
import { createInMemoryDeployment, type InMemoryDeployment } from './in-memory-deployment.js';
import {
  DAY,
  MOCK_ALICE,
  MOCK_BOB,
  MOCK_CAROL,
  MOCK_OWNER,
  MOCK_REVENUE_POOL,
  createMockConfig,
} from '../test-fixtures.js';

describe('StakingLedgerService', () => {
  describe('atomic model, additive-yield issuance', () => {
    let deployment: InMemoryDeployment;

    beforeEach(() => {
      deployment = createInMemoryDeployment(createMockConfig());
      deployment.baseAsset.deposit(MOCK_ALICE, 10_000n);
      deployment.baseAsset.deposit(MOCK_BOB, 10_000n);
    });

    describe('stake', () => {
      it('should mint 1:1 principal claims and day-weighted yield claims into an empty pool', () => {
        const { ledger, principalClaim, yieldClaim, baseAsset } = deployment;

        const result = ledger.stake(MOCK_ALICE, { amount: 1_000n, lockupDays: 10n });

        expect(result).toEqual({
          positionId: 1n,
          principalClaimMinted: 1_000n,
          yieldClaimMinted: 10_000n,
          deadline: 10n * DAY,
        });
        expect(principalClaim.balanceOf(MOCK_ALICE)).toBe(1_000n);
        expect(yieldClaim.balanceOf(MOCK_ALICE)).toBe(10_000n);
        expect(baseAsset.balanceOf(MOCK_ALICE)).toBe(9_000n);
        expect(ledger.state()).toMatchObject({
          totalStaked: 1_000n,
          totalYieldPool: 0n,
          custodyBalance: 1_000n,
          openPositions: 1,
          nextPositionId: 2n,
        });
        expect(ledger.averageStakeDays()).toBe(10n);
      });

      it('should emit position.staked on commit', () => {
        deployment.ledger.stake(MOCK_ALICE, { amount: 1_000n, lockupDays: 10n });

        const [event] = deployment.publisher.events('position.staked');
        expect(event?.entityId).toBe('1');
        expect(event?.payload).toEqual({
          positionId: '1',
          model: 'atomic',
          owner: MOCK_ALICE,
          principalAmount: '1000',
          principalClaimMinted: '1000',
          yieldClaimMinted: '10000',
          lockupDays: '10',
          deadline: '864000',
        });
        expect(event?.metadata).toEqual({ operation: 'stake', caller: MOCK_ALICE });
      });

      it('should route claims to the requested recipients', () => {
        const { ledger, principalClaim, yieldClaim } = deployment;

        ledger.stake(MOCK_ALICE, {
          amount: 1_000n,
          lockupDays: 3n,
          principalRecipient: MOCK_BOB,
          yieldRecipient: MOCK_CAROL,
        });

        expect(principalClaim.balanceOf(MOCK_BOB)).toBe(1_000n);
        expect(yieldClaim.balanceOf(MOCK_CAROL)).toBe(3_000n);
        expect(ledger.positionsOf(MOCK_ALICE).map((p) => p.id)).toEqual([1n]);
      });

      it('should deduct prepaid yield for a later staker', () => {
        const { ledger, baseAsset } = deployment;
        ledger.stake(MOCK_ALICE, { amount: 1_000n, lockupDays: 10n });
        baseAsset.reportYield(300n);

        const result = ledger.stake(MOCK_BOB, { amount: 1_000n, lockupDays: 10n });

        // 10_000 yield claims against 10_000 outstanding on a 300 pool
        expect(result.principalClaimMinted).toBe(700n);
        expect(ledger.state().totalStaked).toBe(2_000n);
      });

      it('should validate inputs before moving anything', () => {
        const { ledger } = deployment;

        expect(() => ledger.stake(MOCK_ALICE, { amount: 0n, lockupDays: 10n })).toThrowError(ZeroInputError);
        expect(() => ledger.stake(MOCK_ALICE, { amount: 99n, lockupDays: 10n })).toThrowError(
          MinStakeInsufficientError
        );
        expect(() => ledger.stake(MOCK_ALICE, { amount: 100n, lockupDays: 366n })).toThrowError(
          InvalidLockupDaysError
        );
        expect(() => ledger.stake(MOCK_ALICE, { amount: 100n, lockupDays: 0n })).toThrowError(
          InvalidLockupDaysError
        );
        expect(deployment.baseAsset.balanceOf(MOCK_ALICE)).toBe(10_000n);
      });

      it('should accept the lockup bounds themselves', () => {
        const { ledger } = deployment;
        expect(ledger.stake(MOCK_ALICE, { amount: 100n, lockupDays: 1n }).positionId).toBe(1n);
        expect(ledger.stake(MOCK_ALICE, { amount: 100n, lockupDays: 365n }).positionId).toBe(2n);
      });

      it('should roll back completely when a claim mint fails', () => {
        const { ledger, yieldClaim, principalClaim, baseAsset, publisher } = deployment;
        const before = ledger.state();
        vi.spyOn(yieldClaim, 'mint').mockImplementationOnce(() => {
          throw new Error('yield claim paused');
        });

        expect(() => ledger.stake(MOCK_ALICE, { amount: 1_000n, lockupDays: 10n })).toThrowError(
          'yield claim paused'
        );

        expect(ledger.state()).toEqual(before);
        expect(baseAsset.balanceOf(MOCK_ALICE)).toBe(10_000n);
        expect(principalClaim.balanceOf(MOCK_ALICE)).toBe(0n);
        expect(publisher.events()).toEqual([]);
        expect(ledger.stake(MOCK_ALICE, { amount: 1_000n, lockupDays: 10n }).positionId).toBe(1n);
      });
    });

    describe('unstake', () => {
      beforeEach(() => {
        deployment.ledger.stake(MOCK_ALICE, { amount: 1_000n, lockupDays: 10n });
      });

      it('should claw back every remaining day and charge the fee on an immediate exit', () => {
        const { ledger, baseAsset, yieldClaim, principalClaim } = deployment;

        const plan = ledger.unstake(MOCK_ALICE, 1n);

        expect(plan).toMatchObject({
          early: true,
          remainingDays: 10n,
          yieldClaimBurned: 10_000n,
          fee: 50n,
          payout: 950n,
        });
        expect(baseAsset.balanceOf(MOCK_ALICE)).toBe(9_950n);
        expect(baseAsset.rawBalanceOf(MOCK_REVENUE_POOL)).toBe(50n);
        expect(yieldClaim.balanceOf(MOCK_ALICE)).toBe(0n);
        expect(principalClaim.balanceOf(MOCK_ALICE)).toBe(0n);
        expect(ledger.getPosition(1n)).toMatchObject({ closed: true, deadline: 0n });
        expect(ledger.state()).toMatchObject({ totalStaked: 0n, custodyBalance: 0n, openPositions: 0 });
      });

      it('should return the full principal at the deadline', () => {
        const { ledger, clock, baseAsset, yieldClaim } = deployment;
        clock.advance(10n * DAY);

        const plan = ledger.unstake(MOCK_ALICE, 1n);

        expect(plan).toMatchObject({ early: false, yieldClaimBurned: 0n, fee: 0n, payout: 1_000n });
        expect(baseAsset.balanceOf(MOCK_ALICE)).toBe(10_000n);
        expect(yieldClaim.balanceOf(MOCK_ALICE)).toBe(10_000n);
      });

      it('should burn a full day one second before the deadline', () => {
        deployment.clock.set(10n * DAY - 1n);
        expect(deployment.ledger.unstake(MOCK_ALICE, 1n).yieldClaimBurned).toBe(1_000n);
      });

      it('should fail a second close with PositionClosed and leave state unchanged', () => {
        const { ledger, baseAsset, publisher } = deployment;
        ledger.unstake(MOCK_ALICE, 1n);
        const before = ledger.state();
        const balance = baseAsset.balanceOf(MOCK_ALICE);
        const events = publisher.events().length;

        expect(() => ledger.unstake(MOCK_ALICE, 1n)).toThrowError(PositionClosedError);

        expect(ledger.state()).toEqual(before);
        expect(baseAsset.balanceOf(MOCK_ALICE)).toBe(balance);
        expect(publisher.events()).toHaveLength(events);
      });

      it('should refuse to quote an exit of a closed position', () => {
        const { ledger } = deployment;
        ledger.unstake(MOCK_ALICE, 1n);

        expect(() => ledger.quoteExit(1n)).toThrowError(PositionClosedError);
      });

      it('should check the owner before anything else', () => {
        expect(() => deployment.ledger.unstake(MOCK_BOB, 1n)).toThrowError(PermissionDeniedError);
      });

      it('should roll back when the caller no longer holds the clawback', () => {
        const { ledger, yieldClaim, principalClaim, baseAsset } = deployment;
        yieldClaim.transfer(MOCK_ALICE, MOCK_BOB, 1n);

        expect(() => ledger.unstake(MOCK_ALICE, 1n)).toThrowError(InsufficientBalanceError);

        expect(ledger.getPosition(1n)).toMatchObject({ closed: false, deadline: 10n * DAY });
        expect(principalClaim.balanceOf(MOCK_ALICE)).toBe(1_000n);
        expect(baseAsset.balanceOf(ledger.address)).toBe(1_000n);
        expect(baseAsset.rawBalanceOf(MOCK_REVENUE_POOL)).toBe(0n);
        expect(ledger.state().totalStaked).toBe(1_000n);
      });

      it('should apply parameter changes to later exits', () => {
        const { ledger, baseAsset } = deployment;
        ledger.parameters.setForceUnstakeFeeRate(MOCK_OWNER, 1_000n);
        ledger.parameters.setRevenuePool(MOCK_OWNER, MOCK_CAROL);

        expect(ledger.quoteExit(1n).fee).toBe(100n);
        ledger.unstake(MOCK_ALICE, 1n);

        expect(baseAsset.rawBalanceOf(MOCK_CAROL)).toBe(100n);
        expect(baseAsset.rawBalanceOf(MOCK_REVENUE_POOL)).toBe(0n);
      });

      it('should emit position.unstaked', () => {
        deployment.ledger.unstake(MOCK_ALICE, 1n);

        const [event] = deployment.publisher.events('position.unstaked');
        expect(event?.payload).toEqual({
          positionId: '1',
          share: '1000',
          principalShare: '1000',
          early: true,
          yieldClaimBurned: '10000',
          fee: '50',
          payout: '950',
          closed: true,
        });
      });

      it('should refuse redeem in the atomic model', () => {
        expect(() => deployment.ledger.redeem(MOCK_ALICE, 1n, 10n)).toThrowError(WrongPositionModelError);
      });
    });

    describe('extendLockTime', () => {
      beforeEach(() => {
        deployment.ledger.stake(MOCK_ALICE, { amount: 1_000n, lockupDays: 10n });
      });

      it('should move the deadline and mint the added days of yield claims', () => {
        const { ledger, yieldClaim, publisher } = deployment;

        const result = ledger.extendLockTime(MOCK_ALICE, 1n, 5n);

        expect(result).toEqual({ positionId: 1n, newDeadline: 15n * DAY, yieldClaimMinted: 5_000n });
        expect(ledger.getPosition(1n).deadline).toBe(15n * DAY);
        expect(yieldClaim.balanceOf(MOCK_ALICE)).toBe(15_000n);
        expect(publisher.events('position.lock.extended')[0]?.payload).toEqual({
          positionId: '1',
          extendDays: '5',
          previousDeadline: '864000',
          newDeadline: '1296000',
          yieldClaimMinted: '5000',
        });
      });

      it('should reject a non-owner', () => {
        expect(() => deployment.ledger.extendLockTime(MOCK_BOB, 1n, 5n)).toThrowError(PermissionDeniedError);
      });

      it('should reject a lock that has run out', () => {
        deployment.clock.advance(10n * DAY);
        expect(() => deployment.ledger.extendLockTime(MOCK_ALICE, 1n, 5n)).toThrowError(
          'Position #1 already reached its deadline 864000'
        );
      });
    });

    describe('yield', () => {
      beforeEach(() => {
        deployment.ledger.stake(MOCK_ALICE, { amount: 1_000n, lockupDays: 10n });
        deployment.baseAsset.reportYield(300n);
      });

      it('should accrue reported yield into the pool', () => {
        const { ledger, publisher } = deployment;

        expect(ledger.state()).toMatchObject({ totalYieldPool: 300n, custodyBalance: 1_300n });
        expect(publisher.events('yield.accrued')[0]?.payload).toEqual({
          amount: '300',
          totalYieldPoolAfter: '300',
        });
      });

      it('should pay the pro-rata share of the pool for burned yield claims', () => {
        const { ledger, baseAsset, yieldClaim } = deployment;

        expect(ledger.withdrawYield(MOCK_ALICE, 5_000n)).toBe(150n);

        expect(baseAsset.balanceOf(MOCK_ALICE)).toBe(9_150n);
        expect(yieldClaim.totalSupply()).toBe(5_000n);
        expect(ledger.state().totalYieldPool).toBe(150n);
      });

      it('should fail a zero withdrawal with ZeroInput and keep the pool', () => {
        const { ledger } = deployment;

        expect(() => ledger.withdrawYield(MOCK_ALICE, 0n)).toThrowError(ZeroInputError);
        expect(ledger.state().totalYieldPool).toBe(300n);
      });

      it('should only accept accrual from the yield reporter', () => {
        const { ledger } = deployment;

        let caught: unknown;
        try {
          ledger.accumYieldPool(MOCK_BOB, 1_000n);
        } catch (error) {
          caught = error;
        }

        expect(isLedgerError(caught, 'PermissionDenied')).toBe(true);
        expect(ledger.state().totalYieldPool).toBe(300n);
      });

      it('should treat a zero accrual as a silent no-op', () => {
        const { ledger, baseAsset, publisher } = deployment;
        const events = publisher.events().length;

        ledger.accumYieldPool(baseAsset.address, 0n);

        expect(ledger.state().totalYieldPool).toBe(300n);
        expect(publisher.events()).toHaveLength(events);
      });

      it('should reject a negative accrual and keep the pool', () => {
        const { ledger, baseAsset, publisher } = deployment;
        const events = publisher.events().length;

        expect(() => ledger.accumYieldPool(baseAsset.address, -200n)).toThrowError(ArithmeticUnderflowError);

        expect(ledger.state().totalYieldPool).toBe(300n);
        expect(publisher.events()).toHaveLength(events);
      });
    });
  });

  describe('fractional model', () => {
    let deployment: InMemoryDeployment;

    beforeEach(() => {
      deployment = createInMemoryDeployment(
        createMockConfig({ positionModel: 'fractional' }, { burnedYieldClaimFeeRate: 2_000n })
      );
      deployment.baseAsset.deposit(MOCK_ALICE, 10_000n);
      deployment.ledger.stake(MOCK_ALICE, { amount: 1_000n, lockupDays: 10n });
    });

    function shares() {
      const token = deployment.positionShares;
      if (token === undefined) throw new Error('fractional deployment without position shares');
      return token;
    }

    it('should mint one position share per principal claim', () => {
      expect(shares().balanceOf(MOCK_ALICE, 1n)).toBe(1_000n);
    });

    it('should let any share holder redeem part of a position early', () => {
      const { ledger, principalClaim, yieldClaim, baseAsset } = deployment;
      shares().transfer(MOCK_ALICE, MOCK_BOB, 1n, 400n);
      principalClaim.transfer(MOCK_ALICE, MOCK_BOB, 400n);
      yieldClaim.transfer(MOCK_ALICE, MOCK_BOB, 4_800n);

      const plan = ledger.redeem(MOCK_BOB, 1n, 400n);

      // 400 * 10 days * (10_000 + 2_000) / 10_000
      expect(plan).toMatchObject({ yieldClaimBurned: 4_800n, fee: 20n, payout: 380n, closesPosition: false });
      expect(baseAsset.balanceOf(MOCK_BOB)).toBe(380n);
      expect(ledger.getPosition(1n)).toMatchObject({
        principalAmount: 600n,
        principalClaimAmount: 600n,
        deadline: 0n,
        closed: false,
      });
      expect(ledger.state().totalStaked).toBe(600n);
    });

    it('should not penalize the remaining shares a second time', () => {
      const { ledger, principalClaim, yieldClaim, baseAsset } = deployment;
      shares().transfer(MOCK_ALICE, MOCK_BOB, 1n, 400n);
      principalClaim.transfer(MOCK_ALICE, MOCK_BOB, 400n);
      yieldClaim.transfer(MOCK_ALICE, MOCK_BOB, 4_800n);
      ledger.redeem(MOCK_BOB, 1n, 400n);

      const plan = ledger.redeem(MOCK_ALICE, 1n, 600n);

      expect(plan).toMatchObject({ early: false, fee: 0n, payout: 600n, closesPosition: true });
      expect(baseAsset.balanceOf(MOCK_ALICE)).toBe(9_600n);
      expect(ledger.getPosition(1n).closed).toBe(true);
      expect(ledger.state()).toMatchObject({ totalStaked: 0n, openPositions: 0 });
    });

    it('should deny a redemption above the caller share balance', () => {
      expect(() => deployment.ledger.redeem(MOCK_BOB, 1n, 1n)).toThrowError(PermissionDeniedError);
    });

    it('should refuse to quote a share above the outstanding claim', () => {
      expect(() => deployment.ledger.quoteExit(1n, 1_001n)).toThrowError(InvalidShareAmountError);
      expect(() => deployment.ledger.quoteExit(1n, 1_001n)).toThrowError(
        'Share 1001 exceeds the 1000 outstanding on position #1'
      );
      expect(deployment.ledger.quoteExit(1n, 250n).principalShare).toBe(250n);
    });

    it('should require every share to extend', () => {
      shares().transfer(MOCK_ALICE, MOCK_BOB, 1n, 1n);
      expect(() => deployment.ledger.extendLockTime(MOCK_ALICE, 1n, 5n)).toThrowError(PermissionDeniedError);
    });

    it('should refuse unstake in the fractional model', () => {
      expect(() => deployment.ledger.unstake(MOCK_ALICE, 1n)).toThrowError(WrongPositionModelError);
    });
  });

  describe('share-ratio issuance', () => {
    it('should mint principal claims at the custody share price', () => {
      const deployment = createInMemoryDeployment(createMockConfig({ issuancePolicy: 'share-ratio' }));
      const { ledger, baseAsset } = deployment;
      baseAsset.deposit(MOCK_ALICE, 10_000n);
      baseAsset.deposit(MOCK_BOB, 10_000n);

      expect(ledger.stake(MOCK_ALICE, { amount: 1_000n, lockupDays: 10n }).principalClaimMinted).toBe(1_000n);
      baseAsset.reportYield(100n);

      const result = ledger.stake(MOCK_BOB, { amount: 1_100n, lockupDays: 10n });

      expect(result).toMatchObject({ principalClaimMinted: 1_000n, yieldClaimMinted: 11_000n });
      expect(ledger.state()).toMatchObject({
        issuancePolicy: 'share-ratio',
        principalClaimSupply: 2_000n,
        custodyBalance: 2_200n,
      });
    });
  });
});
