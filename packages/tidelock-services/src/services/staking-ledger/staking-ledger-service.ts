/**
 * Staking Ledger Service
 *
 * The single entry point of a ledger deployment. Wires the lockup policy,
 * position ledger, yield pool accountant, settlement engine and parameter
 * store together, parameterized by a position model and an issuance
 * policy chosen at configuration time.
 *
 * Data flow:
 * - stake:   lockup policy -> accountant (issuance) -> position ledger -> transfer/mint
 * - unstake: position ledger (authorize) -> settlement (price) -> accountant -> burn/transfer
 * - yield:   base-asset wrapper -> accountant
 *
 * Every operation is one ledger transaction: it commits completely or
 * rolls back completely, and invariants are asserted before commit.
 */

import { getAddress, isAddressEqual, type Address } from 'viem';
import {
  InvalidShareAmountError,
  MinStakeInsufficientError,
  PermissionDeniedError,
  PositionClosedError,
  WrongPositionModelError,
  ZeroInputError,
  type ExitPlan,
  type LedgerParameters,
  type LedgerState,
  type Position,
  type PositionModel,
} from '@tidelock/shared';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { createLedgerEvent } from '../../events/index.js';
import type { Clock } from '../../clock/index.js';
import type { LedgerCollaborators, YieldSink } from '../../collaborators/index.js';
import type { LedgerTransaction, TransactionManager } from '../../transaction/index.js';
import { LockupPolicy } from '../lockup-policy/index.js';
import { ParameterStore } from '../parameter-store/index.js';
import { PositionLedger } from '../position-ledger/index.js';
import { UnstakeSettlementEngine } from '../settlement/index.js';
import { YieldPoolAccountant, dayWeightedYieldClaim } from '../yield-pool/index.js';
import type { IssuancePolicy } from '../yield-pool/index.js';
import {
  AtomicPositionModel,
  FractionalPositionModel,
  type PositionModelStrategy,
} from './position-models.js';

/**
 * Dependencies for StakingLedgerService
 */
export interface StakingLedgerServiceDependencies {
  /** Custody account of the ledger (holds staked base asset) */
  address: Address;
  positionModel: PositionModel;
  issuancePolicy: IssuancePolicy;
  collaborators: LedgerCollaborators;
  transactions: TransactionManager;
  clock: Clock;
  /** Parameter owner */
  owner: Address;
  parameters: LedgerParameters;
  /** Check ledger invariants before every commit (default true) */
  assertInvariants?: boolean;
}

/**
 * Input for a stake
 */
export interface StakeInput {
  /** Base-asset units to lock */
  amount: bigint;
  lockupDays: bigint;
  /** Owner of the position (atomic) or receiver of its shares (fractional); defaults to the caller */
  positionOwner?: Address;
  /** Receiver of the Principal Claims; defaults to the caller */
  principalRecipient?: Address;
  /** Receiver of the Yield Claims; defaults to the caller */
  yieldRecipient?: Address;
}

export interface StakeResult {
  positionId: bigint;
  principalClaimMinted: bigint;
  yieldClaimMinted: bigint;
  deadline: bigint;
}

export interface ExtendLockResult {
  positionId: bigint;
  newDeadline: bigint;
  yieldClaimMinted: bigint;
}

export class StakingLedgerService implements YieldSink {
  readonly address: Address;
  readonly positionModel: PositionModel;
  readonly parameters: ParameterStore;
  readonly positions: PositionLedger;
  readonly accountant: YieldPoolAccountant;
  readonly lockupPolicy: LockupPolicy;
  readonly settlement: UnstakeSettlementEngine;

  private readonly collaborators: LedgerCollaborators;
  private readonly transactions: TransactionManager;
  private readonly clock: Clock;
  private readonly model: PositionModelStrategy;
  private readonly assertInvariantsOnCommit: boolean;
  private readonly logger: ServiceLogger;

  constructor(dependencies: StakingLedgerServiceDependencies) {
    this.address = getAddress(dependencies.address);
    this.positionModel = dependencies.positionModel;
    this.collaborators = dependencies.collaborators;
    this.transactions = dependencies.transactions;
    this.clock = dependencies.clock;
    this.assertInvariantsOnCommit = dependencies.assertInvariants ?? true;
    this.logger = createServiceLogger('StakingLedgerService');

    this.parameters = new ParameterStore({
      transactions: this.transactions,
      clock: this.clock,
      owner: dependencies.owner,
      initial: dependencies.parameters,
    });
    this.positions = new PositionLedger({ transactions: this.transactions });
    this.accountant = new YieldPoolAccountant({
      transactions: this.transactions,
      issuancePolicy: dependencies.issuancePolicy,
    });
    this.lockupPolicy = new LockupPolicy({ parameters: this.parameters });
    this.settlement = new UnstakeSettlementEngine({
      transactions: this.transactions,
      collaborators: this.collaborators,
      lockupPolicy: this.lockupPolicy,
      custody: this.address,
    });

    if (this.positionModel === 'fractional') {
      const shares = this.collaborators.positionShares;
      if (shares === undefined) {
        throw new TypeError('The fractional position model requires a position-share token');
      }
      this.model = new FractionalPositionModel(this.positions, shares, this.transactions);
    } else {
      this.model = new AtomicPositionModel(this.positions);
    }
  }

  // ============================================================================
  // OPERATIONS
  // ============================================================================

  /**
   * Lock base asset and mint Principal and Yield Claims
   *
   * @throws ZeroInputError for a zero amount
   * @throws MinStakeInsufficientError below the minimum stake
   * @throws InvalidLockupDaysError outside the lockup bounds
   */
  stake(caller: Address, input: StakeInput): StakeResult {
    return this.run('stake', caller, (tx, now) => {
      const { amount, lockupDays } = input;
      if (amount === 0n) {
        throw new ZeroInputError('amount');
      }
      const minStake = this.parameters.get('minStake');
      if (amount < minStake) {
        throw new MinStakeInsufficientError(amount, minStake);
      }
      const deadline = this.lockupPolicy.validateLockup(lockupDays, now);

      const owner = getAddress(input.positionOwner ?? caller);
      const principalRecipient = getAddress(input.principalRecipient ?? caller);
      const yieldRecipient = getAddress(input.yieldRecipient ?? caller);
      const { baseAsset, principalClaim, yieldClaim } = this.collaborators;

      const issuance = this.accountant.quoteIssuance({
        principal: amount,
        lockupDays,
        yieldClaimSupply: yieldClaim.totalSupply(),
        principalClaimSupply: principalClaim.totalSupply(),
        custodyBalance: baseAsset.balanceOf(this.address),
      });

      baseAsset.transfer(caller, this.address, amount);
      this.transactions.record(`pull ${baseAsset.symbol}`, () =>
        baseAsset.transfer(this.address, caller, amount)
      );

      this.accountant.recordStake(amount);
      const positionId = this.positions.create({
        model: this.positionModel,
        principalAmount: amount,
        principalClaimAmount: issuance.principalClaimMinted,
        deadline,
        createdAt: now,
        owner,
      });

      principalClaim.mint(principalRecipient, issuance.principalClaimMinted);
      this.transactions.record(`mint ${principalClaim.symbol}`, () =>
        principalClaim.burn(principalRecipient, issuance.principalClaimMinted)
      );
      yieldClaim.mint(yieldRecipient, issuance.yieldClaimMinted);
      this.transactions.record(`mint ${yieldClaim.symbol}`, () =>
        yieldClaim.burn(yieldRecipient, issuance.yieldClaimMinted)
      );
      this.model.onStaked(positionId, owner, issuance.principalClaimMinted);

      tx.emit(
        createLedgerEvent({
          type: 'position.staked',
          entityId: positionId.toString(),
          entityType: 'position',
          payload: {
            positionId: positionId.toString(),
            model: this.positionModel,
            owner,
            principalAmount: amount.toString(),
            principalClaimMinted: issuance.principalClaimMinted.toString(),
            yieldClaimMinted: issuance.yieldClaimMinted.toString(),
            lockupDays: lockupDays.toString(),
            deadline: deadline.toString(),
          },
          ledgerTime: now,
          operation: 'stake',
          caller,
        })
      );

      return {
        positionId,
        principalClaimMinted: issuance.principalClaimMinted,
        yieldClaimMinted: issuance.yieldClaimMinted,
        deadline,
      };
    });
  }

  /**
   * Close an atomic position, early or on time
   *
   * @throws PermissionDeniedError when the caller is not the owner
   * @throws PositionClosedError when the position is already closed
   */
  unstake(caller: Address, positionId: bigint): ExitPlan {
    this.requireModel('atomic');
    return this.run('unstake', caller, (tx, now) => {
      const position = this.positions.get(positionId);
      return this.exit(tx, caller, position, position.principalClaimAmount, now);
    });
  }

  /**
   * Redeem `share` units of a fractional position. The shares and the
   * matching Principal Claims are burned from the caller.
   *
   * @throws PermissionDeniedError when the caller holds fewer shares
   * @throws InvalidShareAmountError when the share exceeds what is outstanding
   */
  redeem(caller: Address, positionId: bigint, share: bigint): ExitPlan {
    this.requireModel('fractional');
    return this.run('redeem', caller, (tx, now) => {
      const position = this.positions.get(positionId);
      return this.exit(tx, caller, position, share, now);
    });
  }

  /**
   * Push a running lock further out and mint the Yield Claims of the added days
   *
   * @throws ReachedDeadlineError once the deadline has passed
   * @throws InvalidExtendDaysError when the resulting lock is out of bounds
   */
  extendLockTime(caller: Address, positionId: bigint, extendDays: bigint): ExtendLockResult {
    return this.run('extendLockTime', caller, (tx, now) => {
      const position = this.positions.get(positionId);
      this.model.authorizeExtend(position, caller);

      const { newDeadline } = this.lockupPolicy.extendLockTime(position, extendDays, now);
      this.positions.setDeadline(positionId, newDeadline);

      const yieldClaimMinted = dayWeightedYieldClaim(position.principalAmount, extendDays);
      const { yieldClaim } = this.collaborators;
      yieldClaim.mint(caller, yieldClaimMinted);
      this.transactions.record(`mint ${yieldClaim.symbol}`, () => yieldClaim.burn(caller, yieldClaimMinted));

      tx.emit(
        createLedgerEvent({
          type: 'position.lock.extended',
          entityId: positionId.toString(),
          entityType: 'position',
          payload: {
            positionId: positionId.toString(),
            extendDays: extendDays.toString(),
            previousDeadline: position.deadline.toString(),
            newDeadline: newDeadline.toString(),
            yieldClaimMinted: yieldClaimMinted.toString(),
          },
          ledgerTime: now,
          operation: 'extendLockTime',
          caller,
        })
      );

      return { positionId, newDeadline, yieldClaimMinted };
    });
  }

  /**
   * Burn Yield Claims for their pro-rata share of the yield pool
   *
   * @returns Base-asset units paid to the caller (rounded down)
   * @throws ZeroInputError when burnedYieldClaim is zero
   */
  withdrawYield(caller: Address, burnedYieldClaim: bigint): bigint {
    return this.run('withdrawYield', caller, (tx, now) => {
      const { baseAsset, yieldClaim } = this.collaborators;
      const yieldAmount = this.accountant.quoteYieldWithdrawal(burnedYieldClaim, yieldClaim.totalSupply());

      this.accountant.recordYieldWithdrawal(yieldAmount);
      yieldClaim.burn(caller, burnedYieldClaim);
      this.transactions.record(`burn ${yieldClaim.symbol}`, () => yieldClaim.mint(caller, burnedYieldClaim));

      if (yieldAmount > 0n) {
        baseAsset.transfer(this.address, caller, yieldAmount);
        this.transactions.record(`pay out ${baseAsset.symbol}`, () =>
          baseAsset.transfer(caller, this.address, yieldAmount)
        );
      }

      tx.emit(
        createLedgerEvent({
          type: 'yield.withdrawn',
          entityId: 'pool',
          entityType: 'yield-pool',
          payload: {
            yieldClaimBurned: burnedYieldClaim.toString(),
            yieldAmount: yieldAmount.toString(),
            totalYieldPoolAfter: this.accountant.totalYieldPool.toString(),
          },
          ledgerTime: now,
          operation: 'withdrawYield',
          caller,
        })
      );

      return yieldAmount;
    });
  }

  /**
   * Yield callback of the base-asset wrapper.
   *
   * Trust boundary: only the configured yield reporter may call, and the
   * amount it reports is taken as is. A compromised reporter can inflate
   * the pool; nothing here can detect that.
   *
   * @throws PermissionDeniedError for any other caller
   */
  accumYieldPool(caller: Address, amount: bigint): void {
    this.run('accumYieldPool', caller, (tx, now) => {
      const reporter = this.parameters.get('yieldReporter');
      if (!isAddressEqual(caller, reporter)) {
        throw new PermissionDeniedError(caller, 'accumulate yield');
      }
      if (!this.accountant.accumYieldPool(amount)) {
        return;
      }

      tx.emit(
        createLedgerEvent({
          type: 'yield.accrued',
          entityId: 'pool',
          entityType: 'yield-pool',
          payload: {
            amount: amount.toString(),
            totalYieldPoolAfter: this.accountant.totalYieldPool.toString(),
          },
          ledgerTime: now,
          operation: 'accumYieldPool',
          caller,
        })
      );
    });
  }

  // ============================================================================
  // VIEWS
  // ============================================================================

  getPosition(positionId: bigint): Position {
    return this.positions.get(positionId);
  }

  positionsOf(owner: Address): Position[] {
    return this.positions.listByOwner(owner);
  }

  /**
   * Price an exit as of now without executing it
   *
   * @param share - Units to redeem; the whole position when omitted
   * @throws PositionClosedError once the position has been exited
   * @throws InvalidShareAmountError when the share is zero or exceeds the outstanding claim
   */
  quoteExit(positionId: bigint, share?: bigint): ExitPlan {
    const position = this.positions.get(positionId);
    if (position.closed) {
      throw new PositionClosedError(position.id);
    }
    const redeemed = share ?? position.principalClaimAmount;
    if (redeemed <= 0n || redeemed > position.principalClaimAmount) {
      throw new InvalidShareAmountError(position.id, redeemed, position.principalClaimAmount);
    }
    return this.settlement.quoteExit({
      position,
      share: redeemed,
      principalShare: this.positions.principalForShare(position, redeemed),
      now: this.clock.now(),
      params: this.parameters.snapshot(),
    });
  }

  averageStakeDays(): bigint {
    return this.accountant.averageStakeDays(this.collaborators.yieldClaim.totalSupply());
  }

  state(): LedgerState {
    return {
      positionModel: this.positionModel,
      issuancePolicy: this.accountant.issuancePolicy.name,
      totalStaked: this.accountant.totalStaked,
      totalYieldPool: this.accountant.totalYieldPool,
      principalClaimSupply: this.collaborators.principalClaim.totalSupply(),
      yieldClaimSupply: this.collaborators.yieldClaim.totalSupply(),
      custodyBalance: this.collaborators.baseAsset.balanceOf(this.address),
      nextPositionId: this.positions.peekNextId(),
      openPositions: this.positions.listOpen().length,
      parameters: this.parameters.snapshot(),
    };
  }

  // ============================================================================
  // INTERNALS
  // ============================================================================

  /**
   * Shared exit path of both models: authorize, price, record, settle
   */
  private exit(
    tx: LedgerTransaction,
    caller: Address,
    position: Position,
    share: bigint,
    now: bigint
  ): ExitPlan {
    this.model.authorizeExit(position, caller, share);

    const params = this.parameters.snapshot();
    const plan = this.settlement.quoteExit({
      position,
      share,
      principalShare: this.positions.principalForShare(position, share),
      now,
      params,
    });

    this.model.commitExit(plan, caller);
    this.accountant.recordUnstake(plan.principalShare);
    this.settlement.settle(plan, caller, params.revenuePool);

    tx.emit(
      createLedgerEvent({
        type: 'position.unstaked',
        entityId: plan.positionId.toString(),
        entityType: 'position',
        payload: {
          positionId: plan.positionId.toString(),
          share: plan.share.toString(),
          principalShare: plan.principalShare.toString(),
          early: plan.early,
          yieldClaimBurned: plan.yieldClaimBurned.toString(),
          fee: plan.fee.toString(),
          payout: plan.payout.toString(),
          closed: plan.closesPosition,
        },
        ledgerTime: now,
        operation: tx.operation,
        caller,
      })
    );

    return plan;
  }

  private requireModel(model: PositionModel): void {
    if (this.positionModel !== model) {
      throw new WrongPositionModelError(model, this.positionModel);
    }
  }

  private run<T>(
    operation: string,
    caller: Address,
    fn: (tx: LedgerTransaction, now: bigint) => T
  ): T {
    log.methodEntry(this.logger, operation, { caller });
    try {
      const result = this.transactions.execute(
        operation,
        (tx) => fn(tx, this.clock.now()),
        () => this.checkInvariants()
      );
      log.methodExit(this.logger, operation, { caller });
      return result;
    } catch (error) {
      log.methodError(this.logger, operation, error, { caller });
      throw error;
    }
  }

  private checkInvariants(): void {
    if (this.assertInvariantsOnCommit) {
      this.accountant.assertInvariants(this.positions.sumOpenPrincipal());
    }
  }
}
