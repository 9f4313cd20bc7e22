/**
 * Yield Pool Accountant
 *
 * Owns the two shared accumulators of the ledger:
 * - totalStaked: principal currently locked in open positions
 * - totalYieldPool: undistributed yield, owned pro rata by Yield Claim holders
 *
 * totalStaked moves only on stake/unstake; totalYieldPool only on yield
 * accrual (up) and yield withdrawal (down). Every write is checked and
 * journaled on the active ledger transaction.
 */

import {
  checkedAdd,
  checkedSub,
  mulDiv,
  ArithmeticUnderflowError,
  InsufficientYieldClaimError,
  LedgerInvariantViolationError,
  ZeroInputError,
  type Issuance,
} from '@tidelock/shared';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { TransactionManager } from '../../transaction/index.js';
import type { IssuanceContext, IssuancePolicy } from './issuance-policies.js';

export interface YieldPoolAccountantDependencies {
  transactions: TransactionManager;
  issuancePolicy: IssuancePolicy;
}

export class YieldPoolAccountant {
  private readonly transactions: TransactionManager;
  private readonly logger: ServiceLogger;
  readonly issuancePolicy: IssuancePolicy;

  private staked = 0n;
  private yieldPool = 0n;

  constructor(dependencies: YieldPoolAccountantDependencies) {
    this.transactions = dependencies.transactions;
    this.issuancePolicy = dependencies.issuancePolicy;
    this.logger = createServiceLogger('YieldPoolAccountant');
  }

  get totalStaked(): bigint {
    return this.staked;
  }

  get totalYieldPool(): bigint {
    return this.yieldPool;
  }

  /**
   * Principal and Yield Claims a stake mints under the configured policy
   */
  quoteIssuance(context: Omit<IssuanceContext, 'totalYieldPool'>): Issuance {
    return this.issuancePolicy.computeIssuance({ ...context, totalYieldPool: this.yieldPool });
  }

  /**
   * Base-asset yield paid for burning `burnedYieldClaim` out of `yieldClaimSupply`
   * (rounded down)
   */
  quoteYieldWithdrawal(burnedYieldClaim: bigint, yieldClaimSupply: bigint): bigint {
    if (burnedYieldClaim === 0n) {
      throw new ZeroInputError('burnedYieldClaim');
    }
    if (burnedYieldClaim > yieldClaimSupply) {
      throw new InsufficientYieldClaimError(burnedYieldClaim, yieldClaimSupply);
    }
    return mulDiv(this.yieldPool, burnedYieldClaim, yieldClaimSupply, 'yield withdrawal');
  }

  recordStake(amount: bigint): void {
    this.setStaked(checkedAdd(this.staked, amount, 'totalStaked'), 'recordStake');
  }

  recordUnstake(amount: bigint): void {
    this.setStaked(checkedSub(this.staked, amount, 'totalStaked'), 'recordUnstake');
  }

  /**
   * Remove paid-out yield from the pool. The amount comes from
   * quoteYieldWithdrawal within the same transaction, so it never exceeds
   * the pool; the checked subtraction enforces that anyway.
   */
  recordYieldWithdrawal(amount: bigint): void {
    this.setYieldPool(checkedSub(this.yieldPool, amount, 'totalYieldPool'), 'recordYieldWithdrawal');
  }

  /**
   * Add reported yield to the pool.
   *
   * Trusted input: the amount is not reconciled against any balance. The
   * ledger service restricts the call to the configured yield reporter.
   *
   * @returns false when the amount is zero and nothing changed
   * @throws ArithmeticUnderflowError for a negative amount; accrual only adds
   */
  accumYieldPool(amount: bigint): boolean {
    if (amount < 0n) {
      throw new ArithmeticUnderflowError('accumYieldPool');
    }
    if (amount === 0n) {
      return false;
    }
    this.setYieldPool(checkedAdd(this.yieldPool, amount, 'totalYieldPool'), 'accumYieldPool');
    return true;
  }

  /**
   * Average remaining lock weight per staked unit, in days
   */
  averageStakeDays(yieldClaimSupply: bigint): bigint {
    return this.staked === 0n ? 0n : yieldClaimSupply / this.staked;
  }

  /**
   * @throws LedgerInvariantViolationError when the open positions do not add up to totalStaked
   */
  assertInvariants(openPrincipalSum: bigint): void {
    if (openPrincipalSum !== this.staked) {
      throw new LedgerInvariantViolationError(
        `open principal ${openPrincipalSum} != totalStaked ${this.staked}`
      );
    }
    if (this.yieldPool < 0n) {
      throw new LedgerInvariantViolationError(`totalYieldPool is negative (${this.yieldPool})`);
    }
  }

  private setStaked(next: bigint, label: string): void {
    const previous = this.staked;
    this.staked = next;
    this.transactions.record(label, () => {
      this.staked = previous;
    });
    log.methodExit(this.logger, label, { totalStaked: next.toString() });
  }

  private setYieldPool(next: bigint, label: string): void {
    const previous = this.yieldPool;
    this.yieldPool = next;
    this.transactions.record(label, () => {
      this.yieldPool = previous;
    });
    log.methodExit(this.logger, label, { totalYieldPool: next.toString() });
  }
}
