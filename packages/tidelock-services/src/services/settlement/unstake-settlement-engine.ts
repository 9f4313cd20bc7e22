/**
 * Unstake Settlement Engine
 *
 * Prices an exit and then carries it out against the collaborators.
 *
 * Per position: OPEN -> (early exit | on-time exit) -> CLOSED. An exit
 * before the deadline pays two penalties at once: the Yield Claims of the
 * remaining lock days are clawed back (remaining days rounded up), and a
 * force-unstake fee is taken from the principal and routed to the revenue
 * pool. The position deadline is then moved to now, so a later partial
 * exit of the same position is not penalized twice.
 */

import type { Address } from 'viem';
import {
  RATIO,
  checkedMul,
  checkedSub,
  mulDiv,
  type ExitPlan,
  type LedgerParameters,
  type Position,
} from '@tidelock/shared';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { LedgerCollaborators } from '../../collaborators/index.js';
import type { TransactionManager } from '../../transaction/index.js';
import type { LockupPolicy } from '../lockup-policy/index.js';

export interface UnstakeSettlementEngineDependencies {
  transactions: TransactionManager;
  collaborators: LedgerCollaborators;
  lockupPolicy: LockupPolicy;
  /** Ledger account holding staked base asset */
  custody: Address;
}

export interface QuoteExitInput {
  position: Position;
  /** Principal Claim units redeemed; the whole position in the atomic model */
  share: bigint;
  /** Base-asset units released for `share` */
  principalShare: bigint;
  now: bigint;
  params: Pick<LedgerParameters, 'forceUnstakeFeeRate' | 'burnedYieldClaimFeeRate'>;
}

export class UnstakeSettlementEngine {
  private readonly transactions: TransactionManager;
  private readonly collaborators: LedgerCollaborators;
  private readonly lockupPolicy: LockupPolicy;
  private readonly custody: Address;
  private readonly logger: ServiceLogger;

  constructor(dependencies: UnstakeSettlementEngineDependencies) {
    this.transactions = dependencies.transactions;
    this.collaborators = dependencies.collaborators;
    this.lockupPolicy = dependencies.lockupPolicy;
    this.custody = dependencies.custody;
    this.logger = createServiceLogger('UnstakeSettlementEngine');
  }

  /**
   * Compute everything an exit moves, without moving anything
   */
  quoteExit(input: QuoteExitInput): ExitPlan {
    const { position, share, principalShare, now, params } = input;
    const closesPosition = share === position.principalClaimAmount;
    const remainingDays = this.lockupPolicy.remainingDays(position.deadline, now);

    if (remainingDays === 0n) {
      return {
        positionId: position.id,
        model: position.model,
        share,
        principalShare,
        early: false,
        remainingDays,
        yieldClaimBurned: 0n,
        fee: 0n,
        payout: principalShare,
        deadlineAfter: position.deadline,
        closesPosition,
      };
    }

    const yieldClaimBurned =
      position.model === 'fractional'
        ? mulDiv(
            checkedMul(principalShare, remainingDays, 'yield claim clawback'),
            RATIO + params.burnedYieldClaimFeeRate,
            RATIO,
            'yield claim clawback'
          )
        : checkedMul(principalShare, remainingDays, 'yield claim clawback');

    const fee = mulDiv(principalShare, params.forceUnstakeFeeRate, RATIO, 'force unstake fee');

    return {
      positionId: position.id,
      model: position.model,
      share,
      principalShare,
      early: true,
      remainingDays,
      yieldClaimBurned,
      fee,
      payout: checkedSub(principalShare, fee, 'exit payout'),
      deadlineAfter: now,
      closesPosition,
    };
  }

  /**
   * Carry out an exit plan for `caller`.
   *
   * Reversible effects (burns, payout transfer) run first and record their
   * compensation; the fee withdrawal through the wrapper cannot be undone
   * and runs last.
   *
   * @throws InsufficientBalanceError when the caller lacks the claims to burn
   */
  settle(plan: ExitPlan, caller: Address, revenuePool: Address): void {
    const { baseAsset, principalClaim, yieldClaim, positionShares } = this.collaborators;
    const positionId = plan.positionId;

    if (plan.model === 'fractional') {
      if (positionShares === undefined) {
        throw new TypeError('Fractional settlement requires a position-share token');
      }
      positionShares.burn(caller, positionId, plan.share);
      this.transactions.record(`burn position shares #${positionId}`, () =>
        positionShares.mint(caller, positionId, plan.share)
      );
    }

    principalClaim.burn(caller, plan.share);
    this.transactions.record(`burn ${principalClaim.symbol}`, () => principalClaim.mint(caller, plan.share));

    if (plan.yieldClaimBurned > 0n) {
      yieldClaim.burn(caller, plan.yieldClaimBurned);
      this.transactions.record(`burn ${yieldClaim.symbol}`, () =>
        yieldClaim.mint(caller, plan.yieldClaimBurned)
      );
    }

    if (plan.payout > 0n) {
      baseAsset.transfer(this.custody, caller, plan.payout);
      this.transactions.record(`pay out ${baseAsset.symbol}`, () =>
        baseAsset.transfer(caller, this.custody, plan.payout)
      );
    }

    if (plan.fee > 0n) {
      baseAsset.withdraw(this.custody, plan.fee, revenuePool);
    }

    log.methodExit(this.logger, 'settle', {
      positionId: positionId.toString(),
      early: plan.early,
      yieldClaimBurned: plan.yieldClaimBurned.toString(),
      fee: plan.fee.toString(),
      payout: plan.payout.toString(),
    });
  }
}
