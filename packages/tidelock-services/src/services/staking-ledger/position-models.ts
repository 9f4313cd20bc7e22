/**
 * Position Model Strategies
 *
 * The atomic and fractional models share one ledger engine and differ only
 * in how a caller is authorized and how a stake and an exit are recorded.
 * The strategy is chosen once, at deployment.
 */

import { isAddressEqual, type Address } from 'viem';
import {
  InvalidShareAmountError,
  PermissionDeniedError,
  PositionClosedError,
  WrongPositionModelError,
  ZeroInputError,
  type ExitPlan,
  type Position,
  type PositionModel,
} from '@tidelock/shared';
import type { PositionShareToken } from '../../collaborators/index.js';
import type { TransactionManager } from '../../transaction/index.js';
import type { PositionLedger } from '../position-ledger/index.js';

export interface PositionModelStrategy {
  readonly model: PositionModel;

  /**
   * Authorization first, then state conflicts, then the share itself.
   * Nothing is mutated.
   */
  authorizeExit(position: Position, caller: Address, share: bigint): void;

  authorizeExtend(position: Position, caller: Address): void;

  /** Record ownership of a freshly created position */
  onStaked(positionId: bigint, owner: Address, principalClaimMinted: bigint): void;

  /** Apply a priced exit to the position record */
  commitExit(plan: ExitPlan, caller: Address): void;
}

function assertModel(position: Position, model: PositionModel): void {
  if (position.model !== model) {
    throw new WrongPositionModelError(model, position.model);
  }
}

/**
 * Single owner, all-or-nothing, closed exactly once
 */
export class AtomicPositionModel implements PositionModelStrategy {
  readonly model = 'atomic' as const;

  constructor(private readonly ledger: PositionLedger) {}

  authorizeExit(position: Position, caller: Address, share: bigint): void {
    this.authorizeExtend(position, caller);
    if (share !== position.principalClaimAmount) {
      throw new InvalidShareAmountError(position.id, share, position.principalClaimAmount);
    }
  }

  authorizeExtend(position: Position, caller: Address): void {
    if (position.model !== 'atomic') {
      throw new WrongPositionModelError('atomic', position.model);
    }
    if (!isAddressEqual(position.owner, caller)) {
      throw new PermissionDeniedError(caller, `operate position #${position.id}`);
    }
    if (position.closed) {
      throw new PositionClosedError(position.id);
    }
  }

  onStaked(): void {
    // Ownership lives on the record itself
  }

  commitExit(plan: ExitPlan, caller: Address): void {
    if (plan.early) {
      this.ledger.setDeadline(plan.positionId, plan.deadlineAfter);
    }
    this.ledger.close(plan.positionId, caller);
  }
}

/**
 * Multi-owner through position shares, partially redeemable.
 * Holding (and burning) the shares is the authorization.
 */
export class FractionalPositionModel implements PositionModelStrategy {
  readonly model = 'fractional' as const;

  constructor(
    private readonly ledger: PositionLedger,
    private readonly shares: PositionShareToken,
    private readonly transactions: TransactionManager
  ) {}

  authorizeExit(position: Position, caller: Address, share: bigint): void {
    assertModel(position, 'fractional');
    if (share <= 0n) {
      throw new ZeroInputError('share');
    }
    if (this.shares.balanceOf(caller, position.id) < share) {
      throw new PermissionDeniedError(caller, `redeem ${share} shares of position #${position.id}`);
    }
    if (position.closed) {
      throw new PositionClosedError(position.id);
    }
    if (share > position.principalClaimAmount) {
      throw new InvalidShareAmountError(position.id, share, position.principalClaimAmount);
    }
  }

  /**
   * Extending changes the lock of every share, so the caller must hold
   * all of them.
   */
  authorizeExtend(position: Position, caller: Address): void {
    assertModel(position, 'fractional');
    const held = this.shares.balanceOf(caller, position.id);
    if (held === 0n || held !== this.shares.totalSupply(position.id)) {
      throw new PermissionDeniedError(caller, `extend position #${position.id}`);
    }
    if (position.closed) {
      throw new PositionClosedError(position.id);
    }
  }

  onStaked(positionId: bigint, owner: Address, principalClaimMinted: bigint): void {
    this.shares.mint(owner, positionId, principalClaimMinted);
    this.transactions.record(`mint position shares #${positionId}`, () =>
      this.shares.burn(owner, positionId, principalClaimMinted)
    );
  }

  commitExit(plan: ExitPlan): void {
    if (plan.early) {
      this.ledger.setDeadline(plan.positionId, plan.deadlineAfter);
    }
    this.ledger.reduce(plan.positionId, plan.share);
  }
}
