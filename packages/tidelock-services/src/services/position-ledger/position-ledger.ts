/**
 * Position Ledger
 *
 * Creates, reads, mutates and closes position records. Ids are handed out
 * from a monotonically increasing counter and never reused. Every mutation
 * records an undo step on the active ledger transaction.
 */

import { getAddress, isAddressEqual, type Address } from 'viem';
import {
  checkedSub,
  mulDiv,
  InvalidShareAmountError,
  LedgerInvariantViolationError,
  PermissionDeniedError,
  PositionClosedError,
  PositionNotFoundError,
  WrongPositionModelError,
  ZeroInputError,
  type AtomicPosition,
  type Position,
  type PositionModel,
} from '@tidelock/shared';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { TransactionManager } from '../../transaction/index.js';

export interface PositionLedgerDependencies {
  transactions: TransactionManager;
}

/**
 * Input for recording a new position
 */
export interface CreatePositionInput {
  model: PositionModel;
  principalAmount: bigint;
  principalClaimAmount: bigint;
  deadline: bigint;
  createdAt: bigint;
  /** Required for the atomic model, ignored for the fractional model */
  owner?: Address;
}

/**
 * Result of a partial (fractional) redemption
 */
export interface PositionReduction {
  principalReleased: bigint;
  closed: boolean;
}

export class PositionLedger {
  private readonly transactions: TransactionManager;
  private readonly logger: ServiceLogger;
  private readonly positions = new Map<bigint, Position>();
  private nextId = 1n;

  constructor(dependencies: PositionLedgerDependencies) {
    this.transactions = dependencies.transactions;
    this.logger = createServiceLogger('PositionLedger');
  }

  /**
   * Record a new position
   *
   * @returns The new position id
   */
  create(input: CreatePositionInput): bigint {
    if (input.principalAmount <= 0n) throw new ZeroInputError('principalAmount');
    if (input.principalClaimAmount <= 0n) throw new ZeroInputError('principalClaimAmount');
    if (input.deadline < input.createdAt) {
      throw new LedgerInvariantViolationError(
        `deadline ${input.deadline} precedes creation time ${input.createdAt}`
      );
    }

    const id = this.nextId;
    const base = {
      id,
      principalAmount: input.principalAmount,
      principalClaimAmount: input.principalClaimAmount,
      deadline: input.deadline,
      createdAt: input.createdAt,
      closed: false,
    };

    let position: Position;
    if (input.model === 'atomic') {
      if (input.owner === undefined) {
        throw new TypeError('Atomic positions require an owner');
      }
      position = { ...base, model: 'atomic', owner: getAddress(input.owner) };
    } else {
      position = { ...base, model: 'fractional' };
    }

    this.positions.set(id, position);
    this.nextId = id + 1n;
    this.transactions.record(`create position #${id}`, () => {
      this.positions.delete(id);
      this.nextId = id;
    });

    log.methodExit(this.logger, 'create', {
      positionId: id.toString(),
      model: input.model,
      principalAmount: input.principalAmount.toString(),
    });
    return id;
  }

  /**
   * @throws PositionNotFoundError for unknown ids
   */
  get(positionId: bigint): Position {
    const position = this.positions.get(positionId);
    if (position === undefined) {
      throw new PositionNotFoundError(positionId);
    }
    return { ...position };
  }

  find(positionId: bigint): Position | undefined {
    const position = this.positions.get(positionId);
    return position === undefined ? undefined : { ...position };
  }

  /**
   * Close an atomic position.
   *
   * @throws PermissionDeniedError when the caller is not the owner (checked first)
   * @throws PositionClosedError when the position is already closed
   */
  close(positionId: bigint, caller: Address): AtomicPosition {
    const position = this.get(positionId);
    if (position.model !== 'atomic') {
      throw new WrongPositionModelError('atomic', position.model);
    }
    if (!isAddressEqual(position.owner, caller)) {
      throw new PermissionDeniedError(caller, `close position #${positionId}`);
    }
    if (position.closed) {
      throw new PositionClosedError(positionId);
    }

    const closed: AtomicPosition = { ...position, closed: true };
    this.replace(closed, `close position #${positionId}`);
    return { ...closed };
  }

  /**
   * Redeem `shareAmount` of a fractional position.
   *
   * The caller has already burned `shareAmount`; this only moves the
   * record. Principal is released pro rata to the outstanding claim, and
   * the last share releases whatever principal remains.
   *
   * @throws InvalidShareAmountError when the share exceeds what is outstanding
   */
  reduce(positionId: bigint, shareAmount: bigint): PositionReduction {
    if (shareAmount <= 0n) throw new ZeroInputError('shareAmount');
    const position = this.get(positionId);
    if (position.model !== 'fractional') {
      throw new WrongPositionModelError('fractional', position.model);
    }
    if (position.closed) {
      throw new PositionClosedError(positionId);
    }
    if (shareAmount > position.principalClaimAmount) {
      throw new InvalidShareAmountError(positionId, shareAmount, position.principalClaimAmount);
    }

    const principalReleased = this.principalForShare(position, shareAmount);
    const principalClaimAmount = checkedSub(position.principalClaimAmount, shareAmount, 'position claim');
    const updated: Position = {
      ...position,
      principalAmount: checkedSub(position.principalAmount, principalReleased, 'position principal'),
      principalClaimAmount,
      closed: principalClaimAmount === 0n,
    };
    this.replace(updated, `reduce position #${positionId}`);

    return { principalReleased, closed: updated.closed };
  }

  /**
   * Principal released by redeeming `shareAmount`, from the position's
   * current ratio (rounded down; the final share takes the remainder)
   */
  principalForShare(position: Position, shareAmount: bigint): bigint {
    if (shareAmount === position.principalClaimAmount) {
      return position.principalAmount;
    }
    return mulDiv(position.principalAmount, shareAmount, position.principalClaimAmount, 'principal for share');
  }

  setDeadline(positionId: bigint, deadline: bigint): void {
    const position = this.get(positionId);
    if (position.closed) {
      throw new PositionClosedError(positionId);
    }
    this.replace({ ...position, deadline }, `set deadline of position #${positionId}`);
  }

  listOpen(): Position[] {
    return [...this.positions.values()].filter((p) => !p.closed).map((p) => ({ ...p }));
  }

  listByOwner(owner: Address): AtomicPosition[] {
    const result: AtomicPosition[] = [];
    for (const position of this.positions.values()) {
      if (position.model === 'atomic' && isAddressEqual(position.owner, owner)) {
        result.push({ ...position });
      }
    }
    return result;
  }

  sumOpenPrincipal(): bigint {
    let sum = 0n;
    for (const position of this.positions.values()) {
      if (!position.closed) sum += position.principalAmount;
    }
    return sum;
  }

  /** Id the next position will receive */
  peekNextId(): bigint {
    return this.nextId;
  }

  private replace(updated: Position, label: string): void {
    const previous = this.positions.get(updated.id);
    if (previous === undefined) {
      throw new PositionNotFoundError(updated.id);
    }
    if (previous.closed) {
      throw new PositionClosedError(updated.id);
    }
    this.positions.set(updated.id, updated);
    this.transactions.record(label, () => {
      this.positions.set(previous.id, previous);
    });
  }
}
