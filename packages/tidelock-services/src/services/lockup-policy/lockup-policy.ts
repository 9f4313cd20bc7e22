/**
 * Lockup Policy
 *
 * Validates lock durations against the configured bounds and turns them
 * into absolute deadlines.
 */

import {
  SECONDS_PER_DAY,
  ceilDiv,
  checkedAdd,
  checkedMul,
  checkedSub,
  InvalidExtendDaysError,
  InvalidLockupDaysError,
  ReachedDeadlineError,
  ZeroInputError,
  type Position,
} from '@tidelock/shared';
import type { ParameterStore } from '../parameter-store/index.js';

export interface LockupPolicyDependencies {
  parameters: ParameterStore;
}

export interface LockExtension {
  newDeadline: bigint;
  /** Whole days from now to the new deadline, rounded down */
  daysFromNow: bigint;
}

export class LockupPolicy {
  private readonly parameters: ParameterStore;

  constructor(dependencies: LockupPolicyDependencies) {
    this.parameters = dependencies.parameters;
  }

  /**
   * Validate a lockup and compute its deadline.
   *
   * lockupDays is bounded by maxLockupDays before the multiplication, so
   * `now + lockupDays * DAY` stays many orders of magnitude below
   * UINT256_MAX; the checked operations only guard against a corrupted
   * clock.
   *
   * @throws InvalidLockupDaysError when lockupDays is outside [min, max]
   */
  validateLockup(lockupDays: bigint, now: bigint): bigint {
    const { minLockupDays, maxLockupDays } = this.parameters.snapshot();
    if (lockupDays < minLockupDays || lockupDays > maxLockupDays) {
      throw new InvalidLockupDaysError(lockupDays, minLockupDays, maxLockupDays);
    }
    return checkedAdd(now, checkedMul(lockupDays, SECONDS_PER_DAY, 'lockup duration'), 'lockup deadline');
  }

  /**
   * Push a position's deadline further out.
   *
   * The lock must still be running, and the distance from now to the new
   * deadline (in whole days, rounded down) must itself be a valid lockup.
   *
   * @throws ReachedDeadlineError when the deadline has already passed
   * @throws InvalidExtendDaysError when the resulting lock is out of bounds
   */
  extendLockTime(position: Position, extendDays: bigint, now: bigint): LockExtension {
    if (extendDays <= 0n) {
      throw new ZeroInputError('extendDays');
    }
    if (position.deadline <= now) {
      throw new ReachedDeadlineError(position.id, position.deadline);
    }

    const { minLockupDays, maxLockupDays } = this.parameters.snapshot();
    // Reject before the multiplication so the checked math below never sees an unbounded factor
    if (extendDays > maxLockupDays) {
      throw new InvalidExtendDaysError(
        (position.deadline - now) / SECONDS_PER_DAY + extendDays,
        minLockupDays,
        maxLockupDays
      );
    }

    const newDeadline = checkedAdd(
      position.deadline,
      checkedMul(extendDays, SECONDS_PER_DAY, 'extension duration'),
      'extended deadline'
    );
    const daysFromNow = checkedSub(newDeadline, now, 'extended lock') / SECONDS_PER_DAY;
    if (daysFromNow < minLockupDays || daysFromNow > maxLockupDays) {
      throw new InvalidExtendDaysError(daysFromNow, minLockupDays, maxLockupDays);
    }

    return { newDeadline, daysFromNow };
  }

  /**
   * Whole days left on a lock, rounded up (0 once the deadline is reached)
   */
  remainingDays(deadline: bigint, now: bigint): bigint {
    if (deadline <= now) {
      return 0n;
    }
    return ceilDiv(deadline - now, SECONDS_PER_DAY);
  }
}
