/**
 * Ledger Error Classes
 *
 * Every failure the staking ledger can raise. Validation, authorization and
 * state-conflict errors are raised before any state is mutated; arithmetic,
 * collaborator and invariant errors can surface mid-operation and cause the
 * enclosing ledger transaction to roll back.
 */

/**
 * Error codes, one per failure mode
 */
export type LedgerErrorCode =
  | 'ZeroInput'
  | 'MinStakeInsufficient'
  | 'InvalidLockupDays'
  | 'InvalidExtendDays'
  | 'InvalidLockupBounds'
  | 'InvalidShareAmount'
  | 'InvalidAddress'
  | 'FeeRateOverflow'
  | 'ForceUnstakeFeeOverflow'
  | 'PermissionDenied'
  | 'PositionClosed'
  | 'PositionNotFound'
  | 'ReachedDeadline'
  | 'WrongPositionModel'
  | 'ReentrantCall'
  | 'ArithmeticOverflow'
  | 'ArithmeticUnderflow'
  | 'InsufficientYieldClaim'
  | 'InsufficientBalance'
  | 'LedgerInvariantViolation';

/**
 * Error categories used for reporting and retry decisions by callers
 */
export type LedgerErrorCategory =
  | 'validation'
  | 'authorization'
  | 'state-conflict'
  | 'arithmetic'
  | 'collaborator'
  | 'invariant';

const CATEGORY_BY_CODE: Record<LedgerErrorCode, LedgerErrorCategory> = {
  ZeroInput: 'validation',
  MinStakeInsufficient: 'validation',
  InvalidLockupDays: 'validation',
  InvalidExtendDays: 'validation',
  InvalidLockupBounds: 'validation',
  InvalidShareAmount: 'validation',
  InvalidAddress: 'validation',
  FeeRateOverflow: 'validation',
  ForceUnstakeFeeOverflow: 'validation',
  PermissionDenied: 'authorization',
  PositionClosed: 'state-conflict',
  PositionNotFound: 'state-conflict',
  ReachedDeadline: 'state-conflict',
  WrongPositionModel: 'state-conflict',
  ReentrantCall: 'state-conflict',
  ArithmeticOverflow: 'arithmetic',
  ArithmeticUnderflow: 'arithmetic',
  InsufficientYieldClaim: 'validation',
  InsufficientBalance: 'collaborator',
  LedgerInvariantViolation: 'invariant',
};

/**
 * Base class for all ledger errors
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly category: LedgerErrorCategory;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = `${code}Error`;
    this.code = code;
    this.category = CATEGORY_BY_CODE[code];
  }
}

/**
 * Narrow an unknown error to a LedgerError, optionally of a given code
 */
export function isLedgerError(err: unknown, code?: LedgerErrorCode): err is LedgerError {
  if (!(err instanceof LedgerError)) {
    return false;
  }
  return code === undefined || err.code === code;
}

// ============================================================================
// VALIDATION
// ============================================================================

export class ZeroInputError extends LedgerError {
  constructor(public readonly field: string) {
    super('ZeroInput', `${field} must be greater than zero`);
  }
}

export class MinStakeInsufficientError extends LedgerError {
  constructor(
    public readonly amount: bigint,
    public readonly minStake: bigint
  ) {
    super('MinStakeInsufficient', `Stake of ${amount} is below the minimum stake of ${minStake}`);
  }
}

export class InvalidLockupDaysError extends LedgerError {
  constructor(
    public readonly lockupDays: bigint,
    public readonly minLockupDays: bigint,
    public readonly maxLockupDays: bigint
  ) {
    super(
      'InvalidLockupDays',
      `Lockup of ${lockupDays} days is outside [${minLockupDays}, ${maxLockupDays}]`
    );
  }
}

export class InvalidExtendDaysError extends LedgerError {
  constructor(
    public readonly resultingDays: bigint,
    public readonly minLockupDays: bigint,
    public readonly maxLockupDays: bigint
  ) {
    super(
      'InvalidExtendDays',
      `Extended lock would run ${resultingDays} days from now, outside [${minLockupDays}, ${maxLockupDays}]`
    );
  }
}

export class InvalidLockupBoundsError extends LedgerError {
  constructor(
    public readonly minLockupDays: bigint,
    public readonly maxLockupDays: bigint
  ) {
    super(
      'InvalidLockupBounds',
      `minLockupDays (${minLockupDays}) must not exceed maxLockupDays (${maxLockupDays})`
    );
  }
}

export class InvalidShareAmountError extends LedgerError {
  constructor(
    public readonly positionId: bigint,
    public readonly share: bigint,
    public readonly outstanding: bigint
  ) {
    super(
      'InvalidShareAmount',
      `Share ${share} exceeds the ${outstanding} outstanding on position #${positionId}`
    );
  }
}

export class InvalidAddressError extends LedgerError {
  constructor(
    public readonly field: string,
    public readonly value: string
  ) {
    super('InvalidAddress', `${field} must be a valid address, got "${value}"`);
  }
}

export class FeeRateOverflowError extends LedgerError {
  constructor(public readonly rate: bigint) {
    super('FeeRateOverflow', `Yield-claim burn fee rate ${rate} exceeds the basis-point ratio`);
  }
}

export class ForceUnstakeFeeOverflowError extends LedgerError {
  constructor(public readonly rate: bigint) {
    super('ForceUnstakeFeeOverflow', `Force-unstake fee rate ${rate} exceeds the basis-point ratio`);
  }
}

export class InsufficientYieldClaimError extends LedgerError {
  constructor(
    public readonly burned: bigint,
    public readonly supply: bigint
  ) {
    super('InsufficientYieldClaim', `Cannot redeem ${burned} yield claims out of a supply of ${supply}`);
  }
}

// ============================================================================
// AUTHORIZATION
// ============================================================================

export class PermissionDeniedError extends LedgerError {
  constructor(
    public readonly caller: string,
    public readonly action: string
  ) {
    super('PermissionDenied', `${caller} is not allowed to ${action}`);
  }
}

// ============================================================================
// STATE CONFLICT
// ============================================================================

export class PositionClosedError extends LedgerError {
  constructor(public readonly positionId: bigint) {
    super('PositionClosed', `Position #${positionId} is closed`);
  }
}

export class PositionNotFoundError extends LedgerError {
  constructor(public readonly positionId: bigint) {
    super('PositionNotFound', `Position #${positionId} does not exist`);
  }
}

export class ReachedDeadlineError extends LedgerError {
  constructor(
    public readonly positionId: bigint,
    public readonly deadline: bigint
  ) {
    super('ReachedDeadline', `Position #${positionId} already reached its deadline ${deadline}`);
  }
}

export class WrongPositionModelError extends LedgerError {
  constructor(
    public readonly expected: string,
    public readonly actual: string
  ) {
    super('WrongPositionModel', `Operation requires the ${expected} position model, ledger runs ${actual}`);
  }
}

export class ReentrantCallError extends LedgerError {
  constructor(
    public readonly operation: string,
    public readonly activeOperation: string
  ) {
    super('ReentrantCall', `Cannot start ${operation} while ${activeOperation} is in progress`);
  }
}

// ============================================================================
// ARITHMETIC
// ============================================================================

export class ArithmeticOverflowError extends LedgerError {
  constructor(public readonly operation: string) {
    super('ArithmeticOverflow', `Arithmetic overflow in ${operation}`);
  }
}

export class ArithmeticUnderflowError extends LedgerError {
  constructor(public readonly operation: string) {
    super('ArithmeticUnderflow', `Arithmetic underflow in ${operation}`);
  }
}

// ============================================================================
// COLLABORATOR / INVARIANT
// ============================================================================

export class InsufficientBalanceError extends LedgerError {
  constructor(
    public readonly asset: string,
    public readonly account: string,
    public readonly requested: bigint,
    public readonly available: bigint
  ) {
    super(
      'InsufficientBalance',
      `${account} holds ${available} ${asset}, ${requested} required`
    );
  }
}

export class LedgerInvariantViolationError extends LedgerError {
  constructor(detail: string) {
    super('LedgerInvariantViolation', `Ledger invariant violated: ${detail}`);
  }
}
