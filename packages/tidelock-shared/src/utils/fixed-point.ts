/**
 * Fixed-Point Arithmetic Utilities
 *
 * Integer arithmetic over the uint256 domain with explicit rounding
 * direction. Nothing here wraps: a result outside [0, UINT256_MAX] raises
 * ArithmeticOverflow / ArithmeticUnderflow, which aborts the enclosing
 * ledger operation.
 */

import { UINT256_MAX } from '../constants.js';
import {
  ArithmeticOverflowError,
  ArithmeticUnderflowError,
} from '../errors/ledger-errors.js';

/**
 * Assert that a value lies in the uint256 domain.
 *
 * @param value - Candidate result
 * @param operation - Label used in the error message
 * @returns The value unchanged
 */
export function toUint256(value: bigint, operation = 'toUint256'): bigint {
  if (value < 0n) {
    throw new ArithmeticUnderflowError(operation);
  }
  if (value > UINT256_MAX) {
    throw new ArithmeticOverflowError(operation);
  }
  return value;
}

export function checkedAdd(a: bigint, b: bigint, operation = 'checkedAdd'): bigint {
  return toUint256(a + b, operation);
}

export function checkedSub(a: bigint, b: bigint, operation = 'checkedSub'): bigint {
  return toUint256(a - b, operation);
}

export function checkedMul(a: bigint, b: bigint, operation = 'checkedMul'): bigint {
  return toUint256(a * b, operation);
}

/**
 * Floor of a * b / denominator.
 *
 * The intermediate product is exact (bigint), so only the final quotient
 * has to fit in uint256.
 *
 * @example
 * mulDiv(1000n, 25n, 10000n); // 2n
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint, operation = 'mulDiv'): bigint {
  if (denominator === 0n) {
    throw new ArithmeticOverflowError(`${operation} (division by zero)`);
  }
  toUint256(a, operation);
  toUint256(b, operation);
  return toUint256((a * b) / denominator, operation);
}

/**
 * Ceiling of a / b, rounding up so that a collector never under-collects.
 *
 * @example
 * ceilDiv(86_401n, 86_400n); // 2n
 * ceilDiv(0n, 86_400n);      // 0n
 */
export function ceilDiv(a: bigint, b: bigint): bigint {
  if (b === 0n) {
    throw new ArithmeticOverflowError('ceilDiv (division by zero)');
  }
  toUint256(a, 'ceilDiv');
  if (a === 0n) {
    return 0n;
  }
  return (a - 1n) / b + 1n;
}
