import { describe, it, expect } from 'vitest';
import {
  toUint256,
  checkedAdd,
  checkedSub,
  checkedMul,
  mulDiv,
  ceilDiv,
} from './fixed-point.js';
import { UINT256_MAX, SECONDS_PER_DAY } from '../constants.js';
import { isLedgerError } from '../errors/ledger-errors.js';

describe('Fixed-Point Arithmetic Utilities', () => {
  describe('toUint256', () => {
    it('should pass through values inside the domain', () => {
      expect(toUint256(0n)).toBe(0n);
      expect(toUint256(UINT256_MAX)).toBe(UINT256_MAX);
    });

    it('should reject negative values as underflow', () => {
      expect(() => toUint256(-1n)).toThrowError(/Arithmetic underflow/);
    });

    it('should reject values above UINT256_MAX as overflow', () => {
      expect(() => toUint256(UINT256_MAX + 1n)).toThrowError(/Arithmetic overflow/);
    });
  });

  describe('checked operations', () => {
    it('should add, subtract and multiply inside the domain', () => {
      expect(checkedAdd(2n, 3n)).toBe(5n);
      expect(checkedSub(5n, 3n)).toBe(2n);
      expect(checkedMul(4n, 3n)).toBe(12n);
    });

    it('should raise ArithmeticUnderflow instead of wrapping on subtraction', () => {
      try {
        checkedSub(1n, 2n, 'totalStaked');
        expect.unreachable();
      } catch (err) {
        expect(isLedgerError(err, 'ArithmeticUnderflow')).toBe(true);
        expect((err as Error).message).toBe('Arithmetic underflow in totalStaked');
      }
    });

    it('should raise ArithmeticOverflow on addition past UINT256_MAX', () => {
      expect(() => checkedAdd(UINT256_MAX, 1n)).toThrowError(/Arithmetic overflow in checkedAdd/);
    });

    it('should raise ArithmeticOverflow on multiplication past UINT256_MAX', () => {
      expect(() => checkedMul(UINT256_MAX, 2n)).toThrowError(/Arithmetic overflow/);
    });
  });

  describe('mulDiv', () => {
    it('should round down', () => {
      expect(mulDiv(1000n, 25n, 10_000n)).toBe(2n);
      expect(mulDiv(7n, 1n, 2n)).toBe(3n);
    });

    it('should keep the intermediate product exact', () => {
      // a * b exceeds uint256 but the quotient does not
      expect(mulDiv(UINT256_MAX, 4n, 8n)).toBe(UINT256_MAX / 2n);
    });

    it('should reject a zero denominator', () => {
      expect(() => mulDiv(1n, 1n, 0n)).toThrowError(/division by zero/);
    });
  });

  describe('ceilDiv', () => {
    it('should return zero for a zero numerator', () => {
      expect(ceilDiv(0n, SECONDS_PER_DAY)).toBe(0n);
    });

    it('should return the exact quotient for whole days', () => {
      expect(ceilDiv(10n * SECONDS_PER_DAY, SECONDS_PER_DAY)).toBe(10n);
    });

    it('should round a single remaining second up to a full day', () => {
      expect(ceilDiv(1n, SECONDS_PER_DAY)).toBe(1n);
      expect(ceilDiv(SECONDS_PER_DAY + 1n, SECONDS_PER_DAY)).toBe(2n);
    });

    it('should reject a zero divisor', () => {
      expect(() => ceilDiv(1n, 0n)).toThrowError(/division by zero/);
    });
  });
});
