/**
 * Fee/Parameter Store
 *
 * Owner-gated, range-checked ledger parameters. Every accepted write runs
 * as its own ledger transaction and emits a `parameter.changed` event
 * carrying the new value.
 */

import { getAddress, isAddress, isAddressEqual, type Address } from 'viem';
import {
  RATIO,
  FeeRateOverflowError,
  ForceUnstakeFeeOverflowError,
  InvalidAddressError,
  InvalidLockupBoundsError,
  PermissionDeniedError,
  ZeroInputError,
  type LedgerParameterName,
  type LedgerParameters,
} from '@tidelock/shared';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { createLedgerEvent } from '../../events/index.js';
import type { Clock } from '../../clock/index.js';
import type { TransactionManager } from '../../transaction/index.js';

export interface ParameterStoreDependencies {
  transactions: TransactionManager;
  clock: Clock;
  /** Address allowed to change parameters */
  owner: Address;
  initial: LedgerParameters;
}

/**
 * Ledger parameter store
 */
export class ParameterStore {
  private readonly transactions: TransactionManager;
  private readonly clock: Clock;
  private readonly logger: ServiceLogger;
  private readonly owner: Address;
  private params: LedgerParameters;

  constructor(dependencies: ParameterStoreDependencies) {
    this.transactions = dependencies.transactions;
    this.clock = dependencies.clock;
    this.owner = getAddress(dependencies.owner);
    this.logger = createServiceLogger('ParameterStore');

    const { initial } = dependencies;
    this.assertLockupBounds(initial.minLockupDays, initial.maxLockupDays);
    this.assertForceUnstakeFeeRate(initial.forceUnstakeFeeRate);
    this.assertBurnedYieldClaimFeeRate(initial.burnedYieldClaimFeeRate);
    if (initial.minStake <= 0n) throw new ZeroInputError('minStake');
    this.params = {
      ...initial,
      revenuePool: getAddress(initial.revenuePool),
      yieldReporter: getAddress(initial.yieldReporter),
    };
  }

  /**
   * Current parameter values (a copy)
   */
  snapshot(): LedgerParameters {
    return { ...this.params };
  }

  get<K extends LedgerParameterName>(name: K): LedgerParameters[K] {
    return this.params[name];
  }

  getOwner(): Address {
    return this.owner;
  }

  setMinLockupDays(caller: Address, days: bigint): void {
    this.update(caller, 'minLockupDays', days, () => {
      this.assertLockupBounds(days, this.params.maxLockupDays);
    });
  }

  setMaxLockupDays(caller: Address, days: bigint): void {
    this.update(caller, 'maxLockupDays', days, () => {
      this.assertLockupBounds(this.params.minLockupDays, days);
    });
  }

  setMinStake(caller: Address, amount: bigint): void {
    this.update(caller, 'minStake', amount, () => {
      if (amount <= 0n) throw new ZeroInputError('minStake');
    });
  }

  setForceUnstakeFeeRate(caller: Address, rate: bigint): void {
    this.update(caller, 'forceUnstakeFeeRate', rate, () => this.assertForceUnstakeFeeRate(rate));
  }

  setBurnedYieldClaimFeeRate(caller: Address, rate: bigint): void {
    this.update(caller, 'burnedYieldClaimFeeRate', rate, () => this.assertBurnedYieldClaimFeeRate(rate));
  }

  setRevenuePool(caller: Address, pool: string): void {
    this.assertOwner(caller, 'setRevenuePool');
    this.update(caller, 'revenuePool', this.parseAddress(pool, 'revenuePool'));
  }

  setYieldReporter(caller: Address, reporter: string): void {
    this.assertOwner(caller, 'setYieldReporter');
    this.update(caller, 'yieldReporter', this.parseAddress(reporter, 'yieldReporter'));
  }

  /**
   * Authorize, validate, then write one parameter inside a transaction
   */
  private update<K extends LedgerParameterName>(
    caller: Address,
    name: K,
    value: LedgerParameters[K],
    validate?: () => void
  ): void {
    const operation = `set${name.charAt(0).toUpperCase()}${name.slice(1)}`;
    log.methodEntry(this.logger, operation, { caller, value: String(value) });

    try {
      this.transactions.execute(operation, (tx) => {
        this.assertOwner(caller, operation);
        validate?.();

        const before = this.params;
        const previous = before[name];
        const next = { ...before };
        next[name] = value;
        this.params = next;
        tx.onRollback(operation, () => {
          this.params = before;
        });

        tx.emit(
          createLedgerEvent({
            type: 'parameter.changed',
            entityId: name,
            entityType: 'parameters',
            payload: { name, previousValue: String(previous), newValue: String(value) },
            ledgerTime: this.clock.now(),
            operation,
            caller,
          })
        );
      });

      log.parameterChanged(this.logger, name, String(value));
      log.methodExit(this.logger, operation);
    } catch (error) {
      log.methodError(this.logger, operation, error, { caller });
      throw error;
    }
  }

  private assertOwner(caller: Address, operation: string): void {
    if (!isAddressEqual(caller, this.owner)) {
      throw new PermissionDeniedError(caller, operation);
    }
  }

  /**
   * Lockup bounds are cross-validated at write time: a min above the max
   * would make every future stake impossible.
   */
  private assertLockupBounds(minLockupDays: bigint, maxLockupDays: bigint): void {
    if (minLockupDays <= 0n) throw new ZeroInputError('minLockupDays');
    if (minLockupDays > maxLockupDays) {
      throw new InvalidLockupBoundsError(minLockupDays, maxLockupDays);
    }
  }

  private assertForceUnstakeFeeRate(rate: bigint): void {
    if (rate < 0n || rate > RATIO) throw new ForceUnstakeFeeOverflowError(rate);
  }

  private assertBurnedYieldClaimFeeRate(rate: bigint): void {
    if (rate < 0n || rate > RATIO) throw new FeeRateOverflowError(rate);
  }

  private parseAddress(value: string, field: string): Address {
    if (!isAddress(value)) {
      throw new InvalidAddressError(field, value);
    }
    return getAddress(value);
  }
}
