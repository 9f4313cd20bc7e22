import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ReentrantCallError, isLedgerError } from '@tidelock/shared';
import { InMemoryEventPublisher, createLedgerEvent } from '../events/index.js';
import { TransactionManager } from './ledger-transaction.js';

function accruedEvent(amount: bigint) {
  return createLedgerEvent({
    type: 'yield.accrued',
    entityId: 'pool',
    entityType: 'yield-pool',
    payload: { amount: amount.toString(), totalYieldPoolAfter: amount.toString() },
    ledgerTime: 0n,
    operation: 'accumYieldPool',
    caller: '0x2000',
  });
}

describe('TransactionManager', () => {
  let publisher: InMemoryEventPublisher;
  let transactions: TransactionManager;

  beforeEach(() => {
    publisher = new InMemoryEventPublisher();
    transactions = new TransactionManager({ publisher });
  });

  it('should return the operation result and publish its events on commit', () => {
    const result = transactions.execute('accumYieldPool', (tx) => {
      tx.emit(accruedEvent(5n));
      return 'ok';
    });

    expect(result).toBe('ok');
    expect(publisher.events().map((e) => e.payload)).toEqual([
      { amount: '5', totalYieldPoolAfter: '5' },
    ]);
    expect(transactions.active).toBeNull();
  });

  it('should run undo steps newest first and drop events on failure', () => {
    const order: string[] = [];

    expect(() =>
      transactions.execute('stake', (tx) => {
        transactions.record('first', () => order.push('first'));
        transactions.record('second', () => order.push('second'));
        tx.emit(accruedEvent(1n));
        throw new Error('mint failed');
      })
    ).toThrowError('mint failed');

    expect(order).toEqual(['second', 'first']);
    expect(publisher.events()).toEqual([]);
    expect(transactions.active).toBeNull();
  });

  it('should roll back when the pre-commit check fails', () => {
    let value = 0;

    expect(() =>
      transactions.execute(
        'stake',
        () => {
          value = 1;
          transactions.record('value', () => {
            value = 0;
          });
        },
        () => {
          throw new Error('invariant');
        }
      )
    ).toThrowError('invariant');

    expect(value).toBe(0);
  });

  it('should report undo steps that could not be applied', () => {
    expect(() =>
      transactions.execute('unstake', () => {
        transactions.record('broken', () => {
          throw new Error('undo failed');
        });
        throw new Error('transfer failed');
      })
    ).toThrowError('unstake failed and 1 undo step(s) could not be applied');
  });

  it('should reject a nested operation', () => {
    let caught: unknown;
    transactions.execute('stake', () => {
      try {
        transactions.execute('unstake', () => undefined);
      } catch (error) {
        caught = error;
      }
    });

    expect(caught).toBeInstanceOf(ReentrantCallError);
    expect(isLedgerError(caught, 'ReentrantCall')).toBe(true);
  });

  it('should ignore undo records outside a transaction', () => {
    const undo = vi.fn();
    transactions.record('direct', undo);
    expect(undo).not.toHaveBeenCalled();
    expect(transactions.active).toBeNull();
  });

  it('should keep delivering when a subscriber throws', () => {
    const good = vi.fn();
    publisher.subscribe(() => {
      throw new Error('handler broke');
    });
    publisher.subscribe(good);

    transactions.execute('accumYieldPool', (tx) => tx.emit(accruedEvent(2n)));

    expect(good).toHaveBeenCalledTimes(1);
  });

  it('should stop delivery after unsubscribe', () => {
    const handler = vi.fn();
    const unsubscribe = publisher.subscribe(handler);
    unsubscribe();

    transactions.execute('accumYieldPool', (tx) => tx.emit(accruedEvent(2n)));

    expect(handler).not.toHaveBeenCalled();
    expect(publisher.events('yield.accrued')).toHaveLength(1);
  });
});
