import { getAddress, type Address } from 'viem';
import { InsufficientBalanceError, ZeroInputError } from '@tidelock/shared';
import type { BaseAssetWrapper, YieldSink } from '../types.js';

export interface InMemoryBaseAssetOptions {
  /** Address of the wrapper; also the authorized yield reporter */
  address: Address;
  symbol: string;
}

/**
 * In-memory base-asset wrapper.
 *
 * Holds wrapped balances and raw (unwrapped) balances side by side.
 * `reportYield` simulates the native asset rebasing: it credits the new
 * yield to the ledger's custody account and reports it through the
 * ledger's yield callback, as the wrapper contract does.
 */
export class InMemoryBaseAssetWrapper implements BaseAssetWrapper {
  public readonly address: Address;
  public readonly symbol: string;

  private readonly wrapped = new Map<Address, bigint>();
  private readonly raw = new Map<Address, bigint>();
  private supply = 0n;
  private yieldSink: { sink: YieldSink; custody: Address } | null = null;

  constructor(options: InMemoryBaseAssetOptions) {
    this.address = getAddress(options.address);
    this.symbol = options.symbol;
  }

  /**
   * Connect the ledger that receives yield reports
   */
  connectYieldSink(sink: YieldSink, custody: Address): void {
    this.yieldSink = { sink, custody: getAddress(custody) };
  }

  /**
   * Wrap raw asset into depositable balance (test funding)
   */
  deposit(account: Address, amount: bigint): void {
    if (amount <= 0n) throw new ZeroInputError(`${this.symbol} deposit amount`);
    this.credit(this.wrapped, account, amount);
    this.supply += amount;
  }

  /**
   * Credit freshly accrued yield to the ledger custody and report it
   */
  reportYield(amount: bigint): void {
    if (this.yieldSink === null) {
      throw new Error(`${this.symbol} wrapper has no yield sink connected`);
    }
    if (amount <= 0n) throw new ZeroInputError(`${this.symbol} yield amount`);
    const { sink, custody } = this.yieldSink;
    this.credit(this.wrapped, custody, amount);
    this.supply += amount;
    try {
      sink.accumYieldPool(this.address, amount);
    } catch (error) {
      this.debit(this.wrapped, custody, amount);
      this.supply -= amount;
      throw error;
    }
  }

  balanceOf(account: Address): bigint {
    return this.wrapped.get(getAddress(account)) ?? 0n;
  }

  /** Raw asset paid out by `withdraw` */
  rawBalanceOf(account: Address): bigint {
    return this.raw.get(getAddress(account)) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    if (amount <= 0n) throw new ZeroInputError(`${this.symbol} transfer amount`);
    this.debit(this.wrapped, from, amount);
    this.credit(this.wrapped, to, amount);
  }

  withdraw(holder: Address, amount: bigint, recipient: Address): void {
    if (amount <= 0n) throw new ZeroInputError(`${this.symbol} withdraw amount`);
    this.debit(this.wrapped, holder, amount);
    this.supply -= amount;
    this.credit(this.raw, recipient, amount);
  }

  private credit(book: Map<Address, bigint>, account: Address, amount: bigint): void {
    const key = getAddress(account);
    book.set(key, (book.get(key) ?? 0n) + amount);
  }

  private debit(book: Map<Address, bigint>, account: Address, amount: bigint): void {
    const key = getAddress(account);
    const balance = book.get(key) ?? 0n;
    if (balance < amount) {
      throw new InsufficientBalanceError(this.symbol, key, amount, balance);
    }
    book.set(key, balance - amount);
  }
}
