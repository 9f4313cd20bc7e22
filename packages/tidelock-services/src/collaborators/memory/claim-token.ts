import { getAddress, type Address } from 'viem';
import { InsufficientBalanceError, ZeroInputError } from '@tidelock/shared';
import type { ClaimToken, PositionShareToken } from '../types.js';

/**
 * In-memory fungible claim token.
 *
 * Stands in for the Principal Claim and Yield Claim contracts in tests and
 * simulations. Zero-amount mints and burns are rejected so that a ledger
 * bug which would move nothing surfaces immediately.
 */
export class InMemoryClaimToken implements ClaimToken {
  private readonly balances = new Map<Address, bigint>();
  private supply = 0n;

  constructor(public readonly symbol: string) {}

  mint(to: Address, amount: bigint): void {
    if (amount <= 0n) throw new ZeroInputError(`${this.symbol} mint amount`);
    const account = getAddress(to);
    this.balances.set(account, this.balanceOf(account) + amount);
    this.supply += amount;
  }

  burn(from: Address, amount: bigint): void {
    if (amount <= 0n) throw new ZeroInputError(`${this.symbol} burn amount`);
    const account = getAddress(from);
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new InsufficientBalanceError(this.symbol, account, amount, balance);
    }
    this.balances.set(account, balance - amount);
    this.supply -= amount;
  }

  /** Move balance between holders (claims are freely transferable) */
  transfer(from: Address, to: Address, amount: bigint): void {
    this.burn(from, amount);
    this.mint(to, amount);
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(getAddress(account)) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }
}

/**
 * In-memory semi-fungible position-share token (one id per position)
 */
export class InMemoryPositionShareToken implements PositionShareToken {
  private readonly balances = new Map<string, bigint>();
  private readonly supplies = new Map<bigint, bigint>();

  mint(to: Address, positionId: bigint, amount: bigint): void {
    if (amount <= 0n) throw new ZeroInputError('position share mint amount');
    const key = this.key(to, positionId);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
    this.supplies.set(positionId, this.totalSupply(positionId) + amount);
  }

  burn(from: Address, positionId: bigint, amount: bigint): void {
    if (amount <= 0n) throw new ZeroInputError('position share burn amount');
    const key = this.key(from, positionId);
    const balance = this.balances.get(key) ?? 0n;
    if (balance < amount) {
      throw new InsufficientBalanceError(`position share #${positionId}`, getAddress(from), amount, balance);
    }
    this.balances.set(key, balance - amount);
    this.supplies.set(positionId, this.totalSupply(positionId) - amount);
  }

  /** Move shares of one position between holders */
  transfer(from: Address, to: Address, positionId: bigint, amount: bigint): void {
    this.burn(from, positionId, amount);
    this.mint(to, positionId, amount);
  }

  balanceOf(account: Address, positionId: bigint): bigint {
    return this.balances.get(this.key(account, positionId)) ?? 0n;
  }

  totalSupply(positionId: bigint): bigint {
    return this.supplies.get(positionId) ?? 0n;
  }

  private key(account: Address, positionId: bigint): string {
    return `${getAddress(account)}:${positionId}`;
  }
}
