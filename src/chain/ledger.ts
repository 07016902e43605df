import type { Address } from 'viem';
import type { TokenMeta } from '../domain/types';
import { ExternalCallError, ValidationError } from '../domain/errors';
import { addressKey, isZeroAddress } from '../utils/address';
import type { Snapshottable } from './journal';

export interface LedgerState {
  balances: Map<string, bigint>;
  allowances: Map<string, bigint>;
}

function balanceKey(token: Address, account: Address): string {
  return `${addressKey(token)}:${addressKey(account)}`;
}

function allowanceKey(token: Address, owner: Address, spender: Address): string {
  return `${addressKey(token)}:${addressKey(owner)}:${addressKey(spender)}`;
}

// ERC-20 style balances and allowances for every registered token.
export class TokenLedger implements Snapshottable<LedgerState> {
  private readonly tokens = new Map<string, TokenMeta>();
  private balances = new Map<string, bigint>();
  private allowances = new Map<string, bigint>();

  registerToken(meta: TokenMeta): TokenMeta {
    if (isZeroAddress(meta.address)) {
      throw new ValidationError('InvalidToken', 'Token address must be non-zero');
    }
    this.tokens.set(addressKey(meta.address), meta);
    return meta;
  }

  token(token: Address): TokenMeta {
    const meta = this.tokens.get(addressKey(token));
    if (!meta) throw new ValidationError('InvalidToken', `Unknown token ${token}`, { token });
    return meta;
  }

  decimalsOf(token: Address): number {
    return this.token(token).decimals;
  }

  balanceOf(token: Address, account: Address): bigint {
    return this.balances.get(balanceKey(token, account)) ?? 0n;
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(token, owner, spender)) ?? 0n;
  }

  mint(token: Address, to: Address, amount: bigint): void {
    this.token(token);
    this.credit(token, to, amount);
  }

  burn(token: Address, from: Address, amount: bigint): void {
    this.token(token);
    this.debit(token, from, amount);
  }

  transfer(token: Address, from: Address, to: Address, amount: bigint): void {
    this.token(token);
    this.debit(token, from, amount);
    this.credit(token, to, amount);
  }

  // Sets (never adds to) the allowance.
  approve(token: Address, owner: Address, spender: Address, amount: bigint): void {
    this.token(token);
    if (amount < 0n) throw new ValidationError('InvalidAmount', 'Allowance cannot be negative');
    const key = allowanceKey(token, owner, spender);
    if (amount === 0n) this.allowances.delete(key);
    else this.allowances.set(key, amount);
  }

  transferFrom(token: Address, spender: Address, from: Address, to: Address, amount: bigint): void {
    const current = this.allowance(token, from, spender);
    if (current < amount) {
      throw new ExternalCallError('TransferFailed', 'Insufficient allowance', {
        token,
        owner: from,
        spender,
        allowance: current.toString(),
        needed: amount.toString(),
      });
    }
    this.transfer(token, from, to, amount);
    this.approve(token, from, spender, current - amount);
  }

  snapshot(): LedgerState {
    return { balances: new Map(this.balances), allowances: new Map(this.allowances) };
  }

  restore(state: LedgerState): void {
    this.balances = new Map(state.balances);
    this.allowances = new Map(state.allowances);
  }

  private credit(token: Address, account: Address, amount: bigint): void {
    if (amount < 0n) throw new ValidationError('InvalidAmount', 'Amount cannot be negative');
    const key = balanceKey(token, account);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  private debit(token: Address, account: Address, amount: bigint): void {
    if (amount < 0n) throw new ValidationError('InvalidAmount', 'Amount cannot be negative');
    const key = balanceKey(token, account);
    const balance = this.balances.get(key) ?? 0n;
    if (balance < amount) {
      throw new ExternalCallError('TransferFailed', 'Insufficient balance', {
        token,
        account,
        balance: balance.toString(),
        needed: amount.toString(),
      });
    }
    this.balances.set(key, balance - amount);
  }
}
