import type { Address } from 'viem';
import type { TokenLedger } from '../chain/ledger';
import type { Snapshottable } from '../chain/journal';
import type { ValueOracle } from '../domain/types';
import { ExternalCallError } from '../domain/errors';
import { addressKey, sameAddress } from '../utils/address';
import { WAD, mulDiv } from '../utils/math';

export interface MarketParams {
  loanToken: Address;
  collateralToken: Address;
  lltv: bigint; // WAD
}

export interface MarketPosition {
  collateral: bigint;
  borrowed: bigint;
}

type MarketState = Map<string, MarketPosition>;

function revert(message: string, details: Record<string, string> = {}): never {
  throw new ExternalCallError('ProtocolCallFailed', message, details);
}

/**
 * Isolated market: one collateral token, one loan token, one LLTV. Loan
 * liquidity is whatever loan-token balance the market holds.
 */
export class MorphoMarket implements Snapshottable<MarketState> {
  private positions: MarketState = new Map();

  constructor(
    readonly address: Address,
    readonly params: MarketParams,
    private readonly ledger: TokenLedger,
    private readonly oracle: ValueOracle,
  ) {
    if (params.lltv <= 0n || params.lltv >= WAD) revert('LLTV must be between 0 and 1');
    if (sameAddress(params.loanToken, params.collateralToken)) revert('Loan and collateral token must differ');
  }

  position(account: Address): MarketPosition {
    const p = this.positions.get(addressKey(account));
    return p ? { ...p } : { collateral: 0n, borrowed: 0n };
  }

  supplyCollateral(sender: Address, amount: bigint, onBehalf: Address): void {
    if (amount <= 0n) revert('Zero collateral amount');
    this.ledger.transferFrom(this.params.collateralToken, this.address, sender, this.address, amount);
    const p = this.position(onBehalf);
    this.write(onBehalf, { ...p, collateral: p.collateral + amount });
  }

  withdrawCollateral(sender: Address, amount: bigint, receiver: Address): void {
    const p = this.position(sender);
    if (amount <= 0n) revert('Zero collateral amount');
    if (amount > p.collateral) {
      revert('Insufficient collateral', { collateral: p.collateral.toString(), requested: amount.toString() });
    }
    const next = { ...p, collateral: p.collateral - amount };
    this.requireHealthy(next);
    this.write(sender, next);
    this.ledger.transfer(this.params.collateralToken, this.address, receiver, amount);
  }

  borrow(sender: Address, amount: bigint, receiver: Address): void {
    if (amount <= 0n) revert('Zero borrow amount');
    const liquidity = this.ledger.balanceOf(this.params.loanToken, this.address);
    if (liquidity < amount) {
      revert('Insufficient liquidity', { liquidity: liquidity.toString(), needed: amount.toString() });
    }
    const p = this.position(sender);
    const next = { ...p, borrowed: p.borrowed + amount };
    this.requireHealthy(next);
    this.write(sender, next);
    this.ledger.transfer(this.params.loanToken, this.address, receiver, amount);
  }

  repay(sender: Address, amount: bigint, onBehalf: Address): void {
    const p = this.position(onBehalf);
    if (amount <= 0n) revert('Zero repay amount');
    if (amount > p.borrowed) {
      revert('Repay exceeds borrowed amount', { borrowed: p.borrowed.toString(), requested: amount.toString() });
    }
    this.ledger.transferFrom(this.params.loanToken, this.address, sender, this.address, amount);
    this.write(onBehalf, { ...p, borrowed: p.borrowed - amount });
  }

  snapshot(): MarketState {
    return new Map([...this.positions].map(([k, v]) => [k, { ...v }]));
  }

  restore(state: MarketState): void {
    this.positions = new Map([...state].map(([k, v]) => [k, { ...v }]));
  }

  private requireHealthy(p: MarketPosition): void {
    if (p.borrowed === 0n) return;
    const maxBorrowUsd = mulDiv(this.oracle.valueOf(this.params.collateralToken, p.collateral), this.params.lltv, WAD);
    const borrowedUsd = this.oracle.valueOf(this.params.loanToken, p.borrowed);
    if (borrowedUsd > maxBorrowUsd) {
      revert('Position would be unhealthy', { borrowedUsd: borrowedUsd.toString(), maxBorrowUsd: maxBorrowUsd.toString() });
    }
  }

  private write(account: Address, p: MarketPosition): void {
    if (p.collateral === 0n && p.borrowed === 0n) this.positions.delete(addressKey(account));
    else this.positions.set(addressKey(account), p);
  }
}
