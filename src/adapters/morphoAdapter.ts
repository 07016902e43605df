import type { Address } from 'viem';
import type { TokenLedger } from '../chain/ledger';
import type { LendingAdapter, PositionAmounts } from '../domain/types';
import { ValidationError } from '../domain/errors';
import type { MorphoMarket } from '../venues/morphoMarket';
import { sameAddress } from '../utils/address';
import { minBigInt } from '../utils/math';

export class MorphoAdapter implements LendingAdapter {
  readonly venue = 'morpho';

  constructor(
    private readonly market: MorphoMarket,
    private readonly ledger: TokenLedger,
    private readonly account: Address,
  ) {}

  collateralAsset(): Address {
    return this.market.params.collateralToken;
  }

  debtAsset(): Address {
    return this.market.params.loanToken;
  }

  positionAmounts(): PositionAmounts {
    const p = this.market.position(this.account);
    return { collateral: p.collateral, debt: p.borrowed };
  }

  supply(asset: Address, amount: bigint): void {
    this.requireCollateral(asset);
    this.ledger.approve(asset, this.account, this.market.address, amount);
    this.market.supplyCollateral(this.account, amount, this.account);
    this.ledger.approve(asset, this.account, this.market.address, 0n);
  }

  withdrawFromVenue(asset: Address, amount: bigint): void {
    this.requireCollateral(asset);
    this.market.withdrawCollateral(this.account, amount, this.account);
  }

  borrow(asset: Address, amount: bigint): void {
    this.requireLoan(asset);
    this.market.borrow(this.account, amount, this.account);
  }

  // Capped at the outstanding borrow; nothing owed is a no-op.
  repay(asset: Address, amount: bigint): void {
    this.requireLoan(asset);
    const owed = this.market.position(this.account).borrowed;
    const repaid = minBigInt(amount, owed);
    if (repaid === 0n) return;
    this.ledger.approve(asset, this.account, this.market.address, repaid);
    this.market.repay(this.account, repaid, this.account);
    this.ledger.approve(asset, this.account, this.market.address, 0n);
  }

  private requireCollateral(asset: Address): void {
    if (!sameAddress(asset, this.market.params.collateralToken)) {
      throw new ValidationError('InvalidToken', `${asset} is not the market collateral token`, { asset });
    }
  }

  private requireLoan(asset: Address): void {
    if (!sameAddress(asset, this.market.params.loanToken)) {
      throw new ValidationError('InvalidToken', `${asset} is not the market loan token`, { asset });
    }
  }
}
