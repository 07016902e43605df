import type { Address } from 'viem';
import type { TokenLedger } from '../chain/ledger';
import type { LendingAdapter, PositionAmounts, UnwindPlan } from '../domain/types';
import { PERCENTAGE_DENOMINATOR } from '../config/constants';
import type { AavePool } from '../venues/aavePool';
import { minBigInt, mulDivUp, percentOf } from '../utils/math';

export interface AaveAdapterOptions {
  pool: AavePool;
  ledger: TokenLedger;
  account: Address; // the strategy holding the position
  collateralAsset: Address;
  debtAsset: Address;
  rewardTokens?: Address[];
}

// Aave-style venue hooks. Approvals are exact and reset after each call.
export class AaveAdapter implements LendingAdapter {
  readonly venue = 'aave';
  private readonly pool: AavePool;
  private readonly ledger: TokenLedger;
  private readonly account: Address;
  private readonly collateral: Address;
  private readonly debt: Address;
  private readonly rewardTokens: Address[];

  constructor(options: AaveAdapterOptions) {
    this.pool = options.pool;
    this.ledger = options.ledger;
    this.account = options.account;
    this.collateral = options.collateralAsset;
    this.debt = options.debtAsset;
    this.rewardTokens = [...(options.rewardTokens ?? [])];
    this.pool.reserve(this.collateral);
    this.pool.reserve(this.debt);
  }

  collateralAsset(): Address {
    return this.collateral;
  }

  debtAsset(): Address {
    return this.debt;
  }

  positionAmounts(): PositionAmounts {
    return {
      collateral: this.pool.collateralOf(this.account, this.collateral),
      debt: this.pool.debtOf(this.account, this.debt),
    };
  }

  supply(asset: Address, amount: bigint): void {
    this.ledger.approve(asset, this.account, this.pool.address, amount);
    this.pool.supply(this.account, asset, amount, this.account);
    this.ledger.approve(asset, this.account, this.pool.address, 0n);
  }

  withdrawFromVenue(asset: Address, amount: bigint): void {
    this.pool.withdraw(this.account, asset, amount, this.account);
  }

  borrow(asset: Address, amount: bigint): void {
    this.pool.borrow(this.account, asset, amount, this.account);
  }

  repay(asset: Address, amount: bigint): void {
    this.ledger.approve(asset, this.account, this.pool.address, amount);
    this.pool.repay(this.account, asset, amount, this.account);
    this.ledger.approve(asset, this.account, this.pool.address, 0n);
  }

  extraTrackedTokens(): Address[] {
    return [...this.rewardTokens];
  }

  // Rounds the repayment up and adds one unit so the remaining position never ends up more levered.
  unwindAmounts(position: PositionAmounts, percentage: bigint): UnwindPlan {
    const repayAmount = minBigInt(position.debt, mulDivUp(position.debt, percentage, PERCENTAGE_DENOMINATOR) + 1n);
    return { repayAmount, withdrawAmount: percentOf(position.collateral, percentage) };
  }
}
