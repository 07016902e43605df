import { maxUint256, type Address } from 'viem';
import type { TokenLedger } from '../chain/ledger';
import type { Snapshottable } from '../chain/journal';
import type { ValueOracle } from '../domain/types';
import { ExternalCallError } from '../domain/errors';
import { BPS_DENOMINATOR } from '../config/constants';
import { addressKey } from '../utils/address';
import { computeHealthFactor } from '../utils/health';
import { WAD, minBigInt, mulDiv } from '../utils/math';

export interface ReserveConfig {
  asset: Address;
  ltvBps: bigint; // max borrow against this collateral
  liquidationThresholdBps: bigint;
}

export interface UserAccountData {
  totalCollateralUsd: bigint;
  totalDebtUsd: bigint;
  availableBorrowsUsd: bigint;
  liquidationThresholdBps: bigint; // collateral-weighted
  healthFactor: bigint; // WAD, maxUint256 without debt
}

export interface AavePoolState {
  collateral: Map<string, bigint>;
  debt: Map<string, bigint>;
}

function positionKey(account: Address, asset: Address): string {
  return `${addressKey(account)}:${addressKey(asset)}`;
}

function revert(message: string, details: Record<string, string> = {}): never {
  throw new ExternalCallError('ProtocolCallFailed', message, details);
}

// Multi-reserve lending pool. Liquidity is the pool's own ledger balance.
export class AavePool implements Snapshottable<AavePoolState> {
  private readonly reserves = new Map<string, ReserveConfig>();
  private collateral = new Map<string, bigint>();
  private debt = new Map<string, bigint>();

  constructor(
    readonly address: Address,
    private readonly ledger: TokenLedger,
    private readonly oracle: ValueOracle,
  ) {}

  addReserve(config: ReserveConfig): void {
    if (config.liquidationThresholdBps < config.ltvBps || config.liquidationThresholdBps > BPS_DENOMINATOR) {
      revert('Invalid reserve configuration', { asset: config.asset });
    }
    this.ledger.token(config.asset);
    this.reserves.set(addressKey(config.asset), { ...config });
  }

  reserve(asset: Address): ReserveConfig {
    return this.reserves.get(addressKey(asset)) ?? revert(`Reserve not listed: ${asset}`, { asset });
  }

  collateralOf(account: Address, asset: Address): bigint {
    return this.collateral.get(positionKey(account, asset)) ?? 0n;
  }

  debtOf(account: Address, asset: Address): bigint {
    return this.debt.get(positionKey(account, asset)) ?? 0n;
  }

  supply(sender: Address, asset: Address, amount: bigint, onBehalfOf: Address): void {
    this.reserve(asset);
    if (amount <= 0n) revert('Supply amount must be positive');
    this.ledger.transferFrom(asset, this.address, sender, this.address, amount);
    this.addTo(this.collateral, positionKey(onBehalfOf, asset), amount);
  }

  // `maxUint256` withdraws everything supplied.
  withdraw(sender: Address, asset: Address, amount: bigint, to: Address): bigint {
    this.reserve(asset);
    const supplied = this.collateralOf(sender, asset);
    const withdrawn = amount === maxUint256 ? supplied : amount;
    if (withdrawn <= 0n) revert('Withdraw amount must be positive');
    if (withdrawn > supplied) {
      revert('Withdraw exceeds supplied balance', { supplied: supplied.toString(), requested: withdrawn.toString() });
    }
    this.requireLiquidity(asset, withdrawn);
    const key = positionKey(sender, asset);
    this.addTo(this.collateral, key, -withdrawn);
    const data = this.getUserAccountData(sender);
    if (data.healthFactor < WAD) {
      this.addTo(this.collateral, key, withdrawn);
      revert('Withdrawal would drop health factor below 1', { healthFactor: data.healthFactor.toString() });
    }
    this.ledger.transfer(asset, this.address, to, withdrawn);
    return withdrawn;
  }

  borrow(sender: Address, asset: Address, amount: bigint, onBehalfOf: Address): void {
    this.reserve(asset);
    if (amount <= 0n) revert('Borrow amount must be positive');
    if (addressKey(sender) !== addressKey(onBehalfOf)) revert('Credit delegation is not supported');
    const before = this.getUserAccountData(onBehalfOf);
    const requestedUsd = this.oracle.valueOf(asset, amount);
    if (requestedUsd > before.availableBorrowsUsd) {
      revert('Borrow exceeds available borrowing power', {
        requestedUsd: requestedUsd.toString(),
        availableUsd: before.availableBorrowsUsd.toString(),
      });
    }
    this.requireLiquidity(asset, amount);
    this.addTo(this.debt, positionKey(onBehalfOf, asset), amount);
    this.ledger.transfer(asset, this.address, sender, amount);
  }

  // Repayment is capped at the outstanding debt; `maxUint256` repays it all.
  repay(sender: Address, asset: Address, amount: bigint, onBehalfOf: Address): bigint {
    this.reserve(asset);
    const owed = this.debtOf(onBehalfOf, asset);
    if (owed === 0n) revert('No debt to repay', { asset });
    const repaid = minBigInt(amount, owed);
    if (repaid <= 0n) revert('Repay amount must be positive');
    this.ledger.transferFrom(asset, this.address, sender, this.address, repaid);
    this.addTo(this.debt, positionKey(onBehalfOf, asset), -repaid);
    return repaid;
  }

  getUserAccountData(account: Address): UserAccountData {
    let totalCollateralUsd = 0n;
    let totalDebtUsd = 0n;
    let borrowCapacityUsd = 0n;
    let weightedThreshold = 0n;
    for (const reserve of this.reserves.values()) {
      const supplied = this.collateralOf(account, reserve.asset);
      if (supplied > 0n) {
        const usd = this.oracle.valueOf(reserve.asset, supplied);
        totalCollateralUsd += usd;
        borrowCapacityUsd += mulDiv(usd, reserve.ltvBps, BPS_DENOMINATOR);
        weightedThreshold += usd * reserve.liquidationThresholdBps;
      }
      const owed = this.debtOf(account, reserve.asset);
      if (owed > 0n) totalDebtUsd += this.oracle.valueOf(reserve.asset, owed);
    }
    const liquidationThresholdBps = totalCollateralUsd === 0n ? 0n : weightedThreshold / totalCollateralUsd;
    return {
      totalCollateralUsd,
      totalDebtUsd,
      availableBorrowsUsd: borrowCapacityUsd > totalDebtUsd ? borrowCapacityUsd - totalDebtUsd : 0n,
      liquidationThresholdBps,
      healthFactor: computeHealthFactor({ collateralUsd: totalCollateralUsd, debtUsd: totalDebtUsd, liquidationThresholdBps }),
    };
  }

  snapshot(): AavePoolState {
    return { collateral: new Map(this.collateral), debt: new Map(this.debt) };
  }

  restore(state: AavePoolState): void {
    this.collateral = new Map(state.collateral);
    this.debt = new Map(state.debt);
  }

  private requireLiquidity(asset: Address, amount: bigint): void {
    const liquidity = this.ledger.balanceOf(asset, this.address);
    if (liquidity < amount) {
      revert('Insufficient pool liquidity', { asset, liquidity: liquidity.toString(), needed: amount.toString() });
    }
  }

  private addTo(book: Map<string, bigint>, key: string, delta: bigint): void {
    const next = (book.get(key) ?? 0n) + delta;
    if (next === 0n) book.delete(key);
    else book.set(key, next);
  }
}
