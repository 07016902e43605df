import type { Address } from 'viem';
import { ConfigurationError } from '../domain/errors';
import { mulDiv, pow10 } from '../utils/math';
import type { StrategyContext } from './context';

export interface ValuationBreakdown {
  idle: Array<{ token: Address; balance: bigint; usdValue: bigint }>;
  idleUsd: bigint;
  collateralUsd: bigint;
  debtUsd: bigint;
  netUsd: bigint; // clamped at zero
  totalAssets: bigint; // base-asset units
}

export function valuationBreakdown(ctx: StrategyContext): ValuationBreakdown {
  const { ledger, oracle, adapter } = ctx;
  const idle = ctx.trackedTokens().map((token) => {
    const balance = ledger.balanceOf(token, ctx.address);
    return { token, balance, usdValue: oracle.valueOf(token, balance) };
  });
  const idleUsd = idle.reduce((sum, entry) => sum + entry.usdValue, 0n);

  const position = adapter.positionAmounts();
  const collateralUsd = oracle.valueOf(adapter.collateralAsset(), position.collateral);
  const debtUsd = oracle.valueOf(adapter.debtAsset(), position.debt);
  const gross = idleUsd + collateralUsd;
  const netUsd = gross > debtUsd ? gross - debtUsd : 0n;

  const basePrice = oracle.priceOf(ctx.baseAsset);
  if (basePrice === 0n) {
    throw new ConfigurationError('ZeroBasePrice', 'Oracle returned a zero price for the base asset', { baseAsset: ctx.baseAsset });
  }
  const totalAssets = mulDiv(netUsd, pow10(ledger.decimalsOf(ctx.baseAsset)), basePrice);
  return { idle, idleUsd, collateralUsd, debtUsd, netUsd, totalAssets };
}

// Net position value (idle + collateral - debt) in base-asset units.
export function totalAssets(ctx: StrategyContext): bigint {
  return valuationBreakdown(ctx).totalAssets;
}
