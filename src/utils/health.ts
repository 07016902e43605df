import { maxUint256 } from 'viem';
import { BPS_DENOMINATOR } from '../config/constants';
import { WAD, mulDiv } from './math';

// HF (WAD) = (collateralUsd * liquidationThreshold) / debtUsd
// Both USD inputs share one scale (the oracle's 8 decimals); the threshold is in bps.
export function computeHealthFactor(params: {
  collateralUsd: bigint;
  debtUsd: bigint;
  liquidationThresholdBps: bigint;
}): bigint {
  const { collateralUsd, debtUsd, liquidationThresholdBps } = params;
  if (debtUsd === 0n) return maxUint256; // effectively infinity
  const weighted = mulDiv(collateralUsd, liquidationThresholdBps, BPS_DENOMINATOR);
  return mulDiv(weighted, WAD, debtUsd);
}

export type HealthStatus = 'healthy' | 'monitor' | 'breach' | 'liquidatable';

export function classifyHealth(healthFactorWad: bigint): HealthStatus {
  if (healthFactorWad < WAD) return 'liquidatable';
  if (healthFactorWad < (WAD * 115n) / 100n) return 'breach';
  if (healthFactorWad < (WAD * 125n) / 100n) return 'monitor';
  return 'healthy';
}

export function healthFactorToNumber(healthFactorWad: bigint): number | null {
  if (healthFactorWad === maxUint256) return null;
  return Number((Number(healthFactorWad) / Number(WAD)).toFixed(4));
}
