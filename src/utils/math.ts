import { formatUnits } from 'viem';
import { BPS_DENOMINATOR, ORACLE_DECIMALS, PERCENTAGE_DENOMINATOR } from '../config/constants';

export const WAD: bigint = 10n ** 18n;

export function pow10(n: number): bigint { return 10n ** BigInt(n); }

export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  return (a * b) / denominator;
}

// Rounds up; used where under-sizing would leave a position less safe.
export function mulDivUp(a: bigint, b: bigint, denominator: bigint): bigint {
  const product = a * b;
  if (product === 0n) return 0n;
  return (product - 1n) / denominator + 1n;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

// amount * (1 - bps/10_000)
export function applyBpsHaircut(amount: bigint, bps: bigint): bigint {
  return mulDiv(amount, BPS_DENOMINATOR - bps, BPS_DENOMINATOR);
}

// amount * percentage, with percentage scaled by PERCENTAGE_DENOMINATOR
export function percentOf(amount: bigint, percentage: bigint): bigint {
  return mulDiv(amount, percentage, PERCENTAGE_DENOMINATOR);
}

export function toUsd(usd8: bigint): number {
  // 8-decimal USD as a display number with 2 decimals
  const n = Number(formatUnits(usd8, ORACLE_DECIMALS));
  return Math.round(n * 100) / 100;
}
