import { parseUnits } from 'viem';
import type { TokenMeta } from '../domain/types';
import { labelAddress } from '../utils/address';

export type DemoSymbol = 'USDC' | 'USDe' | 'PT-sUSDe';

// Demo token registry. Addresses are derived from labels; they exist only in the in-process ledger.
export const TOKENS: Record<DemoSymbol, TokenMeta> = {
  USDC: {
    symbol: 'USDC',
    name: 'USD Coin',
    address: labelAddress('token:USDC'),
    decimals: 6,
  },
  USDe: {
    symbol: 'USDe',
    name: 'Ethena USDe',
    address: labelAddress('token:USDe'),
    decimals: 18,
  },
  'PT-sUSDe': {
    symbol: 'PT-sUSDe',
    name: 'Pendle PT Ethena sUSDe',
    address: labelAddress('token:PT-sUSDe'),
    decimals: 18,
  },
};

// Chainlink-style answers (8 decimals) at startup. PT-sUSDe is priced through Pendle on USDe.
export const INITIAL_FEED_ANSWERS: Record<Exclude<DemoSymbol, 'PT-sUSDe'>, bigint> = {
  USDC: parseUnits('1', 8),
  USDe: parseUnits('1', 8),
};

export const PT_SUSDE_MARKET = labelAddress('pendle-market:PT-sUSDe');
export const INITIAL_PT_RATE = parseUnits('0.96', 18); // PT -> asset
