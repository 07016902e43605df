// Fixed-point scales and protocol constants shared across services.
export const PERCENTAGE_DENOMINATOR = 10n ** 18n; // 1e18 = 100%
export const BPS_DENOMINATOR = 10_000n;
export const MAX_SLIPPAGE_BPS = 10_000n;

export const ORACLE_DECIMALS = 8; // USD values are 8-decimal fixed point
export const MAX_PRICE_AGE_SECONDS = 86_400; // 24h
export const PENDLE_TWAP_DURATION_SECONDS = 900;

// Default unwind rounding buffer, in PERCENTAGE_DENOMINATOR units (one unit = 1e-18).
export const UNWIND_REPAY_BUFFER = 1n;

// Router slots addressable from a SWAP command, with their wire codes.
export const SWAP_ROUTER_SLOTS = ['kyberswap', 'odos', 'pendle'] as const;
export type SwapRouterSlot = (typeof SWAP_ROUTER_SLOTS)[number];
