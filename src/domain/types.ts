import type { Address, Hex } from 'viem';
import type { SwapRouterSlot } from '../config/constants';

export type { Address, Hex };

export interface TokenMeta {
  symbol: string;
  name: string;
  address: Address;
  decimals: number;
}

export interface AssetAmount {
  asset: Address;
  amount: bigint; // base units
}

export interface SwapParams {
  router: SwapRouterSlot;
  tokenIn: Address;
  amountIn: bigint;
  tokenOut: Address;
  minAmountOut: bigint;
  maxOracleSlippageBps: bigint; // 10_000 = 100%
  payload: Hex; // opaque, forwarded to the router untouched
}

// One step of an operator plan. Plans are built off-line and executed all-or-nothing.
export type Command =
  | ({ type: 'supply' } & AssetAmount)
  | ({ type: 'withdraw' } & AssetAmount)
  | ({ type: 'borrow' } & AssetAmount)
  | ({ type: 'repay' } & AssetAmount)
  | { type: 'swap'; swap: SwapParams };

export type CommandType = Command['type'];

export interface PositionAmounts {
  collateral: bigint;
  debt: bigint;
}

export interface UnwindPlan {
  repayAmount: bigint;
  withdrawAmount: bigint;
}

// USD values are 8-decimal fixed point.
export interface ValueOracle {
  readonly address: Address;
  valueOf(token: Address, amount: bigint): bigint;
  priceOf(token: Address): bigint;
}

/**
 * Protocol hooks a lending venue must provide. The pipeline and the withdrawal
 * guard depend only on this interface.
 */
export interface LendingAdapter {
  readonly venue: string;
  collateralAsset(): Address;
  debtAsset(): Address;
  positionAmounts(): PositionAmounts;
  supply(asset: Address, amount: bigint): void;
  withdrawFromVenue(asset: Address, amount: bigint): void;
  borrow(asset: Address, amount: bigint): void;
  repay(asset: Address, amount: bigint): void;
  /** Tokens beyond base/collateral/debt whose idle balances are protected (e.g. rewards). */
  extraTrackedTokens?(): Address[];
  /** Venue-specific sizing of the protocol unwind for a withdrawal of `percentage` (1e18 = 100%). */
  unwindAmounts?(position: PositionAmounts, percentage: bigint): UnwindPlan;
}

/** An external exchange. `caller` is the account whose allowance the router may spend. */
export interface SwapRouter {
  readonly address: Address;
  execute(caller: Address, payload: Hex): void;
}

export interface FlashLoanTerms {
  flashLoanToken: Address | null;
  providedAmount: bigint; // advanced by the parent into the strategy for this call
  expectedAmount: bigint; // to be collected back by the parent at call end
}

export interface DepositRequest extends FlashLoanTerms {
  depositToken: Address;
  depositAmount: bigint;
  commands: readonly Command[];
}

export interface RebalanceRequest extends FlashLoanTerms {
  commands: readonly Command[];
}

export interface WithdrawRequest extends FlashLoanTerms {
  percentage: bigint; // 1e18 = 100%
  outputToken: Address;
  commands: readonly Command[];
}

export interface IdleBalanceSnapshot {
  tokens: Address[];
  balances: bigint[];
}

export type StrategyEvent =
  | {
      type: 'deposited';
      strategy: Address;
      depositToken: Address;
      depositAmount: bigint;
      flashLoanToken: Address | null;
      providedAmount: bigint;
      expectedAmount: bigint;
      commandCount: number;
    }
  | {
      type: 'withdrawn';
      strategy: Address;
      percentage: bigint;
      outputToken: Address;
      actualWithdrawn: bigint;
      flashLoanToken: Address | null;
      expectedAmount: bigint;
      repaidDebt: bigint;
      withdrawnCollateral: bigint;
    }
  | {
      type: 'rebalanced';
      strategy: Address;
      flashLoanToken: Address | null;
      providedAmount: bigint;
      expectedAmount: bigint;
      commandCount: number;
    }
  | {
      type: 'swapExecuted';
      strategy: Address;
      router: SwapRouterSlot;
      routerAddress: Address;
      tokenIn: Address;
      amountIn: bigint;
      tokenOut: Address;
      amountOut: bigint;
      minAmountOut: bigint;
      usdValueIn: bigint;
      usdValueOut: bigint;
    }
  | { type: 'oracleUpdated'; strategy: Address; previous: Address; next: Address }
  | { type: 'swapRouterUpdated'; strategy: Address; slot: SwapRouterSlot; router: Address }
  | { type: 'trackedTokenAdded'; strategy: Address; token: Address };

export type EventSink = (event: StrategyEvent) => void;
