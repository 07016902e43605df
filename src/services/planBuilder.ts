import type { Address } from 'viem';
import type { TokenLedger } from '../chain/ledger';
import type { Command, DepositRequest, LendingAdapter, ValueOracle, WithdrawRequest } from '../domain/types';
import { ConfigurationError, ValidationError } from '../domain/errors';
import { MAX_SLIPPAGE_BPS, type SwapRouterSlot } from '../config/constants';
import { getConfig } from '../config/env';
import { sameAddress } from '../utils/address';
import { encodeRoutePayload } from '../utils/abi';
import { applyBpsHaircut, mulDiv, pow10 } from '../utils/math';
import { defaultUnwindAmounts } from './withdrawalGuard';

// Off-line plan construction for the operator. Plans target the reference
// router's route payload and are sized from oracle quotes.

export interface PlanTarget {
  oracle: ValueOracle;
  ledger: TokenLedger;
  adapter: LendingAdapter;
  router: SwapRouterSlot;
}

export interface SlippageOptions {
  slippageBps?: number; // operator floor on minAmountOut
  maxOracleSlippageBps?: number; // oracle floor, defaults to slippageBps
}

function resolveSlippage(options: SlippageOptions): { slippage: bigint; oracleSlippage: bigint } {
  const slippage = BigInt(options.slippageBps ?? getConfig().DEFAULT_SLIPPAGE_BPS);
  const oracleSlippage = options.maxOracleSlippageBps === undefined ? slippage : BigInt(options.maxOracleSlippageBps);
  if (slippage < 0n || slippage > MAX_SLIPPAGE_BPS || oracleSlippage < 0n || oracleSlippage > MAX_SLIPPAGE_BPS) {
    throw new ValidationError('InvalidAmount', 'Slippage must be within 0..10000 bps');
  }
  return { slippage, oracleSlippage };
}

// amountIn of tokenIn expressed in tokenOut base units at oracle prices.
export function quoteViaOracle(
  oracle: ValueOracle,
  ledger: TokenLedger,
  tokenIn: Address,
  amountIn: bigint,
  tokenOut: Address,
): bigint {
  const usdIn = oracle.valueOf(tokenIn, amountIn);
  const priceOut = oracle.priceOf(tokenOut);
  if (priceOut === 0n) {
    throw new ConfigurationError('ZeroBasePrice', `Oracle returned a zero price for ${tokenOut}`, { token: tokenOut });
  }
  return mulDiv(usdIn, pow10(ledger.decimalsOf(tokenOut)), priceOut);
}

function swapCommand(
  target: PlanTarget,
  tokenIn: Address,
  amountIn: bigint,
  tokenOut: Address,
  slippage: { slippage: bigint; oracleSlippage: bigint },
): { command: Command; quote: bigint; minAmountOut: bigint } {
  const quote = quoteViaOracle(target.oracle, target.ledger, tokenIn, amountIn, tokenOut);
  const minAmountOut = applyBpsHaircut(quote, slippage.slippage);
  return {
    quote,
    minAmountOut,
    command: {
      type: 'swap',
      swap: {
        router: target.router,
        tokenIn,
        amountIn,
        tokenOut,
        minAmountOut,
        maxOracleSlippageBps: slippage.oracleSlippage,
        payload: encodeRoutePayload({ tokenIn, amountIn, tokenOut, amountOut: quote }),
      },
    },
  };
}

export interface LeveragePlan {
  request: DepositRequest;
  expectedCollateral: bigint;
  minCollateral: bigint;
}

/**
 * Equity in the debt asset plus a flash loan of `flashAmount` is swapped into
 * collateral and supplied; `flashAmount` is then borrowed back for the parent.
 */
export function buildLeveragePlan(
  target: PlanTarget,
  params: { equityAmount: bigint; flashAmount: bigint } & SlippageOptions,
): LeveragePlan {
  if (params.equityAmount <= 0n || params.flashAmount < 0n) {
    throw new ValidationError('InvalidAmount', 'equityAmount must be positive and flashAmount non-negative');
  }
  const slippage = resolveSlippage(params);
  const debt = target.adapter.debtAsset();
  const collateral = target.adapter.collateralAsset();
  const swapIn = params.equityAmount + params.flashAmount;
  const swap = swapCommand(target, debt, swapIn, collateral, slippage);

  const commands: Command[] = [swap.command, { type: 'supply', asset: collateral, amount: swap.minAmountOut }];
  if (params.flashAmount > 0n) commands.push({ type: 'borrow', asset: debt, amount: params.flashAmount });

  return {
    request: {
      depositToken: debt,
      depositAmount: params.equityAmount,
      flashLoanToken: params.flashAmount > 0n ? debt : null,
      providedAmount: params.flashAmount,
      expectedAmount: params.flashAmount,
      commands,
    },
    expectedCollateral: swap.quote,
    minCollateral: swap.minAmountOut,
  };
}

export interface UnwindPlanResult {
  request: WithdrawRequest;
  repayAmount: bigint;
  withdrawAmount: bigint;
  expectedOutput: bigint; // net of the flash-loan repayment
}

/**
 * Mirrors the guard's unwind sizing: the parent flash-lends the repay amount in
 * the debt asset, and withdrawn collateral is swapped into the debt asset.
 */
export function buildUnwindPlan(target: PlanTarget, params: { percentage: bigint } & SlippageOptions): UnwindPlanResult {
  const slippage = resolveSlippage(params);
  const { adapter } = target;
  const debt = adapter.debtAsset();
  const collateral = adapter.collateralAsset();
  if (sameAddress(debt, collateral)) {
    throw new ValidationError('InvalidToken', 'Unwind plans need distinct collateral and debt assets');
  }
  const position = adapter.positionAmounts();
  const { repayAmount, withdrawAmount } = adapter.unwindAmounts
    ? adapter.unwindAmounts(position, params.percentage)
    : defaultUnwindAmounts(position, params.percentage);

  const commands: Command[] = [];
  let expectedOutput = 0n;
  if (withdrawAmount > 0n) {
    const swap = swapCommand(target, collateral, withdrawAmount, debt, slippage);
    commands.push(swap.command);
    expectedOutput = swap.quote > repayAmount ? swap.quote - repayAmount : 0n;
  }

  return {
    request: {
      percentage: params.percentage,
      outputToken: debt,
      flashLoanToken: repayAmount > 0n ? debt : null,
      providedAmount: repayAmount,
      expectedAmount: repayAmount,
      commands,
    },
    repayAmount,
    withdrawAmount,
    expectedOutput,
  };
}
