import type { SwapParams } from '../domain/types';
import { ExternalCallError, SlippageError, ValidationError, reasonOf } from '../domain/errors';
import { MAX_SLIPPAGE_BPS } from '../config/constants';
import { isZeroAddress } from '../utils/address';
import { applyBpsHaircut } from '../utils/math';
import { logger } from '../utils/logger';
import type { StrategyContext } from './context';

// Swap through an operator-chosen router, checked against both the operator's
// minimum and an oracle USD floor. The router never keeps an allowance.
export function executeSwap(ctx: StrategyContext, params: SwapParams): bigint {
  const { tokenIn, amountIn, tokenOut, minAmountOut, maxOracleSlippageBps } = params;
  if (isZeroAddress(tokenIn) || isZeroAddress(tokenOut)) {
    throw new ValidationError('InvalidToken', 'Swap tokens must be non-zero', { tokenIn, tokenOut });
  }
  if (amountIn <= 0n) {
    throw new ValidationError('InvalidAmount', 'Swap amountIn must be positive', { amountIn: amountIn.toString() });
  }
  if (maxOracleSlippageBps < 0n || maxOracleSlippageBps > MAX_SLIPPAGE_BPS) {
    throw new ValidationError('InvalidAmount', 'maxOracleSlippageBps must be within 0..10000', {
      maxOracleSlippageBps: maxOracleSlippageBps.toString(),
    });
  }
  const router = ctx.resolveRouter(params.router);
  const { ledger } = ctx;

  const usdValueIn = ctx.oracle.valueOf(tokenIn, amountIn);
  const balanceBefore = ledger.balanceOf(tokenOut, ctx.address);

  ledger.approve(tokenIn, ctx.address, router.address, amountIn);
  try {
    router.execute(ctx.address, params.payload);
  } catch (err) {
    throw new ExternalCallError('SwapFailed', `Swap via ${params.router} failed: ${reasonOf(err)}`, {
      router: params.router,
      reason: reasonOf(err),
    });
  } finally {
    ledger.approve(tokenIn, ctx.address, router.address, 0n);
  }

  const balanceAfter = ledger.balanceOf(tokenOut, ctx.address);
  const amountOut = balanceAfter > balanceBefore ? balanceAfter - balanceBefore : 0n;
  if (amountOut < minAmountOut) {
    throw new SlippageError('SlippageTooHigh', 'Swap returned less than minAmountOut', {
      amountOut: amountOut.toString(),
      minAmountOut: minAmountOut.toString(),
    });
  }

  const usdValueOut = ctx.oracle.valueOf(tokenOut, amountOut);
  const minUsdValueOut = applyBpsHaircut(usdValueIn, maxOracleSlippageBps);
  if (usdValueOut < minUsdValueOut) {
    throw new SlippageError('OracleSlippageCheckFailed', 'Swap output is below the oracle floor', {
      usdValueIn: usdValueIn.toString(),
      usdValueOut: usdValueOut.toString(),
      minUsdValueOut: minUsdValueOut.toString(),
      maxOracleSlippageBps: maxOracleSlippageBps.toString(),
    });
  }

  logger.debug(`swap ${params.router}: ${amountIn} ${tokenIn} -> ${amountOut} ${tokenOut} (usd ${usdValueIn} -> ${usdValueOut})`);
  ctx.emit({
    type: 'swapExecuted',
    strategy: ctx.address,
    router: params.router,
    routerAddress: router.address,
    tokenIn,
    amountIn,
    tokenOut,
    amountOut,
    minAmountOut,
    usdValueIn,
    usdValueOut,
  });
  return amountOut;
}
