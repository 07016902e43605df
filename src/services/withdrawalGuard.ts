import type { Address } from 'viem';
import type { Command, IdleBalanceSnapshot, PositionAmounts, UnwindPlan, WithdrawRequest } from '../domain/types';
import { ProportionalityError, ValidationError } from '../domain/errors';
import { PERCENTAGE_DENOMINATOR, UNWIND_REPAY_BUFFER } from '../config/constants';
import { includesAddress, isZeroAddress, sameAddress } from '../utils/address';
import { minBigInt, mulDiv, percentOf } from '../utils/math';
import { logger } from '../utils/logger';
import type { StrategyContext } from './context';
import { callHook, executeCommands } from './commandPipeline';

// repay = debt * (p + buffer), withdraw = collateral * p; venues may supply their own sizing.
export function defaultUnwindAmounts(position: PositionAmounts, percentage: bigint): UnwindPlan {
  return {
    repayAmount: minBigInt(position.debt, mulDiv(position.debt, percentage + UNWIND_REPAY_BUFFER, PERCENTAGE_DENOMINATOR)),
    withdrawAmount: percentOf(position.collateral, percentage),
  };
}

export function takeIdleSnapshot(ctx: StrategyContext, flashLoanToken: Address | null, providedAmount: bigint): IdleBalanceSnapshot {
  const tokens = ctx.trackedTokens();
  const balances = tokens.map((token) => {
    const balance = ctx.ledger.balanceOf(token, ctx.address);
    if (!sameAddress(token, flashLoanToken)) return balance;
    if (providedAmount > balance) {
      throw new ValidationError('InvalidAmount', 'providedAmount exceeds the flash-loan token balance', {
        token,
        balance: balance.toString(),
        providedAmount: providedAmount.toString(),
      });
    }
    return balance - providedAmount;
  });
  return { tokens, balances };
}

function validateKeeperCommands(commands: readonly Command[], allowed: readonly Address[]): void {
  // Reject any non-swap before looking at payloads.
  commands.forEach((command, index) => {
    if (command.type !== 'swap') {
      throw new ValidationError('InvalidKeeperCommand', `Only swaps are allowed during withdraw (command ${index} is ${command.type})`, {
        index: String(index),
        type: command.type,
      });
    }
  });
  commands.forEach((command, index) => {
    if (command.type !== 'swap') return;
    for (const token of [command.swap.tokenIn, command.swap.tokenOut]) {
      if (!includesAddress(allowed, token)) {
        throw new ValidationError('InvalidToken', `Swap ${index} touches untracked token ${token}`, {
          index: String(index),
          token,
        });
      }
    }
  });
}

/**
 * Proportional withdrawal. The venue unwind is sized from live position state;
 * operator commands may only swap between tracked tokens, and afterwards no
 * tracked balance other than the output token may have shrunk by more than its
 * share `percentage`. Returns the net output-token amount left for the parent.
 */
export function guardedWithdraw(ctx: StrategyContext, request: WithdrawRequest): bigint {
  const { percentage, outputToken, flashLoanToken, providedAmount, expectedAmount, commands } = request;
  if (percentage <= 0n || percentage > PERCENTAGE_DENOMINATOR) {
    throw new ValidationError('InvalidPercentage', 'percentage must be within (0, 1e18]', { percentage: percentage.toString() });
  }
  if (isZeroAddress(outputToken)) {
    throw new ValidationError('InvalidToken', 'outputToken must be non-zero');
  }
  if (flashLoanToken === null && (providedAmount !== 0n || expectedAmount !== 0n)) {
    throw new ValidationError('InvalidAmount', 'Flash-loan amounts require a flash-loan token');
  }

  const snapshot = takeIdleSnapshot(ctx, flashLoanToken, providedAmount);
  if (!includesAddress(snapshot.tokens, outputToken)) {
    throw new ValidationError('InvalidToken', `Output token ${outputToken} is not tracked`, { token: outputToken });
  }
  if (flashLoanToken && !includesAddress(snapshot.tokens, flashLoanToken)) {
    throw new ValidationError('InvalidToken', `Flash-loan token ${flashLoanToken} is not tracked`, { token: flashLoanToken });
  }

  const { adapter } = ctx;
  const before = adapter.positionAmounts();
  const plan = adapter.unwindAmounts ? adapter.unwindAmounts(before, percentage) : defaultUnwindAmounts(before, percentage);
  logger.debug(`unwind via ${adapter.venue}: repay ${plan.repayAmount}, withdraw ${plan.withdrawAmount}`);
  if (plan.repayAmount > 0n) {
    callHook(adapter.venue, 'repay', () => adapter.repay(adapter.debtAsset(), plan.repayAmount));
  }
  if (plan.withdrawAmount > 0n) {
    callHook(adapter.venue, 'withdrawFromVenue', () => adapter.withdrawFromVenue(adapter.collateralAsset(), plan.withdrawAmount));
  }
  const after = adapter.positionAmounts();

  if (commands.length > 0) {
    const allowed = flashLoanToken ? [...snapshot.tokens, flashLoanToken, outputToken] : [...snapshot.tokens, outputToken];
    validateKeeperCommands(commands, allowed);
    executeCommands(ctx, commands);
  }

  let actualWithdrawn = 0n;
  snapshot.tokens.forEach((token, i) => {
    const current = ctx.ledger.balanceOf(token, ctx.address);
    const flashAdjustment = sameAddress(token, flashLoanToken) ? expectedAmount : 0n;
    if (sameAddress(token, outputToken)) {
      const gained = current - snapshot.balances[i] - flashAdjustment;
      actualWithdrawn = gained > 0n ? gained : 0n;
      return;
    }
    const required = mulDiv(snapshot.balances[i], PERCENTAGE_DENOMINATOR - percentage, PERCENTAGE_DENOMINATOR) + flashAdjustment;
    if (current < required) {
      throw new ProportionalityError('InvalidAmount', `Balance of ${token} fell below its proportional floor`, {
        token,
        balance: current.toString(),
        required: required.toString(),
      });
    }
  });

  const { ledger } = ctx;
  if (flashLoanToken && sameAddress(flashLoanToken, outputToken)) {
    ledger.approve(outputToken, ctx.address, ctx.parent, actualWithdrawn + expectedAmount);
  } else {
    ledger.approve(outputToken, ctx.address, ctx.parent, actualWithdrawn);
    if (flashLoanToken) ledger.approve(flashLoanToken, ctx.address, ctx.parent, expectedAmount);
  }

  ctx.emit({
    type: 'withdrawn',
    strategy: ctx.address,
    percentage,
    outputToken,
    actualWithdrawn,
    flashLoanToken,
    expectedAmount,
    repaidDebt: before.debt > after.debt ? before.debt - after.debt : 0n,
    withdrawnCollateral: before.collateral > after.collateral ? before.collateral - after.collateral : 0n,
  });
  return actualWithdrawn;
}
