import { parseUnits } from 'viem';
import { describe, expect, test } from 'vitest';
import { ManualClock } from '../src/chain/clock';
import { TOKENS } from '../src/config/tokens';
import { buildLeveragePlan, buildUnwindPlan, quoteViaOracle, type PlanTarget } from '../src/services/planBuilder';
import { createWorld, type World } from '../src/services/world';
import { catchStrategyError } from './helpers/fixtures';

const USDC = TOKENS.USDC.address;
const PT = TOKENS['PT-sUSDe'].address;

function target(world: World): PlanTarget {
  return { oracle: world.oracle, ledger: world.ledger, adapter: world.adapter, router: 'kyberswap' };
}

// 1000 USDC of equity plus a 2000 USDC flash loan, PT at $0.96.
function leveragedWorld(): World {
  const world = createWorld({ clock: new ManualClock() });
  const plan = buildLeveragePlan(target(world), { equityAmount: 1_000_000_000n, flashAmount: 2_000_000_000n, slippageBps: 50 });
  world.parent.deposit(plan.request);
  return world;
}

describe('quoteViaOracle', () => {
  test('converts through USD at oracle prices', () => {
    const world = createWorld({ clock: new ManualClock() });
    expect(quoteViaOracle(world.oracle, world.ledger, USDC, 1_000_000_000n, PT)).toBe(1_041_666_666_666_666_666_666n);
    expect(quoteViaOracle(world.oracle, world.ledger, PT, parseUnits('100', 18), USDC)).toBe(96_000_000n);
  });
});

describe('buildLeveragePlan', () => {
  test('swaps equity plus flash into collateral, supplies the floor and borrows the flash back', () => {
    const world = createWorld({ clock: new ManualClock() });
    const plan = buildLeveragePlan(target(world), { equityAmount: 1_000_000_000n, flashAmount: 2_000_000_000n, slippageBps: 50 });
    expect(plan.expectedCollateral).toBe(parseUnits('3125', 18));
    expect(plan.minCollateral).toBe(parseUnits('3109.375', 18));
    expect(plan.request).toMatchObject({
      depositToken: USDC,
      depositAmount: 1_000_000_000n,
      flashLoanToken: USDC,
      providedAmount: 2_000_000_000n,
      expectedAmount: 2_000_000_000n,
    });
    expect(plan.request.commands.map((c) => c.type)).toEqual(['swap', 'supply', 'borrow']);
    expect(plan.request.commands[0]).toMatchObject({
      swap: { router: 'kyberswap', tokenIn: USDC, amountIn: 3_000_000_000n, tokenOut: PT, maxOracleSlippageBps: 50n },
    });
  });

  test('without a flash loan there is no borrow', () => {
    const world = createWorld({ clock: new ManualClock() });
    const plan = buildLeveragePlan(target(world), { equityAmount: 1_000_000n, flashAmount: 0n });
    expect(plan.request.flashLoanToken).toBeNull();
    expect(plan.request.commands.map((c) => c.type)).toEqual(['swap', 'supply']);
  });

  test('rejects empty equity and out-of-range slippage', () => {
    const world = createWorld({ clock: new ManualClock() });
    expect(catchStrategyError(() => buildLeveragePlan(target(world), { equityAmount: 0n, flashAmount: 0n })).code).toBe(
      'InvalidAmount',
    );
    expect(
      catchStrategyError(() => buildLeveragePlan(target(world), { equityAmount: 1n, flashAmount: 0n, slippageBps: 10_001 })).code,
    ).toBe('InvalidAmount');
  });

  test('executes through the parent and preserves equity', () => {
    const world = leveragedWorld();
    expect(world.strategy.positionAmounts()).toEqual({
      collateral: parseUnits('3109.375', 18),
      debt: 2_000_000_000n,
    });
    expect(world.ledger.balanceOf(PT, world.strategy.address)).toBe(parseUnits('15.625', 18));
    expect(world.ledger.balanceOf(USDC, world.parent.address)).toBe(parseUnits('99000', 6));
    expect(world.strategy.totalAssets()).toBe(1_000_000_000n);
  });
});

describe('buildUnwindPlan', () => {
  test('mirrors the venue unwind and nets out the flash loan', () => {
    const world = leveragedWorld();
    const plan = buildUnwindPlan(target(world), { percentage: parseUnits('0.5', 18), slippageBps: 50 });
    expect(plan.repayAmount).toBe(1_000_000_001n);
    expect(plan.withdrawAmount).toBe(parseUnits('1554.6875', 18));
    expect(plan.expectedOutput).toBe(492_499_999n);
    expect(plan.request).toMatchObject({
      outputToken: USDC,
      flashLoanToken: USDC,
      providedAmount: 1_000_000_001n,
      expectedAmount: 1_000_000_001n,
    });
    expect(plan.request.commands[0]).toMatchObject({ swap: { tokenIn: PT, tokenOut: USDC, minAmountOut: 1_485_037_500n } });
  });

  test('the executed unwind returns the expected output to the parent', () => {
    const world = leveragedWorld();
    const plan = buildUnwindPlan(target(world), { percentage: parseUnits('0.5', 18), slippageBps: 50 });
    expect(world.parent.withdraw(plan.request)).toBe(492_499_999n);
    expect(world.strategy.positionAmounts()).toEqual({
      collateral: parseUnits('1554.6875', 18),
      debt: 999_999_999n,
    });
    expect(world.ledger.balanceOf(PT, world.strategy.address)).toBe(parseUnits('15.625', 18));
    expect(world.ledger.balanceOf(USDC, world.parent.address)).toBe(99_492_499_999n);
  });

  test('an empty position plans nothing', () => {
    const world = createWorld({ clock: new ManualClock() });
    const plan = buildUnwindPlan(target(world), { percentage: parseUnits('0.5', 18) });
    expect(plan.request.commands).toEqual([]);
    expect(plan.request.flashLoanToken).toBeNull();
    expect(plan.expectedOutput).toBe(0n);
  });
});
