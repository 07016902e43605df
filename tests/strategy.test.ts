import { parseUnits, zeroAddress } from 'viem';
import { describe, expect, test } from 'vitest';
import { StateJournal } from '../src/chain/journal';
import { TokenLedger } from '../src/chain/ledger';
import { MorphoAdapter } from '../src/adapters/morphoAdapter';
import type { StrategyEvent } from '../src/domain/types';
import { PayloadRouter } from '../src/routers/payloadRouter';
import { GuardedParent } from '../src/services/guardedParent';
import { LeveragedStrategy } from '../src/services/leveragedStrategy';
import { labelAddress } from '../src/utils/address';
import { MorphoMarket } from '../src/venues/morphoMarket';
import {
  BASE,
  COLL,
  FixedPriceOracle,
  OUTSIDER,
  PARENT,
  REWARD,
  STRATEGY,
  STRAY,
  catchStrategyError,
  createHarness,
  noFlash,
  swapCommand,
  units,
} from './helpers/fixtures';

describe('LeveragedStrategy access and configuration', () => {
  test('requires non-zero parent and base asset', () => {
    const h = createHarness();
    const options = {
      address: STRATEGY,
      parent: PARENT,
      baseAsset: BASE.address,
      oracle: h.oracle,
      adapter: h.adapter,
      ledger: h.ledger,
      journal: new StateJournal(),
    };
    expect(catchStrategyError(() => new LeveragedStrategy({ ...options, parent: zeroAddress })).code).toBe('InvalidToken');
    expect(catchStrategyError(() => new LeveragedStrategy({ ...options, baseAsset: zeroAddress })).code).toBe(
      'InvalidToken',
    );
  });

  test('every mutating entry point is parent-only', () => {
    const h = createHarness();
    const calls: Array<() => unknown> = [
      () => h.strategy.deposit(OUTSIDER, { depositToken: BASE.address, depositAmount: 0n, ...noFlash(), commands: [] }),
      () => h.strategy.withdraw(OUTSIDER, { percentage: 1n, outputToken: BASE.address, ...noFlash(), commands: [] }),
      () => h.strategy.rebalance(OUTSIDER, { ...noFlash(), commands: [] }),
      () => h.strategy.setOracle(OUTSIDER, h.oracle),
      () => h.strategy.setSwapRouter(OUTSIDER, 'odos', h.router),
      () => h.strategy.addTrackedToken(OUTSIDER, REWARD.address),
    ];
    for (const call of calls) {
      const err = catchStrategyError(call);
      expect(err.code).toBe('Unauthorized');
      expect(err.details.sender).toBe(OUTSIDER);
    }
    expect(h.events).toEqual([]);
  });

  test('setOracle swaps the valuation source', () => {
    const h = createHarness();
    const next = new FixedPriceOracle(labelAddress('test:oracle-2'), h.ledger);
    expect(catchStrategyError(() => h.strategy.setOracle(PARENT, new FixedPriceOracle(zeroAddress, h.ledger))).code).toBe(
      'ZeroAddress',
    );
    h.strategy.setOracle(PARENT, next);
    expect(h.strategy.priceOracle).toBe(next);
    expect(h.events).toEqual([
      { type: 'oracleUpdated', strategy: STRATEGY, previous: h.oracle.address, next: next.address },
    ]);
    // The new oracle has no prices yet.
    expect(catchStrategyError(() => h.strategy.totalAssets()).code).toBe('PriceFeedNotFound');
  });

  test('setSwapRouter fills a slot', () => {
    const h = createHarness();
    const router = new PayloadRouter(labelAddress('test:router-2'), h.ledger);
    expect(catchStrategyError(() => h.strategy.setSwapRouter(PARENT, 'odos', new PayloadRouter(zeroAddress, h.ledger))).code).toBe(
      'ZeroAddress',
    );
    expect(h.strategy.swapRouter('odos')).toBeUndefined();
    h.strategy.setSwapRouter(PARENT, 'odos', router);
    expect(h.strategy.swapRouter('odos')).toBe(router);
    expect(h.events).toEqual([{ type: 'swapRouterUpdated', strategy: STRATEGY, slot: 'odos', router: router.address }]);
  });

  test('configuration changes roll back with the enclosing call', () => {
    const h = createHarness();
    expect(() =>
      h.journal.atomically(() => {
        h.strategy.setSwapRouter(PARENT, 'odos', h.router);
        h.strategy.addTrackedToken(PARENT, REWARD.address);
        throw new Error('outer call failed');
      }),
    ).toThrow('outer call failed');
    expect(h.strategy.swapRouter('odos')).toBeUndefined();
    expect(h.strategy.trackedTokens()).toEqual([BASE.address, COLL.address]);
    expect(h.events).toEqual([]);
  });

  test('addTrackedToken extends the tracked set once', () => {
    const h = createHarness();
    expect(catchStrategyError(() => h.strategy.addTrackedToken(PARENT, zeroAddress)).code).toBe('InvalidToken');
    expect(catchStrategyError(() => h.strategy.addTrackedToken(PARENT, labelAddress('test-token:unknown'))).code).toBe(
      'InvalidToken',
    );
    h.strategy.addTrackedToken(PARENT, REWARD.address);
    h.strategy.addTrackedToken(PARENT, REWARD.address);
    h.strategy.addTrackedToken(PARENT, BASE.address);
    expect(h.strategy.trackedTokens()).toEqual([BASE.address, COLL.address, REWARD.address]);
    expect(h.events).toEqual([{ type: 'trackedTokenAdded', strategy: STRATEGY, token: REWARD.address }]);
  });

  test('tracked tokens are deduplicated', () => {
    const h = createHarness({ collateral: BASE });
    expect(h.strategy.trackedTokens()).toEqual([BASE.address]);
  });

  test('unsubscribed sinks receive nothing', () => {
    const h = createHarness();
    const seen: StrategyEvent[] = [];
    const unsubscribe = h.strategy.onEvent((event) => seen.push(event));
    unsubscribe();
    h.strategy.rebalance(PARENT, { ...noFlash(), commands: [] });
    expect(seen).toEqual([]);
    expect(h.events).toHaveLength(1);
  });
});

describe('deposit and rebalance', () => {
  test('deposit runs the plan and approves the flash repayment', () => {
    const h = createHarness();
    h.ledger.mint(COLL.address, STRATEGY, units('100', COLL));
    h.strategy.deposit(PARENT, {
      depositToken: COLL.address,
      depositAmount: units('100', COLL),
      flashLoanToken: BASE.address,
      providedAmount: 0n,
      expectedAmount: units('40', BASE),
      commands: [
        { type: 'supply', asset: COLL.address, amount: units('100', COLL) },
        { type: 'borrow', asset: BASE.address, amount: units('40', BASE) },
      ],
    });
    expect(h.adapter.positionAmounts()).toEqual({ collateral: units('100', COLL), debt: units('40', BASE) });
    expect(h.ledger.allowance(BASE.address, STRATEGY, PARENT)).toBe(units('40', BASE));
    expect(h.events).toEqual([
      {
        type: 'deposited',
        strategy: STRATEGY,
        depositToken: COLL.address,
        depositAmount: units('100', COLL),
        flashLoanToken: BASE.address,
        providedAmount: 0n,
        expectedAmount: units('40', BASE),
        commandCount: 2,
      },
    ]);
  });

  test('deposit validates its token and flash terms', () => {
    const h = createHarness();
    const deposit = { depositToken: BASE.address, depositAmount: 0n, ...noFlash(), commands: [] };
    expect(catchStrategyError(() => h.strategy.deposit(PARENT, { ...deposit, depositToken: zeroAddress })).code).toBe(
      'InvalidToken',
    );
    expect(catchStrategyError(() => h.strategy.deposit(PARENT, { ...deposit, flashLoanToken: STRAY.address })).code).toBe(
      'InvalidToken',
    );
    expect(catchStrategyError(() => h.strategy.deposit(PARENT, { ...deposit, providedAmount: 1n })).code).toBe(
      'InvalidAmount',
    );
  });

  test('rebalance reports its command count', () => {
    const h = createHarness();
    h.ledger.mint(COLL.address, STRATEGY, units('10', COLL));
    h.strategy.rebalance(PARENT, {
      ...noFlash(),
      commands: [swapCommand(COLL, units('10', COLL), BASE, units('10', BASE))],
    });
    expect(h.events[1]).toEqual({
      type: 'rebalanced',
      strategy: STRATEGY,
      flashLoanToken: null,
      providedAmount: 0n,
      expectedAmount: 0n,
      commandCount: 1,
    });
  });
});

// Morpho-style market at 91.5% LLTV; collateral priced at $1.04.
function morphoSetup() {
  const ledger = new TokenLedger();
  const journal = new StateJournal();
  journal.register(ledger);
  ledger.registerToken(BASE);
  ledger.registerToken(COLL);
  const oracle = new FixedPriceOracle(labelAddress('test:oracle'), ledger);
  oracle.setPrice(BASE.address, '1');
  oracle.setPrice(COLL.address, '1.04');

  const market = new MorphoMarket(
    labelAddress('test:morpho-market'),
    { loanToken: BASE.address, collateralToken: COLL.address, lltv: parseUnits('0.915', 18) },
    ledger,
    oracle,
  );
  journal.register(market);
  ledger.mint(BASE.address, market.address, units('10000', BASE));

  const router = new PayloadRouter(labelAddress('test:router'), ledger);
  ledger.mint(BASE.address, router.address, units('10000', BASE));

  const strategy = new LeveragedStrategy({
    address: STRATEGY,
    parent: PARENT,
    baseAsset: BASE.address,
    oracle,
    adapter: new MorphoAdapter(market, ledger, STRATEGY),
    ledger,
    journal,
    routers: { kyberswap: router },
  });
  const parent = new GuardedParent(PARENT, ledger, journal);
  parent.attach(strategy);
  const events: StrategyEvent[] = [];
  strategy.onEvent((event) => events.push(event));
  return { ledger, market, strategy, parent, events };
}

describe('leveraged position lifecycle', () => {
  test('a 10% withdrawal with a flash-loaned repay nets the swap proceeds minus the loan', () => {
    const { ledger, market, strategy, parent, events } = morphoSetup();

    // 3000 collateral supplied, 2000 borrowed back to the parent.
    ledger.mint(COLL.address, PARENT, units('3000', COLL));
    parent.deposit({
      depositToken: COLL.address,
      depositAmount: units('3000', COLL),
      flashLoanToken: BASE.address,
      providedAmount: 0n,
      expectedAmount: units('2000', BASE),
      commands: [
        { type: 'supply', asset: COLL.address, amount: units('3000', COLL) },
        { type: 'borrow', asset: BASE.address, amount: units('2000', BASE) },
      ],
    });
    expect(market.position(STRATEGY)).toEqual({ collateral: units('3000', COLL), borrowed: units('2000', BASE) });
    expect(ledger.balanceOf(BASE.address, PARENT)).toBe(units('2000', BASE));

    const actual = parent.withdraw({
      percentage: parseUnits('0.1', 18),
      outputToken: BASE.address,
      flashLoanToken: BASE.address,
      providedAmount: units('200', BASE),
      expectedAmount: units('200', BASE),
      commands: [swapCommand(COLL, units('300', COLL), BASE, units('310', BASE), { maxOracleSlippageBps: 100n })],
    });

    expect(actual).toBe(units('110', BASE));
    expect(market.position(STRATEGY)).toEqual({ collateral: units('2700', COLL), borrowed: units('1800', BASE) });
    expect(ledger.balanceOf(BASE.address, PARENT)).toBe(units('2110', BASE));
    expect(ledger.balanceOf(BASE.address, STRATEGY)).toBe(0n);
    expect(ledger.allowance(BASE.address, STRATEGY, PARENT)).toBe(0n);
    expect(events.map((e) => e.type)).toEqual(['deposited', 'swapExecuted', 'withdrawn']);
    expect(events[2]).toMatchObject({ repaidDebt: units('200', BASE), withdrawnCollateral: units('300', COLL) });
  });

  test('a withdrawal that cannot fund its repay leaves the position untouched', () => {
    const { ledger, market, parent, events } = morphoSetup();
    ledger.mint(COLL.address, PARENT, units('3000', COLL));
    parent.deposit({
      depositToken: COLL.address,
      depositAmount: units('3000', COLL),
      flashLoanToken: BASE.address,
      providedAmount: 0n,
      expectedAmount: units('2000', BASE),
      commands: [
        { type: 'supply', asset: COLL.address, amount: units('3000', COLL) },
        { type: 'borrow', asset: BASE.address, amount: units('2000', BASE) },
      ],
    });

    // No flash loan, so the strategy holds nothing to repay 1000 of debt with.
    const err = catchStrategyError(() =>
      parent.withdraw({ percentage: parseUnits('0.5', 18), outputToken: BASE.address, ...noFlash(), commands: [] }),
    );
    expect(err.code).toBe('TransferFailed');
    expect(market.position(STRATEGY)).toEqual({ collateral: units('3000', COLL), borrowed: units('2000', BASE) });
    expect(ledger.balanceOf(BASE.address, PARENT)).toBe(units('2000', BASE));
    expect(events.map((e) => e.type)).toEqual(['deposited']);
  });
});
