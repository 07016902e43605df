import { describe, expect, test } from 'vitest';
import { valuationBreakdown } from '../src/services/valuation';
import { BASE, COLL, STRATEGY, catchStrategyError, createHarness, units } from './helpers/fixtures';

describe('totalAssets', () => {
  test('is collateral minus debt in base units', () => {
    const h = createHarness();
    h.adapter.setPosition(units('1200', COLL), units('500', BASE));
    expect(h.strategy.totalAssets()).toBe(units('700', BASE));
  });

  test('includes idle tracked balances', () => {
    const h = createHarness();
    h.adapter.setPosition(units('1200', COLL), units('500', BASE));
    h.ledger.mint(BASE.address, STRATEGY, units('250', BASE));
    expect(h.strategy.totalAssets()).toBe(units('950', BASE));
  });

  test('is zero when debt exceeds assets', () => {
    const h = createHarness();
    h.adapter.setPosition(units('400', COLL), units('500', BASE));
    expect(h.strategy.totalAssets()).toBe(0n);
  });

  test('divides by the base asset price', () => {
    const h = createHarness();
    h.adapter.setPosition(units('1200', COLL), units('500', BASE));
    h.oracle.setPrice(BASE.address, '2');
    // $2400 collateral - $1000 debt = $1400 = 700 base units at $2
    expect(h.strategy.totalAssets()).toBe(units('700', BASE));
  });

  test('a zero base price is a configuration error', () => {
    const h = createHarness();
    h.oracle.setPrice(BASE.address, '0');
    const err = catchStrategyError(() => h.strategy.totalAssets());
    expect(err.kind).toBe('configuration');
    expect(err.code).toBe('ZeroBasePrice');
  });
});

describe('valuationBreakdown', () => {
  test('reports every component in USD', () => {
    const h = createHarness();
    h.adapter.setPosition(units('1200', COLL), units('500', BASE));
    h.ledger.mint(COLL.address, STRATEGY, units('30', COLL));
    const breakdown = valuationBreakdown(h.context);
    expect(breakdown.idle).toEqual([
      { token: BASE.address, balance: 0n, usdValue: 0n },
      { token: COLL.address, balance: units('30', COLL), usdValue: 3_000_000_000n },
    ]);
    expect(breakdown.idleUsd).toBe(3_000_000_000n);
    expect(breakdown.collateralUsd).toBe(120_000_000_000n);
    expect(breakdown.debtUsd).toBe(50_000_000_000n);
    expect(breakdown.netUsd).toBe(73_000_000_000n);
    expect(breakdown.totalAssets).toBe(units('730', BASE));
  });
});
