import { Hono } from 'hono';
import type { Runtime } from '../../services/runtime';
import type { World } from '../../services/world';
import { toUsd } from '../../utils/math';
import { formatUnits } from 'viem';
import { jsonRespond } from '../utils/respond';
import { DepositBodySchema, RebalanceBodySchema, WithdrawBodySchema } from '../schemas';

export function describeStrategy(world: World) {
  const { strategy, ledger } = world;
  const valuation = strategy.valuationBreakdown();
  const baseDecimals = ledger.decimalsOf(strategy.baseAsset);
  return {
    address: strategy.address,
    parent: strategy.parent,
    baseAsset: strategy.baseAsset,
    venue: world.adapter.venue,
    trackedTokens: strategy.trackedTokens().map((address) => {
      const meta = ledger.token(address);
      return { symbol: meta.symbol, address, idle: formatUnits(ledger.balanceOf(address, strategy.address), meta.decimals) };
    }),
    position: strategy.positionAmounts(),
    valuations: {
      idleUsd: toUsd(valuation.idleUsd),
      collateralUsd: toUsd(valuation.collateralUsd),
      debtUsd: toUsd(valuation.debtUsd),
      netUsd: toUsd(valuation.netUsd),
    },
    totalAssets: valuation.totalAssets,
    totalAssetsFormatted: formatUnits(valuation.totalAssets, baseDecimals),
  };
}

// Strategy snapshot plus the three mutating entry points, called through the guarded parent.
export function strategyRoute(runtime: Runtime) {
  const route = new Hono();

  route.get('/', (c) => jsonRespond(c, describeStrategy(runtime.world())));

  route.post('/deposit', async (c) => {
    const body = DepositBodySchema.parse(await c.req.json());
    const world = runtime.world();
    world.parent.deposit(body);
    return jsonRespond(c, { ok: true, strategy: describeStrategy(world) });
  });

  route.post('/withdraw', async (c) => {
    const body = WithdrawBodySchema.parse(await c.req.json());
    const world = runtime.world();
    const actualWithdrawn = world.parent.withdraw(body);
    return jsonRespond(c, { ok: true, actualWithdrawn, strategy: describeStrategy(world) });
  });

  route.post('/rebalance', async (c) => {
    const body = RebalanceBodySchema.parse(await c.req.json());
    const world = runtime.world();
    world.parent.rebalance(body);
    return jsonRespond(c, { ok: true, strategy: describeStrategy(world) });
  });

  return route;
}
