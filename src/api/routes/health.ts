import { Hono } from 'hono';
import { formatUnits } from 'viem';
import type { Runtime } from '../../services/runtime';
import { TOKENS } from '../../config/tokens';
import { ORACLE_DECIMALS } from '../../config/constants';
import { classifyHealth, healthFactorToNumber } from '../../utils/health';
import { toUsd } from '../../utils/math';
import { jsonRespond } from '../utils/respond';

export function healthRoute(runtime: Runtime) {
  const route = new Hono();

  route.get('/', (c) => {
    const { pool, oracle, strategy } = runtime.world();
    const prices = Object.fromEntries(
      Object.values(TOKENS).map((t) => [t.symbol, Number(formatUnits(oracle.priceOf(t.address), ORACLE_DECIMALS))]),
    );
    const account = pool.getUserAccountData(strategy.address);
    return jsonRespond(c, {
      prices,
      strategy: strategy.address,
      collateralUsd: toUsd(account.totalCollateralUsd),
      debtUsd: toUsd(account.totalDebtUsd),
      availableBorrowsUsd: toUsd(account.availableBorrowsUsd),
      healthFactor: healthFactorToNumber(account.healthFactor),
      status: classifyHealth(account.healthFactor),
    });
  });

  return route;
}
