import { parseUnits, type Address } from 'viem';
import { StateJournal } from '../chain/journal';
import { TokenLedger } from '../chain/ledger';
import { systemClock, type Clock } from '../chain/clock';
import { StaticPendleRates, StaticPriceFeed } from '../oracle/feeds';
import { PriceOracle } from '../oracle/priceOracle';
import { AavePool } from '../venues/aavePool';
import { AaveAdapter } from '../adapters/aaveAdapter';
import { PayloadRouter } from '../routers/payloadRouter';
import { getConfig } from '../config/env';
import { INITIAL_FEED_ANSWERS, INITIAL_PT_RATE, PT_SUSDE_MARKET, TOKENS } from '../config/tokens';
import { labelAddress } from '../utils/address';
import { logger, stringifyWithBigInt } from '../utils/logger';
import { LeveragedStrategy } from './leveragedStrategy';
import { GuardedParent } from './guardedParent';

export interface World {
  clock: Clock;
  ledger: TokenLedger;
  journal: StateJournal;
  pendle: StaticPendleRates;
  feeds: { USDC: StaticPriceFeed; USDe: StaticPriceFeed };
  oracle: PriceOracle;
  pool: AavePool;
  adapter: AaveAdapter;
  router: PayloadRouter;
  strategy: LeveragedStrategy;
  parent: GuardedParent;
  accounts: { deployer: Address; parent: Address; strategy: Address };
}

export interface WorldOptions {
  clock?: Clock;
  maxPriceAgeSeconds?: number;
}

/**
 * USDC-based strategy levering PT-sUSDe on an Aave-style pool, with one
 * reference router behind every swap slot and a guarded parent holding funds.
 */
export function createWorld(options: WorldOptions = {}): World {
  const clock = options.clock ?? systemClock;
  const ledger = new TokenLedger();
  const journal = new StateJournal();
  journal.register(ledger);
  for (const meta of Object.values(TOKENS)) ledger.registerToken(meta);

  const usdc = TOKENS.USDC.address;
  const usde = TOKENS.USDe.address;
  const pt = TOKENS['PT-sUSDe'].address;
  const deployer = labelAddress('account:deployer');

  const pendle = new StaticPendleRates(labelAddress('pendle:pt-oracle'));
  pendle.setRates(PT_SUSDE_MARKET, { ptToAsset: INITIAL_PT_RATE, ptToSy: INITIAL_PT_RATE });

  const oracle = new PriceOracle({
    address: labelAddress('oracle:price'),
    owner: deployer,
    ledger,
    clock,
    pendle,
    maxPriceAgeSeconds: options.maxPriceAgeSeconds ?? getConfig().MAX_PRICE_AGE_SECONDS,
    onConfigChange: (event) => logger.debug(`oracle ${event.type}: ${stringifyWithBigInt(event)}`),
  });
  const feeds = {
    USDC: new StaticPriceFeed(labelAddress('feed:USDC'), 8, clock, INITIAL_FEED_ANSWERS.USDC),
    USDe: new StaticPriceFeed(labelAddress('feed:USDe'), 8, clock, INITIAL_FEED_ANSWERS.USDe),
  };
  oracle.addPriceFeed(deployer, usdc, feeds.USDC);
  oracle.addPriceFeed(deployer, usde, feeds.USDe);
  oracle.addPtToken(deployer, pt, { market: PT_SUSDE_MARKET, underlying: usde, useSyRate: false });

  const pool = new AavePool(labelAddress('venue:aave-pool'), ledger, oracle);
  journal.register(pool);
  pool.addReserve({ asset: pt, ltvBps: 8_600n, liquidationThresholdBps: 8_800n });
  pool.addReserve({ asset: usdc, ltvBps: 7_500n, liquidationThresholdBps: 7_800n });
  ledger.mint(usdc, pool.address, parseUnits('1000000', 6));

  const router = new PayloadRouter(labelAddress('router:reference'), ledger);
  ledger.mint(usdc, router.address, parseUnits('1000000', 6));
  ledger.mint(pt, router.address, parseUnits('1000000', 18));

  const accounts = {
    deployer,
    parent: labelAddress('vault:parent'),
    strategy: labelAddress('strategy:aave-pt-susde'),
  };
  const adapter = new AaveAdapter({ pool, ledger, account: accounts.strategy, collateralAsset: pt, debtAsset: usdc });
  const strategy = new LeveragedStrategy({
    address: accounts.strategy,
    parent: accounts.parent,
    baseAsset: usdc,
    oracle,
    adapter,
    ledger,
    journal,
    routers: { kyberswap: router, odos: router, pendle: router },
  });
  const parent = new GuardedParent(accounts.parent, ledger, journal);
  parent.attach(strategy);
  ledger.mint(usdc, parent.address, parseUnits('100000', 6));

  logger.debug(`world ready: strategy ${strategy.address}, parent ${parent.address}`);
  return { clock, ledger, journal, pendle, feeds, oracle, pool, adapter, router, strategy, parent, accounts };
}
