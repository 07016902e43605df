import { parseUnits, type Address } from 'viem';
import { StateJournal, type Snapshottable } from '../../src/chain/journal';
import { TokenLedger } from '../../src/chain/ledger';
import { OracleError, StrategyError, ValidationError } from '../../src/domain/errors';
import type {
  Command,
  LendingAdapter,
  PositionAmounts,
  StrategyEvent,
  TokenMeta,
  ValueOracle,
} from '../../src/domain/types';
import type { SwapRouterSlot } from '../../src/config/constants';
import { PayloadRouter } from '../../src/routers/payloadRouter';
import type { StrategyContext } from '../../src/services/context';
import { LeveragedStrategy } from '../../src/services/leveragedStrategy';
import { encodeRoutePayload } from '../../src/utils/abi';
import { addressKey, labelAddress } from '../../src/utils/address';
import { minBigInt, mulDiv, pow10 } from '../../src/utils/math';

export const PARENT = labelAddress('test:parent');
export const STRATEGY = labelAddress('test:strategy');
export const OUTSIDER = labelAddress('test:outsider');

function testToken(symbol: string, decimals: number): TokenMeta {
  return { symbol, name: `Test ${symbol}`, address: labelAddress(`test-token:${symbol}`), decimals };
}

export const BASE = testToken('tUSD', 6);
export const COLL = testToken('tPT', 18);
export const REWARD = testToken('tRWD', 18);
export const STRAY = testToken('tXYZ', 18);

export function units(amount: string, token: TokenMeta): bigint {
  return parseUnits(amount, token.decimals);
}

// Fixed 8-decimal prices; an unset price reads like a missing feed.
export class FixedPriceOracle implements ValueOracle {
  private readonly prices = new Map<string, bigint>();

  constructor(
    readonly address: Address,
    private readonly ledger: TokenLedger,
  ) {}

  setPrice(token: Address, usd: string): void {
    this.prices.set(addressKey(token), parseUnits(usd, 8));
  }

  priceOf(token: Address): bigint {
    const price = this.prices.get(addressKey(token));
    if (price === undefined) throw new OracleError('PriceFeedNotFound', `No price for ${token}`, { token });
    return price;
  }

  valueOf(token: Address, amount: bigint): bigint {
    if (amount === 0n) return 0n;
    return mulDiv(amount, this.priceOf(token), pow10(this.ledger.decimalsOf(token)));
  }
}

type Hook = 'supply' | 'withdrawFromVenue' | 'borrow' | 'repay';

/**
 * Bookkeeping-only venue. Supplied collateral sits with `vault`; borrows are
 * minted to the account and repayments burned.
 */
export class InMemoryAdapter implements LendingAdapter, Snapshottable<PositionAmounts> {
  readonly venue = 'memory';
  readonly vault = labelAddress('test:venue-vault');
  private position: PositionAmounts = { collateral: 0n, debt: 0n };
  private readonly failures = new Map<Hook, unknown>();

  constructor(
    private readonly ledger: TokenLedger,
    private readonly account: Address,
    private readonly collateral: Address,
    private readonly debt: Address,
  ) {}

  collateralAsset(): Address {
    return this.collateral;
  }

  debtAsset(): Address {
    return this.debt;
  }

  positionAmounts(): PositionAmounts {
    return { ...this.position };
  }

  setPosition(collateral: bigint, debt: bigint): void {
    if (collateral > 0n) this.ledger.mint(this.collateral, this.vault, collateral);
    this.position = { collateral, debt };
  }

  failOn(hook: Hook, err: unknown): void {
    this.failures.set(hook, err);
  }

  supply(asset: Address, amount: bigint): void {
    this.maybeFail('supply');
    this.ledger.transfer(asset, this.account, this.vault, amount);
    this.position.collateral += amount;
  }

  withdrawFromVenue(asset: Address, amount: bigint): void {
    this.maybeFail('withdrawFromVenue');
    if (amount > this.position.collateral) throw new Error('withdraw exceeds collateral');
    this.ledger.transfer(asset, this.vault, this.account, amount);
    this.position.collateral -= amount;
  }

  borrow(asset: Address, amount: bigint): void {
    this.maybeFail('borrow');
    this.ledger.mint(asset, this.account, amount);
    this.position.debt += amount;
  }

  repay(asset: Address, amount: bigint): void {
    this.maybeFail('repay');
    const repaid = minBigInt(amount, this.position.debt);
    this.ledger.burn(asset, this.account, repaid);
    this.position.debt -= repaid;
  }

  snapshot(): PositionAmounts {
    return { ...this.position };
  }

  restore(state: PositionAmounts): void {
    this.position = { ...state };
  }

  private maybeFail(hook: Hook): void {
    if (this.failures.has(hook)) throw this.failures.get(hook);
  }
}

export interface Harness {
  ledger: TokenLedger;
  journal: StateJournal;
  oracle: FixedPriceOracle;
  adapter: InMemoryAdapter;
  router: PayloadRouter;
  strategy: LeveragedStrategy;
  events: StrategyEvent[];
  // Direct view for unit-testing services outside a strategy call.
  context: StrategyContext;
  emitted: StrategyEvent[];
}

/**
 * Strategy over an in-memory venue. Debt and base asset are BASE; collateral
 * is COLL unless overridden. Every token is priced at $1 and the router holds
 * a million of BASE, COLL and REWARD.
 */
export function createHarness(options: { collateral?: TokenMeta } = {}): Harness {
  const ledger = new TokenLedger();
  const journal = new StateJournal();
  journal.register(ledger);
  for (const meta of [BASE, COLL, REWARD, STRAY]) ledger.registerToken(meta);

  const oracle = new FixedPriceOracle(labelAddress('test:oracle'), ledger);
  for (const meta of [BASE, COLL, REWARD, STRAY]) oracle.setPrice(meta.address, '1');

  const collateral = options.collateral ?? COLL;
  const adapter = new InMemoryAdapter(ledger, STRATEGY, collateral.address, BASE.address);
  journal.register(adapter);

  const router = new PayloadRouter(labelAddress('test:router'), ledger);
  for (const meta of [BASE, COLL, REWARD]) ledger.mint(meta.address, router.address, units('1000000', meta));

  const strategy = new LeveragedStrategy({
    address: STRATEGY,
    parent: PARENT,
    baseAsset: BASE.address,
    oracle,
    adapter,
    ledger,
    journal,
    routers: { kyberswap: router },
  });
  const events: StrategyEvent[] = [];
  strategy.onEvent((event) => events.push(event));

  const emitted: StrategyEvent[] = [];
  const context: StrategyContext = {
    address: STRATEGY,
    parent: PARENT,
    baseAsset: BASE.address,
    ledger,
    oracle,
    adapter,
    trackedTokens: () => strategy.trackedTokens(),
    resolveRouter: (slot) => {
      const found = strategy.swapRouter(slot);
      if (!found) throw new ValidationError('InvalidRouter', `No router for ${slot}`);
      return found;
    },
    emit: (event) => emitted.push(event),
  };

  return { ledger, journal, oracle, adapter, router, strategy, events, context, emitted };
}

export function swapCommand(
  tokenIn: TokenMeta,
  amountIn: bigint,
  tokenOut: TokenMeta,
  amountOut: bigint,
  options: { router?: SwapRouterSlot; minAmountOut?: bigint; maxOracleSlippageBps?: bigint } = {},
): Extract<Command, { type: 'swap' }> {
  return {
    type: 'swap',
    swap: {
      router: options.router ?? 'kyberswap',
      tokenIn: tokenIn.address,
      amountIn,
      tokenOut: tokenOut.address,
      minAmountOut: options.minAmountOut ?? 0n,
      maxOracleSlippageBps: options.maxOracleSlippageBps ?? 100n,
      payload: encodeRoutePayload({ tokenIn: tokenIn.address, amountIn, tokenOut: tokenOut.address, amountOut }),
    },
  };
}

export function noFlash(): { flashLoanToken: null; providedAmount: bigint; expectedAmount: bigint } {
  return { flashLoanToken: null, providedAmount: 0n, expectedAmount: 0n };
}

export function catchStrategyError(fn: () => unknown): StrategyError {
  try {
    fn();
  } catch (err) {
    if (err instanceof StrategyError) return err;
    throw err;
  }
  throw new Error('expected the call to throw');
}
