import type { Address } from 'viem';
import type { StateJournal, Snapshottable } from '../chain/journal';
import type { TokenLedger } from '../chain/ledger';
import type {
  DepositRequest,
  EventSink,
  FlashLoanTerms,
  LendingAdapter,
  PositionAmounts,
  RebalanceRequest,
  StrategyEvent,
  SwapRouter,
  ValueOracle,
  WithdrawRequest,
} from '../domain/types';
import { AuthorizationError, ValidationError, reasonOf } from '../domain/errors';
import { SWAP_ROUTER_SLOTS, type SwapRouterSlot } from '../config/constants';
import { dedupeAddresses, includesAddress, isZeroAddress, sameAddress } from '../utils/address';
import { logger } from '../utils/logger';
import type { StrategyContext } from './context';
import { executeCommands } from './commandPipeline';
import { guardedWithdraw } from './withdrawalGuard';
import { totalAssets, valuationBreakdown, type ValuationBreakdown } from './valuation';

export interface LeveragedStrategyOptions {
  address: Address;
  parent: Address;
  baseAsset: Address;
  oracle: ValueOracle;
  adapter: LendingAdapter;
  ledger: TokenLedger;
  journal: StateJournal;
  routers?: Partial<Record<SwapRouterSlot, SwapRouter>>;
  trackedTokens?: Address[];
}

export interface StrategyConfig {
  oracle: ValueOracle;
  routers: Map<SwapRouterSlot, SwapRouter>;
  extraTokens: Address[];
}

/**
 * One leveraged position in one lending venue, driven by operator command plans.
 *
 * Every mutating call must come from `parent`, and must be made from a
 * single-entry, non-reentrant context: the strategy holds no reentrancy guard
 * of its own and relies on the parent's (see GuardedParent).
 */
export class LeveragedStrategy implements Snapshottable<StrategyConfig> {
  readonly address: Address;
  readonly parent: Address;
  readonly baseAsset: Address;
  private readonly adapter: LendingAdapter;
  private readonly ledger: TokenLedger;
  private readonly journal: StateJournal;
  private readonly config: StrategyConfig;
  private readonly sinks = new Set<EventSink>();
  private readonly context: StrategyContext;

  constructor(options: LeveragedStrategyOptions) {
    if (isZeroAddress(options.parent)) throw new ValidationError('InvalidToken', 'parent must be non-zero');
    if (isZeroAddress(options.baseAsset)) throw new ValidationError('InvalidToken', 'baseAsset must be non-zero');
    this.address = options.address;
    this.parent = options.parent;
    this.baseAsset = options.baseAsset;
    this.adapter = options.adapter;
    this.ledger = options.ledger;
    this.journal = options.journal;

    const routers = new Map<SwapRouterSlot, SwapRouter>();
    for (const slot of SWAP_ROUTER_SLOTS) {
      const router = options.routers?.[slot];
      if (router) routers.set(slot, router);
    }
    const config: StrategyConfig = { oracle: options.oracle, routers, extraTokens: [...(options.trackedTokens ?? [])] };
    this.config = config;

    this.context = {
      address: this.address,
      parent: this.parent,
      baseAsset: this.baseAsset,
      ledger: this.ledger,
      adapter: this.adapter,
      get oracle() {
        return config.oracle;
      },
      trackedTokens: () => this.trackedTokens(),
      resolveRouter: (slot) => this.resolveRouter(slot),
      emit: (event) => this.publish(event),
    };
    this.journal.register(this);
  }

  get priceOracle(): ValueOracle {
    return this.config.oracle;
  }

  onEvent(sink: EventSink): () => void {
    this.sinks.add(sink);
    return () => this.sinks.delete(sink);
  }

  deposit(sender: Address, request: DepositRequest): void {
    this.run('deposit', sender, () => {
      if (isZeroAddress(request.depositToken)) throw new ValidationError('InvalidToken', 'depositToken must be non-zero');
      this.requireFlashTerms(request);
      logger.info(`deposit ${request.depositAmount} of ${request.depositToken} with ${request.commands.length} command(s)`);
      executeCommands(this.context, request.commands);
      this.approveFlashRepayment(request);
      this.publish({
        type: 'deposited',
        strategy: this.address,
        depositToken: request.depositToken,
        depositAmount: request.depositAmount,
        flashLoanToken: request.flashLoanToken,
        providedAmount: request.providedAmount,
        expectedAmount: request.expectedAmount,
        commandCount: request.commands.length,
      });
    });
  }

  withdraw(sender: Address, request: WithdrawRequest): bigint {
    return this.run('withdraw', sender, () => {
      logger.info(`withdraw ${request.percentage} (1e18 = 100%) into ${request.outputToken}`);
      const actual = guardedWithdraw(this.context, request);
      logger.info(`withdraw released ${actual} of ${request.outputToken}`);
      return actual;
    });
  }

  rebalance(sender: Address, request: RebalanceRequest): void {
    this.run('rebalance', sender, () => {
      this.requireFlashTerms(request);
      logger.info(`rebalance with ${request.commands.length} command(s)`);
      executeCommands(this.context, request.commands);
      this.approveFlashRepayment(request);
      this.publish({
        type: 'rebalanced',
        strategy: this.address,
        flashLoanToken: request.flashLoanToken,
        providedAmount: request.providedAmount,
        expectedAmount: request.expectedAmount,
        commandCount: request.commands.length,
      });
    });
  }

  setOracle(sender: Address, oracle: ValueOracle): void {
    this.run('setOracle', sender, () => {
      if (isZeroAddress(oracle.address)) throw new ValidationError('ZeroAddress', 'oracle must be non-zero');
      const previous = this.config.oracle.address;
      this.config.oracle = oracle;
      this.publish({ type: 'oracleUpdated', strategy: this.address, previous, next: oracle.address });
    });
  }

  setSwapRouter(sender: Address, slot: SwapRouterSlot, router: SwapRouter): void {
    this.run('setSwapRouter', sender, () => {
      if (isZeroAddress(router.address)) throw new ValidationError('ZeroAddress', 'router must be non-zero');
      this.config.routers.set(slot, router);
      this.publish({ type: 'swapRouterUpdated', strategy: this.address, slot, router: router.address });
    });
  }

  addTrackedToken(sender: Address, token: Address): void {
    this.run('addTrackedToken', sender, () => {
      if (isZeroAddress(token)) throw new ValidationError('InvalidToken', 'token must be non-zero');
      this.ledger.token(token);
      if (includesAddress(this.trackedTokens(), token)) return;
      this.config.extraTokens.push(token);
      this.publish({ type: 'trackedTokenAdded', strategy: this.address, token });
    });
  }

  trackedTokens(): Address[] {
    return dedupeAddresses([
      this.baseAsset,
      this.adapter.collateralAsset(),
      this.adapter.debtAsset(),
      ...(this.adapter.extraTrackedTokens?.() ?? []),
      ...this.config.extraTokens,
    ]);
  }

  positionAmounts(): PositionAmounts {
    return this.adapter.positionAmounts();
  }

  totalAssets(): bigint {
    return totalAssets(this.context);
  }

  valuationBreakdown(): ValuationBreakdown {
    return valuationBreakdown(this.context);
  }

  swapRouter(slot: SwapRouterSlot): SwapRouter | undefined {
    return this.config.routers.get(slot);
  }

  snapshot(): StrategyConfig {
    return { oracle: this.config.oracle, routers: new Map(this.config.routers), extraTokens: [...this.config.extraTokens] };
  }

  restore(state: StrategyConfig): void {
    this.config.oracle = state.oracle;
    this.config.routers = new Map(state.routers);
    this.config.extraTokens = [...state.extraTokens];
  }

  private run<T>(operation: string, sender: Address, fn: () => T): T {
    try {
      if (!sameAddress(sender, this.parent)) {
        throw new AuthorizationError('Unauthorized', `Only the parent can call ${operation}`, { sender, operation });
      }
      return this.journal.atomically(fn);
    } catch (err) {
      logger.warn(`${operation} rejected: ${reasonOf(err)}`);
      throw err;
    }
  }

  private resolveRouter(slot: SwapRouterSlot): SwapRouter {
    const router = this.config.routers.get(slot);
    if (!router) throw new ValidationError('InvalidRouter', `No router configured for slot ${slot}`, { router: slot });
    return router;
  }

  private requireFlashTerms(terms: FlashLoanTerms): void {
    if (terms.flashLoanToken === null) {
      if (terms.providedAmount !== 0n || terms.expectedAmount !== 0n) {
        throw new ValidationError('InvalidAmount', 'Flash-loan amounts require a flash-loan token');
      }
      return;
    }
    if (!includesAddress(this.trackedTokens(), terms.flashLoanToken)) {
      throw new ValidationError('InvalidToken', `Flash-loan token ${terms.flashLoanToken} is not tracked`, {
        token: terms.flashLoanToken,
      });
    }
  }

  private approveFlashRepayment(terms: FlashLoanTerms): void {
    if (terms.flashLoanToken && terms.expectedAmount > 0n) {
      this.ledger.approve(terms.flashLoanToken, this.address, this.parent, terms.expectedAmount);
    }
  }

  private publish(event: StrategyEvent): void {
    this.journal.afterCommit(() => {
      for (const sink of this.sinks) sink(event);
    });
  }
}
