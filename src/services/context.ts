import type { Address } from 'viem';
import type { TokenLedger } from '../chain/ledger';
import type { LendingAdapter, StrategyEvent, SwapRouter, ValueOracle } from '../domain/types';
import type { SwapRouterSlot } from '../config/constants';

/** What the executor, pipeline, guard and valuation see of a strategy. */
export interface StrategyContext {
  readonly address: Address;
  readonly parent: Address;
  readonly baseAsset: Address;
  readonly ledger: TokenLedger;
  readonly oracle: ValueOracle;
  readonly adapter: LendingAdapter;
  trackedTokens(): Address[];
  resolveRouter(slot: SwapRouterSlot): SwapRouter;
  // Published once the enclosing call commits.
  emit(event: StrategyEvent): void;
}
