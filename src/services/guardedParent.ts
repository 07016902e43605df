import type { Address } from 'viem';
import type { StateJournal } from '../chain/journal';
import type { TokenLedger } from '../chain/ledger';
import type { DepositRequest, RebalanceRequest, SwapRouter, ValueOracle, WithdrawRequest } from '../domain/types';
import { AuthorizationError } from '../domain/errors';
import type { SwapRouterSlot } from '../config/constants';
import { sameAddress } from '../utils/address';
import type { LeveragedStrategy } from './leveragedStrategy';

/**
 * Minimal owning vault: one non-reentrant entry at a time, advances flash-loan
 * funds from its own balance and collects whatever the strategy approved.
 * No epochs, queues, shares or fees.
 */
export class GuardedParent {
  private entered = false;
  private target: LeveragedStrategy | null = null;

  constructor(
    readonly address: Address,
    private readonly ledger: TokenLedger,
    private readonly journal: StateJournal,
  ) {}

  attach(strategy: LeveragedStrategy): void {
    if (!sameAddress(strategy.parent, this.address)) {
      throw new AuthorizationError('Unauthorized', 'Strategy is owned by another parent', { parent: strategy.parent });
    }
    this.target = strategy;
  }

  get strategy(): LeveragedStrategy {
    if (!this.target) throw new AuthorizationError('Unauthorized', 'No strategy attached');
    return this.target;
  }

  deposit(request: DepositRequest): void {
    this.nonReentrant(() => {
      const strategy = this.strategy;
      if (request.depositAmount > 0n) {
        this.ledger.transfer(request.depositToken, this.address, strategy.address, request.depositAmount);
      }
      this.advance(request.flashLoanToken, request.providedAmount);
      strategy.deposit(this.address, request);
      this.collect(request.flashLoanToken, request.expectedAmount);
    });
  }

  withdraw(request: WithdrawRequest): bigint {
    return this.nonReentrant(() => {
      const strategy = this.strategy;
      this.advance(request.flashLoanToken, request.providedAmount);
      const actualWithdrawn = strategy.withdraw(this.address, request);
      if (request.flashLoanToken && sameAddress(request.flashLoanToken, request.outputToken)) {
        this.collect(request.outputToken, actualWithdrawn + request.expectedAmount);
      } else {
        this.collect(request.outputToken, actualWithdrawn);
        this.collect(request.flashLoanToken, request.expectedAmount);
      }
      return actualWithdrawn;
    });
  }

  rebalance(request: RebalanceRequest): void {
    this.nonReentrant(() => {
      this.advance(request.flashLoanToken, request.providedAmount);
      this.strategy.rebalance(this.address, request);
      this.collect(request.flashLoanToken, request.expectedAmount);
    });
  }

  setOracle(oracle: ValueOracle): void {
    this.nonReentrant(() => this.strategy.setOracle(this.address, oracle));
  }

  setSwapRouter(slot: SwapRouterSlot, router: SwapRouter): void {
    this.nonReentrant(() => this.strategy.setSwapRouter(this.address, slot, router));
  }

  addTrackedToken(token: Address): void {
    this.nonReentrant(() => this.strategy.addTrackedToken(this.address, token));
  }

  private nonReentrant<T>(fn: () => T): T {
    if (this.entered) throw new AuthorizationError('ReentrantCall', 'Parent is already executing a call');
    this.entered = true;
    try {
      return this.journal.atomically(fn);
    } finally {
      this.entered = false;
    }
  }

  private advance(token: Address | null, amount: bigint): void {
    if (token && amount > 0n) this.ledger.transfer(token, this.address, this.strategy.address, amount);
  }

  private collect(token: Address | null, amount: bigint): void {
    if (token && amount > 0n) this.ledger.transferFrom(token, this.address, this.strategy.address, this.address, amount);
  }
}
