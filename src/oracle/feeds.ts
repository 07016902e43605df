import type { Address } from 'viem';
import type { Clock } from '../chain/clock';
import { OracleError } from '../domain/errors';
import { addressKey } from '../utils/address';

export interface RoundData {
  answer: bigint;
  updatedAt: number; // unix seconds
}

// Chainlink-style aggregator surface.
export interface PriceFeed {
  readonly address: Address;
  readonly decimals: number;
  latestRoundData(): RoundData;
}

// Pendle PT rate oracle surface; rates are 1e18-scaled.
export interface PendleRateSource {
  readonly address: Address;
  getPtToAssetRate(market: Address, duration: number): bigint;
  getPtToSyRate(market: Address, duration: number): bigint;
}

// Settable feed for demos and tests. `updateAnswer` stamps the current clock time.
export class StaticPriceFeed implements PriceFeed {
  private round: RoundData = { answer: 0n, updatedAt: 0 };

  constructor(
    readonly address: Address,
    readonly decimals: number,
    private readonly clock: Clock,
    answer?: bigint,
  ) {
    if (answer !== undefined) this.updateAnswer(answer);
  }

  updateAnswer(answer: bigint): void {
    this.round = { answer, updatedAt: this.clock.now() };
  }

  setRound(answer: bigint, updatedAt: number): void {
    this.round = { answer, updatedAt };
  }

  latestRoundData(): RoundData {
    return { ...this.round };
  }
}

export class StaticPendleRates implements PendleRateSource {
  private readonly rates = new Map<string, { ptToAsset: bigint; ptToSy: bigint }>();

  constructor(readonly address: Address) {}

  setRates(market: Address, rates: { ptToAsset: bigint; ptToSy: bigint }): void {
    this.rates.set(addressKey(market), { ...rates });
  }

  getPtToAssetRate(market: Address, _duration: number): bigint {
    return this.ratesFor(market).ptToAsset;
  }

  getPtToSyRate(market: Address, _duration: number): bigint {
    return this.ratesFor(market).ptToSy;
  }

  private ratesFor(market: Address): { ptToAsset: bigint; ptToSy: bigint } {
    const rates = this.rates.get(addressKey(market));
    if (!rates) throw new OracleError('InvalidPrice', `No PT rate for market ${market}`, { market });
    return rates;
  }
}
