import type { Address } from 'viem';
import type { Clock } from '../chain/clock';
import type { TokenLedger } from '../chain/ledger';
import type { ValueOracle } from '../domain/types';
import { AuthorizationError, OracleError, ValidationError } from '../domain/errors';
import { MAX_PRICE_AGE_SECONDS, ORACLE_DECIMALS, PENDLE_TWAP_DURATION_SECONDS } from '../config/constants';
import { addressKey, isZeroAddress, sameAddress } from '../utils/address';
import { WAD, mulDiv, pow10 } from '../utils/math';
import type { PendleRateSource, PriceFeed } from './feeds';

export interface PtTokenConfig {
  market: Address;
  underlying: Address;
  useSyRate: boolean; // price through PT->SY instead of PT->asset
}

export type OracleConfigEvent =
  | { type: 'priceFeedUpdated'; token: Address; feed: Address }
  | { type: 'ptTokenAdded'; pt: Address; market: Address; underlying: Address; useSyRate: boolean }
  | { type: 'pendleOracleUpdated'; previous: Address; next: Address };

export interface PriceOracleOptions {
  address: Address;
  owner: Address;
  ledger: TokenLedger; // token decimals
  clock: Clock;
  pendle: PendleRateSource;
  maxPriceAgeSeconds?: number;
  twapDurationSeconds?: number;
  onConfigChange?: (event: OracleConfigEvent) => void;
}

/**
 * USD pricing in 8-decimal fixed point. Plain tokens read a Chainlink-style
 * feed; Pendle PT tokens are priced as underlying price x PT rate.
 */
export class PriceOracle implements ValueOracle {
  readonly address: Address;
  readonly owner: Address;
  private readonly feeds = new Map<string, PriceFeed>();
  private readonly ptTokens = new Map<string, PtTokenConfig>();
  private pendle: PendleRateSource;
  private readonly ledger: TokenLedger;
  private readonly clock: Clock;
  private readonly maxPriceAge: number;
  private readonly twapDuration: number;
  private readonly onConfigChange: (event: OracleConfigEvent) => void;

  constructor(options: PriceOracleOptions) {
    if (isZeroAddress(options.pendle.address)) {
      throw new ValidationError('InvalidToken', 'Pendle oracle address must be non-zero');
    }
    this.address = options.address;
    this.owner = options.owner;
    this.ledger = options.ledger;
    this.clock = options.clock;
    this.pendle = options.pendle;
    this.maxPriceAge = options.maxPriceAgeSeconds ?? MAX_PRICE_AGE_SECONDS;
    this.twapDuration = options.twapDurationSeconds ?? PENDLE_TWAP_DURATION_SECONDS;
    this.onConfigChange = options.onConfigChange ?? (() => undefined);
  }

  get pendleOracle(): PendleRateSource {
    return this.pendle;
  }

  addPriceFeed(sender: Address, token: Address, feed: PriceFeed): void {
    this.requireOwner(sender);
    if (isZeroAddress(token)) throw new ValidationError('InvalidToken', 'Token address must be non-zero');
    if (isZeroAddress(feed.address)) {
      throw new ValidationError('InvalidPriceFeed', 'Price feed address must be non-zero', { token });
    }
    this.feeds.set(addressKey(token), feed);
    this.onConfigChange({ type: 'priceFeedUpdated', token, feed: feed.address });
  }

  addPtToken(sender: Address, pt: Address, config: PtTokenConfig): void {
    this.requireOwner(sender);
    if (isZeroAddress(pt)) throw new ValidationError('InvalidToken', 'PT address must be non-zero');
    if (isZeroAddress(config.market)) throw new ValidationError('InvalidMarket', 'Market address must be non-zero');
    if (isZeroAddress(config.underlying)) {
      throw new ValidationError('InvalidUnderlying', 'Underlying address must be non-zero');
    }
    if (!this.feeds.has(addressKey(config.underlying))) {
      throw new OracleError('UnderlyingMissingPriceFeed', `No price feed for underlying ${config.underlying}`, {
        underlying: config.underlying,
      });
    }
    const ptDecimals = this.ledger.decimalsOf(pt);
    const underlyingDecimals = this.ledger.decimalsOf(config.underlying);
    if (ptDecimals !== underlyingDecimals) {
      throw new OracleError('DecimalsMismatch', 'PT and underlying decimals differ', {
        pt,
        ptDecimals: String(ptDecimals),
        underlying: config.underlying,
        underlyingDecimals: String(underlyingDecimals),
      });
    }
    this.ptTokens.set(addressKey(pt), { ...config });
    this.onConfigChange({ type: 'ptTokenAdded', pt, ...config });
  }

  setPendleOracle(sender: Address, source: PendleRateSource): void {
    this.requireOwner(sender);
    if (isZeroAddress(source.address)) throw new ValidationError('InvalidToken', 'Pendle oracle address must be non-zero');
    const previous = this.pendle.address;
    this.pendle = source;
    this.onConfigChange({ type: 'pendleOracleUpdated', previous, next: source.address });
  }

  getPtConfig(token: Address): PtTokenConfig | undefined {
    return this.ptTokens.get(addressKey(token));
  }

  isPtToken(token: Address): boolean {
    return this.ptTokens.has(addressKey(token));
  }

  // USD per one whole token.
  priceOf(token: Address): bigint {
    if (isZeroAddress(token)) throw new ValidationError('InvalidToken', 'Token address must be non-zero');
    const pt = this.ptTokens.get(addressKey(token));
    if (!pt) return this.feedPrice(token);
    const underlyingPrice = this.feedPrice(pt.underlying);
    const rate = pt.useSyRate
      ? this.pendle.getPtToSyRate(pt.market, this.twapDuration)
      : this.pendle.getPtToAssetRate(pt.market, this.twapDuration);
    return mulDiv(underlyingPrice, rate, WAD);
  }

  valueOf(token: Address, amount: bigint): bigint {
    if (isZeroAddress(token)) throw new ValidationError('InvalidToken', 'Token address must be non-zero');
    if (amount === 0n) return 0n;
    const price = this.priceOf(token);
    return mulDiv(amount, price, pow10(this.ledger.decimalsOf(token)));
  }

  private feedPrice(token: Address): bigint {
    const feed = this.feeds.get(addressKey(token));
    if (!feed) throw new OracleError('PriceFeedNotFound', `No price feed for ${token}`, { token });
    const { answer, updatedAt } = feed.latestRoundData();
    if (answer <= 0n) {
      throw new OracleError('InvalidPrice', `Non-positive price for ${token}`, { token, answer: answer.toString() });
    }
    const age = this.clock.now() - updatedAt;
    if (age > this.maxPriceAge) {
      throw new OracleError('PriceDataTooOld', `Price for ${token} is ${age}s old`, {
        token,
        updatedAt: String(updatedAt),
        maxAge: String(this.maxPriceAge),
      });
    }
    if (feed.decimals === ORACLE_DECIMALS) return answer;
    if (feed.decimals > ORACLE_DECIMALS) return answer / pow10(feed.decimals - ORACLE_DECIMALS);
    return answer * pow10(ORACLE_DECIMALS - feed.decimals);
  }

  private requireOwner(sender: Address): void {
    if (!sameAddress(sender, this.owner)) {
      throw new AuthorizationError('Unauthorized', 'Only the oracle owner can change configuration', { sender });
    }
  }
}
