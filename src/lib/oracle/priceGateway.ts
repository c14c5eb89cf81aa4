/**
 * Price Oracle Gateway
 *
 * Hard checks (fatal): non-positive price, data older than one hour,
 * unreadable feed. Soft check (advisory): a single-step move larger than
 * the deviation threshold marks the read unconfirmed but never blocks.
 *
 * The deviation baseline is the last committed price (monotonic
 * replacement, not a rolling window).
 */

import { BPS_DENOMINATOR, MAX_PRICE_AGE_SECONDS, MIN_PRICE_DEVIATION_BPS } from '../../config/constant';
import type { AgentEmitter } from '../agent/events';
import { ErrorCode, TradingError, describeError, isTradingError } from '../errors';
import type { PriceRead, PriceSnapshot } from '../types';
import { createLogger } from '../utils/logger';
import { nowSeconds } from '../utils/time';
import type { DataFeed, FeedReading } from './types';

const log = createLogger('PriceGateway');

export function deviationBps(price: bigint, previous: bigint): number {
  if (previous <= 0n) return 0;
  const diff = price > previous ? price - previous : previous - price;
  return Number((diff * BigInt(BPS_DENOMINATOR)) / previous);
}

/** Exact comparison; `deviationBps` rounds down. */
export function exceedsDeviation(price: bigint, previous: bigint, thresholdBps: number): boolean {
  if (previous <= 0n) return false;
  const diff = price > previous ? price - previous : previous - price;
  return diff * BigInt(BPS_DENOMINATOR) > BigInt(thresholdBps) * previous;
}

export class PriceOracleGateway {
  private lastValidPrice: bigint = 0n;

  constructor(
    private feed: DataFeed,
    private readonly events: AgentEmitter,
    private deviationThresholdBps: number = MIN_PRICE_DEVIATION_BPS
  ) {}

  get feedDescription(): string {
    return this.feed.description;
  }

  getLastValidPrice(): bigint {
    return this.lastValidPrice;
  }

  setFeed(feed: DataFeed): void {
    log.info({ from: this.feed.description, to: feed.description }, 'Price feed rotated');
    this.feed = feed;
  }

  setDeviationThreshold(bps: number): void {
    this.deviationThresholdBps = bps;
  }

  /**
   * Validated read with no side effects.
   * @throws TradingError INVALID_PRICE | PRICE_DATA_STALE | PRICE_FEED_UNAVAILABLE
   */
  async readPrice(now: number = nowSeconds()): Promise<PriceRead> {
    let reading: FeedReading;
    try {
      reading = await this.feed.latestReading();
    } catch (error) {
      if (isTradingError(error)) throw error;
      throw new TradingError(ErrorCode.PRICE_FEED_UNAVAILABLE, `Price feed unavailable: ${describeError(error)}`, {
        feed: this.feed.description,
      });
    }

    if (reading.value <= 0n) {
      throw new TradingError(ErrorCode.INVALID_PRICE, 'Invalid price data', {
        price: reading.value.toString(),
      });
    }

    if (now - reading.updatedAt > MAX_PRICE_AGE_SECONDS) {
      throw new TradingError(ErrorCode.PRICE_DATA_STALE, 'Price data stale', {
        updatedAt: reading.updatedAt,
        ageSeconds: now - reading.updatedAt,
      });
    }

    const deviation = deviationBps(reading.value, this.lastValidPrice);
    return {
      price: reading.value,
      updatedAt: reading.updatedAt,
      deviationBps: deviation,
      confirmed: !exceedsDeviation(reading.value, this.lastValidPrice, this.deviationThresholdBps),
    };
  }

  /** Makes `read` the new deviation baseline, signalling an unconfirmed move first. */
  recordValidPrice(read: PriceRead, now: number = nowSeconds()): void {
    if (!read.confirmed) {
      log.warn(
        { price: read.price.toString(), previous: this.lastValidPrice.toString(), deviationBps: read.deviationBps },
        'Price deviation above threshold, read unconfirmed'
      );
      this.events.emit('price-unconfirmed', {
        price: read.price,
        previousPrice: this.lastValidPrice,
        deviationBps: read.deviationBps,
        timestamp: now,
      });
    }
    this.lastValidPrice = read.price;
  }

  async getLatestPrice(): Promise<PriceSnapshot> {
    const now = nowSeconds();
    const read = await this.readPrice(now);
    this.recordValidPrice(read, now);
    return { price: read.price, updatedAt: read.updatedAt };
  }

  /**
   * Best-effort baseline fetch. On any failure the documented fallback
   * (default 0, i.e. no deviation baseline) is used and reported.
   */
  async initialize(fallback: bigint = 0n): Promise<bigint> {
    try {
      const read = await this.readPrice();
      this.lastValidPrice = read.price;
      log.info({ price: read.price.toString(), feed: this.feed.description }, 'Price baseline initialized');
    } catch (error) {
      this.lastValidPrice = fallback;
      log.warn({ fallback: fallback.toString(), error: describeError(error) }, 'Price baseline unavailable, using fallback');
      this.events.emit('price-fallback', {
        fallbackPrice: fallback,
        reason: describeError(error),
        timestamp: nowSeconds(),
      });
    }
    return this.lastValidPrice;
  }
}
