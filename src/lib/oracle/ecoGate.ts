/**
 * Eco Gate
 *
 * An absent feed is a pass-through (score 0). A configured feed that is
 * stale or unreadable scores MAX_ECO_SCORE, which blocks every trade.
 */

import { MAX_ECO_SCORE, MAX_PRICE_AGE_SECONDS } from '../../config/constant';
import type { AgentEmitter } from '../agent/events';
import { describeError } from '../errors';
import { createLogger } from '../utils/logger';
import { nowSeconds } from '../utils/time';
import type { DataFeed, FeedStatus } from './types';

const log = createLogger('EcoGate');

export class EcoGate {
  constructor(
    private feed: DataFeed | null,
    private readonly events: AgentEmitter
  ) {}

  setFeed(feed: DataFeed | null): void {
    this.feed = feed;
    log.info({ feed: feed?.description ?? null }, 'Eco feed rotated');
  }

  get configured(): boolean {
    return this.feed !== null;
  }

  async status(now: number = nowSeconds()): Promise<FeedStatus> {
    if (!this.feed) return { state: 'UNCONFIGURED' };

    try {
      const reading = await this.feed.latestReading();
      if (now - reading.updatedAt > MAX_PRICE_AGE_SECONDS) {
        return { state: 'STALE', reading };
      }
      return { state: 'LIVE', reading };
    } catch (error) {
      return { state: 'UNAVAILABLE', error: describeError(error) };
    }
  }

  async score(now: number = nowSeconds()): Promise<bigint> {
    const status = await this.status(now);

    switch (status.state) {
      case 'UNCONFIGURED':
        return 0n;
      case 'LIVE':
        return status.reading && status.reading.value > 0n ? status.reading.value : 0n;
      case 'STALE':
      case 'UNAVAILABLE':
        log.warn({ state: status.state, error: status.error }, 'Eco feed degraded, failing closed');
        return MAX_ECO_SCORE;
    }
  }

  /** Scores and reports against `threshold`; true when trading may proceed. */
  async check(threshold: bigint, now: number = nowSeconds()): Promise<{ passed: boolean; score: bigint }> {
    const score = await this.score(now);
    const passed = score <= threshold;
    this.events.emit('eco-score-checked', { score, threshold, passed, timestamp: now });
    return { passed, score };
  }
}
