/**
 * Oracle Layer Types
 *
 * Every oracle (price, eco, volatility, regulatory) is consumed through the
 * same `DataFeed` contract and treated as untrusted: it may be stale, may
 * report nonsense, and may throw.
 */

// ============================================
// FEED CONTRACT
// ============================================

export interface FeedReading {
  /** Raw reading as a fixed-point integer (may be <= 0 on a broken feed) */
  value: bigint;

  /** Unix timestamp (seconds) of the reading */
  updatedAt: number;
}

export interface DataFeed {
  /** Human-readable feed id, e.g. "ETH/USD" */
  readonly description: string;

  /** Fixed-point decimals of `value` */
  readonly decimals: number;

  /** Latest reading. Rejects when the feed is unavailable. */
  latestReading(): Promise<FeedReading>;
}

// ============================================
// FEED STATUS
// ============================================

export type FeedState = 'LIVE' | 'STALE' | 'UNAVAILABLE' | 'UNCONFIGURED';

export interface FeedStatus {
  state: FeedState;
  reading?: FeedReading;
  error?: string;
}
