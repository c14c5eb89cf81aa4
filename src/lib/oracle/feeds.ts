/**
 * Data feed implementations.
 *
 * - StaticFeed: settable reading, used by tests and paper mode
 * - RandomWalkFeed: simulated market drift for paper sessions
 * - HttpJsonFeed: polls a JSON endpoint returning { value, updatedAt }
 */

import { z } from 'zod';
import { BPS_DENOMINATOR } from '../../config/constant';
import { nowSeconds } from '../utils/time';
import type { DataFeed, FeedReading } from './types';

// ============================================
// STATIC FEED
// ============================================

export class StaticFeed implements DataFeed {
  private reading: FeedReading;
  private failure: Error | null = null;

  constructor(
    public readonly description: string,
    value: bigint,
    public readonly decimals: number = 8,
    updatedAt: number = nowSeconds()
  ) {
    this.reading = { value, updatedAt };
  }

  /** Sets a new value stamped with the current time. */
  update(value: bigint): void {
    this.reading = { value, updatedAt: nowSeconds() };
    this.failure = null;
  }

  /** Keeps the value but moves its timestamp, e.g. into the past. */
  setUpdatedAt(updatedAt: number): void {
    this.reading = { ...this.reading, updatedAt };
  }

  /** Makes every subsequent read reject until the next `update`. */
  fail(error: Error = new Error(`${this.description} feed unavailable`)): void {
    this.failure = error;
  }

  async latestReading(): Promise<FeedReading> {
    if (this.failure) throw this.failure;
    return { ...this.reading };
  }
}

// ============================================
// RANDOM WALK FEED
// ============================================

export class RandomWalkFeed implements DataFeed {
  private value: bigint;

  constructor(
    public readonly description: string,
    initialValue: bigint,
    public readonly decimals: number = 8,
    private readonly maxStepBps: number = 50,
    private readonly random: () => number = Math.random
  ) {
    this.value = initialValue;
  }

  async latestReading(): Promise<FeedReading> {
    // Uniform step in [-maxStepBps, +maxStepBps]
    const stepBps = Math.round((this.random() * 2 - 1) * this.maxStepBps);
    const next = this.value + (this.value * BigInt(stepBps)) / BigInt(BPS_DENOMINATOR);
    this.value = next > 0n ? next : 1n;
    return { value: this.value, updatedAt: nowSeconds() };
  }
}

// ============================================
// HTTP JSON FEED
// ============================================

const readingSchema = z.object({
  value: z.union([z.string().regex(/^-?\d+$/), z.number().int()]).transform((v) => BigInt(v)),
  updatedAt: z.number().int().nonnegative(),
});

export class HttpJsonFeed implements DataFeed {
  constructor(
    public readonly description: string,
    private readonly url: string,
    public readonly decimals: number = 8,
    private readonly timeoutMs: number = 5000
  ) {}

  async latestReading(): Promise<FeedReading> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(this.url, {
        method: 'GET',
        headers: { accept: 'application/json' },
        signal: controller.signal,
      });

      if (!res.ok) {
        const text = await res.text().catch(() => '');
        throw new Error(`${this.description} HTTP ${res.status}: ${text.slice(0, 200)}`);
      }

      const parsed = readingSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new Error(`${this.description} returned a malformed reading`);
      }
      return parsed.data;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
