/**
 * Risk Limiter
 *
 * Per-trade size cap, cooldown between trades, minimum signal confidence and
 * a lazily reset 24h volume window. `admit` only reads; every mutation goes
 * through one of the paired mutators so that a failed execution can be
 * undone exactly.
 */

import { DAY_SECONDS } from '../../config/constant';
import { ErrorCode, TradingError } from '../errors';
import type { RateState, TradingConfig } from '../types';
import { createLogger } from '../utils/logger';
import { nowSeconds } from '../utils/time';

const log = createLogger('RiskLimiter');

// ============================================
// TYPES
// ============================================

export type AdmissionRejection =
  | ErrorCode.TRADE_AMOUNT_TOO_LARGE
  | ErrorCode.COOLDOWN_NOT_MET
  | ErrorCode.CONFIDENCE_TOO_LOW
  | ErrorCode.DAILY_LIMIT_EXCEEDED;

export type Admission = { ok: true } | { ok: false; code: AdmissionRejection; message: string };

export interface AdmitOptions {
  /** Elements of an already-admitted batch skip the cooldown check */
  skipCooldown?: boolean;
}

// ============================================
// LIMITER
// ============================================

export class RiskLimiter {
  private state: RateState;

  constructor(
    private config: TradingConfig,
    startedAt: number = nowSeconds()
  ) {
    this.state = {
      lastTradeTimestamp: 0,
      dailyTradeVolume: 0n,
      lastDayReset: startedAt,
      totalTrades: 0,
      successfulTrades: 0,
    };
  }

  setConfig(config: TradingConfig): void {
    this.config = config;
  }

  getState(): RateState {
    return { ...this.state };
  }

  /** Volume as the next admission would see it, window reset included. */
  currentDayVolume(now: number = nowSeconds()): bigint {
    return this.isDayDue(now) ? 0n : this.state.dailyTradeVolume;
  }

  remainingDailyLimit(now: number = nowSeconds()): bigint {
    const used = this.currentDayVolume(now);
    return used >= this.config.dailyTradeLimit ? 0n : this.config.dailyTradeLimit - used;
  }

  /** First failing check wins. Never mutates. */
  admit(amount: bigint, confidenceBps: number, now: number = nowSeconds(), options: AdmitOptions = {}): Admission {
    const { maxTradeSize, cooldownPeriod, confidenceThresholdBps, dailyTradeLimit } = this.config;

    if (amount > maxTradeSize) {
      return { ok: false, code: ErrorCode.TRADE_AMOUNT_TOO_LARGE, message: 'Trade amount too large' };
    }

    if (!options.skipCooldown && now < this.state.lastTradeTimestamp + cooldownPeriod) {
      return { ok: false, code: ErrorCode.COOLDOWN_NOT_MET, message: 'Cooldown period not met' };
    }

    if (confidenceBps < confidenceThresholdBps) {
      return { ok: false, code: ErrorCode.CONFIDENCE_TOO_LOW, message: 'Confidence too low' };
    }

    if (this.currentDayVolume(now) + amount > dailyTradeLimit) {
      return { ok: false, code: ErrorCode.DAILY_LIMIT_EXCEEDED, message: 'Daily trade limit exceeded' };
    }

    return { ok: true };
  }

  /** `admit` that throws the rejection as a TradingError. */
  assertAdmitted(amount: bigint, confidenceBps: number, now: number = nowSeconds(), options: AdmitOptions = {}): void {
    const admission = this.admit(amount, confidenceBps, now, options);
    if (!admission.ok) {
      log.debug({ code: admission.code, amount: amount.toString(), confidenceBps }, 'Trade not admitted');
      throw new TradingError(admission.code, admission.message, {
        amount: amount.toString(),
        confidenceBps,
      });
    }
  }

  rollDayIfDue(now: number = nowSeconds()): boolean {
    if (!this.isDayDue(now)) return false;

    log.info({ previousVolume: this.state.dailyTradeVolume.toString() }, 'Daily volume window reset');
    this.state.dailyTradeVolume = 0n;
    this.state.lastDayReset = now;
    return true;
  }

  commit(amount: bigint, now: number = nowSeconds()): void {
    this.state.lastTradeTimestamp = now;
    this.state.dailyTradeVolume += amount;
    this.state.totalTrades += 1;
  }

  /** Undoes the volume and trade count of a failed commit. The timestamp stays. */
  rollback(amount: bigint): void {
    this.state.dailyTradeVolume = this.state.dailyTradeVolume >= amount ? this.state.dailyTradeVolume - amount : 0n;
    this.state.totalTrades = Math.max(0, this.state.totalTrades - 1);
  }

  recordSuccess(): number {
    this.state.successfulTrades += 1;
    return this.state.successfulTrades;
  }

  private isDayDue(now: number): boolean {
    return now >= this.state.lastDayReset + DAY_SECONDS;
  }
}
