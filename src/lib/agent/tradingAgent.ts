/**
 * Trade Authorizer
 *
 * Runs every trade intent through the fixed gate order
 *
 *   emergency → pause → risk limits → price read → price threshold
 *   → extra gates (eco, in the enhanced agent) → commit → custody
 *
 * and rolls the commit back when custody fails. A gate rejection leaves
 * state untouched; a custody failure is re-thrown as the same object.
 *
 * `TradingAgent` is the base variant; `EnhancedTradingAgent` adds the eco
 * gate and the prediction lifecycle on top of the same authorizer.
 */

import EventEmitter from 'eventemitter3';
import { BPS_DENOMINATOR, CONSECUTIVE_FAILURE_ALERT, MAX_BATCH_SIZE, MIN_PRICE_DEVIATION_BPS } from '../../config/constant';
import { AccessControl, type Role } from '../access/accessControl';
import { parseTradingConfig } from '../config/tradingConfig';
import { ErrorCode, TradingError, describeError, isTradingError } from '../errors';
import type { CustodyExecutor, ExecutionReceipt } from '../execution/custody';
import { EmergencyControl } from '../failsafe/emergencyControl';
import { PriceOracleGateway } from '../oracle/priceGateway';
import type { DataFeed } from '../oracle/types';
import { RiskLimiter, type AdmitOptions } from '../risk/limiter';
import type {
  AuthorizationPhase,
  BatchElementResult,
  BatchOutcome,
  EligibilityResult,
  EmergencyState,
  PriceRead,
  TradeOutcome,
  TradeRequest,
  TradeSource,
  TradingConfig,
  TradingStats,
} from '../types';
import { createLogger, type Logger } from '../utils/logger';
import { SingleFlightGuard } from '../utils/singleFlight';
import { nowSeconds } from '../utils/time';
import type { AgentEmitter, AgentEvents } from './events';

// ============================================
// TYPES
// ============================================

export interface AgentOptions<C extends TradingConfig> {
  /** Initial admin; holds every role */
  admin: string;
  custody: CustodyExecutor;
  priceFeed: DataFeed;
  sourceAsset: string;
  targetAsset: string;
  config: C;
  /** Single-step move that marks a price read unconfirmed */
  deviationThresholdBps?: number;
  /** Start of the first daily volume window (defaults to now) */
  startedAt?: number;
}

export interface AuthorizeOptions extends AdmitOptions {
  /** The caller already ran the additional gates for this trade */
  gatesPrechecked?: boolean;
}

/** canTrade reason for each code a gate can reject with */
const ELIGIBILITY_REASONS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.INVALID_AMOUNT]: 'Invalid amount',
  [ErrorCode.EMERGENCY_STOP_ACTIVE]: 'Emergency stop active',
  [ErrorCode.CONTRACT_PAUSED]: 'Contract paused',
  [ErrorCode.TRADE_AMOUNT_TOO_LARGE]: 'Amount too large',
  [ErrorCode.COOLDOWN_NOT_MET]: 'Cooldown not met',
  [ErrorCode.CONFIDENCE_TOO_LOW]: 'Confidence too low',
  [ErrorCode.DAILY_LIMIT_EXCEEDED]: 'Daily limit exceeded',
  [ErrorCode.PRICE_DATA_STALE]: 'Price data stale',
  [ErrorCode.INVALID_PRICE]: 'Invalid price',
  [ErrorCode.PRICE_FEED_UNAVAILABLE]: 'Price feed unavailable',
  [ErrorCode.PRICE_BELOW_THRESHOLD]: 'Price below threshold',
  [ErrorCode.ECO_SCORE_TOO_HIGH]: 'Eco score too high',
};

function assertValidAmounts(amountIn: bigint, amountOutMin: bigint): void {
  if (amountIn <= 0n || amountOutMin < 0n) {
    throw new TradingError(ErrorCode.INVALID_AMOUNT, 'Trade amounts must be positive', {
      amountIn: amountIn.toString(),
      amountOutMin: amountOutMin.toString(),
    });
  }
}

// ============================================
// AUTHORIZER
// ============================================

export abstract class TradeAuthorizer<C extends TradingConfig> {
  readonly events: AgentEmitter = new EventEmitter<AgentEvents>();

  protected readonly access: AccessControl;
  protected readonly emergency: EmergencyControl;
  protected readonly limiter: RiskLimiter;
  protected readonly priceGateway: PriceOracleGateway;
  protected readonly guard = new SingleFlightGuard();
  protected readonly custody: CustodyExecutor;
  protected readonly log: Logger;

  protected config: C;
  protected sourceAsset: string;
  protected targetAsset: string;

  private phase: AuthorizationPhase = 'IDLE';
  private consecutiveFailures = 0;

  protected constructor(
    name: string,
    options: AgentOptions<C>,
    private readonly parseConfig: (input: unknown) => C
  ) {
    this.log = createLogger(name);
    this.config = parseConfig(options.config);

    requireAsset(options.sourceAsset);
    requireAsset(options.targetAsset);
    this.sourceAsset = options.sourceAsset;
    this.targetAsset = options.targetAsset;

    this.access = new AccessControl(options.admin);
    this.emergency = new EmergencyControl(this.access, this.events);
    this.limiter = new RiskLimiter(this.config, options.startedAt);
    this.priceGateway = new PriceOracleGateway(
      options.priceFeed,
      this.events,
      options.deviationThresholdBps ?? MIN_PRICE_DEVIATION_BPS
    );
    this.custody = options.custody;
  }

  /** Fetches the deviation baseline; falls back to no baseline on failure. */
  async initialize(): Promise<void> {
    await this.priceGateway.initialize();
  }

  // ==========================================
  // TRADING
  // ==========================================

  async triggerTrade(actor: string, request: TradeRequest): Promise<TradeOutcome> {
    return this.guard.run('triggerTrade', async () => {
      this.access.requireRole(actor, 'ai');
      return this.authorize(request, 'MANUAL');
    });
  }

  /**
   * Admits the summed amount once, then authorizes each non-zero element on
   * its own. Not atomic: a failed element leaves earlier settlements in place.
   */
  async triggerBatchTrade(
    actor: string,
    amountsIn: bigint[],
    amountsOutMin: bigint[],
    deadline: number,
    confidenceBps: number
  ): Promise<BatchOutcome> {
    return this.guard.run('triggerBatchTrade', async () => {
      this.access.requireRole(actor, 'ai');
      this.emergency.assertTradingAllowed();

      if (amountsIn.length !== amountsOutMin.length) {
        throw new TradingError(ErrorCode.ARRAY_LENGTH_MISMATCH, 'Array length mismatch', {
          amountsIn: amountsIn.length,
          amountsOutMin: amountsOutMin.length,
        });
      }
      if (amountsIn.length === 0) {
        throw new TradingError(ErrorCode.EMPTY_BATCH, 'Empty batch');
      }
      if (amountsIn.length > MAX_BATCH_SIZE) {
        throw new TradingError(ErrorCode.TOO_MANY_TRADES, 'Too many trades', { count: amountsIn.length });
      }
      if (amountsIn.some((amount) => amount < 0n)) {
        throw new TradingError(ErrorCode.INVALID_AMOUNT, 'Batch amounts must be non-negative');
      }

      const now = nowSeconds();
      this.limiter.rollDayIfDue(now);
      const total = amountsIn.reduce((sum, amount) => sum + amount, 0n);
      this.limiter.assertAdmitted(total, confidenceBps, now);

      const results: BatchElementResult[] = [];
      for (const [index, amountIn] of amountsIn.entries()) {
        if (amountIn === 0n) {
          results.push({ index, status: 'SKIPPED' });
          continue;
        }

        try {
          const outcome = await this.authorize(
            { amountIn, amountOutMin: amountsOutMin[index] ?? 0n, deadline, confidenceBps },
            'BATCH',
            { skipCooldown: true }
          );
          results.push({ index, status: 'SETTLED', outcome });
        } catch (error) {
          this.log.warn({ index, error: describeError(error) }, 'Batch element failed');
          results.push({ index, status: 'FAILED', error: error instanceof Error ? error : new Error(String(error)) });
        }
      }

      const outcome: BatchOutcome = {
        results,
        settled: results.filter((r) => r.status === 'SETTLED').length,
        failed: results.filter((r) => r.status === 'FAILED').length,
        skipped: results.filter((r) => r.status === 'SKIPPED').length,
      };
      this.log.info({ settled: outcome.settled, failed: outcome.failed, skipped: outcome.skipped }, 'Batch completed');
      return outcome;
    });
  }

  /**
   * Same gates as `triggerTrade` at the same instant, with no side effects.
   */
  async canTrade(amount: bigint, confidenceBps: number): Promise<EligibilityResult> {
    const now = nowSeconds();

    try {
      this.emergency.assertTradingAllowed();
      assertValidAmounts(amount, 0n);
      this.limiter.assertAdmitted(amount, confidenceBps, now);
      const read = await this.priceGateway.readPrice(now);
      this.assertAboveThreshold(read);
      await this.checkAdditionalGates(now, false);
    } catch (error) {
      if (isTradingError(error)) {
        const reason = ELIGIBILITY_REASONS[error.code];
        if (reason) return { allowed: false, reason };
      }
      throw error;
    }

    return { allowed: true, reason: 'Trade allowed' };
  }

  getTradingStats(): TradingStats {
    const now = nowSeconds();
    const state = this.limiter.getState();

    return {
      totalTrades: state.totalTrades,
      successfulTrades: state.successfulTrades,
      successRateBps:
        state.totalTrades > 0 ? Math.floor((state.successfulTrades * BPS_DENOMINATOR) / state.totalTrades) : 0,
      dailyTradeVolume: this.limiter.currentDayVolume(now),
      remainingDailyLimit: this.limiter.remainingDailyLimit(now),
      lastTradeTimestamp: state.lastTradeTimestamp,
    };
  }

  getPhase(): AuthorizationPhase {
    return this.phase;
  }

  getConfig(): C {
    return { ...this.config };
  }

  getLastValidPrice(): bigint {
    return this.priceGateway.getLastValidPrice();
  }

  getEmergencyState(): EmergencyState {
    return this.emergency.getState();
  }

  getAssets(): { sourceAsset: string; targetAsset: string } {
    return { sourceAsset: this.sourceAsset, targetAsset: this.targetAsset };
  }

  hasRole(actor: string, role: Role): boolean {
    return this.access.hasRole(actor, role);
  }

  // ==========================================
  // EMERGENCY
  // ==========================================

  // The kill switches stay reachable while a trade is in flight.

  activateEmergencyStop(actor: string, reason: string): void {
    this.emergency.activate(actor, reason);
  }

  deactivateEmergencyStop(actor: string): void {
    this.emergency.deactivate(actor);
  }

  pause(actor: string): void {
    this.emergency.pause(actor);
  }

  unpause(actor: string): void {
    this.emergency.unpause(actor);
  }

  // ==========================================
  // ADMIN
  // ==========================================

  updateConfig(actor: string, input: unknown): C {
    this.guard.assertIdle('updateConfig');
    this.access.requireRole(actor, 'admin');

    const next = this.parseConfig(input);
    const previous = this.config;
    this.config = next;
    this.limiter.setConfig(next);
    this.onConfigChanged(next);

    this.log.info({ actor }, 'Trading config updated');
    this.events.emit('config-updated', { previous, next, actor, timestamp: nowSeconds() });
    return { ...next };
  }

  setPriceThreshold(actor: string, priceThreshold: bigint): void {
    this.updateConfig(actor, { ...this.config, priceThreshold });
  }

  setPriceFeed(actor: string, feed: DataFeed): void {
    this.guard.assertIdle('setPriceFeed');
    this.access.requireRole(actor, 'admin');
    this.priceGateway.setFeed(feed);
  }

  setTargetAsset(actor: string, asset: string): void {
    this.guard.assertIdle('setTargetAsset');
    this.access.requireRole(actor, 'admin');
    requireAsset(asset);

    this.log.info({ actor, from: this.targetAsset, to: asset }, 'Target asset updated');
    this.targetAsset = asset;
  }

  grantRole(caller: string, role: Role, actor: string): void {
    this.guard.assertIdle('grantRole');
    this.access.grantRole(caller, role, actor);
  }

  revokeRole(caller: string, role: Role, actor: string): void {
    this.guard.assertIdle('revokeRole');
    this.access.revokeRole(caller, role, actor);
  }

  // ==========================================
  // EXTENSION POINTS
  // ==========================================

  /**
   * Gates evaluated after the price threshold. `emit` is false for the
   * read-only eligibility check.
   */
  protected async checkAdditionalGates(_now: number, _emit: boolean): Promise<void> {}

  protected onConfigChanged(_config: C): void {}

  // ==========================================
  // AUTHORIZATION PATH
  // ==========================================

  /**
   * Gate → commit → execute for one trade. Runs inside the caller's guard.
   */
  protected async authorize(request: TradeRequest, source: TradeSource, options: AuthorizeOptions = {}): Promise<TradeOutcome> {
    const { amountIn, amountOutMin, deadline, confidenceBps } = request;
    const now = nowSeconds();
    let read: PriceRead;

    try {
      this.phase = 'ADMITTING';
      this.emergency.assertTradingAllowed();
      assertValidAmounts(amountIn, amountOutMin);
      this.limiter.rollDayIfDue(now);
      this.limiter.assertAdmitted(amountIn, confidenceBps, now, options);

      this.phase = 'PRICE_CHECKING';
      read = await this.priceGateway.readPrice(now);
      this.assertAboveThreshold(read);
      this.events.emit('price-checked', {
        price: read.price,
        threshold: this.config.priceThreshold,
        valid: true,
        timestamp: now,
      });

      this.phase = 'GATE_CHECKING';
      if (!options.gatesPrechecked) {
        await this.checkAdditionalGates(now, true);
      }
    } catch (error) {
      this.phase = 'IDLE';
      throw error;
    }

    this.limiter.commit(amountIn, now);
    this.priceGateway.recordValidPrice(read, now);

    this.phase = 'EXECUTING';
    let receipt: ExecutionReceipt;
    try {
      receipt = await this.custody.execute({
        amountIn,
        minAmountOut: amountOutMin,
        path: [this.sourceAsset, this.targetAsset],
        deadline,
        maxSlippageBps: this.config.maxSlippageBps,
      });
    } catch (error) {
      this.limiter.rollback(amountIn);
      this.consecutiveFailures += 1;
      this.phase = 'ROLLED_BACK';

      const reason = describeError(error);
      if (this.consecutiveFailures >= CONSECUTIVE_FAILURE_ALERT) {
        this.log.error({ consecutiveFailures: this.consecutiveFailures, reason }, 'Repeated custody failures');
      } else {
        this.log.warn({ amountIn: amountIn.toString(), source, reason }, 'Custody execution failed, rolled back');
      }
      this.events.emit('trade-failed', {
        amountIn,
        source,
        reason,
        consecutiveFailures: this.consecutiveFailures,
        timestamp: now,
      });
      throw error;
    }

    this.consecutiveFailures = 0;
    this.limiter.recordSuccess();
    const sequence = this.limiter.getState().totalTrades;

    this.phase = 'SETTLED';
    this.log.info(
      { sequence, amountIn: amountIn.toString(), amountOut: receipt.amountOut.toString(), source, txId: receipt.txId },
      'Trade settled'
    );
    this.events.emit('trade-triggered', {
      sequence,
      amountIn,
      amountOut: receipt.amountOut,
      price: read.price,
      confidenceBps,
      source,
      txId: receipt.txId,
      timestamp: now,
    });

    return {
      phase: 'SETTLED',
      sequence,
      amountIn,
      amountOut: receipt.amountOut,
      price: read.price,
      confidenceBps,
      source,
      txId: receipt.txId,
    };
  }

  private assertAboveThreshold(read: PriceRead): void {
    if (read.price < this.config.priceThreshold) {
      this.log.debug(
        { price: read.price.toString(), threshold: this.config.priceThreshold.toString() },
        'Price below threshold'
      );
      throw new TradingError(ErrorCode.PRICE_BELOW_THRESHOLD, 'Price below threshold', {
        price: read.price.toString(),
        threshold: this.config.priceThreshold.toString(),
      });
    }
  }
}

function requireAsset(asset: string): void {
  if (!asset || asset.trim() === '') {
    throw new TradingError(ErrorCode.INVALID_ADDRESS, 'Asset id must be non-empty');
  }
}

// ============================================
// BASE AGENT
// ============================================

export class TradingAgent extends TradeAuthorizer<TradingConfig> {
  constructor(options: AgentOptions<TradingConfig>) {
    super('TradingAgent', options, parseTradingConfig);
  }
}
