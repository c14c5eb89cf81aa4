/**
 * Decision Log & Observability
 *
 * Listens to an agent's events and keeps bounded, JSON-safe audit logs of
 * every trade decision, prediction lifecycle step and control action, plus
 * rolling system metrics. Amounts and prices are stored as decimal strings.
 */

import type EventEmitter from 'eventemitter3';
import type { AgentEmitter, AgentEvents } from '../agent/events';
import { describeError } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('DecisionLogger');

// ============================================
// TYPES
// ============================================

export interface TradeLogEntry {
  id: string;
  timestamp: number;
  status: 'SETTLED' | 'FAILED';
  source: string;
  amountIn: string;
  amountOut?: string;
  price?: string;
  sequence?: number;
  txId?: string;
  reason?: string;
}

export type PredictionLogType =
  | 'REQUESTED'
  | 'FULFILLED'
  | 'REJECTED'
  | 'ERRORED'
  | 'SKIPPED'
  | 'RESET'
  | 'REWARD_MINTED'
  | 'REWARD_CLAIMED';

export interface PredictionLogEntry {
  id: string;
  timestamp: number;
  type: PredictionLogType;
  requestId: string;
  detail: string;
}

export type ControlLogType =
  | 'EMERGENCY_ACTIVATED'
  | 'EMERGENCY_DEACTIVATED'
  | 'PAUSED'
  | 'UNPAUSED'
  | 'CONFIG_UPDATED'
  | 'PRICE_UNCONFIRMED'
  | 'PRICE_FALLBACK';

export interface ControlLogEntry {
  id: string;
  timestamp: number;
  type: ControlLogType;
  actor?: string;
  detail: string;
}

export interface SystemMetrics {
  tradesSettled: number;
  tradesFailed: number;

  /** settled / (settled + failed), 0 before the first trade */
  successRate: number;

  lastPrice: string | null;
  lastPriceAt: number;
  unconfirmedPrices: number;

  predictionsRequested: number;
  predictionsFulfilled: number;
  predictionsRejected: number;
  pendingPredictions: number;
  rewardsMinted: number;

  emergencyActive: boolean;
  paused: boolean;

  uptimeSeconds: number;
}

// ============================================
// DECISION LOGGER
// ============================================

export class DecisionLogger {
  private tradeLog: TradeLogEntry[] = [];
  private predictionLog: PredictionLogEntry[] = [];
  private controlLog: ControlLogEntry[] = [];
  private subscribers: Set<(metrics: SystemMetrics) => void> = new Set();
  private logCounter = 0;
  private readonly startTime = Date.now();

  private lastPrice: bigint | null = null;
  private lastPriceAt = 0;
  private unconfirmedPrices = 0;
  private emergencyActive = false;
  private paused = false;

  constructor(private readonly maxLogSize: number = 10000) {}

  /** Subscribes to `events`; returns the matching unsubscribe. */
  attach(events: AgentEmitter): () => void {
    const detach = [
      listen(events, 'trade-triggered', (e) => {
        this.lastPrice = e.price;
        this.lastPriceAt = e.timestamp;
        this.addTrade({
          timestamp: e.timestamp,
          status: 'SETTLED',
          source: e.source,
          amountIn: e.amountIn.toString(),
          amountOut: e.amountOut.toString(),
          price: e.price.toString(),
          sequence: e.sequence,
          txId: e.txId,
        });
      }),
      listen(events, 'trade-failed', (e) =>
        this.addTrade({
          timestamp: e.timestamp,
          status: 'FAILED',
          source: e.source,
          amountIn: e.amountIn.toString(),
          reason: e.reason,
        })
      ),
      listen(events, 'price-checked', (e) => {
        this.lastPrice = e.price;
        this.lastPriceAt = e.timestamp;
      }),
      listen(events, 'price-unconfirmed', (e) => {
        this.unconfirmedPrices++;
        this.addControl('PRICE_UNCONFIRMED', e.timestamp, `${e.previousPrice} -> ${e.price} (${e.deviationBps} bps)`);
      }),
      listen(events, 'price-fallback', (e) => this.addControl('PRICE_FALLBACK', e.timestamp, e.reason)),
      listen(events, 'config-updated', (e) =>
        this.addControl('CONFIG_UPDATED', e.timestamp, 'Trading config replaced', e.actor)
      ),
      listen(events, 'emergency-activated', (e) => {
        this.emergencyActive = true;
        this.addControl('EMERGENCY_ACTIVATED', e.timestamp, e.reason, e.actor);
      }),
      listen(events, 'emergency-deactivated', (e) => {
        this.emergencyActive = false;
        this.addControl('EMERGENCY_DEACTIVATED', e.timestamp, 'Emergency stop cleared', e.actor);
      }),
      listen(events, 'paused', (e) => {
        this.paused = true;
        this.addControl('PAUSED', e.timestamp, 'Trading paused', e.actor);
      }),
      listen(events, 'unpaused', (e) => {
        this.paused = false;
        this.addControl('UNPAUSED', e.timestamp, 'Trading resumed', e.actor);
      }),
      listen(events, 'prediction-requested', (e) =>
        this.addPrediction('REQUESTED', e.timestamp, e.requestId, `price ${e.currentPrice}`)
      ),
      listen(events, 'prediction-fulfilled', (e) =>
        this.addPrediction(
          'FULFILLED',
          e.timestamp,
          e.requestId,
          `predicted ${e.predictedPrice} at ${e.confidenceBps} bps${e.isAnomaly ? ' (anomaly)' : ''}`
        )
      ),
      listen(events, 'prediction-rejected', (e) => this.addPrediction('REJECTED', e.timestamp, e.requestId, e.reason)),
      listen(events, 'prediction-errored', (e) => this.addPrediction('ERRORED', e.timestamp, e.requestId, e.reason)),
      listen(events, 'prediction-skipped', (e) =>
        this.addPrediction(
          'SKIPPED',
          e.timestamp,
          e.requestId,
          e.ecoScore === undefined ? e.reason : `${e.reason} (eco ${e.ecoScore})`
        )
      ),
      listen(events, 'prediction-reset', (e) => this.addPrediction('RESET', e.timestamp, e.requestId, e.reason)),
      listen(events, 'reward-minted', (e) =>
        this.addPrediction('REWARD_MINTED', e.timestamp, e.requestId, `token ${e.tokenId}`)
      ),
      listen(events, 'reward-claimed', (e) =>
        this.addPrediction('REWARD_CLAIMED', e.timestamp, e.requestId, `token ${e.tokenId} to ${e.recipient ?? 'unknown'}`)
      ),
    ];

    return () => {
      for (const off of detach) off();
    };
  }

  // ==========================================
  // METRICS CALCULATION
  // ==========================================

  getMetrics(): SystemMetrics {
    const settled = this.tradeLog.filter((t) => t.status === 'SETTLED').length;
    const failed = this.tradeLog.filter((t) => t.status === 'FAILED').length;
    const count = (type: PredictionLogType) => this.predictionLog.filter((p) => p.type === type).length;

    const requested = count('REQUESTED');
    const closed = count('FULFILLED') + count('REJECTED') + count('ERRORED') + count('RESET');

    return {
      tradesSettled: settled,
      tradesFailed: failed,
      successRate: settled + failed > 0 ? settled / (settled + failed) : 0,
      lastPrice: this.lastPrice === null ? null : this.lastPrice.toString(),
      lastPriceAt: this.lastPriceAt,
      unconfirmedPrices: this.unconfirmedPrices,
      predictionsRequested: requested,
      predictionsFulfilled: count('FULFILLED'),
      predictionsRejected: count('REJECTED'),
      pendingPredictions: Math.max(0, requested - closed),
      rewardsMinted: count('REWARD_MINTED'),
      emergencyActive: this.emergencyActive,
      paused: this.paused,
      uptimeSeconds: (Date.now() - this.startTime) / 1000,
    };
  }

  // ==========================================
  // QUERY METHODS
  // ==========================================

  getRecentTrades(count: number = 50): TradeLogEntry[] {
    return this.tradeLog.slice(-count).reverse();
  }

  getFailedTrades(count: number = 50): TradeLogEntry[] {
    return this.tradeLog
      .filter((t) => t.status === 'FAILED')
      .slice(-count)
      .reverse();
  }

  getRecentPredictionEvents(count: number = 100): PredictionLogEntry[] {
    return this.predictionLog.slice(-count).reverse();
  }

  getPredictionHistory(requestId: string): PredictionLogEntry[] {
    return this.predictionLog.filter((p) => p.requestId === requestId);
  }

  getRecentControlEvents(count: number = 100): ControlLogEntry[] {
    return this.controlLog.slice(-count).reverse();
  }

  // ==========================================
  // EXPORT
  // ==========================================

  exportFullAuditLog(): string {
    return JSON.stringify(
      {
        exportedAt: new Date().toISOString(),
        trades: this.tradeLog,
        predictions: this.predictionLog,
        control: this.controlLog,
        metrics: this.getMetrics(),
      },
      null,
      2
    );
  }

  // ==========================================
  // SUBSCRIPTION
  // ==========================================

  subscribe(callback: (metrics: SystemMetrics) => void): () => void {
    this.subscribers.add(callback);
    callback(this.getMetrics());
    return () => {
      this.subscribers.delete(callback);
    };
  }

  // ==========================================
  // PRIVATE METHODS
  // ==========================================

  private nextId(prefix: string): string {
    this.logCounter++;
    return `${prefix}-${Date.now().toString(36)}-${this.logCounter.toString(36).padStart(6, '0')}`;
  }

  private addTrade(entry: Omit<TradeLogEntry, 'id'>): void {
    this.addToLog(this.tradeLog, { id: this.nextId('TRD'), ...entry });
    this.notifySubscribers();
  }

  private addPrediction(type: PredictionLogType, timestamp: number, requestId: string, detail: string): void {
    this.addToLog(this.predictionLog, { id: this.nextId('PRD'), timestamp, type, requestId, detail });
    this.notifySubscribers();
  }

  private addControl(type: ControlLogType, timestamp: number, detail: string, actor?: string): void {
    this.addToLog(this.controlLog, { id: this.nextId('CTL'), timestamp, type, actor, detail });
    this.notifySubscribers();
  }

  private addToLog<T>(entries: T[], entry: T): void {
    entries.push(entry);
    if (entries.length > this.maxLogSize) {
      entries.shift();
    }
  }

  private notifySubscribers(): void {
    const metrics = this.getMetrics();
    for (const callback of this.subscribers) {
      try {
        callback(metrics);
      } catch (error) {
        log.error({ error: describeError(error) }, 'Subscriber error');
      }
    }
  }
}

function listen<K extends EventEmitter.EventNames<AgentEvents>>(
  events: AgentEmitter,
  name: K,
  fn: EventEmitter.EventListener<AgentEvents, K>
): () => void {
  events.on(name, fn);
  return () => {
    events.off(name, fn);
  };
}
