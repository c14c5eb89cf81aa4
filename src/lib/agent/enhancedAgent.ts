/**
 * Enhanced Trading Agent
 *
 * The base authorizer plus:
 * - an eco gate on every trade path
 * - the prediction lifecycle: request → (bridge) → fulfillment →
 *   compliance → optional reward → autonomous trade
 * - keeper-driven upkeep that issues requests on a fixed interval
 *
 * At most one prediction request is outstanding. A fulfillment never throws
 * back into the bridge: every outcome is returned and reported as an event.
 */

import {
  BPS_DENOMINATOR,
  HIGH_CONFIDENCE_BPS,
  MAX_CONFIDENCE_MULTIPLIER,
  PENDING_REQUEST_TIMEOUT_SECONDS,
  PREDICTION_TRADE_DEADLINE_SECONDS,
} from '../../config/constant';
import { ComplianceGate } from '../compliance/engine';
import { parseEnhancedTradingConfig } from '../config/tradingConfig';
import { ErrorCode, TradingError, describeError, isTradingError } from '../errors';
import { EcoGate } from '../oracle/ecoGate';
import type { DataFeed } from '../oracle/types';
import { decodePrediction } from '../prediction/codec';
import { PREDICTION_SOURCE, type PredictionBridge } from '../prediction/bridge';
import { RewardLedger, type RewardToken } from '../rewards/rewardTokens';
import type {
  AdvancedStats,
  DecodedPrediction,
  EnhancedTradingConfig,
  EvaluationOutcome,
  FulfillmentOutcome,
  PredictionRequest,
  UpkeepCheck,
  UpkeepPerformData,
} from '../types';
import { nowSeconds } from '../utils/time';
import { TradeAuthorizer, type AgentOptions } from './tradingAgent';

export interface EnhancedAgentOptions extends AgentOptions<EnhancedTradingConfig> {
  bridge: PredictionBridge;
  ecoFeed?: DataFeed | null;
  volatilityFeed?: DataFeed | null;
  regulatoryFeed?: DataFeed | null;
  /** Actor allowed to perform upkeep without holding the keeper role */
  keeperRegistry?: string | null;
}

export class EnhancedTradingAgent extends TradeAuthorizer<EnhancedTradingConfig> {
  private readonly bridge: PredictionBridge;
  private readonly ecoGate: EcoGate;
  private readonly compliance: ComplianceGate;
  private readonly rewards = new RewardLedger();

  private requests: Map<string, PredictionRequest> = new Map();
  private pendingRequestId: string | null = null;
  private pendingRequestsCount = 0;
  private totalPredictions = 0;
  private fulfilledPredictions = 0;
  private lastPredictionTime = 0;
  private keeperRegistry: string | null;

  constructor(options: EnhancedAgentOptions) {
    super(
      'EnhancedTradingAgent',
      { ...options, deviationThresholdBps: options.config.deviationThresholdBps },
      parseEnhancedTradingConfig
    );

    this.bridge = options.bridge;
    this.ecoGate = new EcoGate(options.ecoFeed ?? null, this.events);
    this.compliance = new ComplianceGate(this.events, options.volatilityFeed ?? null, options.regulatoryFeed ?? null);
    this.keeperRegistry = options.keeperRegistry ?? null;

    this.bridge.onFulfilled((requestId, payload, error) => this.fulfillPrediction(requestId, payload, error));
  }

  // ==========================================
  // PREDICTION REQUESTS
  // ==========================================

  async requestPrediction(actor: string): Promise<string> {
    return this.guard.run('requestPrediction', async () => {
      this.access.requireRole(actor, 'ai');
      return this.issueRequest(actor);
    });
  }

  async checkUpkeep(now: number = nowSeconds()): Promise<UpkeepCheck> {
    const upkeepNeeded =
      !this.emergency.stopped &&
      !this.emergency.paused &&
      now - this.lastPredictionTime >= this.config.predictionIntervalSeconds &&
      this.pendingRequestsCount === 0;

    let price: bigint | null = null;
    if (upkeepNeeded) {
      try {
        price = (await this.priceGateway.readPrice(now)).price;
      } catch (error) {
        this.log.debug({ error: describeError(error) }, 'Upkeep price preview unavailable');
      }
    }

    return { upkeepNeeded, performData: { price, timestamp: now } };
  }

  async performUpkeep(actor: string, performData: UpkeepPerformData): Promise<string> {
    return this.guard.run('performUpkeep', async () => {
      if (!this.access.hasRole(actor, 'keeper') && actor !== this.keeperRegistry) {
        throw new TradingError(ErrorCode.UNAUTHORIZED_KEEPER, 'Unauthorized keeper', { actor });
      }

      const check = await this.checkUpkeep();
      if (!check.upkeepNeeded) {
        throw new TradingError(ErrorCode.UPKEEP_NOT_NEEDED, 'Upkeep not needed');
      }

      this.log.debug({ actor, quotedAt: performData.timestamp }, 'Performing upkeep');
      return this.issueRequest(actor);
    });
  }

  setKeeperRegistry(actor: string, registry: string | null): void {
    this.guard.assertIdle('setKeeperRegistry');
    this.access.requireRole(actor, 'admin');
    if (registry !== null && registry.trim() === '') {
      throw new TradingError(ErrorCode.INVALID_ADDRESS, 'Keeper registry must be a non-empty id');
    }

    this.keeperRegistry = registry;
    this.log.info({ actor, registry }, 'Keeper registry updated');
  }

  // ==========================================
  // FULFILLMENT
  // ==========================================

  /**
   * Bridge callback. Settles the request and, when the prediction passes,
   * lets it drive a trade. Waits behind any operation in flight; only a
   * nested call is ignored. Never throws.
   */
  async fulfillPrediction(requestId: string, payload: Uint8Array, error: string): Promise<FulfillmentOutcome> {
    try {
      return await this.guard.run('fulfillPrediction', () => this.settle(requestId, payload, error));
    } catch (failure) {
      this.log.warn({ requestId, error: describeError(failure) }, 'Fulfillment not processed');
      return { status: 'IGNORED', requestId, reason: describeError(failure) };
    }
  }

  async forcePendingReset(actor: string): Promise<PredictionRequest> {
    return this.guard.run('forcePendingReset', async () => {
      this.access.requireRole(actor, 'admin');

      const record = this.pendingRequestId ? this.requests.get(this.pendingRequestId) : undefined;
      if (!record) {
        throw new TradingError(ErrorCode.NO_PENDING_REQUEST, 'No pending prediction request');
      }

      const now = nowSeconds();
      const age = now - record.timestamp;
      if (age < PENDING_REQUEST_TIMEOUT_SECONDS) {
        throw new TradingError(ErrorCode.PENDING_REQUEST_NOT_EXPIRED, 'Pending request has not timed out', {
          requestId: record.requestId,
          ageSeconds: age,
        });
      }

      record.status = 'RESET';
      record.failureReason = 'Reset after timeout';
      this.pendingRequestId = null;
      this.pendingRequestsCount = 0;

      this.log.warn({ actor, requestId: record.requestId, ageSeconds: age }, 'Pending prediction request reset');
      this.events.emit('prediction-reset', {
        requestId: record.requestId,
        status: 'RESET',
        reason: record.failureReason,
        timestamp: now,
      });
      return { ...record };
    });
  }

  // ==========================================
  // REWARDS
  // ==========================================

  claimReward(actor: string, tokenId: number, recipient: string): RewardToken {
    this.guard.assertIdle('claimReward');
    this.access.requireRole(actor, 'admin');

    const token = this.rewards.claim(tokenId, recipient);
    this.log.info({ tokenId, recipient }, 'Reward claimed');
    this.events.emit('reward-claimed', {
      tokenId,
      requestId: token.requestId,
      recipient,
      timestamp: nowSeconds(),
    });
    return token;
  }

  getRewardCollection(): { name: string; symbol: string; totalSupply: number } {
    return { name: this.rewards.name, symbol: this.rewards.symbol, totalSupply: this.rewards.totalSupply };
  }

  getPendingRewards(): RewardToken[] {
    return this.rewards.pending();
  }

  getReward(tokenId: number): RewardToken | undefined {
    return this.rewards.get(tokenId);
  }

  // ==========================================
  // FEEDS
  // ==========================================

  setEcoFeed(actor: string, feed: DataFeed | null): void {
    this.guard.assertIdle('setEcoFeed');
    this.access.requireRole(actor, 'admin');
    this.ecoGate.setFeed(feed);
  }

  setComplianceFeeds(actor: string, volatilityFeed: DataFeed | null, regulatoryFeed: DataFeed | null): void {
    this.guard.assertIdle('setComplianceFeeds');
    this.access.requireRole(actor, 'admin');
    this.compliance.setFeeds(volatilityFeed, regulatoryFeed);
  }

  // ==========================================
  // QUERIES
  // ==========================================

  getPrediction(requestId: string): PredictionRequest | undefined {
    const record = this.requests.get(requestId);
    return record ? { ...record } : undefined;
  }

  getPendingRequestId(): string | null {
    return this.pendingRequestId;
  }

  async getAdvancedStats(): Promise<AdvancedStats> {
    return {
      ...this.getTradingStats(),
      totalPredictions: this.totalPredictions,
      fulfilledPredictions: this.fulfilledPredictions,
      rewardsMinted: this.rewards.totalSupply,
      pendingRequestsCount: this.pendingRequestsCount,
      lastPredictionTime: this.lastPredictionTime,
      currentEcoScore: await this.ecoGate.score(),
    };
  }

  // ==========================================
  // EXTENSION POINTS
  // ==========================================

  protected override async checkAdditionalGates(now: number, emit: boolean): Promise<void> {
    const threshold = this.config.ecoThreshold;
    const score = emit ? (await this.ecoGate.check(threshold, now)).score : await this.ecoGate.score(now);

    if (score > threshold) {
      throw new TradingError(ErrorCode.ECO_SCORE_TOO_HIGH, 'Eco score too high', {
        score: score.toString(),
        threshold: threshold.toString(),
      });
    }
  }

  protected override onConfigChanged(config: EnhancedTradingConfig): void {
    this.priceGateway.setDeviationThreshold(config.deviationThresholdBps);
  }

  // ==========================================
  // LIFECYCLE INTERNALS
  // ==========================================

  private async issueRequest(requester: string): Promise<string> {
    this.emergency.assertTradingAllowed();

    if (this.pendingRequestsCount > 0) {
      throw new TradingError(ErrorCode.PENDING_REQUEST_EXISTS, 'A prediction request is already pending', {
        requestId: this.pendingRequestId,
      });
    }

    const snapshot = await this.priceGateway.getLatestPrice();
    const now = nowSeconds();

    let requestId: string;
    try {
      requestId = await this.bridge.submitRequest(
        PREDICTION_SOURCE,
        [snapshot.price.toString(), now.toString()],
        { requester, sourceAsset: this.sourceAsset, targetAsset: this.targetAsset }
      );
    } catch (error) {
      throw new TradingError(ErrorCode.PREDICTION_BRIDGE_FAILED, `Prediction request failed: ${describeError(error)}`);
    }

    this.requests.set(requestId, {
      requestId,
      timestamp: now,
      currentPriceAtRequest: snapshot.price,
      fulfilled: false,
      predictedPrice: 0n,
      confidenceBps: 0,
      isAnomaly: false,
      status: 'REQUESTED',
    });
    this.pendingRequestId = requestId;
    this.pendingRequestsCount += 1;
    this.totalPredictions += 1;
    this.lastPredictionTime = now;

    this.log.info({ requestId, requester, price: snapshot.price.toString() }, 'Prediction requested');
    this.events.emit('prediction-requested', { requestId, currentPrice: snapshot.price, timestamp: now });
    return requestId;
  }

  private async settle(requestId: string, payload: Uint8Array, error: string): Promise<FulfillmentOutcome> {
    const record = this.requests.get(requestId);
    if (!record || record.status !== 'REQUESTED') {
      this.log.warn({ requestId, status: record?.status ?? null }, 'Fulfillment for unknown or settled request');
      return { status: 'IGNORED', requestId, reason: record ? `Request already ${record.status}` : 'Unknown request' };
    }

    const now = nowSeconds();

    if (error !== '') {
      record.status = 'ERRORED';
      record.failureReason = error;
      this.releasePending(requestId);

      this.log.warn({ requestId, error }, 'Prediction service reported an error');
      this.events.emit('prediction-errored', { requestId, status: 'ERRORED', reason: error, timestamp: now });
      return { status: 'ERRORED', requestId, error };
    }

    let prediction: DecodedPrediction;
    try {
      prediction = decodePrediction(payload);
    } catch (decodeError) {
      const code = isTradingError(decodeError) ? decodeError.code : ErrorCode.INVALID_RESPONSE_LENGTH;
      return this.reject(record, code, now);
    }

    if (prediction.predictedPrice === 0n || prediction.confidenceBps > BPS_DENOMINATOR) {
      return this.reject(record, ErrorCode.INVALID_PREDICTION, now);
    }

    const compliant = await this.compliance.validatePrediction(requestId, prediction.predictedPrice);
    if (!compliant) {
      return this.reject(record, ErrorCode.COMPLIANCE_REJECTED, now);
    }

    record.fulfilled = true;
    record.status = 'FULFILLED';
    record.predictedPrice = prediction.predictedPrice;
    record.confidenceBps = prediction.confidenceBps;
    record.isAnomaly = prediction.isAnomaly;
    this.releasePending(requestId);
    this.fulfilledPredictions += 1;

    this.log.info(
      { requestId, predictedPrice: prediction.predictedPrice.toString(), confidenceBps: prediction.confidenceBps },
      'Prediction fulfilled'
    );
    this.events.emit('prediction-fulfilled', { requestId, ...prediction, timestamp: now });

    let rewardTokenId: number | null = null;
    if (prediction.confidenceBps >= HIGH_CONFIDENCE_BPS) {
      const token = this.rewards.mint(requestId, prediction.predictedPrice, prediction.confidenceBps, now);
      rewardTokenId = token.tokenId;
      this.events.emit('reward-minted', { tokenId: token.tokenId, requestId, timestamp: now });
    }

    const evaluation = await this.evaluateAndExecute(record);
    return { status: 'FULFILLED', requestId, prediction, rewardTokenId, evaluation };
  }

  /**
   * Lets a fulfilled prediction drive a trade. Failures are absorbed: this
   * runs inside the bridge callback.
   */
  private async evaluateAndExecute(record: PredictionRequest): Promise<EvaluationOutcome> {
    const { requestId, predictedPrice, confidenceBps } = record;
    const now = nowSeconds();

    if (record.isAnomaly) {
      return this.skip(requestId, 'Anomaly detected', false);
    }
    if (confidenceBps < this.config.confidenceThresholdBps) {
      return this.skip(requestId, 'Confidence below threshold', false);
    }

    const eco = await this.ecoGate.check(this.config.ecoThreshold, now);
    if (!eco.passed) {
      this.events.emit('prediction-skipped', { requestId, reason: 'Eco score too high', ecoScore: eco.score, timestamp: now });
      return this.skip(requestId, 'Eco score too high', false);
    }

    if (predictedPrice < this.config.priceThreshold) {
      return this.skip(requestId, 'Predicted price below threshold', false);
    }

    const { maxTradeSize } = this.config;
    const scaled =
      ((maxTradeSize / 4n) * BigInt(confidenceBps) * BigInt(MAX_CONFIDENCE_MULTIPLIER)) / BigInt(BPS_DENOMINATOR);
    const amountIn = scaled < maxTradeSize ? scaled : maxTradeSize;

    try {
      const trade = await this.authorize(
        {
          amountIn,
          amountOutMin: 0n,
          deadline: now + PREDICTION_TRADE_DEADLINE_SECONDS,
          confidenceBps,
        },
        'PREDICTION',
        { gatesPrechecked: true }
      );
      return { executed: true, trade };
    } catch (error) {
      return this.skip(requestId, describeError(error), true);
    }
  }

  private reject(record: PredictionRequest, code: ErrorCode, now: number): FulfillmentOutcome {
    record.status = 'REJECTED';
    record.failureReason = code;
    this.releasePending(record.requestId);

    this.log.warn({ requestId: record.requestId, reason: code }, 'Prediction rejected');
    this.events.emit('prediction-rejected', {
      requestId: record.requestId,
      status: 'REJECTED',
      reason: code,
      timestamp: now,
    });
    return { status: 'REJECTED', requestId: record.requestId, reason: code };
  }

  private skip(requestId: string, reason: string, report: boolean): EvaluationOutcome {
    if (report) {
      this.log.warn({ requestId, reason }, 'Prediction-driven trade failed');
      this.events.emit('prediction-skipped', { requestId, reason, timestamp: nowSeconds() });
    } else {
      this.log.debug({ requestId, reason }, 'Prediction-driven trade skipped');
    }
    return { executed: false, reason };
  }

  private releasePending(requestId: string): void {
    this.pendingRequestsCount = Math.max(0, this.pendingRequestsCount - 1);
    if (this.pendingRequestId === requestId) this.pendingRequestId = null;
  }
}
