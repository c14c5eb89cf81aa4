/**
 * Core Type Definitions
 *
 * Prices and amounts are fixed-point integers (bigint). Prices use the
 * oracle's decimals, amounts use the asset's base units. Timestamps are
 * unix seconds.
 */

// ============================================
// CONFIGURATION
// ============================================

export interface TradingConfig {
  /** Minimum oracle price at which trades are allowed */
  priceThreshold: bigint;

  /** Per-trade size cap */
  maxTradeSize: bigint;

  /** Volume cap per rolling 24h window */
  dailyTradeLimit: bigint;

  /** Minimum seconds between two trades */
  cooldownPeriod: number;

  /** Max slippage handed to custody (<= 1000) */
  maxSlippageBps: number;

  /** Minimum signal confidence (0-10000) */
  confidenceThresholdBps: number;
}

export interface EnhancedTradingConfig extends TradingConfig {
  /** Single-step price move that marks a read unconfirmed (<= 5000) */
  deviationThresholdBps: number;

  /** Eco score above which trading is blocked */
  ecoThreshold: bigint;

  /** Minimum seconds between automated prediction requests */
  predictionIntervalSeconds: number;
}

// ============================================
// RATE STATE
// ============================================

export interface RateState {
  lastTradeTimestamp: number;
  dailyTradeVolume: bigint;
  lastDayReset: number;
  totalTrades: number;
  successfulTrades: number;
}

// ============================================
// PRICE DATA
// ============================================

export interface PriceSnapshot {
  price: bigint;
  updatedAt: number;
}

export interface PriceRead extends PriceSnapshot {
  /** Relative move against the last committed price, 0 when there is none */
  deviationBps: number;

  /** False when the move exceeds the deviation threshold */
  confirmed: boolean;
}

// ============================================
// EMERGENCY STATE
// ============================================

export interface EmergencyState {
  emergencyStop: boolean;
  emergencyStopTimestamp: number;
  emergencyReason: string | null;
  paused: boolean;
}

// ============================================
// TRADES
// ============================================

export interface TradeRequest {
  amountIn: bigint;
  amountOutMin: bigint;

  /** Unix seconds after which custody must refuse to execute */
  deadline: number;

  confidenceBps: number;
}

export type TradeSource = 'MANUAL' | 'BATCH' | 'PREDICTION';

export type AuthorizationPhase =
  | 'IDLE'
  | 'ADMITTING'
  | 'PRICE_CHECKING'
  | 'GATE_CHECKING'
  | 'EXECUTING'
  | 'SETTLED'
  | 'ROLLED_BACK';

export interface TradeOutcome {
  phase: 'SETTLED';
  sequence: number;
  amountIn: bigint;
  amountOut: bigint;
  price: bigint;
  confidenceBps: number;
  source: TradeSource;
  txId: string;
}

export type BatchElementResult =
  | { index: number; status: 'SETTLED'; outcome: TradeOutcome }
  | { index: number; status: 'FAILED'; error: Error }
  | { index: number; status: 'SKIPPED' };

export interface BatchOutcome {
  results: BatchElementResult[];
  settled: number;
  failed: number;
  skipped: number;
}

export interface EligibilityResult {
  allowed: boolean;
  reason: string;
}

export interface TradingStats {
  totalTrades: number;
  successfulTrades: number;

  /** successful / total in basis points, 0 before the first trade */
  successRateBps: number;

  dailyTradeVolume: bigint;
  remainingDailyLimit: bigint;
  lastTradeTimestamp: number;
}

// ============================================
// PREDICTIONS
// ============================================

export type PredictionStatus = 'REQUESTED' | 'FULFILLED' | 'REJECTED' | 'ERRORED' | 'RESET';

export interface PredictionRequest {
  requestId: string;
  timestamp: number;
  currentPriceAtRequest: bigint;
  fulfilled: boolean;
  predictedPrice: bigint;
  confidenceBps: number;
  isAnomaly: boolean;
  status: PredictionStatus;
  failureReason?: string;
}

export interface DecodedPrediction {
  predictedPrice: bigint;
  confidenceBps: number;
  isAnomaly: boolean;
}

export type EvaluationOutcome =
  | { executed: true; trade: TradeOutcome }
  | { executed: false; reason: string };

export type FulfillmentOutcome =
  | { status: 'IGNORED'; requestId: string; reason: string }
  | { status: 'ERRORED'; requestId: string; error: string }
  | { status: 'REJECTED'; requestId: string; reason: string }
  | {
      status: 'FULFILLED';
      requestId: string;
      prediction: DecodedPrediction;
      rewardTokenId: number | null;
      evaluation: EvaluationOutcome;
    };

export interface UpkeepCheck {
  upkeepNeeded: boolean;
  performData: UpkeepPerformData;
}

export interface UpkeepPerformData {
  price: bigint | null;
  timestamp: number;
}

export interface AdvancedStats extends TradingStats {
  totalPredictions: number;
  fulfilledPredictions: number;
  rewardsMinted: number;
  pendingRequestsCount: number;
  lastPredictionTime: number;
  currentEcoScore: bigint;
}
