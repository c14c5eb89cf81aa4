/**
 * Observability events emitted by the agents.
 *
 * Event names and payload shapes are part of the public contract: the
 * decision log, the admin API and external monitors all consume them.
 */

import type EventEmitter from 'eventemitter3';
import type { EnhancedTradingConfig, PredictionStatus, TradeSource, TradingConfig } from '../types';

export interface TradeTriggeredEvent {
  sequence: number;
  amountIn: bigint;
  amountOut: bigint;
  price: bigint;
  confidenceBps: number;
  source: TradeSource;
  txId: string;
  timestamp: number;
}

export interface TradeFailedEvent {
  amountIn: bigint;
  source: TradeSource;
  reason: string;
  consecutiveFailures: number;
  timestamp: number;
}

export interface PriceCheckedEvent {
  price: bigint;
  threshold: bigint;
  valid: boolean;
  timestamp: number;
}

export interface PriceUnconfirmedEvent {
  price: bigint;
  previousPrice: bigint;
  deviationBps: number;
  timestamp: number;
}

export interface PriceFallbackEvent {
  fallbackPrice: bigint;
  reason: string;
  timestamp: number;
}

export interface ConfigUpdatedEvent<C extends TradingConfig = TradingConfig | EnhancedTradingConfig> {
  previous: C;
  next: C;
  actor: string;
  timestamp: number;
}

export interface EmergencyActivatedEvent {
  actor: string;
  reason: string;
  timestamp: number;
}

export interface ActorEvent {
  actor: string;
  timestamp: number;
}

export interface ComplianceValidatedEvent {
  requestId: string;
  predictedPrice: bigint;
  approved: boolean;
  reason: string;
  timestamp: number;
}

export interface EcoScoreCheckedEvent {
  score: bigint;
  threshold: bigint;
  passed: boolean;
  timestamp: number;
}

export interface PredictionRequestedEvent {
  requestId: string;
  currentPrice: bigint;
  timestamp: number;
}

export interface PredictionFulfilledEvent {
  requestId: string;
  predictedPrice: bigint;
  confidenceBps: number;
  isAnomaly: boolean;
  timestamp: number;
}

export interface PredictionSettledEvent {
  requestId: string;
  status: PredictionStatus;
  reason: string;
  timestamp: number;
}

export interface PredictionSkippedEvent {
  requestId: string;
  reason: string;
  ecoScore?: bigint;
  timestamp: number;
}

export interface RewardEvent {
  tokenId: number;
  requestId: string;
  recipient?: string;
  timestamp: number;
}

export interface AgentEvents {
  'trade-triggered': (event: TradeTriggeredEvent) => void;
  'trade-failed': (event: TradeFailedEvent) => void;
  'price-checked': (event: PriceCheckedEvent) => void;
  'price-unconfirmed': (event: PriceUnconfirmedEvent) => void;
  'price-fallback': (event: PriceFallbackEvent) => void;
  'config-updated': (event: ConfigUpdatedEvent) => void;
  'emergency-activated': (event: EmergencyActivatedEvent) => void;
  'emergency-deactivated': (event: ActorEvent) => void;
  paused: (event: ActorEvent) => void;
  unpaused: (event: ActorEvent) => void;
  'compliance-validated': (event: ComplianceValidatedEvent) => void;
  'eco-score-checked': (event: EcoScoreCheckedEvent) => void;
  'prediction-requested': (event: PredictionRequestedEvent) => void;
  'prediction-fulfilled': (event: PredictionFulfilledEvent) => void;
  'prediction-rejected': (event: PredictionSettledEvent) => void;
  'prediction-errored': (event: PredictionSettledEvent) => void;
  'prediction-skipped': (event: PredictionSkippedEvent) => void;
  'prediction-reset': (event: PredictionSettledEvent) => void;
  'reward-minted': (event: RewardEvent) => void;
  'reward-claimed': (event: RewardEvent) => void;
}

export type AgentEventName = keyof AgentEvents;

export type AgentEmitter = EventEmitter<AgentEvents>;
