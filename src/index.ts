export * from './lib/types';
export * from './lib/errors';
export * from './lib/agent/events';
export { TradeAuthorizer, TradingAgent, type AgentOptions } from './lib/agent/tradingAgent';
export { EnhancedTradingAgent, type EnhancedAgentOptions } from './lib/agent/enhancedAgent';
export { AccessControl, ALL_ROLES, type Role } from './lib/access/accessControl';
export {
  DEFAULT_ENHANCED_CONFIG,
  DEFAULT_TRADING_CONFIG,
  parseEnhancedTradingConfig,
  parseTradingConfig,
} from './lib/config/tradingConfig';
export { ComplianceGate } from './lib/compliance/engine';
export { EcoGate } from './lib/oracle/ecoGate';
export { PriceOracleGateway } from './lib/oracle/priceGateway';
export { HttpJsonFeed, RandomWalkFeed, StaticFeed } from './lib/oracle/feeds';
export type { DataFeed, FeedReading, FeedStatus } from './lib/oracle/types';
export { RiskLimiter } from './lib/risk/limiter';
export { EmergencyControl } from './lib/failsafe/emergencyControl';
export { CustodyError, PaperCustody, type CustodyExecutor, type ExecutionReceipt, type ExecutionRequest } from './lib/execution/custody';
export { LocalPredictionBridge, PREDICTION_SOURCE, type PredictionBridge } from './lib/prediction/bridge';
export { decodePrediction, encodePrediction } from './lib/prediction/codec';
export { RewardLedger, REWARD_COLLECTION_NAME, REWARD_COLLECTION_SYMBOL } from './lib/rewards/rewardTokens';
export { DecisionLogger, type SystemMetrics } from './lib/observability/decisionLog';
export { UpkeepLoop } from './lib/scheduler/upkeepLoop';
export { createAdminApi } from './server/adminApi';
