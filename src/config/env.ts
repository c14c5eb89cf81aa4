/**
 * Environment Configuration
 * Validates and exports process settings and the initial trading config
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_ENHANCED_CONFIG, parseEnhancedTradingConfig } from '../lib/config/tradingConfig';
import type { EnhancedTradingConfig } from '../lib/types';
import type { LogLevel } from '../lib/utils/logger';

// =============================================================================
// SCHEMA
// =============================================================================

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  ADMIN_API_PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  ALLOWED_ORIGINS: z
    .string()
    .default('http://localhost:5173')
    .transform((v) => v.split(',').map((o) => o.trim()).filter(Boolean)),
  ADMIN_ACTOR_ID: z.string().min(1).default('admin'),

  PRICE_THRESHOLD: z.string().optional(),
  MAX_TRADE_SIZE: z.string().optional(),
  DAILY_TRADE_LIMIT: z.string().optional(),
  COOLDOWN_PERIOD: z.string().optional(),
  MAX_SLIPPAGE_BPS: z.string().optional(),
  CONFIDENCE_THRESHOLD_BPS: z.string().optional(),
  DEVIATION_THRESHOLD_BPS: z.string().optional(),
  ECO_THRESHOLD: z.string().optional(),
  PREDICTION_INTERVAL_SECONDS: z.string().optional(),

  PAPER_INITIAL_PRICE: z.string().regex(/^\d+$/).default('250000000000').transform((v) => BigInt(v)),
  UPKEEP_CHECK_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
});

export interface AppEnv {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  adminApiPort: number;
  allowedOrigins: string[];
  adminActorId: string;
  tradingConfig: EnhancedTradingConfig;
  paperInitialPrice: bigint;
  upkeepCheckIntervalMs: number;
}

// =============================================================================
// LOADING
// =============================================================================

/**
 * Reads `.env` into process.env (existing variables win), then validates.
 * Trading values that are not set fall back to the defaults.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  if (source === process.env) dotenv.config();

  const result = envSchema.safeParse(source);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new Error(`Configuration Error: ${details}`);
  }
  const env = result.data;

  const tradingConfig = parseEnhancedTradingConfig({
    priceThreshold: env.PRICE_THRESHOLD ?? DEFAULT_ENHANCED_CONFIG.priceThreshold,
    maxTradeSize: env.MAX_TRADE_SIZE ?? DEFAULT_ENHANCED_CONFIG.maxTradeSize,
    dailyTradeLimit: env.DAILY_TRADE_LIMIT ?? DEFAULT_ENHANCED_CONFIG.dailyTradeLimit,
    cooldownPeriod: env.COOLDOWN_PERIOD ?? DEFAULT_ENHANCED_CONFIG.cooldownPeriod,
    maxSlippageBps: env.MAX_SLIPPAGE_BPS ?? DEFAULT_ENHANCED_CONFIG.maxSlippageBps,
    confidenceThresholdBps: env.CONFIDENCE_THRESHOLD_BPS ?? DEFAULT_ENHANCED_CONFIG.confidenceThresholdBps,
    deviationThresholdBps: env.DEVIATION_THRESHOLD_BPS ?? DEFAULT_ENHANCED_CONFIG.deviationThresholdBps,
    ecoThreshold: env.ECO_THRESHOLD ?? DEFAULT_ENHANCED_CONFIG.ecoThreshold,
    predictionIntervalSeconds: env.PREDICTION_INTERVAL_SECONDS ?? DEFAULT_ENHANCED_CONFIG.predictionIntervalSeconds,
  });

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    adminApiPort: env.ADMIN_API_PORT,
    allowedOrigins: env.ALLOWED_ORIGINS,
    adminActorId: env.ADMIN_ACTOR_ID,
    tradingConfig,
    paperInitialPrice: env.PAPER_INITIAL_PRICE,
    upkeepCheckIntervalMs: env.UPKEEP_CHECK_INTERVAL_MS,
  };
}
