/**
 * Trading configuration schema and defaults.
 *
 * Accepts bigints directly, or decimal strings / safe integers from env
 * and JSON. The parsed value is what the agents store.
 */

import { z } from 'zod';
import {
  BPS_DENOMINATOR,
  MAX_DEVIATION_BPS_CAP,
  MAX_SLIPPAGE_BPS_CAP,
} from '../../config/constant';
import { ErrorCode, TradingError } from '../errors';
import type { EnhancedTradingConfig, TradingConfig } from '../types';

// ============================================
// FIELD SCHEMAS
// ============================================

export const uintSchema = z
  .union([
    z.bigint(),
    z.string().regex(/^\d+$/, 'must be a non-negative integer string').transform((v) => BigInt(v)),
    z.number().int().nonnegative().transform((v) => BigInt(v)),
  ])
  .pipe(z.bigint().nonnegative());

export const positiveUintSchema = uintSchema.refine((v) => v > 0n, 'must be greater than zero');

const secondsSchema = z.coerce.number().int().nonnegative();

const bpsSchema = (max: number) => z.coerce.number().int().min(0).max(max);

// ============================================
// CONFIG SCHEMAS
// ============================================

export const tradingConfigSchema = z.object({
  priceThreshold: positiveUintSchema,
  maxTradeSize: positiveUintSchema,
  dailyTradeLimit: uintSchema,
  cooldownPeriod: secondsSchema,
  maxSlippageBps: bpsSchema(MAX_SLIPPAGE_BPS_CAP),
  confidenceThresholdBps: bpsSchema(BPS_DENOMINATOR),
});

export const enhancedTradingConfigSchema = tradingConfigSchema.extend({
  deviationThresholdBps: bpsSchema(MAX_DEVIATION_BPS_CAP),
  ecoThreshold: uintSchema,
  predictionIntervalSeconds: secondsSchema,
});

// ============================================
// DEFAULTS
// ============================================

export const DEFAULT_TRADING_CONFIG: TradingConfig = {
  priceThreshold: 2000n * 10n ** 8n,
  maxTradeSize: 100n * 10n ** 18n,
  dailyTradeLimit: 1000n * 10n ** 18n,
  cooldownPeriod: 300,
  maxSlippageBps: 300,
  confidenceThresholdBps: 7000,
};

export const DEFAULT_ENHANCED_CONFIG: EnhancedTradingConfig = {
  ...DEFAULT_TRADING_CONFIG,
  deviationThresholdBps: 1000,
  ecoThreshold: 1000n,
  predictionIntervalSeconds: 3600,
};

// ============================================
// VALIDATION
// ============================================

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
}

export function parseTradingConfig(input: unknown): TradingConfig {
  const result = tradingConfigSchema.safeParse(input);
  if (!result.success) {
    throw new TradingError(ErrorCode.INVALID_CONFIG, `Invalid trading config: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseEnhancedTradingConfig(input: unknown): EnhancedTradingConfig {
  const result = enhancedTradingConfigSchema.safeParse(input);
  if (!result.success) {
    throw new TradingError(ErrorCode.INVALID_CONFIG, `Invalid trading config: ${formatIssues(result.error)}`);
  }
  return result.data;
}
