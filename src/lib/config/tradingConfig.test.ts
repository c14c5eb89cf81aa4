import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ENHANCED_CONFIG,
  DEFAULT_TRADING_CONFIG,
  parseEnhancedTradingConfig,
  parseTradingConfig,
} from './tradingConfig';
import { ErrorCode, TradingError } from '../errors';

function parseError(input: unknown): TradingError {
  try {
    parseEnhancedTradingConfig(input);
  } catch (error) {
    if (error instanceof TradingError) return error;
    throw error;
  }
  throw new Error('expected parse to fail');
}

describe('config/tradingConfig', () => {
  it('accepts the defaults', () => {
    expect(parseTradingConfig(DEFAULT_TRADING_CONFIG)).toEqual(DEFAULT_TRADING_CONFIG);
    expect(parseEnhancedTradingConfig(DEFAULT_ENHANCED_CONFIG)).toEqual(DEFAULT_ENHANCED_CONFIG);
  });

  it('accepts decimal strings and safe integers for amounts', () => {
    const config = parseTradingConfig({
      priceThreshold: '200000000000',
      maxTradeSize: '100000000000000000000',
      dailyTradeLimit: 5000,
      cooldownPeriod: '60',
      maxSlippageBps: 100,
      confidenceThresholdBps: '7000',
    });

    expect(config).toEqual({
      priceThreshold: 200000000000n,
      maxTradeSize: 100n * 10n ** 18n,
      dailyTradeLimit: 5000n,
      cooldownPeriod: 60,
      maxSlippageBps: 100,
      confidenceThresholdBps: 7000,
    });
  });

  it('rejects a zero price threshold and max trade size', () => {
    const error = parseError({ ...DEFAULT_ENHANCED_CONFIG, priceThreshold: 0n, maxTradeSize: 0n });
    expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
    expect(error.message).toContain('priceThreshold: must be greater than zero');
    expect(error.message).toContain('maxTradeSize: must be greater than zero');
  });

  it('enforces the bps caps', () => {
    expect(parseError({ ...DEFAULT_ENHANCED_CONFIG, maxSlippageBps: 1001 }).message).toContain('maxSlippageBps');
    expect(parseError({ ...DEFAULT_ENHANCED_CONFIG, deviationThresholdBps: 5001 }).message).toContain('deviationThresholdBps');
    expect(parseError({ ...DEFAULT_ENHANCED_CONFIG, confidenceThresholdBps: 10001 }).message).toContain(
      'confidenceThresholdBps'
    );
    expect(parseEnhancedTradingConfig({ ...DEFAULT_ENHANCED_CONFIG, maxSlippageBps: 1000, deviationThresholdBps: 5000 }))
      .toMatchObject({ maxSlippageBps: 1000, deviationThresholdBps: 5000 });
  });

  it('rejects negative and non-numeric amounts', () => {
    expect(parseError({ ...DEFAULT_ENHANCED_CONFIG, dailyTradeLimit: '-1' }).code).toBe(ErrorCode.INVALID_CONFIG);
    expect(parseError({ ...DEFAULT_ENHANCED_CONFIG, ecoThreshold: 'lots' }).code).toBe(ErrorCode.INVALID_CONFIG);
  });
});
