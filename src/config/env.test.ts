import { describe, it, expect } from 'vitest';
import { loadEnv } from './env';
import { DEFAULT_ENHANCED_CONFIG } from '../lib/config/tradingConfig';

describe('config/env', () => {
  it('falls back to defaults', () => {
    expect(loadEnv({})).toEqual({
      nodeEnv: 'development',
      logLevel: 'info',
      adminApiPort: 3001,
      allowedOrigins: ['http://localhost:5173'],
      adminActorId: 'admin',
      tradingConfig: DEFAULT_ENHANCED_CONFIG,
      paperInitialPrice: 250000000000n,
      upkeepCheckIntervalMs: 60_000,
    });
  });

  it('reads overrides', () => {
    const env = loadEnv({
      ADMIN_API_PORT: '8080',
      ALLOWED_ORIGINS: 'https://a.example, https://b.example',
      MAX_TRADE_SIZE: '5000000000000000000',
      COOLDOWN_PERIOD: '0',
      PAPER_INITIAL_PRICE: '1',
    });

    expect(env.adminApiPort).toBe(8080);
    expect(env.allowedOrigins).toEqual(['https://a.example', 'https://b.example']);
    expect(env.tradingConfig).toMatchObject({ maxTradeSize: 5n * 10n ** 18n, cooldownPeriod: 0 });
    expect(env.paperInitialPrice).toBe(1n);
  });

  it('rejects invalid values', () => {
    expect(() => loadEnv({ ADMIN_API_PORT: '70000' })).toThrow('Configuration Error: ADMIN_API_PORT');
    expect(() => loadEnv({ MAX_SLIPPAGE_BPS: '5000' })).toThrow('maxSlippageBps');
  });
});
