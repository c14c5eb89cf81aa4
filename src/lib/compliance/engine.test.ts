import { describe, it, expect, vi, beforeEach } from 'vitest';
import EventEmitter from 'eventemitter3';
import { ComplianceGate } from './engine';
import { StaticFeed } from '../oracle/feeds';
import type { AgentEvents } from '../agent/events';

const E8 = 10n ** 8n;

describe('compliance/engine', () => {
  let events: EventEmitter<AgentEvents>;

  beforeEach(() => {
    events = new EventEmitter<AgentEvents>();
  });

  it('approves any non-zero price when no feeds are configured', async () => {
    const gate = new ComplianceGate(events);
    await expect(gate.validatePrediction('req-1', 2600n * E8)).resolves.toBe(true);
  });

  it('rejects a zero predicted price', async () => {
    const gate = new ComplianceGate(events);
    await expect(gate.validatePrediction('req-1', 0n)).resolves.toBe(false);
  });

  it('rejects volatility above 2000 bps and accepts it at the limit', async () => {
    const volatility = new StaticFeed('VOL', 2001n, 0);
    const gate = new ComplianceGate(events, volatility);
    await expect(gate.validatePrediction('req-1', 2600n * E8)).resolves.toBe(false);

    volatility.update(2000n);
    await expect(gate.validatePrediction('req-2', 2600n * E8)).resolves.toBe(true);
  });

  it('rejects when trading is halted by the regulatory feed', async () => {
    const regulatory = new StaticFeed('REG', 1n, 0);
    const gate = new ComplianceGate(events, null, regulatory);
    await expect(gate.validatePrediction('req-1', 2600n * E8)).resolves.toBe(false);

    regulatory.update(0n);
    await expect(gate.validatePrediction('req-2', 2600n * E8)).resolves.toBe(true);
  });

  it('fails closed when a configured feed cannot be read', async () => {
    const volatility = new StaticFeed('VOL', 100n, 0);
    volatility.fail();
    const regulatory = new StaticFeed('REG', 0n, 0);
    regulatory.fail();

    await expect(new ComplianceGate(events, volatility).validatePrediction('a', 1n)).resolves.toBe(false);
    await expect(new ComplianceGate(events, null, regulatory).validatePrediction('b', 1n)).resolves.toBe(false);
  });

  it('emits compliance-validated with the decision', async () => {
    const validated = vi.fn();
    events.on('compliance-validated', validated);
    const gate = new ComplianceGate(events);
    gate.setFeeds(null, new StaticFeed('REG', 1n, 0));

    await gate.validatePrediction('req-9', 2600n * E8);
    expect(validated).toHaveBeenCalledWith(
      expect.objectContaining({
        requestId: 'req-9',
        predictedPrice: 2600n * E8,
        approved: false,
        reason: 'Trading halted by regulator',
      })
    );
  });
});
