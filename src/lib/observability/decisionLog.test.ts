import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import EventEmitter from 'eventemitter3';
import { DecisionLogger } from './decisionLog';
import type { AgentEmitter, AgentEvents } from '../agent/events';

const T0 = 1_800_000_000;

describe('observability/decisionLog', () => {
  let events: AgentEmitter;
  let logger: DecisionLogger;
  let detach: () => void;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0 * 1000);
    events = new EventEmitter<AgentEvents>();
    logger = new DecisionLogger();
    detach = logger.attach(events);
  });

  afterEach(() => {
    detach();
    vi.useRealTimers();
  });

  function settle(sequence: number) {
    events.emit('trade-triggered', {
      sequence,
      amountIn: 10n,
      amountOut: 9n,
      price: 2500n,
      confidenceBps: 8000,
      source: 'MANUAL',
      txId: `tx-${sequence}`,
      timestamp: T0 + sequence,
    });
  }

  it('logs settled and failed trades newest first', () => {
    settle(1);
    events.emit('trade-failed', { amountIn: 5n, source: 'BATCH', reason: 'venue down', consecutiveFailures: 1, timestamp: T0 + 2 });
    settle(3);

    const trades = logger.getRecentTrades();
    expect(trades.map((t) => t.status)).toEqual(['SETTLED', 'FAILED', 'SETTLED']);
    expect(trades[2]).toMatchObject({
      source: 'MANUAL',
      amountIn: '10',
      amountOut: '9',
      price: '2500',
      sequence: 1,
      txId: 'tx-1',
    });
    expect(logger.getFailedTrades()).toEqual([
      expect.objectContaining({ status: 'FAILED', source: 'BATCH', amountIn: '5', reason: 'venue down' }),
    ]);

    const metrics = logger.getMetrics();
    expect(metrics).toMatchObject({ tradesSettled: 2, tradesFailed: 1, lastPrice: '2500', lastPriceAt: T0 + 3 });
    expect(metrics.successRate).toBeCloseTo(2 / 3);
  });

  it('tracks the prediction lifecycle per request', () => {
    events.emit('prediction-requested', { requestId: 'r1', currentPrice: 2500n, timestamp: T0 });
    events.emit('prediction-fulfilled', {
      requestId: 'r1',
      predictedPrice: 2600n,
      confidenceBps: 9000,
      isAnomaly: true,
      timestamp: T0 + 1,
    });
    events.emit('reward-minted', { tokenId: 1, requestId: 'r1', timestamp: T0 + 1 });
    events.emit('prediction-skipped', { requestId: 'r1', reason: 'Eco score too high', ecoScore: 5000n, timestamp: T0 + 1 });
    events.emit('reward-claimed', { tokenId: 1, requestId: 'r1', recipient: 'treasury', timestamp: T0 + 2 });
    events.emit('prediction-requested', { requestId: 'r2', currentPrice: 2500n, timestamp: T0 + 3 });

    expect(logger.getPredictionHistory('r1').map((p) => [p.type, p.detail])).toEqual([
      ['REQUESTED', 'price 2500'],
      ['FULFILLED', 'predicted 2600 at 9000 bps (anomaly)'],
      ['REWARD_MINTED', 'token 1'],
      ['SKIPPED', 'Eco score too high (eco 5000)'],
      ['REWARD_CLAIMED', 'token 1 to treasury'],
    ]);
    expect(logger.getMetrics()).toMatchObject({
      predictionsRequested: 2,
      predictionsFulfilled: 1,
      predictionsRejected: 0,
      pendingPredictions: 1,
      rewardsMinted: 1,
    });
  });

  it('counts rejected, errored and reset requests as closed', () => {
    for (const id of ['a', 'b', 'c']) {
      events.emit('prediction-requested', { requestId: id, currentPrice: 1n, timestamp: T0 });
    }
    events.emit('prediction-rejected', { requestId: 'a', status: 'REJECTED', reason: 'INVALID_PREDICTION', timestamp: T0 });
    events.emit('prediction-errored', { requestId: 'b', status: 'ERRORED', reason: 'timeout', timestamp: T0 });
    events.emit('prediction-reset', { requestId: 'c', status: 'RESET', reason: 'Reset after timeout', timestamp: T0 });

    expect(logger.getMetrics()).toMatchObject({ predictionsRequested: 3, predictionsRejected: 1, pendingPredictions: 0 });
    expect(logger.getRecentPredictionEvents(1)[0]).toMatchObject({ type: 'RESET', requestId: 'c' });
  });

  it('follows emergency and pause state', () => {
    events.emit('emergency-activated', { actor: 'admin', reason: 'drill', timestamp: T0 });
    events.emit('paused', { actor: 'guardian', timestamp: T0 + 1 });
    expect(logger.getMetrics()).toMatchObject({ emergencyActive: true, paused: true });

    events.emit('emergency-deactivated', { actor: 'admin', timestamp: T0 + 2 });
    events.emit('unpaused', { actor: 'admin', timestamp: T0 + 3 });
    expect(logger.getMetrics()).toMatchObject({ emergencyActive: false, paused: false });

    expect(logger.getRecentControlEvents().map((c) => c.type)).toEqual([
      'UNPAUSED',
      'EMERGENCY_DEACTIVATED',
      'PAUSED',
      'EMERGENCY_ACTIVATED',
    ]);
    expect(logger.getRecentControlEvents()[3]).toMatchObject({ actor: 'admin', detail: 'drill' });
  });

  it('records unconfirmed prices', () => {
    events.emit('price-unconfirmed', { price: 2700n, previousPrice: 2500n, deviationBps: 800, timestamp: T0 });

    expect(logger.getMetrics().unconfirmedPrices).toBe(1);
    expect(logger.getRecentControlEvents()[0]).toMatchObject({ type: 'PRICE_UNCONFIRMED', detail: '2500 -> 2700 (800 bps)' });
  });

  it('bounds every log to maxLogSize', () => {
    detach();
    logger = new DecisionLogger(2);
    detach = logger.attach(events);

    settle(1);
    settle(2);
    settle(3);

    expect(logger.getRecentTrades().map((t) => t.sequence)).toEqual([3, 2]);
  });

  it('stops listening after detach', () => {
    detach();
    settle(1);
    expect(logger.getRecentTrades()).toEqual([]);
  });

  it('pushes metrics to subscribers and survives a throwing one', () => {
    const seen: number[] = [];
    let calls = 0;
    logger.subscribe(() => {
      if (calls++ > 0) throw new Error('bad subscriber');
    });
    const unsubscribe = logger.subscribe((m) => seen.push(m.tradesSettled));

    settle(1);
    unsubscribe();
    settle(2);

    expect(seen).toEqual([0, 1]);
  });

  it('exports a JSON audit log', () => {
    settle(1);
    const audit: unknown = JSON.parse(logger.exportFullAuditLog());

    expect(audit).toMatchObject({
      exportedAt: '2027-01-15T08:00:00.000Z',
      trades: [expect.objectContaining({ amountIn: '10', status: 'SETTLED' })],
      predictions: [],
      control: [],
      metrics: expect.objectContaining({ tradesSettled: 1 }),
    });
  });
});
