import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import EventEmitter from 'eventemitter3';
import { EcoGate } from './ecoGate';
import { StaticFeed } from './feeds';
import type { AgentEvents } from '../agent/events';
import { MAX_ECO_SCORE } from '../../config/constant';

const NOW_S = 1_800_000_000;

describe('oracle/ecoGate', () => {
  let events: EventEmitter<AgentEvents>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW_S * 1000);
    events = new EventEmitter<AgentEvents>();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('passes through with score 0 when no feed is configured', async () => {
    const gate = new EcoGate(null, events);
    expect(gate.configured).toBe(false);
    await expect(gate.score()).resolves.toBe(0n);
  });

  it('returns the raw reading of a live feed', async () => {
    const gate = new EcoGate(new StaticFeed('ECO', 420n, 0), events);
    await expect(gate.score()).resolves.toBe(420n);
  });

  it('fails closed on an unreadable feed', async () => {
    const feed = new StaticFeed('ECO', 10n, 0);
    feed.fail();
    const gate = new EcoGate(feed, events);
    await expect(gate.score()).resolves.toBe(MAX_ECO_SCORE);
  });

  it('fails closed on a stale feed', async () => {
    const feed = new StaticFeed('ECO', 10n, 0, NOW_S - 3601);
    const gate = new EcoGate(feed, events);
    await expect(gate.score()).resolves.toBe(MAX_ECO_SCORE);
  });

  it('check reports the comparison against the threshold', async () => {
    const checked = vi.fn();
    events.on('eco-score-checked', checked);
    const gate = new EcoGate(new StaticFeed('ECO', 1500n, 0), events);

    await expect(gate.check(1000n)).resolves.toEqual({ passed: false, score: 1500n });
    await expect(gate.check(1500n)).resolves.toEqual({ passed: true, score: 1500n });
    expect(checked).toHaveBeenNthCalledWith(1, { score: 1500n, threshold: 1000n, passed: false, timestamp: NOW_S });
  });

  it('setFeed(null) returns to pass-through', async () => {
    const gate = new EcoGate(new StaticFeed('ECO', 5000n, 0), events);
    gate.setFeed(null);
    await expect(gate.score()).resolves.toBe(0n);
  });
});
