import { describe, it, expect, vi } from 'vitest';
import { LocalPredictionBridge, PREDICTION_SOURCE, type FulfillmentHandler } from './bridge';
import { decodePrediction } from './codec';

const METADATA = { requester: 'bot', sourceAsset: 'USDC', targetAsset: 'WETH' };

describe('prediction/bridge', () => {
  it('queues requests until they are resolved', async () => {
    const bridge = new LocalPredictionBridge();
    const first = await bridge.submitRequest(PREDICTION_SOURCE, ['100', '1'], METADATA);
    const second = await bridge.submitRequest(PREDICTION_SOURCE, ['100', '2'], METADATA);

    expect(first).not.toBe(second);
    expect(bridge.pendingIds).toEqual([first, second]);
  });

  it('encodes resolver answers for the handler', async () => {
    const resolver = vi.fn(async (args: string[]) => ({
      predictedPrice: BigInt(args[0] ?? '0') * 2n,
      confidenceBps: 9000,
      isAnomaly: false,
    }));
    const bridge = new LocalPredictionBridge(resolver);
    const handler = vi.fn<FulfillmentHandler>(async () => 'handled');
    bridge.onFulfilled(handler);
    const requestId = await bridge.submitRequest(PREDICTION_SOURCE, ['150', '7'], METADATA);

    await expect(bridge.flush()).resolves.toEqual(['handled']);

    expect(resolver).toHaveBeenCalledWith(['150', '7'], METADATA);
    const call = handler.mock.calls[0];
    expect(call?.[0]).toBe(requestId);
    expect(call?.[2]).toBe('');
    expect(decodePrediction(call?.[1] ?? new Uint8Array(0))).toEqual({
      predictedPrice: 300n,
      confidenceBps: 9000,
      isAnomaly: false,
    });
    expect(bridge.pendingIds).toEqual([]);
  });

  it('reports a throwing resolver as a service error', async () => {
    const bridge = new LocalPredictionBridge(async () => {
      throw new Error('model offline');
    });
    const handler = vi.fn<FulfillmentHandler>(async () => undefined);
    bridge.onFulfilled(handler);
    const requestId = await bridge.submitRequest(PREDICTION_SOURCE, [], METADATA);

    await bridge.resolve(requestId);

    expect(handler).toHaveBeenCalledWith(requestId, new Uint8Array(0), 'model offline');
  });

  it('errors every request when no resolver is set', async () => {
    const bridge = new LocalPredictionBridge();
    const handler = vi.fn<FulfillmentHandler>(async () => undefined);
    bridge.onFulfilled(handler);
    const requestId = await bridge.submitRequest(PREDICTION_SOURCE, [], METADATA);

    await bridge.flush();

    expect(handler).toHaveBeenCalledWith(requestId, new Uint8Array(0), 'No resolver configured');
  });

  it('passes raw deliveries through unchanged', async () => {
    const bridge = new LocalPredictionBridge();
    const handler = vi.fn<FulfillmentHandler>(async () => undefined);
    bridge.onFulfilled(handler);
    const raw = new Uint8Array([1, 2, 3]);

    await bridge.deliver('external-1', raw);

    expect(handler).toHaveBeenCalledWith('external-1', raw, '');
    await expect(bridge.resolve('unknown')).resolves.toBeUndefined();
  });
});
