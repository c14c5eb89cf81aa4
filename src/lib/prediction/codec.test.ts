import { describe, it, expect } from 'vitest';
import { PREDICTION_PAYLOAD_BYTES, decodePrediction, encodePrediction } from './codec';
import { ErrorCode } from '../errors';

describe('prediction/codec', () => {
  it('lays out three big-endian 32-byte words', () => {
    const payload = encodePrediction({ predictedPrice: 0x0102n, confidenceBps: 8500, isAnomaly: true });

    expect(payload.length).toBe(PREDICTION_PAYLOAD_BYTES);
    expect(payload[30]).toBe(0x01);
    expect(payload[31]).toBe(0x02);
    // 8500 = 0x2134
    expect(payload[62]).toBe(0x21);
    expect(payload[63]).toBe(0x34);
    expect(payload[95]).toBe(1);
  });

  it('decodes what it encodes', () => {
    const prediction = { predictedPrice: 2600n * 10n ** 8n, confidenceBps: 8500, isAnomaly: false };
    expect(decodePrediction(encodePrediction(prediction))).toEqual(prediction);
  });

  it('rejects payloads that are not exactly 96 bytes', () => {
    expect(() => decodePrediction(new Uint8Array(64))).toThrow('Invalid response length');
    expect(() => decodePrediction(new Uint8Array(97))).toThrow('Invalid response length');
  });

  it('rejects a non-boolean anomaly word', () => {
    const payload = encodePrediction({ predictedPrice: 1n, confidenceBps: 1, isAnomaly: false });
    payload[95] = 2;
    try {
      decodePrediction(payload);
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ code: ErrorCode.INVALID_PREDICTION });
    }
  });

  it('decodes confidence values above 10000 for the caller to reject', () => {
    const payload = encodePrediction({ predictedPrice: 1n, confidenceBps: 20_000, isAnomaly: false });
    expect(decodePrediction(payload).confidenceBps).toBe(20_000);
  });
});
