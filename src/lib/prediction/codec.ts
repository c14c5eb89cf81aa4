/**
 * Prediction payload codec.
 *
 * Layout: three 32-byte big-endian words
 *   [0] predicted price (oracle decimals)
 *   [1] confidence (bps)
 *   [2] anomaly flag (0 or 1)
 */

import { ErrorCode, TradingError } from '../errors';
import type { DecodedPrediction } from '../types';

const WORD_BYTES = 32;
export const PREDICTION_PAYLOAD_BYTES = WORD_BYTES * 3;
const MAX_WORD = 2n ** 256n - 1n;

function readWord(payload: Uint8Array, index: number): bigint {
  let value = 0n;
  for (let i = index * WORD_BYTES; i < (index + 1) * WORD_BYTES; i++) {
    value = (value << 8n) | BigInt(payload[i] ?? 0);
  }
  return value;
}

function writeWord(target: Uint8Array, index: number, value: bigint): void {
  if (value < 0n || value > MAX_WORD) {
    throw new TradingError(ErrorCode.INVALID_PREDICTION, 'Word out of range', { value: value.toString() });
  }
  let rest = value;
  for (let i = (index + 1) * WORD_BYTES - 1; i >= index * WORD_BYTES; i--) {
    target[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
}

/**
 * @throws TradingError INVALID_RESPONSE_LENGTH when the payload is not exactly
 * three words, INVALID_PREDICTION when the anomaly word is not a boolean.
 */
export function decodePrediction(payload: Uint8Array): DecodedPrediction {
  if (payload.length !== PREDICTION_PAYLOAD_BYTES) {
    throw new TradingError(ErrorCode.INVALID_RESPONSE_LENGTH, 'Invalid response length', {
      expected: PREDICTION_PAYLOAD_BYTES,
      received: payload.length,
    });
  }

  const anomalyWord = readWord(payload, 2);
  if (anomalyWord > 1n) {
    throw new TradingError(ErrorCode.INVALID_PREDICTION, 'Anomaly flag is not a boolean');
  }

  return {
    predictedPrice: readWord(payload, 0),
    confidenceBps: Number(readWord(payload, 1)),
    isAnomaly: anomalyWord === 1n,
  };
}

export function encodePrediction(prediction: { predictedPrice: bigint; confidenceBps: number | bigint; isAnomaly: boolean }): Uint8Array {
  const payload = new Uint8Array(PREDICTION_PAYLOAD_BYTES);
  writeWord(payload, 0, prediction.predictedPrice);
  writeWord(payload, 1, BigInt(prediction.confidenceBps));
  writeWord(payload, 2, prediction.isAnomaly ? 1n : 0n);
  return payload;
}
