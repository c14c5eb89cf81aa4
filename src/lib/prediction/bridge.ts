/**
 * Prediction Bridge
 *
 * Boundary to the off-chain prediction service. A request is submitted with
 * the current price and timestamp; the answer comes back later, through the
 * registered fulfillment handler, as an encoded payload or an error string.
 */

import { randomUUID } from 'node:crypto';
import { describeError } from '../errors';
import { createLogger } from '../utils/logger';
import { encodePrediction } from './codec';

const log = createLogger('PredictionBridge');

/** Identifier of the prediction routine the service runs */
export const PREDICTION_SOURCE = 'price-prediction/v1';

export interface PredictionRequestMetadata {
  requester: string;
  sourceAsset: string;
  targetAsset: string;
}

export type FulfillmentHandler = (requestId: string, payload: Uint8Array, error: string) => Promise<unknown>;

export interface PredictionBridge {
  /** Resolves to the request id. Rejects when the request cannot be submitted. */
  submitRequest(source: string, args: string[], metadata: PredictionRequestMetadata): Promise<string>;

  onFulfilled(handler: FulfillmentHandler): void;
}

// =============================================================================
// LOCAL BRIDGE
// =============================================================================

export interface PredictionAnswer {
  predictedPrice: bigint;
  confidenceBps: number;
  isAnomaly: boolean;
}

/** Produces an answer for a request, or throws to report a service error. */
export type PredictionResolver = (args: string[], metadata: PredictionRequestMetadata) => Promise<PredictionAnswer | Uint8Array>;

interface PendingLocalRequest {
  requestId: string;
  args: string[];
  metadata: PredictionRequestMetadata;
}

/**
 * In-process bridge. Requests queue up until `flush` (or `resolve` for a
 * single id) runs the resolver and delivers the result to the handler.
 */
export class LocalPredictionBridge implements PredictionBridge {
  private handler: FulfillmentHandler | null = null;
  private pending: Map<string, PendingLocalRequest> = new Map();

  constructor(private resolver: PredictionResolver | null = null) {}

  setResolver(resolver: PredictionResolver): void {
    this.resolver = resolver;
  }

  onFulfilled(handler: FulfillmentHandler): void {
    this.handler = handler;
  }

  async submitRequest(source: string, args: string[], metadata: PredictionRequestMetadata): Promise<string> {
    const requestId = randomUUID();
    this.pending.set(requestId, { requestId, args, metadata });
    log.debug({ requestId, source, args }, 'Prediction request queued');
    return requestId;
  }

  get pendingIds(): string[] {
    return [...this.pending.keys()];
  }

  /** Delivers a raw response for `requestId`, bypassing the resolver. */
  async deliver(requestId: string, payload: Uint8Array, error: string = ''): Promise<unknown> {
    this.pending.delete(requestId);
    if (!this.handler) {
      log.warn({ requestId }, 'No fulfillment handler registered, response dropped');
      return undefined;
    }
    return this.handler(requestId, payload, error);
  }

  async resolve(requestId: string): Promise<unknown> {
    const request = this.pending.get(requestId);
    if (!request) return undefined;

    if (!this.resolver) {
      return this.deliver(requestId, new Uint8Array(0), 'No resolver configured');
    }

    try {
      const answer = await this.resolver(request.args, request.metadata);
      const payload = answer instanceof Uint8Array ? answer : encodePrediction(answer);
      return this.deliver(requestId, payload);
    } catch (error) {
      return this.deliver(requestId, new Uint8Array(0), describeError(error));
    }
  }

  async flush(): Promise<unknown[]> {
    const results: unknown[] = [];
    for (const requestId of this.pendingIds) {
      results.push(await this.resolve(requestId));
    }
    return results;
  }
}
