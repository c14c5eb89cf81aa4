/**
 * Compliance Gate
 *
 * Vets predicted prices before they can drive a trade. Both signals are
 * optional; a configured signal that cannot be read rejects the prediction.
 */

import { MAX_COMPLIANT_VOLATILITY_BPS } from '../../config/constant';
import type { AgentEmitter } from '../agent/events';
import { describeError } from '../errors';
import type { DataFeed } from '../oracle/types';
import { createLogger } from '../utils/logger';
import { nowSeconds } from '../utils/time';

const log = createLogger('ComplianceGate');

export interface ComplianceDecision {
  approved: boolean;
  reason: string;
}

export class ComplianceGate {
  constructor(
    private readonly events: AgentEmitter,
    private volatilityFeed: DataFeed | null = null,
    private regulatoryFeed: DataFeed | null = null
  ) {}

  setFeeds(volatilityFeed: DataFeed | null, regulatoryFeed: DataFeed | null): void {
    this.volatilityFeed = volatilityFeed;
    this.regulatoryFeed = regulatoryFeed;
    log.info(
      { volatility: volatilityFeed?.description ?? null, regulatory: regulatoryFeed?.description ?? null },
      'Compliance feeds updated'
    );
  }

  async validatePrediction(requestId: string, predictedPrice: bigint): Promise<boolean> {
    const decision = await this.evaluate(predictedPrice);

    if (!decision.approved) {
      log.warn({ requestId, predictedPrice: predictedPrice.toString(), reason: decision.reason }, 'Prediction failed compliance');
    }

    this.events.emit('compliance-validated', {
      requestId,
      predictedPrice,
      approved: decision.approved,
      reason: decision.reason,
      timestamp: nowSeconds(),
    });
    return decision.approved;
  }

  private async evaluate(predictedPrice: bigint): Promise<ComplianceDecision> {
    if (predictedPrice === 0n) {
      return { approved: false, reason: 'Predicted price is zero' };
    }

    if (this.volatilityFeed) {
      try {
        const { value } = await this.volatilityFeed.latestReading();
        if (value > MAX_COMPLIANT_VOLATILITY_BPS) {
          return { approved: false, reason: `Volatility ${value} bps above limit` };
        }
      } catch (error) {
        return { approved: false, reason: `Volatility feed unreadable: ${describeError(error)}` };
      }
    }

    if (this.regulatoryFeed) {
      try {
        const { value } = await this.regulatoryFeed.latestReading();
        if (value !== 0n) {
          return { approved: false, reason: 'Trading halted by regulator' };
        }
      } catch (error) {
        return { approved: false, reason: `Regulatory feed unreadable: ${describeError(error)}` };
      }
    }

    return { approved: true, reason: 'Compliant' };
  }
}
