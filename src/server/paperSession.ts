/**
 * Paper-mode wiring: an enhanced agent over simulated feeds, an in-process
 * prediction bridge and paper custody. Used by the server and the
 * simulation script.
 */

import { BPS_DENOMINATOR } from '../config/constant';
import { EnhancedTradingAgent } from '../lib/agent/enhancedAgent';
import { PaperCustody } from '../lib/execution/custody';
import { DecisionLogger } from '../lib/observability/decisionLog';
import { RandomWalkFeed } from '../lib/oracle/feeds';
import { LocalPredictionBridge, type PredictionResolver } from '../lib/prediction/bridge';
import type { EnhancedTradingConfig } from '../lib/types';

export const PAPER_SOURCE_ASSET = 'USDC';
export const PAPER_TARGET_ASSET = 'WETH';
export const PAPER_KEEPER = 'keeper';

export interface PaperSessionOptions {
  admin: string;
  config: EnhancedTradingConfig;
  initialPrice: bigint;
  random?: () => number;
}

export interface PaperSession {
  agent: EnhancedTradingAgent;
  bridge: LocalPredictionBridge;
  custody: PaperCustody;
  priceFeed: RandomWalkFeed;
  ecoFeed: RandomWalkFeed;
  decisionLogger: DecisionLogger;
  detach: () => void;
}

/** Predicts a move of up to ±3% around the requested price. */
export function createPaperResolver(random: () => number = Math.random): PredictionResolver {
  return async (args) => {
    const price = BigInt(args[0] ?? '0');
    const driftBps = BigInt(Math.round((random() * 2 - 1) * 300));
    return {
      predictedPrice: price + (price * driftBps) / BigInt(BPS_DENOMINATOR),
      confidenceBps: 6000 + Math.floor(random() * 4000),
      isAnomaly: random() < 0.05,
    };
  };
}

export function createPaperSession(options: PaperSessionOptions): PaperSession {
  const random = options.random ?? Math.random;

  const priceFeed = new RandomWalkFeed('ETH/USD', options.initialPrice, 8, 50, random);
  const ecoFeed = new RandomWalkFeed('ECO/SCORE', 100n, 0, 100, random);
  const bridge = new LocalPredictionBridge(createPaperResolver(random));
  const custody = new PaperCustody({
    balances: { [PAPER_SOURCE_ASSET]: 1_000_000n * 10n ** 18n },
  });

  const agent = new EnhancedTradingAgent({
    admin: options.admin,
    custody,
    priceFeed,
    sourceAsset: PAPER_SOURCE_ASSET,
    targetAsset: PAPER_TARGET_ASSET,
    config: options.config,
    bridge,
    ecoFeed,
  });
  agent.grantRole(options.admin, 'keeper', PAPER_KEEPER);

  const decisionLogger = new DecisionLogger();
  const detach = decisionLogger.attach(agent.events);

  return { agent, bridge, custody, priceFeed, ecoFeed, decisionLogger, detach };
}
