/**
 * Prediction reward tokens.
 *
 * One non-fungible token per high-confidence fulfilled prediction. Minted
 * into a pending pool held by the agent and transferred out on claim.
 */

import { ErrorCode, TradingError } from '../errors';

export const REWARD_COLLECTION_NAME = 'Agent Predictions';
export const REWARD_COLLECTION_SYMBOL = 'APRED';

export interface RewardToken {
  tokenId: number;
  requestId: string;
  predictedPrice: bigint;
  confidenceBps: number;
  mintedAt: number;
  owner: string | null;
}

export class RewardLedger {
  readonly name = REWARD_COLLECTION_NAME;
  readonly symbol = REWARD_COLLECTION_SYMBOL;

  private tokens: Map<number, RewardToken> = new Map();
  private nextTokenId = 1;

  get totalSupply(): number {
    return this.tokens.size;
  }

  mint(requestId: string, predictedPrice: bigint, confidenceBps: number, mintedAt: number): RewardToken {
    const token: RewardToken = {
      tokenId: this.nextTokenId++,
      requestId,
      predictedPrice,
      confidenceBps,
      mintedAt,
      owner: null,
    };
    this.tokens.set(token.tokenId, token);
    return { ...token };
  }

  /** Moves a pending token to `recipient`. */
  claim(tokenId: number, recipient: string): RewardToken {
    if (!recipient) {
      throw new TradingError(ErrorCode.INVALID_ADDRESS, 'Recipient must be a non-empty id');
    }

    const token = this.tokens.get(tokenId);
    if (!token || token.owner !== null) {
      throw new TradingError(ErrorCode.REWARD_NOT_PENDING, `Reward ${tokenId} is not pending`, { tokenId });
    }

    token.owner = recipient;
    return { ...token };
  }

  get(tokenId: number): RewardToken | undefined {
    const token = this.tokens.get(tokenId);
    return token ? { ...token } : undefined;
  }

  pending(): RewardToken[] {
    return [...this.tokens.values()].filter((t) => t.owner === null).map((t) => ({ ...t }));
  }

  ownedBy(owner: string): RewardToken[] {
    return [...this.tokens.values()].filter((t) => t.owner === owner).map((t) => ({ ...t }));
  }
}
