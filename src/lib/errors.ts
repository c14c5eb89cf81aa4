/**
 * Error taxonomy for the trading agent.
 *
 * Gate rejections and validation failures leave state untouched. Custody
 * failures are never wrapped: the custody error object is re-thrown as is.
 */

export enum ErrorCode {
  // Validation
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_ADDRESS = 'INVALID_ADDRESS',
  INVALID_AMOUNT = 'INVALID_AMOUNT',
  ARRAY_LENGTH_MISMATCH = 'ARRAY_LENGTH_MISMATCH',
  EMPTY_BATCH = 'EMPTY_BATCH',
  TOO_MANY_TRADES = 'TOO_MANY_TRADES',

  // Gates
  EMERGENCY_STOP_ACTIVE = 'EMERGENCY_STOP_ACTIVE',
  CONTRACT_PAUSED = 'CONTRACT_PAUSED',
  TRADE_AMOUNT_TOO_LARGE = 'TRADE_AMOUNT_TOO_LARGE',
  COOLDOWN_NOT_MET = 'COOLDOWN_NOT_MET',
  CONFIDENCE_TOO_LOW = 'CONFIDENCE_TOO_LOW',
  DAILY_LIMIT_EXCEEDED = 'DAILY_LIMIT_EXCEEDED',
  PRICE_BELOW_THRESHOLD = 'PRICE_BELOW_THRESHOLD',
  ECO_SCORE_TOO_HIGH = 'ECO_SCORE_TOO_HIGH',

  // Dependencies
  INVALID_PRICE = 'INVALID_PRICE',
  PRICE_DATA_STALE = 'PRICE_DATA_STALE',
  PRICE_FEED_UNAVAILABLE = 'PRICE_FEED_UNAVAILABLE',
  PREDICTION_BRIDGE_FAILED = 'PREDICTION_BRIDGE_FAILED',

  // Prediction lifecycle
  PENDING_REQUEST_EXISTS = 'PENDING_REQUEST_EXISTS',
  NO_PENDING_REQUEST = 'NO_PENDING_REQUEST',
  PENDING_REQUEST_NOT_EXPIRED = 'PENDING_REQUEST_NOT_EXPIRED',
  UPKEEP_NOT_NEEDED = 'UPKEEP_NOT_NEEDED',
  INVALID_RESPONSE_LENGTH = 'INVALID_RESPONSE_LENGTH',
  INVALID_PREDICTION = 'INVALID_PREDICTION',
  COMPLIANCE_REJECTED = 'COMPLIANCE_REJECTED',
  REWARD_NOT_PENDING = 'REWARD_NOT_PENDING',

  // Access
  UNAUTHORIZED = 'UNAUTHORIZED',
  UNAUTHORIZED_KEEPER = 'UNAUTHORIZED_KEEPER',

  // Concurrency
  REENTRANT_CALL = 'REENTRANT_CALL',
}

export type ErrorCategory = 'VALIDATION' | 'GATE' | 'DEPENDENCY' | 'LIFECYCLE' | 'ACCESS' | 'CONCURRENCY';

const CATEGORY_BY_CODE: Record<ErrorCode, ErrorCategory> = {
  [ErrorCode.INVALID_CONFIG]: 'VALIDATION',
  [ErrorCode.INVALID_ADDRESS]: 'VALIDATION',
  [ErrorCode.INVALID_AMOUNT]: 'VALIDATION',
  [ErrorCode.ARRAY_LENGTH_MISMATCH]: 'VALIDATION',
  [ErrorCode.EMPTY_BATCH]: 'VALIDATION',
  [ErrorCode.TOO_MANY_TRADES]: 'VALIDATION',
  [ErrorCode.EMERGENCY_STOP_ACTIVE]: 'GATE',
  [ErrorCode.CONTRACT_PAUSED]: 'GATE',
  [ErrorCode.TRADE_AMOUNT_TOO_LARGE]: 'GATE',
  [ErrorCode.COOLDOWN_NOT_MET]: 'GATE',
  [ErrorCode.CONFIDENCE_TOO_LOW]: 'GATE',
  [ErrorCode.DAILY_LIMIT_EXCEEDED]: 'GATE',
  [ErrorCode.PRICE_BELOW_THRESHOLD]: 'GATE',
  [ErrorCode.ECO_SCORE_TOO_HIGH]: 'GATE',
  [ErrorCode.INVALID_PRICE]: 'DEPENDENCY',
  [ErrorCode.PRICE_DATA_STALE]: 'DEPENDENCY',
  [ErrorCode.PRICE_FEED_UNAVAILABLE]: 'DEPENDENCY',
  [ErrorCode.PREDICTION_BRIDGE_FAILED]: 'DEPENDENCY',
  [ErrorCode.PENDING_REQUEST_EXISTS]: 'LIFECYCLE',
  [ErrorCode.NO_PENDING_REQUEST]: 'LIFECYCLE',
  [ErrorCode.PENDING_REQUEST_NOT_EXPIRED]: 'LIFECYCLE',
  [ErrorCode.UPKEEP_NOT_NEEDED]: 'LIFECYCLE',
  [ErrorCode.INVALID_RESPONSE_LENGTH]: 'LIFECYCLE',
  [ErrorCode.INVALID_PREDICTION]: 'LIFECYCLE',
  [ErrorCode.COMPLIANCE_REJECTED]: 'LIFECYCLE',
  [ErrorCode.REWARD_NOT_PENDING]: 'LIFECYCLE',
  [ErrorCode.UNAUTHORIZED]: 'ACCESS',
  [ErrorCode.UNAUTHORIZED_KEEPER]: 'ACCESS',
  [ErrorCode.REENTRANT_CALL]: 'CONCURRENCY',
};

export class TradingError extends Error {
  public readonly category: ErrorCategory;

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TradingError';
    this.category = CATEGORY_BY_CODE[code];

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TradingError);
    }
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      context: this.context,
    };
  }
}

export function isTradingError(error: unknown, code?: ErrorCode): error is TradingError {
  return error instanceof TradingError && (code === undefined || error.code === code);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
