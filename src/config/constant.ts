// Oracle
export const MAX_PRICE_AGE_SECONDS = 60 * 60;
export const MIN_PRICE_DEVIATION_BPS = 500;
export const MAX_ECO_SCORE = 2n ** 256n - 1n;

// Risk
export const BPS_DENOMINATOR = 10_000;
export const DAY_SECONDS = 24 * 60 * 60;
export const MAX_BATCH_SIZE = 10;
export const MAX_SLIPPAGE_BPS_CAP = 1_000;
export const MAX_DEVIATION_BPS_CAP = 5_000;

// Compliance
export const MAX_COMPLIANT_VOLATILITY_BPS = 2_000n;

// Predictions
export const HIGH_CONFIDENCE_BPS = 8_000;
export const MAX_CONFIDENCE_MULTIPLIER = 3;
export const PREDICTION_TRADE_DEADLINE_SECONDS = 300;
export const PENDING_REQUEST_TIMEOUT_SECONDS = 60 * 60;

// Custody
export const CONSECUTIVE_FAILURE_ALERT = 3;
