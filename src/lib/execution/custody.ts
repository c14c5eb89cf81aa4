/**
 * Custody Execution
 *
 * The agent never moves funds itself: once a trade is authorized it hands
 * an ExecutionRequest to a CustodyExecutor. Whatever the executor throws is
 * propagated to the caller unchanged.
 */

import { BPS_DENOMINATOR } from '../../config/constant';
import { createLogger } from '../utils/logger';
import { nowSeconds } from '../utils/time';

const log = createLogger('Custody');

// =============================================================================
// TYPES
// =============================================================================

export interface ExecutionRequest {
  amountIn: bigint;
  minAmountOut: bigint;
  /** [sourceAsset, targetAsset] */
  path: [string, string];
  /** Unix seconds */
  deadline: number;
  /** Basis points (100 = 1%) */
  maxSlippageBps: number;
}

export interface ExecutionReceipt {
  amountOut: bigint;
  txId: string;
}

export interface CustodyExecutor {
  execute(request: ExecutionRequest): Promise<ExecutionReceipt>;
}

export class CustodyError extends Error {
  constructor(
    public readonly reason: string,
    message: string
  ) {
    super(message);
    this.name = 'CustodyError';
  }
}

// =============================================================================
// PAPER CUSTODY
// =============================================================================

const RATE_SCALE = 10n ** 18n;

export interface PaperCustodyOptions {
  /** Output units per input unit, scaled by 1e18 */
  rate?: bigint;
  /** Simulated price impact applied to every fill */
  slippageBps?: number;
  balances?: Record<string, bigint>;
}

/**
 * In-process custody for paper sessions and tests: fixed-rate fills against
 * simulated balances, with deadline, slippage and min-out checks.
 */
export class PaperCustody implements CustodyExecutor {
  private balances: Map<string, bigint>;
  private rate: bigint;
  private slippageBps: number;
  private nextFailure: Error | null = null;
  private fills = 0;
  readonly requests: ExecutionRequest[] = [];

  constructor(options: PaperCustodyOptions = {}) {
    this.rate = options.rate ?? RATE_SCALE;
    this.slippageBps = options.slippageBps ?? 0;
    this.balances = new Map(Object.entries(options.balances ?? {}));
  }

  setRate(rate: bigint): void {
    this.rate = rate;
  }

  setSlippage(bps: number): void {
    this.slippageBps = bps;
  }

  deposit(asset: string, amount: bigint): void {
    this.balances.set(asset, this.balanceOf(asset) + amount);
  }

  balanceOf(asset: string): bigint {
    return this.balances.get(asset) ?? 0n;
  }

  /** The next `execute` rejects with `error`, then behaviour returns to normal. */
  failNext(error: Error = new CustodyError('SIMULATED_FAILURE', 'Simulated custody failure')): void {
    this.nextFailure = error;
  }

  get fillCount(): number {
    return this.fills;
  }

  async execute(request: ExecutionRequest): Promise<ExecutionReceipt> {
    this.requests.push(request);
    const [source, target] = request.path;

    if (this.nextFailure) {
      const error = this.nextFailure;
      this.nextFailure = null;
      throw error;
    }

    if (nowSeconds() > request.deadline) {
      throw new CustodyError('EXPIRED', 'Transaction deadline passed');
    }

    if (this.slippageBps > request.maxSlippageBps) {
      throw new CustodyError('SLIPPAGE_EXCEEDED', `Slippage ${this.slippageBps} bps above ${request.maxSlippageBps} bps`);
    }

    const quoted = (request.amountIn * this.rate) / RATE_SCALE;
    const amountOut = quoted - (quoted * BigInt(this.slippageBps)) / BigInt(BPS_DENOMINATOR);

    if (amountOut < request.minAmountOut) {
      throw new CustodyError('INSUFFICIENT_OUTPUT', 'Insufficient output amount');
    }

    const balance = this.balanceOf(source);
    if (balance < request.amountIn) {
      throw new CustodyError('INSUFFICIENT_BALANCE', `Insufficient ${source} balance`);
    }

    this.balances.set(source, balance - request.amountIn);
    this.deposit(target, amountOut);
    this.fills += 1;

    const txId = `paper-${this.fills.toString().padStart(6, '0')}`;
    log.debug({ txId, amountIn: request.amountIn.toString(), amountOut: amountOut.toString() }, 'Paper fill');
    return { amountOut, txId };
  }
}
