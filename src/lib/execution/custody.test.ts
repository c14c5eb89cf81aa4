import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CustodyError, PaperCustody, type ExecutionRequest } from './custody';

const E18 = 10n ** 18n;
const NOW_S = 1_800_000_000;

function request(overrides: Partial<ExecutionRequest> = {}): ExecutionRequest {
  return {
    amountIn: 100n * E18,
    minAmountOut: 0n,
    path: ['USDC', 'WETH'],
    deadline: NOW_S + 60,
    maxSlippageBps: 300,
    ...overrides,
  };
}

async function custodyError(promise: Promise<unknown>): Promise<CustodyError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof CustodyError) return error;
    throw error;
  }
  throw new Error('expected a CustodyError');
}

describe('execution/custody', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW_S * 1000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('fills at the configured rate minus slippage and moves balances', async () => {
    // 0.0004 WETH per USDC, 1% impact
    const custody = new PaperCustody({ rate: 4n * 10n ** 14n, slippageBps: 100, balances: { USDC: 1000n * E18 } });

    const receipt = await custody.execute(request());

    expect(receipt).toEqual({ amountOut: 396n * 10n ** 14n, txId: 'paper-000001' });
    expect(custody.balanceOf('USDC')).toBe(900n * E18);
    expect(custody.balanceOf('WETH')).toBe(396n * 10n ** 14n);
    expect(custody.fillCount).toBe(1);
  });

  it('checks deadline, slippage, min-out and balance in that order', async () => {
    const custody = new PaperCustody({ slippageBps: 50, balances: { USDC: 10n * E18 } });

    expect((await custodyError(custody.execute(request({ deadline: NOW_S - 1 })))).reason).toBe('EXPIRED');
    expect((await custodyError(custody.execute(request({ maxSlippageBps: 10 })))).reason).toBe('SLIPPAGE_EXCEEDED');
    expect((await custodyError(custody.execute(request({ minAmountOut: 100n * E18 })))).reason).toBe(
      'INSUFFICIENT_OUTPUT'
    );
    expect((await custodyError(custody.execute(request()))).reason).toBe('INSUFFICIENT_BALANCE');
    expect(custody.fillCount).toBe(0);
    expect(custody.requests).toHaveLength(4);
  });

  it('fails exactly once after failNext', async () => {
    const custody = new PaperCustody({ balances: { USDC: 1000n * E18 } });
    const venueDown = new Error('venue down');
    custody.failNext(venueDown);

    await expect(custody.execute(request())).rejects.toBe(venueDown);
    await expect(custody.execute(request())).resolves.toMatchObject({ txId: 'paper-000001' });
  });

  it('accepts deposits and rate changes', async () => {
    const custody = new PaperCustody();
    custody.deposit('USDC', 5n * E18);
    custody.setRate(2n * E18);

    await expect(custody.execute(request({ amountIn: 5n * E18 }))).resolves.toMatchObject({ amountOut: 10n * E18 });
  });
});
