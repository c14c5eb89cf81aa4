import 'dotenv/config';
import { DEFAULT_ENHANCED_CONFIG } from '../src/lib/config/tradingConfig';
import { describeError } from '../src/lib/errors';
import { createPaperSession, PAPER_KEEPER } from '../src/server/paperSession';

const ADMIN = 'sim-admin';

function rand(min: number, max: number) {
  return Math.random() * (max - min) + min;
}

function fmtUnits(value: bigint, decimals: number) {
  const scale = 10n ** BigInt(decimals);
  const whole = value / scale;
  const frac = (value % scale).toString().padStart(decimals, '0').slice(0, 4);
  return `${whole}.${frac}`;
}

async function main() {
  const rounds = Number(process.argv[2] ?? 25);

  // No cooldown and no request interval so every round exercises every path
  const session = createPaperSession({
    admin: ADMIN,
    config: { ...DEFAULT_ENHANCED_CONFIG, cooldownPeriod: 0, predictionIntervalSeconds: 0 },
    initialPrice: 2500n * 10n ** 8n,
  });
  const { agent, bridge, decisionLogger } = session;
  await agent.initialize();

  const deadline = () => Math.floor(Date.now() / 1000) + 600;

  for (let i = 1; i <= rounds; i++) {
    const amount = BigInt(Math.floor(rand(1, 120))) * 10n ** 18n;
    const confidence = Math.floor(rand(5000, 10000));

    const eligibility = await agent.canTrade(amount, confidence);
    if (eligibility.allowed) {
      try {
        const trade = await agent.triggerTrade(ADMIN, {
          amountIn: amount,
          amountOutMin: 0n,
          deadline: deadline(),
          confidenceBps: confidence,
        });
        console.log(`#${i} trade ${fmtUnits(trade.amountIn, 18)} @ ${fmtUnits(trade.price, 8)} (${trade.txId})`);
      } catch (error) {
        console.log(`#${i} trade failed: ${describeError(error)}`);
      }
    } else {
      console.log(`#${i} skipped: ${eligibility.reason}`);
    }

    const { upkeepNeeded, performData } = await agent.checkUpkeep();
    if (upkeepNeeded) {
      await agent.performUpkeep(PAPER_KEEPER, performData);
      await bridge.flush();
    }
  }

  const stats = await agent.getAdvancedStats();
  const metrics = decisionLogger.getMetrics();

  console.log('\n=== Session ===');
  console.log(`trades:       ${stats.successfulTrades}/${stats.totalTrades} (${stats.successRateBps / 100}%)`);
  console.log(`daily volume: ${fmtUnits(stats.dailyTradeVolume, 18)} (remaining ${fmtUnits(stats.remainingDailyLimit, 18)})`);
  console.log(`predictions:  ${stats.fulfilledPredictions}/${stats.totalPredictions} fulfilled, ${stats.rewardsMinted} rewards`);
  console.log(`last price:   ${metrics.lastPrice ?? 'n/a'}`);
  console.log(`unconfirmed:  ${metrics.unconfirmedPrices}`);

  session.detach();
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
