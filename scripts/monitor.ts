import 'dotenv/config';
import { z } from 'zod';

const API_URL = process.env.ADMIN_API_URL || `http://localhost:${process.env.ADMIN_API_PORT || 3001}`;
const INTERVAL_MS = Number(process.env.MONITOR_INTERVAL_MS || 30_000);

const statsResponseSchema = z.object({
  success: z.literal(true),
  data: z.object({
    stats: z.object({
      totalTrades: z.number(),
      successfulTrades: z.number(),
      dailyTradeVolume: z.string(),
      remainingDailyLimit: z.string(),
      totalPredictions: z.number(),
      pendingRequestsCount: z.number(),
      currentEcoScore: z.string(),
    }),
    emergency: z.object({
      emergencyStop: z.boolean(),
      emergencyReason: z.string().nullable(),
      paused: z.boolean(),
    }),
  }),
});

async function poll() {
  try {
    const res = await fetch(`${API_URL}/api/v1/stats`);
    if (!res.ok) {
      console.error(`[monitor] HTTP ${res.status}`);
      return;
    }

    const parsed = statsResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      console.error('[monitor] Unexpected response shape');
      return;
    }

    const { stats, emergency } = parsed.data.data;
    const state = emergency.emergencyStop ? `STOPPED (${emergency.emergencyReason ?? 'no reason'})` : emergency.paused ? 'PAUSED' : 'ACTIVE';
    console.log(
      `[${new Date().toISOString()}] ${state} | trades ${stats.successfulTrades}/${stats.totalTrades}` +
        ` | volume ${stats.dailyTradeVolume} (left ${stats.remainingDailyLimit})` +
        ` | predictions ${stats.totalPredictions} (pending ${stats.pendingRequestsCount}) | eco ${stats.currentEcoScore}`
    );
  } catch (error) {
    console.error('[monitor] Error fetching stats:', error instanceof Error ? error.message : error);
  }
}

console.log(`Monitoring ${API_URL} every ${INTERVAL_MS / 1000}s... Press Ctrl+C to stop`);
void poll();
setInterval(() => void poll(), INTERVAL_MS);
