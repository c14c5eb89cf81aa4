/**
 * Paper-mode admin server
 */

import type { Server } from 'node:http';
import { loadEnv } from '../config/env';
import { describeError } from '../lib/errors';
import { UpkeepLoop } from '../lib/scheduler/upkeepLoop';
import { createLogger, setLogLevel } from '../lib/utils/logger';
import { createAdminApi } from './adminApi';
import { PAPER_KEEPER, createPaperSession } from './paperSession';

const log = createLogger('Server');

async function main(): Promise<void> {
  const env = loadEnv();
  setLogLevel(env.logLevel);

  const session = createPaperSession({
    admin: env.adminActorId,
    config: env.tradingConfig,
    initialPrice: env.paperInitialPrice,
  });
  await session.agent.initialize();

  // Fulfil queued predictions shortly after each upkeep round
  const upkeep = new UpkeepLoop(session.agent, PAPER_KEEPER, env.upkeepCheckIntervalMs);
  const fulfiller = setInterval(() => {
    session.bridge.flush().catch((error: unknown) => {
      log.warn({ error: describeError(error) }, 'Prediction flush failed');
    });
  }, 5_000);
  upkeep.start();

  const app = createAdminApi(session.agent, session.decisionLogger, { allowedOrigins: env.allowedOrigins });
  const server: Server = app.listen(env.adminApiPort, () => {
    log.info({ port: env.adminApiPort, environment: env.nodeEnv, admin: env.adminActorId }, 'Admin API listening');
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, 'Shutting down gracefully');
    upkeep.stop();
    clearInterval(fulfiller);
    session.detach();
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  log.fatal({ error: describeError(error) }, 'Startup failed');
  process.exit(1);
});
