/**
 * Upkeep Loop
 *
 * Keeper-side poller: on every tick asks the agent whether a prediction
 * request is due and, if so, performs the upkeep as the keeper actor.
 * Tick failures are logged and never escape the timer.
 */

import type { EnhancedTradingAgent } from '../agent/enhancedAgent';
import { describeError, isTradingError, ErrorCode } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('UpkeepLoop');

export class UpkeepLoop {
  private timer: ReturnType<typeof setInterval> | null = null;
  private ticking = false;

  constructor(
    private readonly agent: EnhancedTradingAgent,
    private readonly keeper: string,
    private readonly intervalMs: number
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    log.info({ keeper: this.keeper, intervalMs: this.intervalMs }, 'Upkeep loop started');
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    log.info('Upkeep loop stopped');
  }

  /** One check/perform round. Resolves to the request id when one was issued. */
  async tick(): Promise<string | null> {
    if (this.ticking) return null;
    this.ticking = true;

    try {
      const { upkeepNeeded, performData } = await this.agent.checkUpkeep();
      if (!upkeepNeeded) return null;

      const requestId = await this.agent.performUpkeep(this.keeper, performData);
      log.info({ requestId }, 'Upkeep performed');
      return requestId;
    } catch (error) {
      if (isTradingError(error, ErrorCode.UPKEEP_NOT_NEEDED)) {
        log.debug({ error: describeError(error) }, 'Upkeep deferred');
      } else {
        log.warn({ error: describeError(error) }, 'Upkeep tick failed');
      }
      return null;
    } finally {
      this.ticking = false;
    }
  }
}
