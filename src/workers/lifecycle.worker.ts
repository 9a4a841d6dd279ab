import { resolutionWindowEnd } from "../core/market-state.js";
import { logger } from "../core/logger.js";
import type { Engine } from "../engine.js";

export interface SweepReport {
  ended: string[];
  refunded: string[];
}

/**
 * Persists lazy Active -> Ended transitions and refunds Ended markets
 * whose resolution window lapsed without a decision.
 */
export class LifecycleWorker {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;

  constructor(
    private readonly engine: Engine,
    private readonly intervalMs: number = 30_000
  ) {}

  start(): void {
    if (this.timer) {
      logger.warn("Lifecycle worker already running");
      return;
    }
    logger.info({ intervalMs: this.intervalMs }, "Starting lifecycle worker");
    this.timer = setInterval(() => {
      // Skip a tick while the previous sweep is still in flight
      if (this.running) return;
      this.running = this.sweepOnce()
        .then(
          () => undefined,
          (error: unknown) => {
            logger.error({ err: error }, "Lifecycle sweep failed");
          }
        )
        .finally(() => {
          this.running = null;
        });
    }, this.intervalMs);
  }

  async stop(): Promise<void> {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    if (this.running) await this.running;
    logger.info("Lifecycle worker stopped");
  }

  async sweepOnce(): Promise<SweepReport> {
    const { markets, resolution, context } = this.engine;
    const ended = await markets.endExpiredMarkets();

    const now = context.now();
    const refunded: string[] = [];
    const candidates = await context.repo.listMarkets({ status: ["Ended"] });

    for (const market of candidates) {
      const windowEnd = resolutionWindowEnd(
        market,
        context.config.autoRefundHours
      );
      if (now.getTime() < windowEnd.getTime()) continue;

      const result = await resolution.refund(market.id, "system");
      if (result.ok) {
        refunded.push(market.id);
      } else {
        logger.warn(
          { marketId: market.id, code: result.error.code },
          "Auto-refund skipped"
        );
      }
    }

    if (ended.length > 0 || refunded.length > 0) {
      logger.info({ ended, refunded }, "Lifecycle sweep applied");
    }
    return { ended, refunded };
  }
}
