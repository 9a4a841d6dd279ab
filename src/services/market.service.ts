/**
 * Market creation, lifecycle transitions and read models
 */

import { randomUUID } from "crypto";
import { ValidationError, type AppError } from "../core/errors.js";
import {
  canTransition,
  findOutcome,
  transition,
  withEffectiveStatus,
} from "../core/market-state.js";
import { err, ok, type Result } from "../core/result.js";
import { eventTypes, topics } from "../core/topics.js";
import type { PriceNormalization } from "../config/engine.js";
import { parseAmount, toAmount, toPrice } from "../lib/fixed-point.js";
import { withMarketLock } from "../lib/locks.js";
import { OutcomePool, marketPrices } from "./cpmm.service.js";
import {
  commitChange,
  loadMarket,
  nextRevision,
  type EngineContext,
} from "./context.js";
import type {
  Market,
  MarketStatus,
  Position,
  PositionStatus,
  PricePoint,
  Resolution,
} from "../types/index.js";

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

export interface CreateMarketInput {
  question: string;
  outcomes: string[];
  endTime: string;
  initialLiquidity?: unknown;
  description?: string;
  resolutionDeadline?: string;
  createdBy?: string;
}

export interface OutcomeState {
  outcome: string;
  /** Price reported under the configured normalization policy */
  price: string;
  /** The curve's own cashReserve / (cashReserve + shareReserve) */
  impliedPrice: string;
  shareReserve: string;
  cashReserve: string;
  totalVolume: string;
  tradeCount: number;
}

export interface MarketState {
  market: Market;
  outcomes: OutcomeState[];
  priceNormalization: PriceNormalization;
  resolution: Resolution | null;
}

export interface ListMarketsQuery {
  status?: MarketStatus[];
  limit?: number;
}

export class MarketService {
  constructor(private readonly ctx: EngineContext) {}

  async createMarket(input: CreateMarketInput): Promise<Result<MarketState>> {
    const now = this.ctx.now();
    const validated = this.validateCreate(input, now);
    if (!validated.ok) return validated;
    const { question, outcomes, endTime, resolutionDeadline, liquidity } =
      validated.value;

    const market: Market = {
      id: randomUUID(),
      question,
      description: input.description?.trim() || undefined,
      outcomes,
      status: "Active",
      createdBy: input.createdBy,
      createdAt: now.toISOString(),
      endTime: endTime.toISOString(),
      resolutionDeadline: resolutionDeadline?.toISOString(),
      initialLiquidity: liquidity,
      totalVolume: toAmount(0),
      totalTrades: 0,
      version: 1,
      updatedAt: now.toISOString(),
    };
    const pools = outcomes.map((outcome) =>
      OutcomePool.seed(market.id, outcome, liquidity, now).toState()
    );

    await this.ctx.repo.insertMarket(market, pools);

    this.ctx.logger.info(
      { marketId: market.id, outcomes, endTime: market.endTime },
      "Market created"
    );
    void this.ctx.outbox.emit([
      {
        topic: topics.marketTicker(market.id),
        kind: eventTypes.MARKET_CREATED,
        marketId: market.id,
        userIds: market.createdBy ? [market.createdBy] : [],
        payload: { question, outcomes, endTime: market.endTime },
      },
    ]);

    return this.getMarketState(market.id);
  }

  /** Outcomes with prices, volume and status as of now */
  async getMarketState(marketId: string): Promise<Result<MarketState>> {
    const found = await loadMarket(this.ctx, marketId);
    if (!found.ok) return found;
    const market = withEffectiveStatus(found.value, this.ctx.now());

    const states = await this.ctx.repo.findPools(marketId);
    const pools = states.map((s) => OutcomePool.fromState(s));
    const policy = this.ctx.config.priceNormalization;
    const prices = marketPrices(pools, policy);
    const byOutcome = new Map(states.map((s) => [s.outcome, s]));

    const outcomes: OutcomeState[] = [];
    for (const outcome of market.outcomes) {
      const state = byOutcome.get(outcome);
      const pool = pools.find((p) => p.outcome === outcome);
      const price = prices.get(outcome);
      if (!state || !pool || !price) continue;
      outcomes.push({
        outcome,
        price: toPrice(price),
        impliedPrice: toPrice(pool.impliedPrice()),
        shareReserve: state.shareReserve,
        cashReserve: state.cashReserve,
        totalVolume: state.totalVolume,
        tradeCount: state.tradeCount,
      });
    }

    return ok({
      market,
      outcomes,
      priceNormalization: policy,
      resolution: await this.ctx.repo.findResolution(marketId),
    });
  }

  /**
   * Status filtering applies to the effective status, so a stored Active
   * market past its endTime is listed as Ended.
   */
  async listMarkets(query: ListMarketsQuery = {}): Promise<Market[]> {
    const { status, limit } = query;
    const now = this.ctx.now();

    const stored =
      status && status.includes("Ended")
        ? [...new Set<MarketStatus>([...status, "Active", "Paused"])]
        : status;

    const markets = (await this.ctx.repo.listMarkets({ status: stored }))
      .map((m) => withEffectiveStatus(m, now))
      .filter((m) => !status || status.includes(m.status));

    return limit ? markets.slice(0, limit) : markets;
  }

  async getUserPositions(
    bettor: string,
    marketId?: string
  ): Promise<Position[]> {
    return this.ctx.repo.findUserPositions(bettor, marketId);
  }

  async getMarketPositions(
    marketId: string,
    status?: PositionStatus
  ): Promise<Result<Position[]>> {
    const found = await loadMarket(this.ctx, marketId);
    if (!found.ok) return found;
    return ok(await this.ctx.repo.findPositions(marketId, status));
  }

  /** Price after every trade, oldest first, optionally for one outcome */
  async getPriceHistory(
    marketId: string,
    outcomeLabel?: string
  ): Promise<Result<PricePoint[]>> {
    const found = await loadMarket(this.ctx, marketId);
    if (!found.ok) return found;
    const market = found.value;

    if (outcomeLabel === undefined) {
      return ok(await this.ctx.repo.findPriceHistory(marketId));
    }

    const outcome = findOutcome(market, outcomeLabel);
    if (outcome === undefined) {
      return err(
        new ValidationError(
          `'${outcomeLabel}' is not an outcome of market '${marketId}'`,
          "INVALID_OUTCOME",
          { outcome: outcomeLabel, outcomes: market.outcomes }
        )
      );
    }
    return ok(await this.ctx.repo.findPriceHistory(marketId, outcome));
  }

  closeMarket(marketId: string, actor: string): Promise<Result<Market>> {
    return this.changeStatus(marketId, ["Active", "Paused"], "Ended", actor);
  }

  pauseMarket(marketId: string, actor: string): Promise<Result<Market>> {
    return this.changeStatus(marketId, ["Active"], "Paused", actor);
  }

  resumeMarket(marketId: string, actor: string): Promise<Result<Market>> {
    return this.changeStatus(marketId, ["Paused"], "Active", actor);
  }

  /**
   * Persists the Ended status of markets whose endTime has passed. Returns
   * the ids that were written.
   */
  async endExpiredMarkets(): Promise<string[]> {
    const now = this.ctx.now();
    const expired = await this.ctx.repo.listMarkets({
      status: ["Active", "Paused"],
      endingBefore: now.toISOString(),
    });

    const ended: string[] = [];
    for (const candidate of expired) {
      const result = await withMarketLock<boolean>(
        this.ctx.locks,
        candidate.id,
        async () => {
          const found = await loadMarket(this.ctx, candidate.id);
          if (!found.ok) return found;
          const market = found.value;
          if (
            !canTransition(market.status, "Ended") ||
            new Date(market.endTime).getTime() > now.getTime()
          ) {
            return ok(false);
          }

          const committed = await commitChange(this.ctx, {
            expectedVersion: market.version,
            market: nextRevision(market, { status: "Ended" }, now),
          });
          if (!committed.ok) return committed;

          this.emitStatusChanged(market, "Ended", "system");
          return ok(true);
        }
      );

      if (result.ok && result.value) {
        ended.push(candidate.id);
      } else if (!result.ok) {
        this.ctx.logger.warn(
          { marketId: candidate.id, code: result.error.code },
          "Failed to end expired market"
        );
      }
    }
    return ended;
  }

  private async changeStatus(
    marketId: string,
    expected: MarketStatus[],
    to: MarketStatus,
    actor: string
  ): Promise<Result<Market>> {
    return withMarketLock<Market>(this.ctx.locks, marketId, async () => {
      const found = await loadMarket(this.ctx, marketId);
      if (!found.ok) return found;
      const market = found.value;
      const now = this.ctx.now();

      const moved = transition(market, expected, to, now);
      if (!moved.ok) return moved;

      const next = nextRevision(market, { status: to }, now);
      const committed = await commitChange(this.ctx, {
        expectedVersion: market.version,
        market: next,
      });
      if (!committed.ok) return committed;

      this.ctx.logger.info(
        { marketId, from: market.status, to, actor },
        "Market status changed"
      );
      this.emitStatusChanged(market, to, actor);
      return ok(next);
    });
  }

  private emitStatusChanged(market: Market, to: MarketStatus, actor: string) {
    void this.ctx.outbox.emit([
      {
        topic: topics.marketTicker(market.id),
        kind: eventTypes.MARKET_STATUS_CHANGED,
        marketId: market.id,
        userIds: [],
        payload: { from: market.status, to, actor },
      },
    ]);
  }

  private validateCreate(
    input: CreateMarketInput,
    now: Date
  ): Result<
    {
      question: string;
      outcomes: string[];
      endTime: Date;
      resolutionDeadline?: Date;
      liquidity: string;
    },
    AppError
  > {
    const { config } = this.ctx;

    const question = input.question.trim();
    if (question.length === 0) {
      return err(new ValidationError("Question is required"));
    }

    const outcomes = input.outcomes.map((o) => o.trim());
    if (outcomes.length < 2 || outcomes.length > config.maxOutcomes) {
      return err(
        new ValidationError(
          `A market needs between 2 and ${config.maxOutcomes} outcomes`,
          "INVALID_OUTCOME",
          { count: outcomes.length }
        )
      );
    }
    const seen = new Set<string>();
    for (const outcome of outcomes) {
      const key = outcome.toLowerCase();
      if (outcome.length === 0 || seen.has(key)) {
        return err(
          new ValidationError(
            "Outcome labels must be non-empty and unique",
            "INVALID_OUTCOME",
            { outcome }
          )
        );
      }
      seen.add(key);
    }

    const endTime = new Date(input.endTime);
    if (Number.isNaN(endTime.getTime())) {
      return err(new ValidationError("endTime must be a valid date"));
    }
    const duration = endTime.getTime() - now.getTime();
    if (
      duration < config.minMarketDurationMinutes * MINUTE ||
      duration > config.maxMarketDurationHours * HOUR ||
      duration <= 0
    ) {
      return err(
        new ValidationError(
          `Market duration must be between ${config.minMarketDurationMinutes} minutes and ${config.maxMarketDurationHours} hours`,
          "VALIDATION_ERROR",
          { endTime: input.endTime }
        )
      );
    }

    let resolutionDeadline: Date | undefined;
    if (input.resolutionDeadline !== undefined) {
      resolutionDeadline = new Date(input.resolutionDeadline);
      if (
        Number.isNaN(resolutionDeadline.getTime()) ||
        resolutionDeadline.getTime() <= endTime.getTime()
      ) {
        return err(
          new ValidationError("resolutionDeadline must be after endTime", "VALIDATION_ERROR", {
            resolutionDeadline: input.resolutionDeadline,
          })
        );
      }
    }

    const liquidity = parseAmount(
      input.initialLiquidity ?? config.defaultInitialLiquidity
    );
    if (liquidity === null || liquidity.lte(0)) {
      return err(
        new ValidationError(
          "initialLiquidity must be a positive number",
          "INVALID_AMOUNT",
          { initialLiquidity: input.initialLiquidity }
        )
      );
    }

    return ok({
      question,
      outcomes,
      endTime,
      resolutionDeadline,
      liquidity: toAmount(liquidity),
    });
  }
}
