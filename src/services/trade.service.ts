// /services/trade.service.ts

import { randomUUID } from "crypto";
import {
  InvariantViolationError,
  ValidationError,
} from "../core/errors.js";
import { checkTradable, findOutcome } from "../core/market-state.js";
import { err, ok, type Result } from "../core/result.js";
import { eventTypes, topics } from "../core/topics.js";
import {
  fx,
  parseAmount,
  toAmount,
  toPrice,
  type Fixed,
} from "../lib/fixed-point.js";
import { withMarketLock, type MarketLockGuard } from "../lib/locks.js";
import { OutcomePool, type BuyQuote } from "./cpmm.service.js";
import {
  commitChange,
  loadMarket,
  nextRevision,
  type EngineContext,
} from "./context.js";
import type { Market, OutcomePoolState, Position } from "../types/index.js";

export interface PlaceBetRequest {
  marketId: string;
  outcome: string;
  amount: unknown;
  bettor: string;
}

export interface PlaceBetResult {
  position: Position;
  priceBefore: string;
  priceAfter: string;
}

export interface Quote {
  marketId: string;
  outcome: string;
  amount: string;
  sharesOut: string;
  avgPricePerShare: string;
  priceBefore: string;
  priceAfter: string;
  /** (priceAfter - priceBefore) / priceBefore */
  priceImpact: string;
}

export class TradeService {
  constructor(private readonly ctx: EngineContext) {}

  /**
   * Buys shares of one outcome. The whole read-quote-apply-write sequence
   * runs under the market lock and lands as one commit.
   */
  async placeBet(request: PlaceBetRequest): Promise<Result<PlaceBetResult>> {
    const { marketId, bettor } = request;

    const amount = this.validateAmount(request.amount);
    if (!amount.ok) return amount;

    return withMarketLock<PlaceBetResult>(
      this.ctx.locks,
      marketId,
      async (guard) => {
        const found = await loadMarket(this.ctx, marketId);
        if (!found.ok) return found;

        const now = this.ctx.now();
        const tradable = checkTradable(found.value, now);
        if (!tradable.ok) {
          this.ctx.logger.debug(
            { marketId, bettor, code: tradable.error.code },
            "Bet rejected"
          );
          return tradable;
        }
        const market = tradable.value;

        const outcome = this.resolveOutcome(market, request.outcome);
        if (!outcome.ok) return outcome;

        const pool = await this.loadPool(market, outcome.value);
        const applied = await this.applyWithHalt(
          pool,
          amount.value,
          guard,
          now
        );
        if (!applied.ok) return applied;
        const quote = applied.value;

        const position: Position = {
          id: randomUUID(),
          marketId,
          bettor,
          outcome: outcome.value,
          amountPaid: toAmount(quote.cashIn),
          sharesAcquired: toAmount(quote.sharesOut),
          avgPricePerShare: toAmount(quote.cashIn.div(quote.sharesOut)),
          placedAt: now.toISOString(),
          status: "Open",
        };

        const priceBefore = toPrice(quote.priceBefore);
        const priceAfter = toPrice(quote.newImpliedPrice);

        const next = nextRevision(
          market,
          {
            totalVolume: toAmount(fx(market.totalVolume).plus(quote.cashIn)),
            totalTrades: market.totalTrades + 1,
          },
          now
        );

        const committed = await commitChange(this.ctx, {
          expectedVersion: market.version,
          market: next,
          pools: [pool.toState()],
          newPositions: [position],
          pricePoints: [
            {
              marketId,
              outcome: position.outcome,
              price: priceAfter,
              positionRef: position.id,
              recordedAt: position.placedAt,
            },
          ],
        });
        if (!committed.ok) return committed;

        this.ctx.logger.info(
          {
            marketId,
            bettor,
            outcome: position.outcome,
            amount: position.amountPaid,
            shares: position.sharesAcquired,
          },
          "Bet placed"
        );

        void this.ctx.outbox.emit([
          {
            topic: topics.marketTrades(marketId),
            kind: eventTypes.TRADE_EXECUTED,
            marketId,
            userIds: [bettor],
            payload: {
              positionId: position.id,
              outcome: position.outcome,
              amountPaid: position.amountPaid,
              sharesAcquired: position.sharesAcquired,
              avgPricePerShare: position.avgPricePerShare,
              priceBefore,
              priceAfter,
            },
          },
          {
            topic: topics.marketTicker(marketId),
            kind: eventTypes.TRADE_EXECUTED,
            marketId,
            userIds: [],
            payload: {
              outcome: position.outcome,
              price: priceAfter,
              totalVolume: next.totalVolume,
              totalTrades: next.totalTrades,
            },
          },
        ]);

        return ok({ position, priceBefore, priceAfter });
      }
    );
  }

  /** Read-only price check; nothing is locked or written */
  async getQuote(
    marketId: string,
    outcomeLabel: string,
    rawAmount: unknown
  ): Promise<Result<Quote>> {
    const amount = this.validateAmount(rawAmount);
    if (!amount.ok) return amount;

    const found = await loadMarket(this.ctx, marketId);
    if (!found.ok) return found;

    const tradable = checkTradable(found.value, this.ctx.now());
    if (!tradable.ok) return tradable;
    const market = tradable.value;

    const outcome = this.resolveOutcome(market, outcomeLabel);
    if (!outcome.ok) return outcome;

    const pool = await this.loadPool(market, outcome.value);
    const quoted = pool.quoteBuy(amount.value);
    if (!quoted.ok) return quoted;

    const { cashIn, sharesOut, priceBefore, newImpliedPrice } = quoted.value;
    return ok({
      marketId,
      outcome: outcome.value,
      amount: toAmount(cashIn),
      sharesOut: toAmount(sharesOut),
      avgPricePerShare: toAmount(cashIn.div(sharesOut)),
      priceBefore: toPrice(priceBefore),
      priceAfter: toPrice(newImpliedPrice),
      priceImpact: toPrice(newImpliedPrice.minus(priceBefore).div(priceBefore)),
    });
  }

  private validateAmount(raw: unknown): Result<Fixed, ValidationError> {
    const amount = parseAmount(raw);
    if (amount === null || amount.lte(0)) {
      return err(
        new ValidationError("Amount must be a positive number", "INVALID_AMOUNT", {
          amount: raw,
        })
      );
    }

    const { minBetAmount, maxBetAmount } = this.ctx.config;
    if (amount.lt(minBetAmount) || amount.gt(maxBetAmount)) {
      return err(
        new ValidationError(
          `Amount must be between ${minBetAmount} and ${maxBetAmount}`,
          "AMOUNT_OUT_OF_BOUNDS",
          { amount: amount.toString(), min: minBetAmount, max: maxBetAmount }
        )
      );
    }

    return ok(amount);
  }

  private resolveOutcome(
    market: Market,
    label: string
  ): Result<string, ValidationError> {
    const outcome = findOutcome(market, label);
    if (outcome === undefined) {
      return err(
        new ValidationError(
          `'${label}' is not an outcome of market '${market.id}'`,
          "INVALID_OUTCOME",
          { outcome: label, outcomes: market.outcomes }
        )
      );
    }
    return ok(outcome);
  }

  private async loadPool(market: Market, outcome: string): Promise<OutcomePool> {
    const pools = await this.ctx.repo.findPools(market.id);
    const state: OutcomePoolState | undefined = pools.find(
      (p) => p.outcome === outcome
    );
    if (state === undefined) {
      throw new InvariantViolationError(
        market.id,
        `Market '${market.id}' has no pool for outcome '${outcome}'`,
        { outcome }
      );
    }
    return OutcomePool.fromState(state);
  }

  /**
   * An invariant violation halts the market before it propagates, so no
   * further trade runs against reserves nobody trusts.
   */
  private async applyWithHalt(
    pool: OutcomePool,
    amount: Fixed,
    guard: MarketLockGuard,
    now: Date
  ): Promise<Result<BuyQuote, ValidationError>> {
    try {
      return pool.applyBuy(amount, guard, now);
    } catch (error) {
      if (error instanceof InvariantViolationError) {
        this.ctx.logger.fatal(
          { err: error, marketId: pool.marketId, details: error.details },
          "Pool invariant violated, halting market"
        );
        await this.ctx.repo.haltMarket(pool.marketId, error.message);
        void this.ctx.outbox.emit([
          {
            topic: topics.systemAlerts(),
            kind: eventTypes.MARKET_HALTED,
            marketId: pool.marketId,
            userIds: [],
            payload: { reason: error.message, details: error.details ?? {} },
          },
        ]);
      }
      throw error;
    }
  }
}
