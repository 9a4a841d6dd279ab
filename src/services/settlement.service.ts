// /services/settlement.service.ts

import { randomUUID } from "crypto";
import { StateConflictError } from "../core/errors.js";
import { isTerminal } from "../core/market-state.js";
import { err, ok, type Result } from "../core/result.js";
import { eventTypes, topics } from "../core/topics.js";
import type { NewOutboxEvent } from "../repo/outbox.repo.js";
import type { PayoutMode } from "../config/engine.js";
import {
  bpsOf,
  fx,
  quantize,
  sum,
  toAmount,
  type Fixed,
} from "../lib/fixed-point.js";
import { withMarketLock } from "../lib/locks.js";
import {
  commitChange,
  loadMarket,
  nextRevision,
  type EngineContext,
} from "./context.js";
import type {
  Market,
  Payout,
  Position,
  PositionSettlement,
} from "../types/index.js";

export interface SettlementInput {
  marketId: string;
  /** Open positions only; anything else is ignored */
  positions: Position[];
  /** null settles as a refund */
  winningOutcome: string | null;
  payoutMode: PayoutMode;
  houseEdgeBps: number;
  now: Date;
}

export interface SettlementTotals {
  totalPool: string;
  totalWinningStake: string;
  totalLosingStake: string;
  totalGross: string;
  houseEdgeAmount: string;
  totalPayout: string;
}

export interface SettlementPlan {
  payouts: Payout[];
  settlements: PositionSettlement[];
  totals: SettlementTotals;
}

export interface SettlementSummary {
  marketId: string;
  status: Market["status"];
  settledAt?: string;
  payoutCount: number;
  totalGross: string;
  totalFee: string;
  totalNet: string;
}

function payoutFor(
  position: Position,
  kind: Payout["kind"],
  gross: Fixed,
  fee: Fixed,
  now: Date
): Payout {
  return {
    id: randomUUID(),
    marketId: position.marketId,
    positionRef: position.id,
    bettor: position.bettor,
    kind,
    grossAmount: toAmount(gross),
    fee: toAmount(fee),
    netAmount: toAmount(gross.minus(fee)),
    profitLoss: toAmount(gross.minus(fee).minus(position.amountPaid)),
    createdAt: now.toISOString(),
  };
}

/**
 * Pure settlement computation. Winners redeem shares at par (or a pro-rata
 * share of the pool in "pool" mode), losers settle with nothing, and a
 * null winning outcome voids every position with its stake returned.
 */
export function computeSettlement(input: SettlementInput): SettlementPlan {
  const { winningOutcome, houseEdgeBps, now } = input;
  const open = input.positions.filter((p) => p.status === "Open");
  const settledAt = now.toISOString();

  const totalPool = sum(open.map((p) => p.amountPaid));
  const winners =
    winningOutcome === null
      ? []
      : open.filter((p) => p.outcome === winningOutcome);
  const totalWinningStake = sum(winners.map((p) => p.amountPaid));

  const payouts: Payout[] = [];
  const settlements: PositionSettlement[] = [];

  if (winningOutcome === null) {
    for (const position of open) {
      payouts.push(
        payoutFor(position, "refund", fx(position.amountPaid), fx(0), now)
      );
      settlements.push({ id: position.id, status: "Voided", settledAt });
    }
  } else {
    const grossById = new Map<string, Fixed>();

    if (input.payoutMode === "par") {
      for (const p of winners) grossById.set(p.id, fx(p.sharesAcquired));
    } else {
      const winningShares = sum(winners.map((p) => p.sharesAcquired));
      let allocated = fx(0);
      winners.forEach((p, i) => {
        // Rounding dust goes to the last winner so the pool is paid out exactly
        const gross =
          i === winners.length - 1
            ? totalPool.minus(allocated)
            : quantize(
                totalPool.times(p.sharesAcquired).div(winningShares),
                "down"
              );
        allocated = allocated.plus(gross);
        grossById.set(p.id, gross);
      });
    }

    for (const position of open) {
      const gross = grossById.get(position.id);
      if (gross !== undefined) {
        payouts.push(
          payoutFor(position, "win", gross, bpsOf(gross, houseEdgeBps), now)
        );
      }
      settlements.push({ id: position.id, status: "Settled", settledAt });
    }
  }

  return {
    payouts,
    settlements,
    totals: {
      totalPool: toAmount(totalPool),
      totalWinningStake: toAmount(totalWinningStake),
      totalLosingStake: toAmount(totalPool.minus(totalWinningStake)),
      totalGross: toAmount(sum(payouts.map((p) => p.grossAmount))),
      houseEdgeAmount: toAmount(sum(payouts.map((p) => p.fee))),
      totalPayout: toAmount(sum(payouts.map((p) => p.netAmount))),
    },
  };
}

/** One payout.ready event per bettor, carrying that bettor's payouts */
export function payoutEvents(
  marketId: string,
  payouts: Payout[]
): NewOutboxEvent[] {
  const byBettor = new Map<string, Payout[]>();
  for (const payout of payouts) {
    const list = byBettor.get(payout.bettor) ?? [];
    list.push(payout);
    byBettor.set(payout.bettor, list);
  }

  return [...byBettor].map(([bettor, list]) => ({
    topic: topics.userNotifications(bettor),
    kind: eventTypes.PAYOUT_READY,
    marketId,
    userIds: [bettor],
    payload: {
      payouts: list.map((p) => ({
        payoutId: p.id,
        positionId: p.positionRef,
        kind: p.kind,
        grossAmount: p.grossAmount,
        fee: p.fee,
        netAmount: p.netAmount,
        profitLoss: p.profitLoss,
      })),
      totalNet: toAmount(sum(list.map((p) => p.netAmount))),
    },
  }));
}

export class SettlementService {
  constructor(private readonly ctx: EngineContext) {}

  plan(market: Market, positions: Position[], now: Date): SettlementPlan {
    return computeSettlement({
      marketId: market.id,
      positions,
      winningOutcome:
        market.status === "Resolved" ? market.winningOutcome ?? null : null,
      payoutMode: this.ctx.config.payoutMode,
      houseEdgeBps: this.ctx.config.houseEdgeBps,
      now,
    });
  }

  /**
   * Settles whatever is still Open on a terminal market. Resolution already
   * settles atomically, so this is a retry path: a second call finds no
   * Open positions and writes nothing.
   */
  async settle(marketId: string): Promise<Result<SettlementSummary>> {
    return withMarketLock<SettlementSummary>(
      this.ctx.locks,
      marketId,
      async () => {
        const found = await loadMarket(this.ctx, marketId);
        if (!found.ok) return found;
        const market = found.value;

        if (!isTerminal(market.status)) {
          return err(
            new StateConflictError(
              `Market '${marketId}' is ${market.status} and cannot be settled`,
              "MARKET_NOT_TERMINAL",
              { marketId, status: market.status }
            )
          );
        }

        const open = await this.ctx.repo.findPositions(marketId, "Open");
        if (open.length === 0) {
          this.ctx.logger.debug({ marketId }, "Settlement already complete");
          return this.summarize(market);
        }

        const now = this.ctx.now();
        const plan = this.plan(market, open, now);
        const next = nextRevision(
          market,
          { settledAt: now.toISOString() },
          now
        );

        const committed = await commitChange(this.ctx, {
          expectedVersion: market.version,
          market: next,
          settledPositions: plan.settlements,
          payouts: plan.payouts,
        });
        if (!committed.ok) return committed;

        this.ctx.logger.info(
          {
            marketId,
            positions: plan.settlements.length,
            totalPayout: plan.totals.totalPayout,
          },
          "Market settlement retried"
        );
        void this.ctx.outbox.emit(payoutEvents(marketId, plan.payouts));

        return this.summarize(next);
      }
    );
  }

  async getSummary(marketId: string): Promise<Result<SettlementSummary>> {
    const found = await loadMarket(this.ctx, marketId);
    if (!found.ok) return found;
    return this.summarize(found.value);
  }

  async getPayouts(marketId: string): Promise<Result<Payout[]>> {
    const found = await loadMarket(this.ctx, marketId);
    if (!found.ok) return found;
    return ok(await this.ctx.repo.findPayouts(marketId));
  }

  private async summarize(
    market: Market
  ): Promise<Result<SettlementSummary, never>> {
    const payouts = await this.ctx.repo.findPayouts(market.id);
    return ok({
      marketId: market.id,
      status: market.status,
      settledAt: market.settledAt,
      payoutCount: payouts.length,
      totalGross: toAmount(sum(payouts.map((p) => p.grossAmount))),
      totalFee: toAmount(sum(payouts.map((p) => p.fee))),
      totalNet: toAmount(sum(payouts.map((p) => p.netAmount))),
    });
  }
}
