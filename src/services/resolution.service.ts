import { randomUUID } from "crypto";
import {
  ResolutionTiedError,
  StateConflictError,
  ValidationError,
} from "../core/errors.js";
import {
  effectiveStatus,
  findOutcome,
  isTerminal,
  transition,
} from "../core/market-state.js";
import { err, ok, type Result } from "../core/result.js";
import { eventTypes, topics } from "../core/topics.js";
import { withMarketLock } from "../lib/locks.js";
import {
  commitChange,
  loadMarket,
  nextRevision,
  type EngineContext,
} from "./context.js";
import {
  payoutEvents,
  type SettlementService,
  type SettlementTotals,
} from "./settlement.service.js";
import type {
  Market,
  MarketStatus,
  Resolution,
  ResolutionMethod,
  ResolutionVote,
} from "../types/index.js";

const HOUR = 60 * 60 * 1000;

export interface CastVoteRequest {
  marketId: string;
  voter: string;
  outcome: string;
  weight?: number;
  confidence?: number;
  reasoning?: string;
  evidenceUrl?: string;
  isFinal?: boolean;
}

export interface VoteTally {
  outcome: string;
  weight: number;
  votes: number;
}

export interface VoteSummary {
  votes: ResolutionVote[];
  tally: VoteTally[];
}

export interface ResolutionResult {
  market: Market;
  resolution: Resolution;
  settlement: SettlementTotals & { payoutCount: number };
}

/** Σweight per outcome, in market outcome order */
export function tallyVotes(
  outcomes: string[],
  votes: ResolutionVote[]
): VoteTally[] {
  return outcomes.map((outcome) => {
    const forOutcome = votes.filter((v) => v.chosenOutcome === outcome);
    return {
      outcome,
      weight: forOutcome.reduce((total, v) => total + v.weight, 0),
      votes: forOutcome.length,
    };
  });
}

export class ResolutionService {
  constructor(
    private readonly ctx: EngineContext,
    private readonly settlement: SettlementService
  ) {}

  /**
   * Records or replaces the caller's vote. Voting stays open until the
   * market is terminal; a vote marked final cannot be changed.
   */
  async castVote(request: CastVoteRequest): Promise<Result<ResolutionVote>> {
    const { marketId, voter, weight = 1, confidence } = request;

    if (!Number.isInteger(weight) || weight < 1) {
      return err(
        new ValidationError("Vote weight must be a positive integer", "VALIDATION_ERROR", {
          weight,
        })
      );
    }
    if (
      confidence !== undefined &&
      (!Number.isInteger(confidence) || confidence < 1 || confidence > 10)
    ) {
      return err(
        new ValidationError("Confidence must be an integer from 1 to 10", "VALIDATION_ERROR", {
          confidence,
        })
      );
    }

    return withMarketLock<ResolutionVote>(
      this.ctx.locks,
      marketId,
      async () => {
        const found = await loadMarket(this.ctx, marketId);
        if (!found.ok) return found;
        const market = found.value;
        const now = this.ctx.now();

        const status = effectiveStatus(market, now);
        if (isTerminal(status)) {
          return err(
            new StateConflictError(
              `Voting on market '${marketId}' closed when it became ${status}`,
              "VOTING_CLOSED",
              { marketId, status }
            )
          );
        }

        const outcome = findOutcome(market, request.outcome);
        if (outcome === undefined) {
          return err(
            new ValidationError(
              `'${request.outcome}' is not an outcome of market '${marketId}'`,
              "INVALID_OUTCOME",
              { outcome: request.outcome, outcomes: market.outcomes }
            )
          );
        }

        const existing = await this.ctx.repo.findVote(marketId, voter);
        if (existing?.isFinal) {
          return err(
            new StateConflictError(
              `Vote of '${voter}' on market '${marketId}' is final`,
              "VOTE_FINAL",
              { marketId, voter }
            )
          );
        }

        const vote = await this.ctx.repo.upsertVote({
          marketId,
          voter,
          chosenOutcome: outcome,
          weight,
          confidence,
          reasoning: request.reasoning,
          evidenceUrl: request.evidenceUrl,
          isFinal: request.isFinal ?? false,
          createdAt: existing?.createdAt ?? now.toISOString(),
          updatedAt: now.toISOString(),
        });

        this.ctx.logger.info(
          { marketId, voter, outcome, weight, replaced: existing !== null },
          "Resolution vote recorded"
        );
        return ok(vote);
      }
    );
  }

  async getVotes(marketId: string): Promise<Result<VoteSummary>> {
    const found = await loadMarket(this.ctx, marketId);
    if (!found.ok) return found;

    const votes = await this.ctx.repo.findVotes(marketId);
    return ok({ votes, tally: tallyVotes(found.value.outcomes, votes) });
  }

  /**
   * Decides the winner by weighted vote. Needs at least minResolutionVotes
   * votes; equal top weights fail with RESOLUTION_TIED.
   */
  async attemptResolve(
    marketId: string,
    resolvedBy: string = "system"
  ): Promise<Result<ResolutionResult>> {
    return withMarketLock<ResolutionResult>(
      this.ctx.locks,
      marketId,
      async () => {
        const found = await loadMarket(this.ctx, marketId);
        if (!found.ok) return found;
        const market = found.value;
        const now = this.ctx.now();

        const moved = transition(market, ["Ended"], "Resolved", now);
        if (!moved.ok) return moved;

        const votes = await this.ctx.repo.findVotes(marketId);
        const { minResolutionVotes } = this.ctx.config;
        if (votes.length < minResolutionVotes) {
          return err(
            new StateConflictError(
              `Market '${marketId}' has ${votes.length} of ${minResolutionVotes} required votes`,
              "INSUFFICIENT_VOTES",
              { marketId, votes: votes.length, required: minResolutionVotes }
            )
          );
        }

        const tally = tallyVotes(market.outcomes, votes);
        const top = Math.max(...tally.map((t) => t.weight));
        const leaders = tally.filter((t) => t.weight === top);
        if (leaders.length !== 1) {
          this.ctx.logger.warn(
            { marketId, tally },
            "Resolution tied, admin decision required"
          );
          return err(
            new ResolutionTiedError(
              marketId,
              leaders.map((t) => t.outcome),
              top
            )
          );
        }

        return this.finalize(market, {
          status: "Resolved",
          winningOutcome: leaders[0].outcome,
          method: "VoteConsensus",
          voteCount: votes.length,
          resolvedBy,
          now,
        });
      }
    );
  }

  /**
   * With an outcome, a privileged caller decides directly and votes are not
   * counted; without one, falls back to the vote consensus.
   */
  async resolve(
    marketId: string,
    outcome: string | undefined,
    resolvedBy: string
  ): Promise<Result<ResolutionResult>> {
    if (outcome === undefined) return this.attemptResolve(marketId, resolvedBy);

    return withMarketLock<ResolutionResult>(
      this.ctx.locks,
      marketId,
      async () => {
        const found = await loadMarket(this.ctx, marketId);
        if (!found.ok) return found;
        const market = found.value;
        const now = this.ctx.now();

        const moved = transition(market, ["Ended"], "Resolved", now);
        if (!moved.ok) return moved;

        const winner = findOutcome(market, outcome);
        if (winner === undefined) {
          return err(
            new ValidationError(
              `'${outcome}' is not an outcome of market '${marketId}'`,
              "INVALID_OUTCOME",
              { outcome, outcomes: market.outcomes }
            )
          );
        }

        const votes = await this.ctx.repo.findVotes(marketId);
        return this.finalize(market, {
          status: "Resolved",
          winningOutcome: winner,
          method: "AdminDecision",
          voteCount: votes.length,
          resolvedBy,
          now,
        });
      }
    );
  }

  /** Ended -> Refunded; every position gets its stake back, fee-free */
  async refund(
    marketId: string,
    resolvedBy: string
  ): Promise<Result<ResolutionResult>> {
    return withMarketLock<ResolutionResult>(
      this.ctx.locks,
      marketId,
      async () => {
        const found = await loadMarket(this.ctx, marketId);
        if (!found.ok) return found;
        const market = found.value;
        const now = this.ctx.now();

        const moved = transition(market, ["Ended"], "Refunded", now);
        if (!moved.ok) return moved;

        const votes = await this.ctx.repo.findVotes(marketId);
        return this.finalize(market, {
          status: "Refunded",
          winningOutcome: null,
          method: "AutoRefund",
          voteCount: votes.length,
          resolvedBy,
          now,
        });
      }
    );
  }

  /** Administrative abort before resolution; settles like a refund */
  async cancel(marketId: string, actor: string): Promise<Result<Market>> {
    return withMarketLock<Market>(this.ctx.locks, marketId, async () => {
      const found = await loadMarket(this.ctx, marketId);
      if (!found.ok) return found;
      const market = found.value;
      const now = this.ctx.now();

      const moved = transition(
        market,
        ["Active", "Paused", "Ended"],
        "Cancelled",
        now
      );
      if (!moved.ok) return moved;

      const next = nextRevision(
        market,
        { status: "Cancelled", settledAt: now.toISOString() },
        now
      );
      const positions = await this.ctx.repo.findPositions(marketId, "Open");
      const plan = this.settlement.plan(next, positions, now);

      const committed = await commitChange(this.ctx, {
        expectedVersion: market.version,
        market: next,
        settledPositions: plan.settlements,
        payouts: plan.payouts,
      });
      if (!committed.ok) return committed;

      this.ctx.logger.info(
        { marketId, actor, refunded: plan.payouts.length },
        "Market cancelled"
      );
      void this.ctx.outbox.emit([
        {
          topic: topics.marketResolved(marketId),
          kind: eventTypes.MARKET_REFUNDED,
          marketId,
          userIds: uniqueBettors(plan.payouts),
          payload: { status: "Cancelled", actor, totals: plan.totals },
        },
        ...payoutEvents(marketId, plan.payouts),
      ]);

      return ok(next);
    });
  }

  /**
   * Writes the status change, the Resolution and the full settlement as a
   * single commit. Must run under the market lock.
   */
  private async finalize(
    market: Market,
    decision: {
      status: Extract<MarketStatus, "Resolved" | "Refunded">;
      winningOutcome: string | null;
      method: ResolutionMethod;
      voteCount: number;
      resolvedBy: string;
      now: Date;
    }
  ): Promise<Result<ResolutionResult>> {
    const { status, winningOutcome, method, voteCount, resolvedBy, now } =
      decision;
    const { houseEdgeBps, disputeWindowHours } = this.ctx.config;

    const next = nextRevision(
      market,
      {
        status,
        winningOutcome: winningOutcome ?? undefined,
        settledAt: now.toISOString(),
      },
      now
    );
    const positions = await this.ctx.repo.findPositions(market.id, "Open");
    const plan = this.settlement.plan(next, positions, now);

    const resolution: Resolution = {
      id: randomUUID(),
      marketId: market.id,
      winningOutcome,
      method,
      resolvedBy,
      resolvedAt: now.toISOString(),
      voteCount,
      totalPool: plan.totals.totalPool,
      totalWinningStake: plan.totals.totalWinningStake,
      totalLosingStake: plan.totals.totalLosingStake,
      houseEdgeBps: winningOutcome === null ? 0 : houseEdgeBps,
      houseEdgeAmount: plan.totals.houseEdgeAmount,
      totalPayout: plan.totals.totalPayout,
      disputeDeadline:
        disputeWindowHours > 0 && winningOutcome !== null
          ? new Date(now.getTime() + disputeWindowHours * HOUR).toISOString()
          : undefined,
    };

    const committed = await commitChange(this.ctx, {
      expectedVersion: market.version,
      market: next,
      resolution,
      settledPositions: plan.settlements,
      payouts: plan.payouts,
    });
    if (!committed.ok) return committed;

    this.ctx.logger.info(
      {
        marketId: market.id,
        status,
        winningOutcome,
        method,
        payouts: plan.payouts.length,
        totalPayout: plan.totals.totalPayout,
      },
      status === "Resolved" ? "Market resolved" : "Market refunded"
    );

    void this.ctx.outbox.emit([
      {
        topic: topics.marketResolved(market.id),
        kind:
          status === "Resolved"
            ? eventTypes.MARKET_RESOLVED
            : eventTypes.MARKET_REFUNDED,
        marketId: market.id,
        userIds: [...new Set(positions.map((p) => p.bettor))],
        payload: {
          resolutionId: resolution.id,
          winningOutcome,
          method,
          totalPool: resolution.totalPool,
          totalPayout: resolution.totalPayout,
        },
      },
      ...payoutEvents(market.id, plan.payouts),
    ]);

    return ok({
      market: next,
      resolution,
      settlement: { ...plan.totals, payoutCount: plan.payouts.length },
    });
  }
}

function uniqueBettors(payouts: { bettor: string }[]): string[] {
  return [...new Set(payouts.map((p) => p.bettor))];
}
