import { describe, it, expect } from "vitest";
import {
  HOUR,
  createTestEngine,
  openMarket,
  unwrap,
  type TestEngine,
} from "../testing/harness.js";
import type { Market } from "../types/index.js";

async function bet(
  t: TestEngine,
  market: Market,
  bettor: string,
  outcome: string,
  amount: string
) {
  return unwrap(
    await t.engine.trades.placeBet({
      marketId: market.id,
      outcome,
      amount,
      bettor,
    })
  );
}

/** alice 1000 on Yes, bob 500 on No, then the market ends */
async function endedMarket(t: TestEngine): Promise<Market> {
  const market = await openMarket(t);
  await bet(t, market, "alice", "Yes", "1000");
  await bet(t, market, "bob", "No", "500");
  t.clock.advance(24 * HOUR);
  return market;
}

async function vote(
  t: TestEngine,
  market: Market,
  voter: string,
  outcome: string,
  weight = 1
) {
  return t.engine.resolution.castVote({
    marketId: market.id,
    voter,
    outcome,
    weight,
  });
}

describe("ResolutionService", () => {
  describe("castVote", () => {
    it("accepts votes until the market is terminal", async () => {
      const t = createTestEngine();
      const market = await openMarket(t);

      const early = await vote(t, market, "v1", "yes");
      expect(early.ok).toBe(true);
      if (early.ok) expect(early.value.chosenOutcome).toBe("Yes");

      t.clock.advance(24 * HOUR);
      unwrap(await vote(t, market, "v2", "Yes"));
      unwrap(await t.engine.resolution.attemptResolve(market.id));

      const late = await vote(t, market, "v3", "No");
      expect(late.ok).toBe(false);
      if (!late.ok) {
        expect(late.error.code).toBe("VOTING_CLOSED");
        expect(late.error.details).toEqual({
          marketId: market.id,
          status: "Resolved",
        });
      }
    });

    it("keeps one vote per voter and lets it change until final", async () => {
      const t = createTestEngine();
      const market = await endedMarket(t);

      unwrap(await vote(t, market, "v1", "Yes"));
      unwrap(
        await t.engine.resolution.castVote({
          marketId: market.id,
          voter: "v1",
          outcome: "No",
          confidence: 8,
          isFinal: true,
        })
      );

      const votes = unwrap(await t.engine.resolution.getVotes(market.id));
      expect(votes.votes).toHaveLength(1);
      expect(votes.votes[0]).toMatchObject({
        chosenOutcome: "No",
        confidence: 8,
        isFinal: true,
      });
      expect(votes.tally).toEqual([
        { outcome: "Yes", weight: 0, votes: 0 },
        { outcome: "No", weight: 1, votes: 1 },
      ]);

      const changed = await vote(t, market, "v1", "Yes");
      expect(changed.ok).toBe(false);
      if (!changed.ok) expect(changed.error.code).toBe("VOTE_FINAL");
    });

    it("validates outcome, weight and confidence", async () => {
      const t = createTestEngine();
      const market = await endedMarket(t);

      const badOutcome = await vote(t, market, "v1", "Maybe");
      const badWeight = await vote(t, market, "v1", "Yes", 0);
      const badConfidence = await t.engine.resolution.castVote({
        marketId: market.id,
        voter: "v1",
        outcome: "Yes",
        confidence: 11,
      });

      expect([badOutcome, badWeight, badConfidence].map((r) => r.ok)).toEqual([
        false,
        false,
        false,
      ]);
      if (!badOutcome.ok) expect(badOutcome.error.code).toBe("INVALID_OUTCOME");
      if (!badWeight.ok) expect(badWeight.error.code).toBe("VALIDATION_ERROR");
    });
  });

  describe("attemptResolve", () => {
    it("picks the outcome with the highest total weight", async () => {
      const t = createTestEngine();
      const market = await endedMarket(t);

      unwrap(await vote(t, market, "v1", "Yes", 1));
      unwrap(await vote(t, market, "v2", "Yes", 1));
      unwrap(await vote(t, market, "v3", "Yes", 2));
      unwrap(await vote(t, market, "v4", "No", 1));
      unwrap(await vote(t, market, "v5", "No", 1));

      const result = unwrap(await t.engine.resolution.attemptResolve(market.id));

      expect(result.market.status).toBe("Resolved");
      expect(result.market.winningOutcome).toBe("Yes");
      expect(result.resolution).toMatchObject({
        winningOutcome: "Yes",
        method: "VoteConsensus",
        resolvedBy: "system",
        voteCount: 5,
        totalPool: "1500.00000000",
        totalWinningStake: "1000.00000000",
        totalLosingStake: "500.00000000",
        houseEdgeBps: 0,
        houseEdgeAmount: "0.00000000",
        totalPayout: "967.74193548",
        resolvedAt: "2026-03-02T12:00:00.000Z",
        disputeDeadline: "2026-03-03T12:00:00.000Z",
      });

      const positions = await t.repo.findPositions(market.id);
      expect(positions.map((p) => [p.bettor, p.status])).toEqual([
        ["alice", "Settled"],
        ["bob", "Settled"],
      ]);
      const payouts = await t.repo.findPayouts(market.id);
      expect(payouts.map((p) => [p.bettor, p.netAmount])).toEqual([
        ["alice", "967.74193548"],
      ]);
    });

    it("fails on a tie", async () => {
      const t = createTestEngine();
      const market = await endedMarket(t);

      unwrap(await vote(t, market, "v1", "Yes", 1));
      unwrap(await vote(t, market, "v2", "Yes", 1));
      unwrap(await vote(t, market, "v3", "No", 2));

      const result = await t.engine.resolution.attemptResolve(market.id);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe("RESOLUTION_TIED");
        expect(result.error.details).toEqual({
          marketId: market.id,
          tied: ["Yes", "No"],
          weight: 2,
        });
      }
      expect((await t.repo.findMarket(market.id))?.status).toBe("Active");
    });

    it("needs the configured number of votes", async () => {
      const t = createTestEngine({ minResolutionVotes: 3 });
      const market = await endedMarket(t);

      unwrap(await vote(t, market, "v1", "Yes"));
      unwrap(await vote(t, market, "v2", "Yes"));

      const result = await t.engine.resolution.attemptResolve(market.id);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("INSUFFICIENT_VOTES");
    });

    it("cannot resolve a market that is still trading", async () => {
      const t = createTestEngine();
      const market = await openMarket(t);

      const result = await t.engine.resolution.attemptResolve(market.id);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("INVALID_TRANSITION");
    });
  });

  describe("resolve", () => {
    it("takes an admin decision without counting votes", async () => {
      const t = createTestEngine({ houseEdgeBps: 200 });
      const market = await endedMarket(t);
      unwrap(await vote(t, market, "v1", "Yes", 5));

      const result = unwrap(
        await t.engine.resolution.resolve(market.id, "no", "admin-1")
      );

      expect(result.resolution).toMatchObject({
        winningOutcome: "No",
        method: "AdminDecision",
        resolvedBy: "admin-1",
        voteCount: 1,
        houseEdgeBps: 200,
      });
      const payouts = await t.repo.findPayouts(market.id);
      expect(payouts).toHaveLength(1);
      expect(payouts[0]).toMatchObject({
        bettor: "bob",
        kind: "win",
        grossAmount: "491.80327868",
        fee: "9.83606558",
        netAmount: "481.96721310",
      });
    });

    it("resolves exactly once under concurrent attempts", async () => {
      const t = createTestEngine();
      const market = await endedMarket(t);

      const results = await Promise.all([
        t.engine.resolution.resolve(market.id, "Yes", "admin-1"),
        t.engine.resolution.resolve(market.id, "No", "admin-2"),
      ]);

      expect(results.map((r) => r.ok)).toEqual([true, false]);
      const second = results[1];
      if (!second.ok) expect(second.error.code).toBe("INVALID_TRANSITION");

      expect((await t.repo.findResolution(market.id))?.winningOutcome).toBe(
        "Yes"
      );
      expect(await t.repo.findPayouts(market.id)).toHaveLength(1);
    });

    it("emits resolution and payout events", async () => {
      const t = createTestEngine();
      const market = await endedMarket(t);

      unwrap(await t.engine.resolution.resolve(market.id, "Yes", "admin"));
      await t.engine.context.outbox.drain();

      const events = (await t.outboxRepo.all()).filter(
        (e) => e.kind === "market.resolved" || e.kind === "payout.ready"
      );
      expect(events.map((e) => [e.kind, e.topic, e.userIds])).toEqual([
        ["market.resolved", `market:${market.id}:resolved`, ["alice", "bob"]],
        ["payout.ready", "user:alice:notifications", ["alice"]],
      ]);
      expect(events[0].seq).toBeLessThan(events[1].seq);
    });
  });

  describe("refund", () => {
    it("returns every stake in full", async () => {
      const t = createTestEngine({ houseEdgeBps: 300 });
      const market = await endedMarket(t);

      const result = unwrap(await t.engine.resolution.refund(market.id, "admin"));

      expect(result.market.status).toBe("Refunded");
      expect(result.resolution).toMatchObject({
        winningOutcome: null,
        method: "AutoRefund",
        houseEdgeBps: 0,
        totalPayout: "1500.00000000",
      });
      expect(result.resolution.disputeDeadline).toBeUndefined();

      const payouts = await t.repo.findPayouts(market.id);
      expect(payouts.map((p) => [p.bettor, p.kind, p.fee, p.netAmount])).toEqual([
        ["alice", "refund", "0.00000000", "1000.00000000"],
        ["bob", "refund", "0.00000000", "500.00000000"],
      ]);
      const positions = await t.repo.findPositions(market.id);
      expect(positions.every((p) => p.status === "Voided")).toBe(true);
    });

    it("is rejected once the market is resolved", async () => {
      const t = createTestEngine();
      const market = await endedMarket(t);
      unwrap(await t.engine.resolution.resolve(market.id, "Yes", "admin"));

      const result = await t.engine.resolution.refund(market.id, "admin");
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("INVALID_TRANSITION");
    });
  });

  describe("cancel", () => {
    it("aborts an active market and refunds its positions", async () => {
      const t = createTestEngine();
      const market = await openMarket(t);
      await bet(t, market, "alice", "Yes", "250");

      const cancelled = unwrap(
        await t.engine.resolution.cancel(market.id, "admin")
      );

      expect(cancelled.status).toBe("Cancelled");
      expect(await t.repo.findResolution(market.id)).toBeNull();
      const payouts = await t.repo.findPayouts(market.id);
      expect(payouts.map((p) => [p.kind, p.netAmount])).toEqual([
        ["refund", "250.00000000"],
      ]);

      const again = await t.engine.trades.placeBet({
        marketId: market.id,
        outcome: "Yes",
        amount: "10",
        bettor: "alice",
      });
      expect(again.ok).toBe(false);
      if (!again.ok) expect(again.error.code).toBe("MARKET_NOT_ACTIVE");
    });
  });
});
