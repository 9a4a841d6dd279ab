import { z } from "zod";
import { toAmount, toPrice } from "../lib/fixed-point.js";
import { MARKET_STATUSES, POSITION_STATUSES } from "../types/index.js";
import type {
  Market,
  OutcomePoolState,
  Payout,
  Position,
  PositionSettlement,
  PricePoint,
  Resolution,
  ResolutionVote,
} from "../types/index.js";

/**
 * Row shapes of the Postgres tables in supabase/migrations. Numeric
 * columns are selected as ::text so no precision is lost on the wire.
 */

const amount = z.union([z.string(), z.number()]).transform((v) => toAmount(v));
const exact = z.union([z.string(), z.number()]).transform((v) => String(v));
const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

export const MARKET_COLUMNS: string =
  "id, question, description, outcomes, status, created_by, created_at, end_time, resolution_deadline, initial_liquidity::text, total_volume::text, total_trades, winning_outcome, settled_at, halted_reason, version, updated_at";

export const POOL_COLUMNS: string =
  "market_id, outcome, share_reserve::text, cash_reserve::text, k::text, initial_liquidity::text, total_volume::text, trade_count, updated_at";

export const POSITION_COLUMNS: string =
  "id, market_id, bettor, outcome, amount_paid::text, shares_acquired::text, avg_price_per_share::text, placed_at, status, settled_at";

export const RESOLUTION_COLUMNS: string =
  "id, market_id, winning_outcome, method, resolved_by, resolved_at, vote_count, total_pool::text, total_winning_stake::text, total_losing_stake::text, house_edge_bps, house_edge_amount::text, total_payout::text, dispute_deadline";

export const PAYOUT_COLUMNS: string =
  "id, market_id, position_id, bettor, kind, gross_amount::text, fee::text, net_amount::text, profit_loss::text, created_at";

export const PRICE_COLUMNS: string =
  "market_id, outcome, price::text, position_id, recorded_at";

export const marketRow = z
  .object({
    id: z.string(),
    question: z.string(),
    description: optionalText,
    outcomes: z.array(z.string()),
    status: z.enum(MARKET_STATUSES),
    created_by: optionalText,
    created_at: z.string(),
    end_time: z.string(),
    resolution_deadline: optionalText,
    initial_liquidity: amount,
    total_volume: amount,
    total_trades: z.number().int(),
    winning_outcome: optionalText,
    settled_at: optionalText,
    halted_reason: optionalText,
    version: z.number().int(),
    updated_at: z.string(),
  })
  .transform(
    (r): Market => ({
      id: r.id,
      question: r.question,
      description: r.description,
      outcomes: r.outcomes,
      status: r.status,
      createdBy: r.created_by,
      createdAt: r.created_at,
      endTime: r.end_time,
      resolutionDeadline: r.resolution_deadline,
      initialLiquidity: r.initial_liquidity,
      totalVolume: r.total_volume,
      totalTrades: r.total_trades,
      winningOutcome: r.winning_outcome,
      settledAt: r.settled_at,
      haltedReason: r.halted_reason,
      version: r.version,
      updatedAt: r.updated_at,
    })
  );

export function toMarketRow(m: Market) {
  return {
    id: m.id,
    question: m.question,
    description: m.description ?? null,
    outcomes: m.outcomes,
    status: m.status,
    created_by: m.createdBy ?? null,
    created_at: m.createdAt,
    end_time: m.endTime,
    resolution_deadline: m.resolutionDeadline ?? null,
    initial_liquidity: m.initialLiquidity,
    total_volume: m.totalVolume,
    total_trades: m.totalTrades,
    winning_outcome: m.winningOutcome ?? null,
    settled_at: m.settledAt ?? null,
    halted_reason: m.haltedReason ?? null,
    version: m.version,
    updated_at: m.updatedAt,
  };
}

export const poolRow = z
  .object({
    market_id: z.string(),
    outcome: z.string(),
    share_reserve: amount,
    cash_reserve: amount,
    k: exact,
    initial_liquidity: amount,
    total_volume: amount,
    trade_count: z.number().int(),
    updated_at: z.string(),
  })
  .transform(
    (r): OutcomePoolState => ({
      marketId: r.market_id,
      outcome: r.outcome,
      shareReserve: r.share_reserve,
      cashReserve: r.cash_reserve,
      k: r.k,
      initialLiquidity: r.initial_liquidity,
      totalVolume: r.total_volume,
      tradeCount: r.trade_count,
      updatedAt: r.updated_at,
    })
  );

export function toPoolRow(p: OutcomePoolState) {
  return {
    market_id: p.marketId,
    outcome: p.outcome,
    share_reserve: p.shareReserve,
    cash_reserve: p.cashReserve,
    k: p.k,
    initial_liquidity: p.initialLiquidity,
    total_volume: p.totalVolume,
    trade_count: p.tradeCount,
    updated_at: p.updatedAt,
  };
}

export const positionRow = z
  .object({
    id: z.string(),
    market_id: z.string(),
    bettor: z.string(),
    outcome: z.string(),
    amount_paid: amount,
    shares_acquired: amount,
    avg_price_per_share: amount,
    placed_at: z.string(),
    status: z.enum(POSITION_STATUSES),
    settled_at: optionalText,
  })
  .transform(
    (r): Position => ({
      id: r.id,
      marketId: r.market_id,
      bettor: r.bettor,
      outcome: r.outcome,
      amountPaid: r.amount_paid,
      sharesAcquired: r.shares_acquired,
      avgPricePerShare: r.avg_price_per_share,
      placedAt: r.placed_at,
      status: r.status,
      settledAt: r.settled_at,
    })
  );

export function toPositionRow(p: Position) {
  return {
    id: p.id,
    market_id: p.marketId,
    bettor: p.bettor,
    outcome: p.outcome,
    amount_paid: p.amountPaid,
    shares_acquired: p.sharesAcquired,
    avg_price_per_share: p.avgPricePerShare,
    placed_at: p.placedAt,
    status: p.status,
    settled_at: p.settledAt ?? null,
  };
}

export function toSettlementRow(s: PositionSettlement) {
  return { id: s.id, status: s.status, settled_at: s.settledAt };
}

export const voteRow = z
  .object({
    market_id: z.string(),
    voter: z.string(),
    chosen_outcome: z.string(),
    weight: z.number().int(),
    confidence: z.number().int().nullish(),
    reasoning: optionalText,
    evidence_url: optionalText,
    is_final: z.boolean(),
    created_at: z.string(),
    updated_at: z.string(),
  })
  .transform(
    (r): ResolutionVote => ({
      marketId: r.market_id,
      voter: r.voter,
      chosenOutcome: r.chosen_outcome,
      weight: r.weight,
      confidence: r.confidence ?? undefined,
      reasoning: r.reasoning,
      evidenceUrl: r.evidence_url,
      isFinal: r.is_final,
      createdAt: r.created_at,
      updatedAt: r.updated_at,
    })
  );

export function toVoteRow(v: ResolutionVote) {
  return {
    market_id: v.marketId,
    voter: v.voter,
    chosen_outcome: v.chosenOutcome,
    weight: v.weight,
    confidence: v.confidence ?? null,
    reasoning: v.reasoning ?? null,
    evidence_url: v.evidenceUrl ?? null,
    is_final: v.isFinal,
    created_at: v.createdAt,
    updated_at: v.updatedAt,
  };
}

export const resolutionRow = z
  .object({
    id: z.string(),
    market_id: z.string(),
    winning_outcome: z.string().nullable(),
    method: z.enum(["AdminDecision", "VoteConsensus", "Oracle", "AutoRefund"]),
    resolved_by: optionalText,
    resolved_at: z.string(),
    vote_count: z.number().int(),
    total_pool: amount,
    total_winning_stake: amount,
    total_losing_stake: amount,
    house_edge_bps: z.number().int(),
    house_edge_amount: amount,
    total_payout: amount,
    dispute_deadline: optionalText,
  })
  .transform(
    (r): Resolution => ({
      id: r.id,
      marketId: r.market_id,
      winningOutcome: r.winning_outcome,
      method: r.method,
      resolvedBy: r.resolved_by,
      resolvedAt: r.resolved_at,
      voteCount: r.vote_count,
      totalPool: r.total_pool,
      totalWinningStake: r.total_winning_stake,
      totalLosingStake: r.total_losing_stake,
      houseEdgeBps: r.house_edge_bps,
      houseEdgeAmount: r.house_edge_amount,
      totalPayout: r.total_payout,
      disputeDeadline: r.dispute_deadline,
    })
  );

export function toResolutionRow(r: Resolution) {
  return {
    id: r.id,
    market_id: r.marketId,
    winning_outcome: r.winningOutcome,
    method: r.method,
    resolved_by: r.resolvedBy ?? null,
    resolved_at: r.resolvedAt,
    vote_count: r.voteCount,
    total_pool: r.totalPool,
    total_winning_stake: r.totalWinningStake,
    total_losing_stake: r.totalLosingStake,
    house_edge_bps: r.houseEdgeBps,
    house_edge_amount: r.houseEdgeAmount,
    total_payout: r.totalPayout,
    dispute_deadline: r.disputeDeadline ?? null,
  };
}

export const payoutRow = z
  .object({
    id: z.string(),
    market_id: z.string(),
    position_id: z.string(),
    bettor: z.string(),
    kind: z.enum(["win", "refund"]),
    gross_amount: amount,
    fee: amount,
    net_amount: amount,
    profit_loss: amount,
    created_at: z.string(),
  })
  .transform(
    (r): Payout => ({
      id: r.id,
      marketId: r.market_id,
      positionRef: r.position_id,
      bettor: r.bettor,
      kind: r.kind,
      grossAmount: r.gross_amount,
      fee: r.fee,
      netAmount: r.net_amount,
      profitLoss: r.profit_loss,
      createdAt: r.created_at,
    })
  );

export function toPayoutRow(p: Payout) {
  return {
    id: p.id,
    market_id: p.marketId,
    position_id: p.positionRef,
    bettor: p.bettor,
    kind: p.kind,
    gross_amount: p.grossAmount,
    fee: p.fee,
    net_amount: p.netAmount,
    profit_loss: p.profitLoss,
    created_at: p.createdAt,
  };
}

export const pricePointRow = z
  .object({
    market_id: z.string(),
    outcome: z.string(),
    price: z.union([z.string(), z.number()]).transform((v) => toPrice(v)),
    position_id: z.string(),
    recorded_at: z.string(),
  })
  .transform(
    (r): PricePoint => ({
      marketId: r.market_id,
      outcome: r.outcome,
      price: r.price,
      positionRef: r.position_id,
      recordedAt: r.recorded_at,
    })
  );

export function toPricePointRow(p: PricePoint) {
  return {
    market_id: p.marketId,
    outcome: p.outcome,
    price: p.price,
    position_id: p.positionRef,
    recorded_at: p.recordedAt,
  };
}
