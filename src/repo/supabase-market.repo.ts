import { z } from "zod";
import type { SupabaseClient } from "@supabase/supabase-js";
import { executeQuery, getSupabase, NO_ROWS } from "../config/supabase.js";
import type {
  CommitResult,
  MarketCommit,
  MarketFilters,
  MarketRepository,
} from "./market.repo.js";
import {
  MARKET_COLUMNS,
  PAYOUT_COLUMNS,
  POOL_COLUMNS,
  POSITION_COLUMNS,
  PRICE_COLUMNS,
  RESOLUTION_COLUMNS,
  marketRow,
  payoutRow,
  poolRow,
  positionRow,
  pricePointRow,
  resolutionRow,
  toMarketRow,
  toPayoutRow,
  toPoolRow,
  toPositionRow,
  toPricePointRow,
  toResolutionRow,
  toSettlementRow,
  toVoteRow,
  voteRow,
} from "./rows.js";
import type {
  Market,
  OutcomePoolState,
  Payout,
  Position,
  PositionStatus,
  PricePoint,
  Resolution,
  ResolutionVote,
} from "../types/index.js";

const commitResponse = z.object({
  committed: z.boolean(),
  reason: z
    .enum(["version_conflict", "position_already_settled", "resolution_exists"])
    .nullish(),
});

/**
 * Postgres-backed storage through PostgREST. Multi-row writes go through
 * the create_market / commit_market_changes functions so each runs as one
 * transaction.
 */
export class SupabaseMarketRepository implements MarketRepository {
  constructor(private readonly db: SupabaseClient = getSupabase()) {}

  async insertMarket(market: Market, pools: OutcomePoolState[]): Promise<void> {
    await executeQuery(
      this.db.rpc("create_market", {
        p_market: toMarketRow(market),
        p_pools: pools.map(toPoolRow),
      }),
      "create market"
    );
  }

  async findMarket(marketId: string): Promise<Market | null> {
    const { data, error } = await this.db
      .from("markets")
      .select(MARKET_COLUMNS)
      .eq("id", marketId)
      .single();

    if (error && error.code !== NO_ROWS) {
      throw new Error(`Failed to find market: ${error.message}`);
    }

    return data ? marketRow.parse(data) : null;
  }

  async listMarkets(filters: MarketFilters = {}): Promise<Market[]> {
    let query = this.db
      .from("markets")
      .select(MARKET_COLUMNS)
      .order("created_at", { ascending: false });

    if (filters.status?.length) {
      query = query.in("status", filters.status);
    }
    if (filters.endingBefore) {
      query = query.lte("end_time", filters.endingBefore);
    }
    if (filters.limit) {
      query = query.limit(filters.limit);
    }

    const data = await executeQuery(query, "list markets");
    return z.array(marketRow).parse(data);
  }

  async findPools(marketId: string): Promise<OutcomePoolState[]> {
    const data = await executeQuery(
      this.db.from("outcome_pools").select(POOL_COLUMNS).eq("market_id", marketId),
      "find pools"
    );
    return z.array(poolRow).parse(data);
  }

  async findPositions(
    marketId: string,
    status?: PositionStatus
  ): Promise<Position[]> {
    let query = this.db
      .from("positions")
      .select(POSITION_COLUMNS)
      .eq("market_id", marketId)
      .order("placed_at", { ascending: true })
      .order("id", { ascending: true });

    if (status) {
      query = query.eq("status", status);
    }

    const data = await executeQuery(query, "find positions");
    return z.array(positionRow).parse(data);
  }

  async findUserPositions(
    bettor: string,
    marketId?: string
  ): Promise<Position[]> {
    let query = this.db
      .from("positions")
      .select(POSITION_COLUMNS)
      .eq("bettor", bettor)
      .order("placed_at", { ascending: false });

    if (marketId) {
      query = query.eq("market_id", marketId);
    }

    const data = await executeQuery(query, "find user positions");
    return z.array(positionRow).parse(data);
  }

  async findVote(
    marketId: string,
    voter: string
  ): Promise<ResolutionVote | null> {
    const { data, error } = await this.db
      .from("resolution_votes")
      .select("*")
      .eq("market_id", marketId)
      .eq("voter", voter)
      .single();

    if (error && error.code !== NO_ROWS) {
      throw new Error(`Failed to find resolution vote: ${error.message}`);
    }

    return data ? voteRow.parse(data) : null;
  }

  async findVotes(marketId: string): Promise<ResolutionVote[]> {
    const data = await executeQuery(
      this.db
        .from("resolution_votes")
        .select("*")
        .eq("market_id", marketId)
        .order("created_at", { ascending: true }),
      "find votes"
    );
    return z.array(voteRow).parse(data);
  }

  async upsertVote(vote: ResolutionVote): Promise<ResolutionVote> {
    const data = await executeQuery(
      this.db
        .from("resolution_votes")
        .upsert(toVoteRow(vote), { onConflict: "market_id,voter" })
        .select("*")
        .single(),
      "upsert vote"
    );
    return voteRow.parse(data);
  }

  async findResolution(marketId: string): Promise<Resolution | null> {
    const { data, error } = await this.db
      .from("resolutions")
      .select(RESOLUTION_COLUMNS)
      .eq("market_id", marketId)
      .single();

    if (error && error.code !== NO_ROWS) {
      throw new Error(`Failed to find resolution: ${error.message}`);
    }

    return data ? resolutionRow.parse(data) : null;
  }

  async findPayouts(marketId: string): Promise<Payout[]> {
    const data = await executeQuery(
      this.db
        .from("payouts")
        .select(PAYOUT_COLUMNS)
        .eq("market_id", marketId)
        .order("created_at", { ascending: true }),
      "find payouts"
    );
    return z.array(payoutRow).parse(data);
  }

  async findPriceHistory(
    marketId: string,
    outcome?: string
  ): Promise<PricePoint[]> {
    let query = this.db
      .from("price_history")
      .select(PRICE_COLUMNS)
      .eq("market_id", marketId)
      .order("id", { ascending: true });

    if (outcome) {
      query = query.eq("outcome", outcome);
    }

    const data = await executeQuery(query, "find price history");
    return z.array(pricePointRow).parse(data);
  }

  async haltMarket(marketId: string, reason: string): Promise<void> {
    await executeQuery(
      this.db.rpc("halt_market", { p_market_id: marketId, p_reason: reason }),
      "halt market"
    );
  }

  async commit(change: MarketCommit): Promise<CommitResult> {
    const data = await executeQuery(
      this.db.rpc("commit_market_changes", {
        p_expected_version: change.expectedVersion,
        p_market: toMarketRow(change.market),
        p_pools: (change.pools ?? []).map(toPoolRow),
        p_new_positions: (change.newPositions ?? []).map(toPositionRow),
        p_settled_positions: (change.settledPositions ?? []).map(toSettlementRow),
        p_resolution: change.resolution ? toResolutionRow(change.resolution) : null,
        p_payouts: (change.payouts ?? []).map(toPayoutRow),
        p_price_points: (change.pricePoints ?? []).map(toPricePointRow),
      }),
      "commit market changes"
    );

    const result = commitResponse.parse(data);
    if (result.committed) return { committed: true };
    return { committed: false, reason: result.reason ?? "version_conflict" };
  }
}
