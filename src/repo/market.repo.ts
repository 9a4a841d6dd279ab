import type {
  Market,
  MarketStatus,
  OutcomePoolState,
  Payout,
  Position,
  PositionSettlement,
  PositionStatus,
  PricePoint,
  Resolution,
  ResolutionVote,
} from "../types/index.js";

export interface MarketFilters {
  status?: MarketStatus[];
  /** Only markets whose endTime is at or before this instant */
  endingBefore?: string;
  limit?: number;
}

/**
 * Everything one locked operation writes for a market, applied as a
 * single transaction. `market.version` must be `expectedVersion + 1`.
 */
export interface MarketCommit {
  expectedVersion: number;
  market: Market;
  pools?: OutcomePoolState[];
  newPositions?: Position[];
  settledPositions?: PositionSettlement[];
  resolution?: Resolution;
  payouts?: Payout[];
  /** Appended to the market's price history */
  pricePoints?: PricePoint[];
}

export type CommitConflict =
  | "version_conflict"
  | "position_already_settled"
  | "resolution_exists";

export type CommitResult =
  | { committed: true }
  | { committed: false; reason: CommitConflict };

/**
 * Storage collaborator. Reads return detached copies; the only multi-row
 * write paths are insertMarket and commit, both atomic.
 */
export interface MarketRepository {
  insertMarket(market: Market, pools: OutcomePoolState[]): Promise<void>;
  findMarket(marketId: string): Promise<Market | null>;
  listMarkets(filters?: MarketFilters): Promise<Market[]>;
  findPools(marketId: string): Promise<OutcomePoolState[]>;

  findPositions(
    marketId: string,
    status?: PositionStatus
  ): Promise<Position[]>;
  findUserPositions(bettor: string, marketId?: string): Promise<Position[]>;

  findVote(marketId: string, voter: string): Promise<ResolutionVote | null>;
  findVotes(marketId: string): Promise<ResolutionVote[]>;
  /** Insert or replace the single vote for (marketId, voter) */
  upsertVote(vote: ResolutionVote): Promise<ResolutionVote>;

  findResolution(marketId: string): Promise<Resolution | null>;
  findPayouts(marketId: string): Promise<Payout[]>;
  /** Oldest first */
  findPriceHistory(marketId: string, outcome?: string): Promise<PricePoint[]>;

  /** Flags the market for manual remediation without touching reserves */
  haltMarket(marketId: string, reason: string): Promise<void>;

  commit(change: MarketCommit): Promise<CommitResult>;
}
