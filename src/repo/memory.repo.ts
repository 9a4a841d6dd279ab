import type {
  CommitResult,
  MarketCommit,
  MarketFilters,
  MarketRepository,
} from "./market.repo.js";
import type {
  NewOutboxEvent,
  OutboxEvent,
  OutboxRepository,
} from "./outbox.repo.js";
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

const voteKey = (marketId: string, voter: string) => `${marketId}:${voter}`;

function copy<T>(value: T): T {
  return structuredClone(value);
}

/**
 * Process-local storage with the same contract as the Supabase repository.
 * Every read hands out a copy, so callers only see state through commit.
 */
export class InMemoryMarketRepository implements MarketRepository {
  private markets = new Map<string, Market>();
  private pools = new Map<string, OutcomePoolState[]>();
  private positions = new Map<string, Position[]>();
  private votes = new Map<string, ResolutionVote>();
  private resolutions = new Map<string, Resolution>();
  private payouts = new Map<string, Payout[]>();
  private prices = new Map<string, PricePoint[]>();

  async insertMarket(market: Market, pools: OutcomePoolState[]): Promise<void> {
    if (this.markets.has(market.id)) {
      throw new Error(`Market '${market.id}' already exists`);
    }
    this.markets.set(market.id, copy(market));
    this.pools.set(market.id, copy(pools));
    this.positions.set(market.id, []);
    this.payouts.set(market.id, []);
    this.prices.set(market.id, []);
  }

  async findMarket(marketId: string): Promise<Market | null> {
    const market = this.markets.get(marketId);
    return market ? copy(market) : null;
  }

  async listMarkets(filters: MarketFilters = {}): Promise<Market[]> {
    const { status, endingBefore, limit } = filters;
    const cutoff = endingBefore ? new Date(endingBefore).getTime() : undefined;

    const result = [...this.markets.values()]
      .filter((m) => !status || status.includes(m.status))
      .filter(
        (m) => cutoff === undefined || new Date(m.endTime).getTime() <= cutoff
      )
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));

    return copy(limit ? result.slice(0, limit) : result);
  }

  async findPools(marketId: string): Promise<OutcomePoolState[]> {
    return copy(this.pools.get(marketId) ?? []);
  }

  async findPositions(
    marketId: string,
    status?: PositionStatus
  ): Promise<Position[]> {
    const all = this.positions.get(marketId) ?? [];
    return copy(status ? all.filter((p) => p.status === status) : all);
  }

  async findUserPositions(
    bettor: string,
    marketId?: string
  ): Promise<Position[]> {
    const result: Position[] = [];
    for (const [id, list] of this.positions) {
      if (marketId && id !== marketId) continue;
      result.push(...list.filter((p) => p.bettor === bettor));
    }
    return copy(result.sort((a, b) => b.placedAt.localeCompare(a.placedAt)));
  }

  async findVote(
    marketId: string,
    voter: string
  ): Promise<ResolutionVote | null> {
    const vote = this.votes.get(voteKey(marketId, voter));
    return vote ? copy(vote) : null;
  }

  async findVotes(marketId: string): Promise<ResolutionVote[]> {
    return copy(
      [...this.votes.values()].filter((v) => v.marketId === marketId)
    );
  }

  async upsertVote(vote: ResolutionVote): Promise<ResolutionVote> {
    this.votes.set(voteKey(vote.marketId, vote.voter), copy(vote));
    return copy(vote);
  }

  async findResolution(marketId: string): Promise<Resolution | null> {
    const resolution = this.resolutions.get(marketId);
    return resolution ? copy(resolution) : null;
  }

  async findPayouts(marketId: string): Promise<Payout[]> {
    return copy(this.payouts.get(marketId) ?? []);
  }

  async findPriceHistory(
    marketId: string,
    outcome?: string
  ): Promise<PricePoint[]> {
    const all = this.prices.get(marketId) ?? [];
    return copy(outcome ? all.filter((p) => p.outcome === outcome) : all);
  }

  async haltMarket(marketId: string, reason: string): Promise<void> {
    const market = this.markets.get(marketId);
    if (!market) return;
    this.markets.set(marketId, {
      ...market,
      haltedReason: reason,
      version: market.version + 1,
      updatedAt: new Date().toISOString(),
    });
  }

  async commit(change: MarketCommit): Promise<CommitResult> {
    const marketId = change.market.id;
    const current = this.markets.get(marketId);

    // Validate everything before the first write
    if (
      !current ||
      current.version !== change.expectedVersion ||
      change.market.version !== change.expectedVersion + 1
    ) {
      return { committed: false, reason: "version_conflict" };
    }

    const positions = this.positions.get(marketId) ?? [];
    const byId = new Map(positions.map((p) => [p.id, p]));
    for (const settled of change.settledPositions ?? []) {
      if (byId.get(settled.id)?.status !== "Open") {
        return { committed: false, reason: "position_already_settled" };
      }
    }

    if (change.resolution && this.resolutions.has(marketId)) {
      return { committed: false, reason: "resolution_exists" };
    }

    this.markets.set(marketId, copy(change.market));

    if (change.pools?.length) {
      const updated = new Map(change.pools.map((p) => [p.outcome, p]));
      this.pools.set(
        marketId,
        (this.pools.get(marketId) ?? []).map((p) =>
          copy(updated.get(p.outcome) ?? p)
        )
      );
    }

    const settledById = new Map(
      (change.settledPositions ?? []).map((s) => [s.id, s])
    );
    this.positions.set(marketId, [
      ...positions.map((p) => {
        const s = settledById.get(p.id);
        return s ? { ...p, status: s.status, settledAt: s.settledAt } : p;
      }),
      ...copy(change.newPositions ?? []),
    ]);

    if (change.resolution) {
      this.resolutions.set(marketId, copy(change.resolution));
    }

    if (change.payouts?.length) {
      this.payouts.set(marketId, [
        ...(this.payouts.get(marketId) ?? []),
        ...copy(change.payouts),
      ]);
    }

    if (change.pricePoints?.length) {
      this.prices.set(marketId, [
        ...(this.prices.get(marketId) ?? []),
        ...copy(change.pricePoints),
      ]);
    }

    return { committed: true };
  }
}

export class InMemoryOutboxRepository implements OutboxRepository {
  private events: OutboxEvent[] = [];
  private nextSeq = 1;

  async append(events: NewOutboxEvent[]): Promise<OutboxEvent[]> {
    const createdAt = new Date().toISOString();
    const stored = events.map((e) => ({
      ...copy(e),
      seq: this.nextSeq++,
      createdAt,
      retries: 0,
    }));
    this.events.push(...stored);
    return copy(stored);
  }

  async getUndeliveredEvents(limit: number = 500): Promise<OutboxEvent[]> {
    return copy(
      this.events.filter((e) => e.deliveredAt === undefined).slice(0, limit)
    );
  }

  async markDelivered(seq: number): Promise<void> {
    const event = this.events.find((e) => e.seq === seq);
    if (event) event.deliveredAt = new Date().toISOString();
  }

  async incrementRetries(seq: number): Promise<void> {
    const event = this.events.find((e) => e.seq === seq);
    if (event) event.retries += 1;
  }

  /** All events in sequence order, delivered or not */
  async all(): Promise<OutboxEvent[]> {
    return copy(this.events);
  }
}
