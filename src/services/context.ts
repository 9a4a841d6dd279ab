import {
  NotFoundError,
  ResourceBusyError,
  StateConflictError,
  type AppError,
} from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { EventOutbox } from "../core/outbox.js";
import { err, ok, type Result } from "../core/result.js";
import type { EngineConfig } from "../config/engine.js";
import type { MarketLockManager } from "../lib/locks.js";
import type { MarketCommit, MarketRepository } from "../repo/market.repo.js";
import type { Market } from "../types/index.js";

/** Collaborators shared by every engine service */
export interface EngineContext {
  repo: MarketRepository;
  outbox: EventOutbox;
  locks: MarketLockManager;
  config: EngineConfig;
  logger: Logger;
  now: () => Date;
}

export async function loadMarket(
  ctx: EngineContext,
  marketId: string
): Promise<Result<Market, NotFoundError>> {
  const market = await ctx.repo.findMarket(marketId);
  return market ? ok(market) : err(new NotFoundError("Market", marketId));
}

/** Next stored row for `market`, with the version bumped for the commit */
export function nextRevision(
  market: Market,
  patch: Partial<Market>,
  now: Date
): Market {
  return {
    ...market,
    ...patch,
    version: market.version + 1,
    updatedAt: now.toISOString(),
  };
}

/** Applies a change set and maps a lost compare-and-set to an error */
export async function commitChange(
  ctx: EngineContext,
  change: MarketCommit
): Promise<Result<void, AppError>> {
  const result = await ctx.repo.commit(change);
  if (result.committed) return ok(undefined);

  const marketId = change.market.id;
  ctx.logger.warn({ marketId, reason: result.reason }, "Market commit rejected");

  switch (result.reason) {
    case "version_conflict":
      return err(new ResourceBusyError(marketId, "concurrent update"));
    case "position_already_settled":
      return err(
        new StateConflictError(
          `Positions of market '${marketId}' are already settled`,
          "ALREADY_SETTLED",
          { marketId }
        )
      );
    case "resolution_exists":
      return err(
        new StateConflictError(
          `Market '${marketId}' already has a resolution`,
          "ALREADY_RESOLVED",
          { marketId }
        )
      );
  }
}
