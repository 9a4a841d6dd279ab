import { env } from "./config/env.js";
import { engineConfigFromEnv, type EngineConfig } from "./config/engine.js";
import { logger as rootLogger, type Logger } from "./core/logger.js";
import { EventOutbox } from "./core/outbox.js";
import { MarketLockManager } from "./lib/locks.js";
import type { MarketRepository } from "./repo/market.repo.js";
import {
  InMemoryMarketRepository,
  InMemoryOutboxRepository,
} from "./repo/memory.repo.js";
import {
  SupabaseOutboxRepository,
  type OutboxRepository,
} from "./repo/outbox.repo.js";
import { SupabaseMarketRepository } from "./repo/supabase-market.repo.js";
import type { EngineContext } from "./services/context.js";
import { MarketService } from "./services/market.service.js";
import { ResolutionService } from "./services/resolution.service.js";
import { SettlementService } from "./services/settlement.service.js";
import { TradeService } from "./services/trade.service.js";

export interface EngineOptions {
  config?: EngineConfig;
  repo?: MarketRepository;
  outboxRepo?: OutboxRepository;
  logger?: Logger;
  now?: () => Date;
}

export interface Engine {
  context: EngineContext;
  outboxRepo: OutboxRepository;
  markets: MarketService;
  trades: TradeService;
  resolution: ResolutionService;
  settlement: SettlementService;
}

function defaultRepositories(): {
  repo: MarketRepository;
  outboxRepo: OutboxRepository;
} {
  if (env.STORAGE_DRIVER === "supabase") {
    return {
      repo: new SupabaseMarketRepository(),
      outboxRepo: new SupabaseOutboxRepository(),
    };
  }
  return {
    repo: new InMemoryMarketRepository(),
    outboxRepo: new InMemoryOutboxRepository(),
  };
}

/** Wires the engine services around one repository and lock manager */
export function createEngine(options: EngineOptions = {}): Engine {
  const defaults =
    options.repo && options.outboxRepo
      ? { repo: options.repo, outboxRepo: options.outboxRepo }
      : defaultRepositories();
  const repo = options.repo ?? defaults.repo;
  const outboxRepo = options.outboxRepo ?? defaults.outboxRepo;

  const config = options.config ?? engineConfigFromEnv(env);
  const logger = (options.logger ?? rootLogger).child({ module: "engine" });

  const context: EngineContext = {
    repo,
    outbox: new EventOutbox(outboxRepo, logger),
    locks: new MarketLockManager(config.lockTimeoutMs),
    config,
    logger,
    now: options.now ?? (() => new Date()),
  };

  const settlement = new SettlementService(context);
  return {
    context,
    outboxRepo,
    markets: new MarketService(context),
    trades: new TradeService(context),
    resolution: new ResolutionService(context, settlement),
    settlement,
  };
}
