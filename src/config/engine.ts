import type { Env } from "./env.js";

export type PriceNormalization = "independent" | "normalized";
export type PayoutMode = "par" | "pool";

export interface EngineConfig {
  minBetAmount: string;
  maxBetAmount: string;
  defaultInitialLiquidity: string;
  minResolutionVotes: number;
  houseEdgeBps: number;
  lockTimeoutMs: number;
  autoRefundHours: number;
  /** 0 disables the dispute deadline on resolutions */
  disputeWindowHours: number;
  maxOutcomes: number;
  minMarketDurationMinutes: number;
  maxMarketDurationHours: number;
  priceNormalization: PriceNormalization;
  payoutMode: PayoutMode;
}

export const defaultEngineConfig: EngineConfig = {
  minBetAmount: "1",
  maxBetAmount: "1000000",
  defaultInitialLiquidity: "30000",
  minResolutionVotes: 2,
  houseEdgeBps: 0,
  lockTimeoutMs: 2000,
  autoRefundHours: 120,
  disputeWindowHours: 24,
  maxOutcomes: 10,
  minMarketDurationMinutes: 5,
  maxMarketDurationHours: 720,
  priceNormalization: "independent",
  payoutMode: "par",
};

export function engineConfigFromEnv(env: Env): EngineConfig {
  return {
    minBetAmount: env.MIN_BET_AMOUNT,
    maxBetAmount: env.MAX_BET_AMOUNT,
    defaultInitialLiquidity: env.DEFAULT_INITIAL_LIQUIDITY,
    minResolutionVotes: env.MIN_RESOLUTION_VOTES,
    houseEdgeBps: env.HOUSE_EDGE_BPS,
    lockTimeoutMs: env.MARKET_LOCK_TIMEOUT_MS,
    autoRefundHours: env.AUTO_REFUND_HOURS,
    disputeWindowHours: env.DISPUTE_WINDOW_HOURS,
    maxOutcomes: env.MAX_OUTCOMES,
    minMarketDurationMinutes: env.MIN_MARKET_DURATION_MINUTES,
    maxMarketDurationHours: env.MAX_MARKET_DURATION_HOURS,
    priceNormalization: env.PRICE_NORMALIZATION,
    payoutMode: env.PAYOUT_MODE,
  };
}
