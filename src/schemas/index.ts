// /schemas/index.ts
import { z } from "zod";
import { MARKET_STATUSES, POSITION_STATUSES } from "../types/index.js";

// Amounts stay strings/numbers here; the engine parses them at fixed point
const amount = z.union([z.string().min(1), z.number()]);

// Market schemas
export const CreateMarketSchema = z.object({
  question: z.string().min(1).max(500),
  description: z.string().max(2000).optional(),
  outcomes: z.array(z.string().min(1).max(100)).min(2),
  endTime: z.string().datetime({ offset: true }),
  resolutionDeadline: z.string().datetime({ offset: true }).optional(),
  initialLiquidity: amount.optional(),
});

export const BetSchema = z.object({
  outcome: z.string().min(1),
  amount,
});

export const QuoteQuerySchema = z.object({
  outcome: z.string().min(1),
  amount: z.string().min(1),
});

// Resolution schemas
export const VoteSchema = z.object({
  voter: z.string().min(1).optional(),
  outcome: z.string().min(1),
  weight: z.number().int().min(1).default(1),
  confidence: z.number().int().min(1).max(10).optional(),
  reasoning: z.string().max(2000).optional(),
  evidenceUrl: z.string().url().optional(),
  isFinal: z.boolean().default(false),
});

export const ResolveMarketSchema = z.object({
  outcome: z.string().min(1).optional(),
});

// Query schemas
export const MarketQuerySchema = z.object({
  status: z
    .string()
    .optional()
    .transform((val) => (val ? val.split(",").filter(Boolean) : undefined))
    .pipe(z.array(z.enum(MARKET_STATUSES)).optional()),
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export const PositionQuerySchema = z.object({
  status: z.enum(POSITION_STATUSES).optional(),
});

export const PriceHistoryQuerySchema = z.object({
  outcome: z.string().min(1).optional(),
});
