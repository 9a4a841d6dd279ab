import { z } from "zod";
import { configDotenv } from "dotenv";
configDotenv();

const decimalString = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .refine((v) => /^\d+(\.\d+)?$/.test(v), "must be a non-negative decimal");

const envSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),
    PORT: z.coerce.number().default(3010),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .optional(),

    // Storage
    STORAGE_DRIVER: z.enum(["memory", "supabase"]).default("memory"),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),

    // Notifications
    REDIS_URL: z.string().optional(),

    // Admin
    ADMIN_API_KEY: z.string().min(1).optional(),

    // CORS
    CORS_ORIGINS: z.string().default("*"),

    // Engine
    MIN_BET_AMOUNT: decimalString.default("1"),
    MAX_BET_AMOUNT: decimalString.default("1000000"),
    DEFAULT_INITIAL_LIQUIDITY: decimalString.default("30000"),
    MIN_RESOLUTION_VOTES: z.coerce.number().int().min(1).default(2),
    HOUSE_EDGE_BPS: z.coerce.number().int().min(0).max(10_000).default(0),
    MARKET_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
    AUTO_REFUND_HOURS: z.coerce.number().positive().default(120),
    DISPUTE_WINDOW_HOURS: z.coerce.number().min(0).default(24),
    MAX_OUTCOMES: z.coerce.number().int().min(2).max(10).default(10),
    MIN_MARKET_DURATION_MINUTES: z.coerce.number().min(0).default(5),
    MAX_MARKET_DURATION_HOURS: z.coerce.number().positive().default(720),
    PRICE_NORMALIZATION: z
      .enum(["independent", "normalized"])
      .default("independent"),
    PAYOUT_MODE: z.enum(["par", "pool"]).default("par"),
    LIFECYCLE_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  })
  .refine((e) => Number(e.MIN_BET_AMOUNT) > 0, {
    message: "MIN_BET_AMOUNT must be positive",
    path: ["MIN_BET_AMOUNT"],
  })
  .refine((e) => Number(e.MIN_BET_AMOUNT) < Number(e.MAX_BET_AMOUNT), {
    message: "MIN_BET_AMOUNT must be less than MAX_BET_AMOUNT",
    path: ["MAX_BET_AMOUNT"],
  })
  .refine(
    (e) =>
      e.STORAGE_DRIVER !== "supabase" ||
      (e.SUPABASE_URL !== undefined && e.SUPABASE_SERVICE_ROLE_KEY !== undefined),
    {
      message: "SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the supabase driver",
      path: ["STORAGE_DRIVER"],
    }
  );

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

export const env = parseEnv(process.env);
