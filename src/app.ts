import { Hono } from "hono";
import { cors } from "hono/cors";
import { env } from "./config/env.js";
import { createRequestLogger } from "./core/logger.js";
import type { Engine } from "./engine.js";
import { identify } from "./middleware/auth.js";
import { errorHandler } from "./middleware/errorHandler.js";
import { createRoutes } from "./routes/index.js";
import type { AppEnv } from "./types/hono.js";

export interface AppOptions {
  adminApiKey?: string;
  corsOrigins?: string;
}

export function createApp(engine: Engine, options: AppOptions = {}) {
  const app = new Hono<AppEnv>();

  // --- CORS FIRST ---
  const origins = (options.corsOrigins ?? env.CORS_ORIGINS)
    .split(",")
    .map((s) => s.trim().replace(/^"+|"+$/g, ""))
    .filter(Boolean);

  app.use(
    "*",
    cors({
      origin: origins.includes("*") ? "*" : origins,
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "x-user-id", "x-api-key"],
      maxAge: 86400,
    })
  );

  app.use("*", createRequestLogger());
  app.use("*", identify(options.adminApiKey ?? env.ADMIN_API_KEY));

  // Health
  app.get("/healthz", (c) => {
    return c.json({
      ok: true,
      timestamp: engine.context.now().toISOString(),
      environment: env.NODE_ENV,
      lockedMarkets: engine.context.locks.activeKeys,
    });
  });

  app.route("/api/v1", createRoutes(engine));

  // Error handler
  app.onError(errorHandler);

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: "NOT_FOUND",
          message: "Route not found",
          details: { path: c.req.path },
        },
      },
      404
    );
  });

  return app;
}
