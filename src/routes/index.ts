import { Hono } from "hono";
import { MarketController } from "../controllers/market.controller.js";
import type { Engine } from "../engine.js";
import type { AppEnv } from "../types/hono.js";
import { createMarketRoutes } from "./market.routes.js";

export function createRoutes(engine: Engine) {
  const app = new Hono<AppEnv>();

  app.get("/", (c) => {
    return c.json({
      name: "amm-market-engine",
      version: "1.0.0",
    });
  });

  // Mount routes
  app.route("/markets", createMarketRoutes(new MarketController(engine)));

  return app;
}
