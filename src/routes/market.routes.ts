import { Hono } from "hono";
import type { MarketController } from "../controllers/market.controller.js";
import { requireAdmin, requireUser } from "../middleware/auth.js";
import type { AppEnv } from "../types/hono.js";

export function createMarketRoutes(controller: MarketController) {
  const marketsRoutes = new Hono<AppEnv>();

  marketsRoutes.get("/", controller.listMarkets);
  marketsRoutes.post("/", requireAdmin(), controller.createMarket);
  marketsRoutes.get(
    "/users/:userId/positions",
    controller.getUserPositions
  );

  marketsRoutes.get("/:id", controller.getMarket);
  marketsRoutes.get("/:id/quote", controller.getQuote);
  marketsRoutes.get("/:id/positions", controller.getPositions);
  marketsRoutes.get("/:id/history", controller.getPriceHistory);
  marketsRoutes.post("/:id/bets", requireUser(), controller.placeBet);

  marketsRoutes.get("/:id/votes", controller.getVotes);
  marketsRoutes.post("/:id/votes", requireAdmin(), controller.castVote);
  marketsRoutes.post("/:id/resolve", requireAdmin(), controller.resolve);
  marketsRoutes.post("/:id/refund", requireAdmin(), controller.refund);
  marketsRoutes.post("/:id/cancel", requireAdmin(), controller.cancel);

  marketsRoutes.post("/:id/close", requireAdmin(), controller.close);
  marketsRoutes.post("/:id/pause", requireAdmin(), controller.pause);
  marketsRoutes.post("/:id/resume", requireAdmin(), controller.resume);

  marketsRoutes.post("/:id/settle", requireAdmin(), controller.settle);
  marketsRoutes.get("/:id/payouts", controller.getPayouts);

  return marketsRoutes;
}
