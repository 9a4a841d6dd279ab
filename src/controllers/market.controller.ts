import type { Context } from "hono";
import { formatError } from "../core/errors.js";
import type { Result } from "../core/result.js";
import type { Engine } from "../engine.js";
import { toStatus } from "../middleware/errorHandler.js";
import { parseJsonBody, parseWith } from "../middleware/validation.js";
import {
  BetSchema,
  CreateMarketSchema,
  MarketQuerySchema,
  PositionQuerySchema,
  PriceHistoryQuerySchema,
  QuoteQuerySchema,
  ResolveMarketSchema,
  VoteSchema,
} from "../schemas/index.js";
import type { AppEnv } from "../types/hono.js";

type AppContext = Context<AppEnv>;

function send<T>(
  c: AppContext,
  result: Result<T>,
  key: string,
  status: 200 | 201 = 200
) {
  if (!result.ok) {
    const log = c.get("logger");
    log.debug(
      { code: result.error.code, details: result.error.details },
      "Request rejected"
    );
    return c.json(
      formatError(result.error),
      toStatus(result.error.statusCode)
    );
  }
  return c.json({ [key]: result.value }, status);
}

function marketIdOf(c: AppContext): string {
  return c.req.param("id") ?? "";
}

export class MarketController {
  constructor(private readonly engine: Engine) {}

  createMarket = async (c: AppContext) => {
    const body = await parseJsonBody(c, CreateMarketSchema);
    if (!body.ok) return send(c, body, "market");

    const result = await this.engine.markets.createMarket({
      ...body.value,
      createdBy: c.get("userId") || undefined,
    });
    return send(c, result, "market", 201);
  };

  listMarkets = async (c: AppContext) => {
    const query = parseWith(MarketQuerySchema, c.req.query());
    if (!query.ok) return send(c, query, "markets");

    const markets = await this.engine.markets.listMarkets(query.value);
    return c.json({ markets });
  };

  getMarket = async (c: AppContext) => {
    const result = await this.engine.markets.getMarketState(marketIdOf(c));
    return send(c, result, "market");
  };

  getPositions = async (c: AppContext) => {
    const query = parseWith(PositionQuerySchema, c.req.query());
    if (!query.ok) return send(c, query, "positions");

    const result = await this.engine.markets.getMarketPositions(
      marketIdOf(c),
      query.value.status
    );
    return send(c, result, "positions");
  };

  getPriceHistory = async (c: AppContext) => {
    const query = parseWith(PriceHistoryQuerySchema, c.req.query());
    if (!query.ok) return send(c, query, "history");

    const result = await this.engine.markets.getPriceHistory(
      marketIdOf(c),
      query.value.outcome
    );
    return send(c, result, "history");
  };

  getQuote = async (c: AppContext) => {
    const query = parseWith(QuoteQuerySchema, c.req.query());
    if (!query.ok) return send(c, query, "quote");

    const result = await this.engine.trades.getQuote(
      marketIdOf(c),
      query.value.outcome,
      query.value.amount
    );
    return send(c, result, "quote");
  };

  placeBet = async (c: AppContext) => {
    const body = await parseJsonBody(c, BetSchema);
    if (!body.ok) return send(c, body, "bet");

    const result = await this.engine.trades.placeBet({
      marketId: marketIdOf(c),
      outcome: body.value.outcome,
      amount: body.value.amount,
      bettor: c.get("userId"),
    });
    return send(c, result, "bet", 201);
  };

  castVote = async (c: AppContext) => {
    const body = await parseJsonBody(c, VoteSchema);
    if (!body.ok) return send(c, body, "vote");

    const { voter, ...vote } = body.value;
    const result = await this.engine.resolution.castVote({
      ...vote,
      marketId: marketIdOf(c),
      voter: voter ?? c.get("userId"),
    });
    return send(c, result, "vote");
  };

  getVotes = async (c: AppContext) => {
    const result = await this.engine.resolution.getVotes(marketIdOf(c));
    return send(c, result, "votes");
  };

  resolve = async (c: AppContext) => {
    const body = await parseJsonBody(c, ResolveMarketSchema, {
      allowEmpty: true,
    });
    if (!body.ok) return send(c, body, "resolution");

    const result = await this.engine.resolution.resolve(
      marketIdOf(c),
      body.value.outcome,
      this.actor(c)
    );
    return send(c, result, "resolution");
  };

  refund = async (c: AppContext) => {
    const result = await this.engine.resolution.refund(
      marketIdOf(c),
      this.actor(c)
    );
    return send(c, result, "resolution");
  };

  cancel = async (c: AppContext) => {
    const result = await this.engine.resolution.cancel(
      marketIdOf(c),
      this.actor(c)
    );
    return send(c, result, "market");
  };

  close = async (c: AppContext) => {
    const result = await this.engine.markets.closeMarket(
      marketIdOf(c),
      this.actor(c)
    );
    return send(c, result, "market");
  };

  pause = async (c: AppContext) => {
    const result = await this.engine.markets.pauseMarket(
      marketIdOf(c),
      this.actor(c)
    );
    return send(c, result, "market");
  };

  resume = async (c: AppContext) => {
    const result = await this.engine.markets.resumeMarket(
      marketIdOf(c),
      this.actor(c)
    );
    return send(c, result, "market");
  };

  settle = async (c: AppContext) => {
    const result = await this.engine.settlement.settle(marketIdOf(c));
    return send(c, result, "settlement");
  };

  getPayouts = async (c: AppContext) => {
    const marketId = marketIdOf(c);
    const [payouts, summary] = await Promise.all([
      this.engine.settlement.getPayouts(marketId),
      this.engine.settlement.getSummary(marketId),
    ]);
    if (!payouts.ok) return send(c, payouts, "payouts");
    if (!summary.ok) return send(c, summary, "summary");
    return c.json({ payouts: payouts.value, summary: summary.value });
  };

  getUserPositions = async (c: AppContext) => {
    const positions = await this.engine.markets.getUserPositions(
      c.req.param("userId") ?? "",
      c.req.query("marketId")
    );
    return c.json({ positions });
  };

  private actor(c: AppContext): string {
    return c.get("userId") || "admin";
  }
}
