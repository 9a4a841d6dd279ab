export const topics = {
  // Market updates
  marketTicker: (marketId: string) => `market:${marketId}:ticker`,
  marketTrades: (marketId: string) => `market:${marketId}:trades`,
  marketResolved: (marketId: string) => `market:${marketId}:resolved`,
  // User notifications
  userNotifications: (userId: string) => `user:${userId}:notifications`,
  // Operator alerts
  systemAlerts: () => "system:alerts",
} as const;

// Event types for outbox
export const eventTypes = {
  TRADE_EXECUTED: "trade.executed",

  MARKET_CREATED: "market.created",
  MARKET_STATUS_CHANGED: "market.status_changed",
  MARKET_RESOLVED: "market.resolved",
  MARKET_REFUNDED: "market.refunded",
  MARKET_HALTED: "market.halted",

  PAYOUT_READY: "payout.ready",
} as const;

export type EventType = (typeof eventTypes)[keyof typeof eventTypes];
export type Topic = ReturnType<(typeof topics)[keyof typeof topics]>;
