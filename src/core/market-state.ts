import { StateConflictError } from "./errors.js";
import { err, ok, type Result } from "./result.js";
import type { Market, MarketStatus } from "../types/index.js";

/**
 * Market lifecycle:
 *
 *   Active <-> Paused
 *   Active | Paused -> Ended            (endTime reached or admin close)
 *   Ended -> Resolved | Refunded
 *   Active | Paused | Ended -> Cancelled
 */
const TRANSITIONS: Record<MarketStatus, readonly MarketStatus[]> = {
  Active: ["Paused", "Ended", "Cancelled"],
  Paused: ["Active", "Ended", "Cancelled"],
  Ended: ["Resolved", "Refunded", "Cancelled"],
  Resolved: [],
  Refunded: [],
  Cancelled: [],
};

export const TERMINAL_STATUSES: readonly MarketStatus[] = [
  "Resolved",
  "Refunded",
  "Cancelled",
];

export function isTerminal(status: MarketStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: MarketStatus, to: MarketStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Status as of `now`: a trading market past its endTime is Ended even if
 * the stored row has not been rewritten yet.
 */
export function effectiveStatus(market: Market, now: Date): MarketStatus {
  if (
    (market.status === "Active" || market.status === "Paused") &&
    now.getTime() >= new Date(market.endTime).getTime()
  ) {
    return "Ended";
  }
  return market.status;
}

/** Market view with the lazy Active -> Ended transition applied */
export function withEffectiveStatus(market: Market, now: Date): Market {
  const status = effectiveStatus(market, now);
  return status === market.status ? market : { ...market, status };
}

/**
 * Checks `expected` against the market's effective status and returns the
 * next row. The repository commit then compares versions, which makes the
 * whole step a compare-and-set.
 */
export function transition(
  market: Market,
  expected: readonly MarketStatus[],
  to: MarketStatus,
  now: Date
): Result<Market, StateConflictError> {
  const current = effectiveStatus(market, now);

  if (!expected.includes(current) || !canTransition(current, to)) {
    return err(
      new StateConflictError(
        `Cannot move market '${market.id}' from ${current} to ${to}`,
        "INVALID_TRANSITION",
        { marketId: market.id, from: current, to, expected: [...expected] }
      )
    );
  }

  return ok({ ...market, status: to, updatedAt: now.toISOString() });
}

/**
 * End of the resolution window: the explicit deadline, or endTime plus the
 * configured auto-refund period.
 */
export function resolutionWindowEnd(
  market: Market,
  autoRefundHours: number
): Date {
  if (market.resolutionDeadline) return new Date(market.resolutionDeadline);
  return new Date(
    new Date(market.endTime).getTime() + autoRefundHours * 60 * 60 * 1000
  );
}

export function checkTradable(
  market: Market,
  now: Date
): Result<Market, StateConflictError> {
  if (market.haltedReason) {
    return err(
      new StateConflictError(
        `Market '${market.id}' is halted pending review`,
        "MARKET_HALTED",
        { marketId: market.id, reason: market.haltedReason }
      )
    );
  }

  const status = effectiveStatus(market, now);
  if (status === "Ended") {
    return err(
      new StateConflictError(
        `Market '${market.id}' ended at ${market.endTime}`,
        "MARKET_ENDED",
        { marketId: market.id, endTime: market.endTime }
      )
    );
  }
  if (status !== "Active") {
    return err(
      new StateConflictError(
        `Market '${market.id}' is ${status}, not Active`,
        "MARKET_NOT_ACTIVE",
        { marketId: market.id, status }
      )
    );
  }
  return ok(market);
}

/** Canonical label for a caller-supplied outcome (case-insensitive match) */
export function findOutcome(
  market: Market,
  label: string
): string | undefined {
  const wanted = label.trim().toLowerCase();
  return market.outcomes.find((o) => o.toLowerCase() === wanted);
}
