import { describe, it, expect } from "vitest";
import {
  canTransition,
  checkTradable,
  effectiveStatus,
  findOutcome,
  isTerminal,
  resolutionWindowEnd,
  transition,
} from "./market-state.js";
import type { Market } from "../types/index.js";

const END = "2026-03-02T12:00:00.000Z";
const BEFORE_END = new Date("2026-03-02T11:59:59.000Z");
const AFTER_END = new Date("2026-03-02T12:00:00.000Z");

function market(overrides: Partial<Market> = {}): Market {
  return {
    id: "m1",
    question: "Will it rain tomorrow?",
    outcomes: ["Yes", "No"],
    status: "Active",
    createdAt: "2026-03-01T12:00:00.000Z",
    endTime: END,
    initialLiquidity: "30000.00000000",
    totalVolume: "0.00000000",
    totalTrades: 0,
    version: 1,
    updatedAt: "2026-03-01T12:00:00.000Z",
    ...overrides,
  };
}

describe("market lifecycle", () => {
  it("allows only the documented transitions", () => {
    expect(canTransition("Active", "Paused")).toBe(true);
    expect(canTransition("Paused", "Active")).toBe(true);
    expect(canTransition("Active", "Ended")).toBe(true);
    expect(canTransition("Ended", "Resolved")).toBe(true);
    expect(canTransition("Ended", "Refunded")).toBe(true);
    expect(canTransition("Active", "Cancelled")).toBe(true);

    expect(canTransition("Active", "Resolved")).toBe(false);
    expect(canTransition("Ended", "Active")).toBe(false);
    expect(canTransition("Resolved", "Refunded")).toBe(false);
    expect(canTransition("Cancelled", "Active")).toBe(false);
  });

  it("marks the three settled states terminal", () => {
    expect(isTerminal("Resolved")).toBe(true);
    expect(isTerminal("Refunded")).toBe(true);
    expect(isTerminal("Cancelled")).toBe(true);
    expect(isTerminal("Ended")).toBe(false);
  });

  it("treats a trading market past endTime as Ended", () => {
    expect(effectiveStatus(market(), BEFORE_END)).toBe("Active");
    expect(effectiveStatus(market(), AFTER_END)).toBe("Ended");
    expect(effectiveStatus(market({ status: "Paused" }), AFTER_END)).toBe(
      "Ended"
    );
    expect(effectiveStatus(market({ status: "Resolved" }), AFTER_END)).toBe(
      "Resolved"
    );
  });

  describe("transition", () => {
    it("returns the next row when the expected status matches", () => {
      const moved = transition(market(), ["Active"], "Paused", BEFORE_END);

      expect(moved.ok).toBe(true);
      if (moved.ok) {
        expect(moved.value.status).toBe("Paused");
        expect(moved.value.updatedAt).toBe(BEFORE_END.toISOString());
      }
    });

    it("checks the effective status, not the stored one", () => {
      const moved = transition(market(), ["Ended"], "Resolved", AFTER_END);
      expect(moved.ok).toBe(true);

      const paused = transition(market(), ["Active"], "Paused", AFTER_END);
      expect(paused.ok).toBe(false);
      if (!paused.ok) {
        expect(paused.error.code).toBe("INVALID_TRANSITION");
        expect(paused.error.details).toMatchObject({ from: "Ended" });
      }
    });

    it("rejects a second resolution", () => {
      const moved = transition(
        market({ status: "Resolved" }),
        ["Ended"],
        "Resolved",
        AFTER_END
      );
      expect(moved.ok).toBe(false);
    });
  });

  describe("checkTradable", () => {
    it("accepts an active market before endTime", () => {
      expect(checkTradable(market(), BEFORE_END).ok).toBe(true);
    });

    it("reports MARKET_ENDED at and after endTime", () => {
      const result = checkTradable(market(), AFTER_END);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("MARKET_ENDED");
    });

    it("reports MARKET_NOT_ACTIVE for paused and terminal markets", () => {
      for (const status of ["Paused", "Cancelled", "Resolved"] as const) {
        const result = checkTradable(market({ status }), BEFORE_END);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.code).toBe("MARKET_NOT_ACTIVE");
      }
    });

    it("reports MARKET_HALTED before anything else", () => {
      const result = checkTradable(
        market({ haltedReason: "reserve drift" }),
        BEFORE_END
      );
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("MARKET_HALTED");
    });
  });

  it("uses the explicit resolution deadline when present", () => {
    expect(resolutionWindowEnd(market(), 120).toISOString()).toBe(
      "2026-03-07T12:00:00.000Z"
    );
    expect(
      resolutionWindowEnd(
        market({ resolutionDeadline: "2026-03-03T00:00:00.000Z" }),
        120
      ).toISOString()
    ).toBe("2026-03-03T00:00:00.000Z");
  });

  it("matches outcome labels case-insensitively", () => {
    expect(findOutcome(market(), " yes ")).toBe("Yes");
    expect(findOutcome(market(), "NO")).toBe("No");
    expect(findOutcome(market(), "Maybe")).toBeUndefined();
  });
});
