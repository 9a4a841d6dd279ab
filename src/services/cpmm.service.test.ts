import { describe, it, expect } from "vitest";
import { OutcomePool, marketPrices } from "./cpmm.service.js";
import { InvariantViolationError } from "../core/errors.js";
import { fx, toPrice } from "../lib/fixed-point.js";
import type { MarketLockGuard } from "../lib/locks.js";

const NOW = new Date("2026-01-01T00:00:00.000Z");
const guard: MarketLockGuard = { marketId: "m1", held: true };

function seeded(outcome = "Yes", liquidity = "30000") {
  return OutcomePool.seed("m1", outcome, liquidity, NOW);
}

describe("OutcomePool", () => {
  it("seeds both reserves at initialLiquidity with k = liquidity^2", () => {
    const state = seeded().toState();

    expect(state.shareReserve).toBe("30000.00000000");
    expect(state.cashReserve).toBe("30000.00000000");
    expect(state.k).toBe("900000000");
    expect(toPrice(seeded().impliedPrice())).toBe("0.5000000000");
  });

  it("quotes a 1000 unit buy on a 30000 pool", () => {
    const pool = seeded();
    const quote = pool.quoteBuy("1000");
    if (!quote.ok) throw quote.error;

    expect(quote.value.newCashReserve.toFixed(8)).toBe("31000.00000000");
    expect(quote.value.newShareReserve.toFixed(8)).toBe("29032.25806452");
    expect(quote.value.sharesOut.toFixed(8)).toBe("967.74193548");
    expect(toPrice(quote.value.priceBefore)).toBe("0.5000000000");
    expect(toPrice(quote.value.newImpliedPrice)).toBe("0.5163890382");

    // quoting is pure
    expect(pool.toState().cashReserve).toBe("30000.00000000");
  });

  it("rounds the new share reserve toward the pool", () => {
    const quote = seeded().quoteBuy("1000");
    if (!quote.ok) throw quote.error;

    const product = quote.value.newShareReserve.times(
      quote.value.newCashReserve
    );
    expect(product.minus("900000000").toFixed(8)).toBe("0.00012000");
  });

  it("rejects non-positive amounts", () => {
    const pool = seeded();
    for (const amount of ["0", "-5"]) {
      const quote = pool.quoteBuy(amount);
      expect(quote.ok).toBe(false);
      if (!quote.ok) expect(quote.error.code).toBe("INVALID_AMOUNT");
    }
  });

  it("applies a buy and moves the reserves to the quoted point", () => {
    const pool = seeded();
    const applied = pool.applyBuy("1000", guard, NOW);
    if (!applied.ok) throw applied.error;

    const state = pool.toState();
    expect(state.cashReserve).toBe("31000.00000000");
    expect(state.shareReserve).toBe("29032.25806452");
    expect(state.totalVolume).toBe("1000.00000000");
    expect(state.tradeCount).toBe(1);
  });

  it("strictly increases the implied price on sequential buys", () => {
    const pool = seeded();
    const prices = [pool.impliedPrice()];

    for (const amount of ["1000", "1000", "5", "0.5"]) {
      const applied = pool.applyBuy(amount, guard, NOW);
      if (!applied.ok) throw applied.error;
      prices.push(pool.impliedPrice());
    }

    for (let i = 1; i < prices.length; i++) {
      expect(prices[i].gt(prices[i - 1])).toBe(true);
    }
    expect(pool.toState().shareReserve).toBe("28120.16684633");
  });

  it("gives 907.25806452 shares for a second 1000 unit buy", () => {
    const pool = seeded();
    pool.applyBuy("1000", guard, NOW);
    const second = pool.applyBuy("1000", guard, NOW);
    if (!second.ok) throw second.error;

    expect(second.value.sharesOut.toFixed(8)).toBe("907.25806452");
    expect(toPrice(pool.impliedPrice())).toBe("0.5322245322");
  });

  it("keeps the product within one unit of k over many trades", () => {
    const pool = seeded("Yes", "1000");
    for (let i = 1; i <= 500; i++) {
      const applied = pool.applyBuy(fx(i).div(7).toFixed(8), guard, NOW);
      expect(applied.ok).toBe(true);
    }

    const state = pool.toState();
    const deviation = fx(state.shareReserve)
      .times(state.cashReserve)
      .minus(state.k)
      .abs();
    expect(deviation.lte(fx(state.cashReserve).times("0.00000001"))).toBe(true);
    expect(state.tradeCount).toBe(500);
  });

  it("refuses to mutate outside the market lock", () => {
    const pool = seeded();

    expect(() =>
      pool.applyBuy("10", { marketId: "m1", held: false }, NOW)
    ).toThrow(InvariantViolationError);
    expect(() =>
      pool.applyBuy("10", { marketId: "other", held: true }, NOW)
    ).toThrow(InvariantViolationError);
    expect(pool.toState().tradeCount).toBe(0);
  });

  it("throws on reserves that drifted from k", () => {
    const tampered = OutcomePool.fromState({
      ...seeded().toState(),
      shareReserve: "29000.00000000",
    });

    expect(() => tampered.applyBuy("10", guard, NOW)).toThrow(
      InvariantViolationError
    );
  });

  it("throws when k no longer matches the seed liquidity", () => {
    const tampered = OutcomePool.fromState({
      ...seeded().toState(),
      k: "900000001",
    });

    try {
      tampered.applyBuy("10", guard, NOW);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvariantViolationError);
      if (error instanceof InvariantViolationError) {
        expect(error.code).toBe("INVARIANT_VIOLATION");
        expect(error.marketId).toBe("m1");
      }
    }
  });
});

describe("marketPrices", () => {
  it("leaves other outcomes untouched after a buy", () => {
    const yes = seeded("Yes");
    const no = seeded("No");
    yes.applyBuy("1000", guard, NOW);

    expect(no.toState().shareReserve).toBe("30000.00000000");
    expect(no.toState().cashReserve).toBe("30000.00000000");

    const prices = marketPrices([yes, no], "independent");
    expect(toPrice(prices.get("Yes") ?? fx(0))).toBe("0.5163890382");
    expect(toPrice(prices.get("No") ?? fx(0))).toBe("0.5000000000");
  });

  it("rescales prices to sum to one when normalized", () => {
    const yes = seeded("Yes");
    const no = seeded("No");
    const maybe = seeded("Maybe");
    yes.applyBuy("1000", guard, NOW);

    const prices = marketPrices([yes, no, maybe], "normalized");
    const total = [...prices.values()].reduce((a, b) => a.plus(b), fx(0));

    expect(toPrice(total)).toBe("1.0000000000");
    expect(prices.get("Yes")?.gt(prices.get("No") ?? fx(1))).toBe(true);
  });
});
