import { describe, it, expect } from "vitest";
import { MarketLockManager, withMarketLock } from "./locks.js";
import { ok } from "../core/result.js";

describe("MarketLockManager", () => {
  it("grants waiters in FIFO order", async () => {
    const locks = new MarketLockManager(1000);
    const order: number[] = [];

    const first = await locks.acquire("m1");
    expect(first.ok).toBe(true);

    const waiting = [1, 2, 3].map((n) =>
      locks.acquire("m1").then((r) => {
        order.push(n);
        if (r.ok) r.value.release();
        return r.ok;
      })
    );

    if (first.ok) first.value.release();
    expect(await Promise.all(waiting)).toEqual([true, true, true]);
    expect(order).toEqual([1, 2, 3]);
    expect(locks.activeKeys).toBe(0);
  });

  it("never makes different markets contend", async () => {
    const locks = new MarketLockManager(1000);
    const a = await locks.acquire("a");
    const b = await locks.acquire("b");

    expect(a.ok && b.ok).toBe(true);
    expect(locks.isLocked("a")).toBe(true);
    expect(locks.isLocked("b")).toBe(true);
    expect(locks.activeKeys).toBe(2);
  });

  it("fails with MARKET_BUSY when the lock is not granted in time", async () => {
    const locks = new MarketLockManager(10);
    const held = await locks.acquire("m1");
    expect(held.ok).toBe(true);

    const second = await locks.acquire("m1");
    expect(second.ok).toBe(false);
    if (!second.ok) {
      expect(second.error.code).toBe("MARKET_BUSY");
      expect(second.error.retryable).toBe(true);
    }

    // The timed-out waiter must not be granted later
    if (held.ok) held.value.release();
    expect(locks.isLocked("m1")).toBe(false);
  });

  it("ignores a second release of the same handle", async () => {
    const locks = new MarketLockManager(1000);
    const first = await locks.acquire("m1");
    if (!first.ok) throw new Error("lock not granted");
    first.value.release();

    const second = await locks.acquire("m1");
    first.value.release();
    expect(second.ok).toBe(true);
    expect(locks.isLocked("m1")).toBe(true);
    expect(first.value.held).toBe(false);
  });
});

describe("withMarketLock", () => {
  it("releases the lock when the body throws", async () => {
    const locks = new MarketLockManager(1000);

    await expect(
      withMarketLock(locks, "m1", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(locks.isLocked("m1")).toBe(false);
  });

  it("hands the body a held guard for the market", async () => {
    const locks = new MarketLockManager(1000);

    const result = await withMarketLock(locks, "m1", async (guard) =>
      ok({ marketId: guard.marketId, held: guard.held })
    );

    expect(result).toEqual({ ok: true, value: { marketId: "m1", held: true } });
    expect(locks.isLocked("m1")).toBe(false);
  });
});
