// /services/cpmm.service.ts

import { InvariantViolationError, ValidationError } from "../core/errors.js";
import { err, ok, type Result } from "../core/result.js";
import type { MarketLockGuard } from "../lib/locks.js";
import {
  fx,
  quantize,
  toAmount,
  ULP,
  type Fixed,
  type FixedInput,
} from "../lib/fixed-point.js";
import type { OutcomePoolState } from "../types/index.js";

/**
 * Constant Product Market Maker (CPMM) for one outcome of one market.
 * Maintains invariant k = shareReserve * cashReserve, with
 * k = initialLiquidity^2 fixed when the pool is seeded.
 */

export interface BuyQuote {
  cashIn: Fixed;
  sharesOut: Fixed;
  newCashReserve: Fixed;
  newShareReserve: Fixed;
  priceBefore: Fixed;
  newImpliedPrice: Fixed;
}

function impliedPriceOf(cashReserve: Fixed, shareReserve: Fixed): Fixed {
  return cashReserve.div(cashReserve.plus(shareReserve));
}

export class OutcomePool {
  private shareReserve: Fixed;
  private cashReserve: Fixed;
  private readonly k: Fixed;
  private totalVolume: Fixed;
  private tradeCount: number;
  private updatedAt: string;

  private constructor(private readonly state: OutcomePoolState) {
    this.shareReserve = fx(state.shareReserve);
    this.cashReserve = fx(state.cashReserve);
    this.k = fx(state.k);
    this.totalVolume = fx(state.totalVolume);
    this.tradeCount = state.tradeCount;
    this.updatedAt = state.updatedAt;
  }

  /** Both reserves start at initialLiquidity, so k = initialLiquidity^2 */
  static seed(
    marketId: string,
    outcome: string,
    initialLiquidity: FixedInput,
    now: Date
  ): OutcomePool {
    const liquidity = quantize(initialLiquidity, "down");
    if (liquidity.lte(0)) {
      throw new RangeError("initialLiquidity must be positive");
    }
    return new OutcomePool({
      marketId,
      outcome,
      shareReserve: toAmount(liquidity),
      cashReserve: toAmount(liquidity),
      k: liquidity.times(liquidity).toFixed(),
      initialLiquidity: toAmount(liquidity),
      totalVolume: toAmount(0),
      tradeCount: 0,
      updatedAt: now.toISOString(),
    });
  }

  static fromState(state: OutcomePoolState): OutcomePool {
    return new OutcomePool(state);
  }

  get marketId(): string {
    return this.state.marketId;
  }

  get outcome(): string {
    return this.state.outcome;
  }

  /**
   * Pure quote. The new share reserve is rounded up, so the pool keeps the
   * rounding remainder and the trader receives slightly fewer shares.
   */
  quoteBuy(cashIn: FixedInput): Result<BuyQuote, ValidationError> {
    const amount = fx(cashIn);
    if (!amount.isFinite() || amount.lte(0)) {
      return err(
        new ValidationError("Amount must be positive", "INVALID_AMOUNT", {
          amount: amount.toString(),
        })
      );
    }

    const newCashReserve = this.cashReserve.plus(amount);
    const newShareReserve = quantize(this.k.div(newCashReserve), "up");
    const sharesOut = this.shareReserve.minus(newShareReserve);

    if (sharesOut.lte(0)) {
      return err(
        new ValidationError(
          "Amount is too small to acquire any shares",
          "INVALID_AMOUNT",
          { amount: amount.toString() }
        )
      );
    }

    return ok({
      cashIn: amount,
      sharesOut,
      newCashReserve,
      newShareReserve,
      priceBefore: this.impliedPrice(),
      newImpliedPrice: impliedPriceOf(newCashReserve, newShareReserve),
    });
  }

  /**
   * Moves the reserves to the quoted point. Must run inside the owning
   * market's lock; reserve drift beyond one rounding unit throws.
   */
  applyBuy(
    cashIn: FixedInput,
    guard: MarketLockGuard,
    now: Date = new Date()
  ): Result<BuyQuote, ValidationError> {
    if (!guard.held || guard.marketId !== this.marketId) {
      throw new InvariantViolationError(
        this.marketId,
        `applyBuy on '${this.outcome}' outside the market lock`
      );
    }

    this.assertInvariant(this.shareReserve, this.cashReserve, "before trade");

    const quote = this.quoteBuy(cashIn);
    if (!quote.ok) return quote;

    const { newShareReserve, newCashReserve, cashIn: amount } = quote.value;
    this.assertInvariant(newShareReserve, newCashReserve, "after trade");

    this.shareReserve = newShareReserve;
    this.cashReserve = newCashReserve;
    this.totalVolume = this.totalVolume.plus(amount);
    this.tradeCount += 1;
    this.updatedAt = now.toISOString();

    return quote;
  }

  impliedPrice(): Fixed {
    return impliedPriceOf(this.cashReserve, this.shareReserve);
  }

  /** The constant product, for reporting */
  get invariant(): Fixed {
    return this.k;
  }

  toState(): OutcomePoolState {
    return {
      ...this.state,
      shareReserve: toAmount(this.shareReserve),
      cashReserve: toAmount(this.cashReserve),
      totalVolume: toAmount(this.totalVolume),
      tradeCount: this.tradeCount,
      updatedAt: this.updatedAt,
    };
  }

  // One share unit against the cash reserve bounds the rounding error of
  // the share reserve; anything larger is drift.
  private assertInvariant(
    shareReserve: Fixed,
    cashReserve: Fixed,
    stage: string
  ): void {
    const initial = fx(this.state.initialLiquidity);
    const product = shareReserve.times(cashReserve);
    const deviation = product.minus(this.k).abs();
    const tolerance = cashReserve.times(ULP);

    if (
      shareReserve.lte(0) ||
      cashReserve.lte(0) ||
      !this.k.eq(initial.times(initial)) ||
      deviation.gt(tolerance)
    ) {
      throw new InvariantViolationError(
        this.marketId,
        `Pool '${this.outcome}' violates constant product ${stage}`,
        {
          outcome: this.outcome,
          stage,
          k: this.k.toString(),
          product: product.toString(),
          deviation: deviation.toString(),
          tolerance: tolerance.toString(),
        }
      );
    }
  }
}

/**
 * Prices across a market's pools. "independent" reports each curve's own
 * implied price; "normalized" rescales them to sum to 1.
 */
export function marketPrices(
  pools: OutcomePool[],
  policy: "independent" | "normalized"
): Map<string, Fixed> {
  const raw = new Map(pools.map((p) => [p.outcome, p.impliedPrice()]));
  if (policy === "independent") return raw;

  let total = fx(0);
  for (const price of raw.values()) total = total.plus(price);
  const normalized = new Map<string, Fixed>();
  for (const [outcome, price] of raw) {
    normalized.set(outcome, total.gt(0) ? price.div(total) : price);
  }
  return normalized;
}
