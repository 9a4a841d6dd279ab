/**
 * Fixed-point arithmetic for reserves, cash and share quantities.
 *
 * Every persisted quantity is a decimal string with exactly SCALE fractional
 * digits (e.g. "967.74193548"). Intermediate results are carried at
 * PRECISION significant digits and only rounded when quantized back to
 * SCALE, with the rounding direction chosen by the caller.
 */

import { Decimal } from "decimal.js";

export const SCALE = 8;
export const PRICE_SCALE = 10;
const PRECISION = 64;

export const Fixed = Decimal.clone({
  precision: PRECISION,
  rounding: Decimal.ROUND_HALF_EVEN,
  toExpNeg: -40,
  toExpPos: 40,
});

export type Fixed = Decimal;
export type FixedInput = Decimal.Value;

/** Smallest representable quantity: 10^-SCALE */
export const ULP: Fixed = new Fixed(1).div(new Fixed(10).pow(SCALE));

export type RoundingMode = "up" | "down" | "half-even";

const ROUNDING: Record<RoundingMode, Decimal.Rounding> = {
  up: Decimal.ROUND_UP,
  down: Decimal.ROUND_DOWN,
  "half-even": Decimal.ROUND_HALF_EVEN,
};

export function fx(value: FixedInput): Fixed {
  return new Fixed(value);
}

/** Rounds to SCALE fractional digits (away from zero for "up") */
export function quantize(
  value: FixedInput,
  mode: RoundingMode = "half-even"
): Fixed {
  return fx(value).toDecimalPlaces(SCALE, ROUNDING[mode]);
}

/** Canonical persisted form */
export function toAmount(value: FixedInput, mode: RoundingMode = "half-even"): string {
  return quantize(value, mode).toFixed(SCALE);
}

export function toPrice(value: FixedInput): string {
  return fx(value).toFixed(PRICE_SCALE, Decimal.ROUND_HALF_EVEN);
}

/**
 * Parses caller-supplied input into a fixed-point value. Returns null for
 * anything that is not a finite decimal; sub-unit digits are truncated.
 */
export function parseAmount(input: unknown): Fixed | null {
  if (typeof input !== "string" && typeof input !== "number") return null;
  if (typeof input === "number" && !Number.isFinite(input)) return null;
  const text = String(input).trim();
  if (!/^-?\d+(\.\d+)?(e[+-]?\d+)?$/i.test(text)) return null;
  return quantize(text, "down");
}

export function sum(values: Iterable<FixedInput>): Fixed {
  let total = fx(0);
  for (const v of values) total = total.plus(v);
  return total;
}

/** amount * bps / 10000, rounded up so fees never under-collect */
export function bpsOf(amount: FixedInput, bps: number): Fixed {
  return quantize(fx(amount).times(bps).div(10_000), "up");
}
