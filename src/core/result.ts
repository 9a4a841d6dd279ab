import type { AppError } from "./errors.js";

/**
 * Outcome of an engine operation whose failure is expected (bad input,
 * wrong market state, lock contention). Callers must branch on `ok`.
 */
export type Result<T, E extends AppError = AppError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E extends AppError>(error: E): Result<never, E> {
  return { ok: false, error };
}
