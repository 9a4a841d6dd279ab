import type { MiddlewareHandler } from "hono";
import { timingSafeEqual } from "crypto";
import { env } from "../config/env.js";
import {
  ForbiddenError,
  UnauthorizedError,
  formatError,
} from "../core/errors.js";
import type { AppEnv } from "../types/hono.js";

export const USER_HEADER = "x-user-id";
export const API_KEY_HEADER = "x-api-key";

function keyMatches(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Caller identity is asserted upstream; the engine only reads it. The
 * admin flag is set when x-api-key matches ADMIN_API_KEY.
 */
export function identify(
  adminApiKey: string | undefined = env.ADMIN_API_KEY
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const userId = c.req.header(USER_HEADER)?.trim() ?? "";
    const apiKey = c.req.header(API_KEY_HEADER);

    c.set("userId", userId);
    c.set(
      "isAdmin",
      adminApiKey !== undefined &&
        apiKey !== undefined &&
        keyMatches(apiKey, adminApiKey)
    );
    await next();
  };
}

export function requireUser(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (!c.get("userId")) {
      return c.json(
        formatError(new UnauthorizedError(`${USER_HEADER} header required`)),
        401
      );
    }
    await next();
  };
}

export function requireAdmin(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (!c.get("isAdmin")) {
      return c.json(
        formatError(new ForbiddenError("Admin privileges required")),
        403
      );
    }
    await next();
  };
}
