import type { Context } from "hono";
import { AppError, formatError } from "../core/errors.js";
import { logger } from "../core/logger.js";

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 500 | 503;

export function toStatus(statusCode: number): ErrorStatus {
  switch (statusCode) {
    case 400:
      return 400;
    case 401:
      return 401;
    case 403:
      return 403;
    case 404:
      return 404;
    case 409:
      return 409;
    case 503:
      return 503;
    default:
      return 500;
  }
}

export function errorHandler(error: Error, c: Context) {
  if (error instanceof AppError && error.statusCode < 500) {
    logger.warn({ err: error, path: c.req.path }, "Request failed");
  } else {
    logger.error({ err: error, path: c.req.path }, "Unhandled error");
  }

  const status = error instanceof AppError ? toStatus(error.statusCode) : 500;
  return c.json(formatError(error), status);
}
