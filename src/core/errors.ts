import { env } from "../config/env.js";

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  constructor(
    public message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: ErrorDetails
  ) {
    super(message);
    this.name = "AppError";
  }

  /** Whether the caller may retry the same request unchanged */
  get retryable(): boolean {
    return false;
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    code: string = "VALIDATION_ERROR",
    details?: ErrorDetails
  ) {
    super(message, code, 400, details);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    const message = id
      ? `${resource} with id '${id}' not found`
      : `${resource} not found`;
    super(message, "NOT_FOUND", 404);
    this.name = "NotFoundError";
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = "Unauthorized") {
    super(message, "UNAUTHORIZED", 401);
    this.name = "UnauthorizedError";
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = "Forbidden") {
    super(message, "FORBIDDEN", 403);
    this.name = "ForbiddenError";
  }
}

/**
 * The market is in the wrong lifecycle state for the requested operation.
 */
export class StateConflictError extends AppError {
  constructor(message: string, code: string, details?: ErrorDetails) {
    super(message, code, 409, details);
    this.name = "StateConflictError";
  }
}

/**
 * The market lock could not be taken in time, or a concurrent writer won
 * the compare-and-set.
 */
export class ResourceBusyError extends AppError {
  constructor(marketId: string, reason: string = "lock timeout") {
    super(`Market '${marketId}' is busy (${reason})`, "MARKET_BUSY", 503, {
      marketId,
      reason,
    });
    this.name = "ResourceBusyError";
  }

  override get retryable(): boolean {
    return true;
  }
}

export class ResolutionTiedError extends AppError {
  constructor(marketId: string, tied: string[], weight: number) {
    super(
      `Resolution for market '${marketId}' is tied between ${tied.join(", ")}`,
      "RESOLUTION_TIED",
      409,
      { marketId, tied, weight }
    );
    this.name = "ResolutionTiedError";
  }
}

/**
 * Pool reserves drifted beyond rounding tolerance. Always thrown, never
 * returned: the in-flight operation aborts and the market is halted.
 */
export class InvariantViolationError extends AppError {
  constructor(
    public marketId: string,
    message: string,
    details?: ErrorDetails
  ) {
    super(message, "INVARIANT_VIOLATION", 500, { marketId, ...details });
    this.name = "InvariantViolationError";
  }
}

// Error formatter for API responses
export function formatError(error: Error) {
  if (error instanceof AppError) {
    return {
      error: {
        code: error.code,
        message: error.message,
        ...(error.details && { details: error.details }),
      },
    };
  }

  // Unknown errors - don't leak internal details in production
  return {
    error: {
      code: "INTERNAL_ERROR",
      message:
        env.NODE_ENV === "production"
          ? "An internal error occurred"
          : error.message,
    },
  };
}
