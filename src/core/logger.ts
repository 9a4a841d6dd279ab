import pino from "pino";
import type { MiddlewareHandler } from "hono";
import { randomUUID } from "crypto";
import { env } from "../config/env.js";
import type { AppEnv } from "../types/hono.js";

function defaultLevel(): pino.LevelWithSilent {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === "test") return "silent";
  return env.NODE_ENV === "production" ? "info" : "debug";
}

export const logger = pino({
  level: defaultLevel(),
  transport:
    env.NODE_ENV === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            ignore: "pid,hostname",
            translateTime: "SYS:standard",
          },
        }
      : undefined,
  serializers: {
    err: pino.stdSerializers.err,
  },
});

export type Logger = pino.Logger;

// Request logger middleware for Hono
export function createRequestLogger(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();
    const reqId = randomUUID();

    const reqLogger = logger.child({ reqId });
    c.set("requestId", reqId);
    c.set("logger", reqLogger);

    reqLogger.info(
      {
        method: c.req.method,
        url: c.req.url,
        userAgent: c.req.header("user-agent"),
      },
      "Request started"
    );

    await next();

    reqLogger.info(
      {
        status: c.res.status,
        duration: Date.now() - start,
      },
      "Request completed"
    );
  };
}
