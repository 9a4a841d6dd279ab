import { Redis } from "ioredis";
import { env } from "./env.js";
import { logger } from "../core/logger.js";

export interface EventPublisher {
  publish(channel: string, message: string): Promise<void>;
  close(): Promise<void>;
}

/** Publishes outbox events on Redis pub/sub channels */
export class RedisEventPublisher implements EventPublisher {
  private readonly redisPub: Redis;

  constructor(url: string) {
    this.redisPub = new Redis(url, {
      maxRetriesPerRequest: 3,
      lazyConnect: true,
    });

    this.redisPub.on("connect", () => {
      logger.info("Redis publisher connected");
    });

    this.redisPub.on("error", (err) => {
      logger.error({ err }, "Redis publisher error");
    });
  }

  async publish(channel: string, message: string): Promise<void> {
    if (this.redisPub.status === "wait") {
      await this.redisPub.connect();
    }
    await this.redisPub.publish(channel, message);
  }

  async close(): Promise<void> {
    await this.redisPub.quit();
  }
}

/** Used when REDIS_URL is unset: events are only logged */
export class LogEventPublisher implements EventPublisher {
  async publish(channel: string, message: string): Promise<void> {
    logger.info({ channel, message }, "Event published");
  }

  async close(): Promise<void> {}
}

export function createEventPublisher(): EventPublisher {
  return env.REDIS_URL
    ? new RedisEventPublisher(env.REDIS_URL)
    : new LogEventPublisher();
}
