import type { OutboxEvent, OutboxRepository } from "../repo/outbox.repo.js";
import type { EventPublisher } from "../config/redis.js";
import { logger } from "../core/logger.js";

export interface OutboxWorkerOptions {
  pollInterval?: number;
  batchSize?: number;
  maxRetries?: number;
}

/**
 * Relays outbox events to the publisher in seq order. An event is marked
 * delivered only after publish succeeds, so delivery is at-least-once and
 * consumers dedupe on seq.
 */
export class OutboxWorker {
  private isRunning = false;
  private wake: (() => void) | null = null;
  private readonly pollInterval: number;
  private readonly batchSize: number;
  private readonly maxRetries: number;

  constructor(
    private readonly outboxRepo: OutboxRepository,
    private readonly publisher: EventPublisher,
    options: OutboxWorkerOptions = {}
  ) {
    this.pollInterval = options.pollInterval ?? 1000;
    this.batchSize = options.batchSize ?? 500;
    this.maxRetries = options.maxRetries ?? 5;
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn("Outbox worker already running");
      return;
    }

    this.isRunning = true;
    logger.info("Starting outbox worker");

    while (this.isRunning) {
      try {
        await this.processBatch();
        await this.sleep(this.pollInterval);
      } catch (error) {
        logger.error({ err: error }, "Outbox worker error");
        await this.sleep(this.pollInterval * 2); // Backoff on error
      }
    }
  }

  stop(): void {
    logger.info("Stopping outbox worker");
    this.isRunning = false;
    this.wake?.();
  }

  /** Publishes one batch; returns the number of events delivered */
  async processBatch(): Promise<number> {
    const events = (
      await this.outboxRepo.getUndeliveredEvents(this.batchSize)
    ).filter((e) => e.retries < this.maxRetries);

    if (events.length === 0) return 0;

    logger.debug({ count: events.length }, "Processing outbox events");

    let delivered = 0;
    for (const event of events) {
      try {
        await this.publishEvent(event);
        await this.outboxRepo.markDelivered(event.seq);
        delivered += 1;
      } catch (error) {
        logger.error(
          {
            err: error,
            seq: event.seq,
            topic: event.topic,
            kind: event.kind,
            retries: event.retries,
          },
          "Failed to publish event"
        );
        await this.outboxRepo.incrementRetries(event.seq);

        if (event.retries + 1 >= this.maxRetries) {
          logger.error(
            { seq: event.seq, topic: event.topic },
            "Event exceeded max retries, giving up"
          );
        }
      }
    }
    return delivered;
  }

  private async publishEvent(event: OutboxEvent): Promise<void> {
    const message = JSON.stringify({
      seq: event.seq,
      kind: event.kind,
      marketId: event.marketId,
      userIds: event.userIds,
      payload: event.payload,
      timestamp: event.createdAt,
    });

    await this.publisher.publish(event.topic, message);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
