import { describe, it, expect } from "vitest";
import type { EventPublisher } from "../config/redis.js";
import { eventTypes, topics } from "../core/topics.js";
import { InMemoryOutboxRepository } from "../repo/memory.repo.js";
import { OutboxWorker } from "./outBoxWorker.js";

class RecordingPublisher implements EventPublisher {
  messages: { channel: string; message: string }[] = [];
  failing = new Set<string>();

  async publish(channel: string, message: string): Promise<void> {
    if (this.failing.has(channel)) throw new Error(`publish to ${channel} failed`);
    this.messages.push({ channel, message });
  }

  async close(): Promise<void> {}
}

async function seed(repo: InMemoryOutboxRepository) {
  return repo.append([
    {
      topic: topics.marketTicker("m1"),
      kind: eventTypes.TRADE_EXECUTED,
      marketId: "m1",
      userIds: [],
      payload: { outcome: "Yes", price: "0.5322245322" },
    },
    {
      topic: topics.userNotifications("alice"),
      kind: eventTypes.PAYOUT_READY,
      marketId: "m1",
      userIds: ["alice"],
      payload: { totalNet: "967.74193548" },
    },
  ]);
}

describe("OutboxWorker.processBatch", () => {
  it("publishes undelivered events in seq order and marks them", async () => {
    const repo = new InMemoryOutboxRepository();
    const [first] = await seed(repo);
    const publisher = new RecordingPublisher();
    const worker = new OutboxWorker(repo, publisher);

    expect(await worker.processBatch()).toBe(2);

    expect(publisher.messages.map((m) => m.channel)).toEqual([
      "market:m1:ticker",
      "user:alice:notifications",
    ]);
    expect(JSON.parse(publisher.messages[0].message)).toEqual({
      seq: 1,
      kind: "trade.executed",
      marketId: "m1",
      userIds: [],
      payload: { outcome: "Yes", price: "0.5322245322" },
      timestamp: first.createdAt,
    });
    expect(await repo.getUndeliveredEvents()).toEqual([]);
    expect(await worker.processBatch()).toBe(0);
  });

  it("retries failed events until maxRetries", async () => {
    const repo = new InMemoryOutboxRepository();
    await seed(repo);
    const publisher = new RecordingPublisher();
    publisher.failing.add("user:alice:notifications");
    const worker = new OutboxWorker(repo, publisher, { maxRetries: 2 });

    expect(await worker.processBatch()).toBe(1);
    expect(await worker.processBatch()).toBe(0);
    expect(await worker.processBatch()).toBe(0);

    const pending = await repo.getUndeliveredEvents();
    expect(pending.map((e) => [e.seq, e.retries])).toEqual([[2, 2]]);
    expect(publisher.messages).toHaveLength(1);

    // Given up: a recovered publisher no longer sees the event
    publisher.failing.clear();
    expect(await worker.processBatch()).toBe(0);
  });

  it("respects the batch size", async () => {
    const repo = new InMemoryOutboxRepository();
    await seed(repo);
    const publisher = new RecordingPublisher();
    const worker = new OutboxWorker(repo, publisher, { batchSize: 1 });

    expect(await worker.processBatch()).toBe(1);
    expect(await worker.processBatch()).toBe(1);
    expect(publisher.messages).toHaveLength(2);
  });

  it("stops its polling loop", async () => {
    const repo = new InMemoryOutboxRepository();
    await seed(repo);
    const publisher = new RecordingPublisher();
    const worker = new OutboxWorker(repo, publisher, { pollInterval: 60_000 });

    const loop = worker.start();
    await new Promise((resolve) => setTimeout(resolve, 10));
    worker.stop();
    await loop;

    expect(publisher.messages).toHaveLength(2);
  });
});
