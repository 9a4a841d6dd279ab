import { z } from "zod";
import type { SupabaseClient } from "@supabase/supabase-js";
import { executeQuery, getSupabase } from "../config/supabase.js";
import { eventTypes, type EventType, type Topic } from "../core/topics.js";

export interface NewOutboxEvent {
  topic: Topic;
  kind: EventType;
  marketId: string;
  userIds: string[];
  payload: Record<string, unknown>;
}

export interface OutboxEvent extends Omit<NewOutboxEvent, "topic"> {
  topic: string;
  /** Monotonically increasing; consumers dedupe on it */
  seq: number;
  createdAt: string;
  deliveredAt?: string;
  retries: number;
}

export interface OutboxRepository {
  append(events: NewOutboxEvent[]): Promise<OutboxEvent[]>;
  getUndeliveredEvents(limit?: number): Promise<OutboxEvent[]>;
  markDelivered(seq: number): Promise<void>;
  incrementRetries(seq: number): Promise<void>;
}

const outboxRow = z
  .object({
    seq: z.coerce.number().int(),
    topic: z.string(),
    kind: z.nativeEnum(eventTypes),
    market_id: z.string(),
    user_ids: z.array(z.string()),
    payload: z.record(z.unknown()),
    created_at: z.string(),
    delivered_at: z.string().nullish(),
    retries: z.number().int(),
  })
  .transform((r): OutboxEvent => ({
    seq: r.seq,
    topic: r.topic,
    kind: r.kind,
    marketId: r.market_id,
    userIds: r.user_ids,
    payload: r.payload,
    createdAt: r.created_at,
    deliveredAt: r.delivered_at ?? undefined,
    retries: r.retries,
  }));

export class SupabaseOutboxRepository implements OutboxRepository {
  constructor(private readonly db: SupabaseClient = getSupabase()) {}

  async append(events: NewOutboxEvent[]): Promise<OutboxEvent[]> {
    if (events.length === 0) return [];

    const createdAt = new Date().toISOString();
    const data = await executeQuery(
      this.db
        .from("event_outbox")
        .insert(
          events.map((event) => ({
            topic: event.topic,
            kind: event.kind,
            market_id: event.marketId,
            user_ids: event.userIds,
            payload: event.payload,
            created_at: createdAt,
            delivered_at: null,
            retries: 0,
          }))
        )
        .select("*"),
      "write to outbox batch"
    );
    return z.array(outboxRow).parse(data);
  }

  async getUndeliveredEvents(limit: number = 500): Promise<OutboxEvent[]> {
    const data = await executeQuery(
      this.db
        .from("event_outbox")
        .select("*")
        .is("delivered_at", null)
        .order("seq", { ascending: true })
        .limit(limit),
      "get undelivered events"
    );
    return z.array(outboxRow).parse(data);
  }

  async markDelivered(seq: number): Promise<void> {
    await executeQuery(
      this.db
        .from("event_outbox")
        .update({ delivered_at: new Date().toISOString() })
        .eq("seq", seq),
      "mark event delivered"
    );
  }

  async incrementRetries(seq: number): Promise<void> {
    await executeQuery(
      this.db.rpc("increment_outbox_retries", { event_seq: seq }),
      "increment retries"
    );
  }
}
