import type { NewOutboxEvent, OutboxRepository } from "../repo/outbox.repo.js";
import type { Logger } from "./logger.js";

/**
 * Best-effort event emission for the notification collaborator. emit()
 * never rejects: an outbox write failure is logged and the triggering
 * trade or resolution stands.
 */
export class EventOutbox {
  private pending = new Set<Promise<void>>();

  constructor(
    private readonly outboxRepo: OutboxRepository,
    private readonly logger: Logger
  ) {}

  emit(events: NewOutboxEvent[]): Promise<void> {
    if (events.length === 0) return Promise.resolve();

    const write = this.outboxRepo.append(events).then(
      (stored) => {
        this.logger.debug(
          { seqs: stored.map((e) => e.seq), kinds: events.map((e) => e.kind) },
          "Outbox events written"
        );
      },
      (error: unknown) => {
        this.logger.error(
          { err: error, kinds: events.map((e) => e.kind) },
          "Failed to write outbox events"
        );
      }
    );

    this.pending.add(write);
    void write.finally(() => this.pending.delete(write));
    return write;
  }

  /** Resolves once every emit issued so far has settled */
  async drain(): Promise<void> {
    await Promise.all([...this.pending]);
  }
}
