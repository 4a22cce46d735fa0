import { generateUlid } from '@expensox/shared';
import type { EventEnvelope } from '@expensox/shared';
import { eventOutbox } from '@expensox/db';
import type { Database } from '@expensox/db';
import type { OutboxWriter } from './outbox';

type OutboxInsert = typeof eventOutbox.$inferInsert;

/** Unpublished outbox row carrying the whole envelope as its payload. */
export function toOutboxRow(event: EventEnvelope): OutboxInsert {
  return {
    id: generateUlid(),
    tenantId: event.tenantId,
    eventType: event.eventType,
    eventId: event.eventId,
    idempotencyKey: event.idempotencyKey,
    payload: event,
    occurredAt: new Date(event.occurredAt),
    publishedAt: null,
  };
}

export class DrizzleOutboxWriter implements OutboxWriter {
  async writeEvents(tx: Database, events: readonly EventEnvelope[]): Promise<void> {
    if (events.length === 0) return;
    // One statement per transaction, however many events a command raised.
    await tx.insert(eventOutbox).values(events.map(toOutboxRow));
  }
}
