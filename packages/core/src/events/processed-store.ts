import { and, eq } from 'drizzle-orm';
import { createAdminClient, processedEvents } from '@expensox/db';
import { generateUlid } from '@expensox/shared';

/** Remembers which consumer has already handled which event. */
export interface ProcessedEventStore {
  isProcessed(eventId: string, consumerName: string): Promise<boolean>;
  markProcessed(eventId: string, consumerName: string, tenantId: string): Promise<void>;
}

export class DrizzleProcessedEventStore implements ProcessedEventStore {
  async isProcessed(eventId: string, consumerName: string): Promise<boolean> {
    const rows = await createAdminClient()
      .select({ id: processedEvents.id })
      .from(processedEvents)
      .where(
        and(
          eq(processedEvents.eventId, eventId),
          eq(processedEvents.consumerName, consumerName),
        ),
      )
      .limit(1);
    return rows.length > 0;
  }

  async markProcessed(eventId: string, consumerName: string, tenantId: string): Promise<void> {
    await createAdminClient()
      .insert(processedEvents)
      .values({
        id: generateUlid(),
        tenantId,
        eventId,
        consumerName,
        processedAt: new Date(),
      })
      .onConflictDoNothing();
  }
}

export class MemoryProcessedEventStore implements ProcessedEventStore {
  private seen = new Set<string>();

  async isProcessed(eventId: string, consumerName: string): Promise<boolean> {
    return this.seen.has(`${consumerName}:${eventId}`);
  }

  async markProcessed(eventId: string, consumerName: string): Promise<void> {
    this.seen.add(`${consumerName}:${eventId}`);
  }
}
