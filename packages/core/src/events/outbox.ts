import type { EventEnvelope } from '@expensox/shared';
import type { Database } from '@expensox/db';

/** Persists events on the caller's transaction so they commit with the change. */
export interface OutboxWriter {
  writeEvents(tx: Database, events: readonly EventEnvelope[]): Promise<void>;
}
