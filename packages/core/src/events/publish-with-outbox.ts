import type { EventEnvelope } from '@expensox/shared';
import { withTenant } from '@expensox/db';
import type { Database } from '@expensox/db';
import type { RequestContext } from '../auth/context';
import { getOutboxWriter } from './index';

/**
 * Write events to the outbox within a transaction the caller already opened.
 */
export async function publishEventsOnly(
  tx: Database,
  events: EventEnvelope[],
): Promise<void> {
  await getOutboxWriter().writeEvents(tx, events);
}

/**
 * Runs `operation` in a tenant-scoped transaction and writes the events it
 * returns to the outbox before commit. Either both land or neither does.
 */
export async function publishWithOutbox<T>(
  ctx: RequestContext,
  operation: (tx: Database) => Promise<{
    result: T;
    events: EventEnvelope[];
  }>,
): Promise<T> {
  return withTenant(ctx.tenantId, async (tx) => {
    const { result, events } = await operation(tx);
    await publishEventsOnly(tx, events);
    return result;
  });
}
