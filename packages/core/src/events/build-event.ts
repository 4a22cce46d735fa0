import { generateUlid } from '@expensox/shared';
import type { EventEnvelope, EventType } from '@expensox/shared';
import type { RequestContext } from '../auth/context';

export interface BuildEventInput {
  eventType: EventType;
  tenantId: string;
  data: Record<string, unknown>;
  actorUserId?: string;
  correlationId?: string;
  /** Defaults to a key unique to this event. */
  idempotencyKey?: string;
}

/** For events raised without a signed-in user, such as company signup. */
export function buildEvent({
  eventType,
  tenantId,
  data,
  actorUserId,
  correlationId,
  idempotencyKey,
}: BuildEventInput): EventEnvelope {
  const eventId = generateUlid();
  return {
    eventId,
    eventType,
    occurredAt: new Date().toISOString(),
    tenantId,
    actorUserId,
    correlationId,
    idempotencyKey: idempotencyKey ?? `${tenantId}:${eventType}:${eventId}`,
    data,
  };
}

/** Attributes the event to the caller; the request id becomes the correlation id. */
export function buildEventFromContext(
  ctx: RequestContext,
  eventType: EventType,
  data: Record<string, unknown>,
  idempotencyKey?: string,
): EventEnvelope {
  return buildEvent({
    eventType,
    tenantId: ctx.tenantId,
    actorUserId: ctx.user.id,
    correlationId: ctx.requestId,
    data,
    idempotencyKey,
  });
}
