import type { RequestContext } from '../auth/context';
import { getAuditLogger } from './index';
import type { AuditChanges } from './index';

/**
 * Log an audit entry using the current request context.
 * Call it after the command's transaction has committed.
 */
export async function auditLog(
  ctx: RequestContext,
  action: string,
  entityType: string,
  entityId: string,
  changes?: AuditChanges,
  metadata?: Record<string, unknown>,
): Promise<void> {
  await getAuditLogger().log({
    tenantId: ctx.tenantId,
    actorUserId: ctx.user.id,
    actorType: 'user',
    action,
    entityType,
    entityId,
    changes,
    metadata: {
      requestId: ctx.requestId,
      ...metadata,
    },
  });
}

/** For actions with no user behind them: signup, consumers, workers. */
export async function auditLogSystem(
  tenantId: string,
  action: string,
  entityType: string,
  entityId: string,
  metadata?: Record<string, unknown>,
): Promise<void> {
  await getAuditLogger().log({
    tenantId,
    actorType: 'system',
    action,
    entityType,
    entityId,
    metadata,
  });
}
