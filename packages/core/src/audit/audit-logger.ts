import { sql } from 'drizzle-orm';
import { withTenant, createAdminClient, auditLog as auditLogTable } from '@expensox/db';
import { generateUlid } from '@expensox/shared';
import { logger, errorFields } from '../observability/logger';
import type { AuditChanges, AuditEntry, AuditLogger, AuditQueryFilters } from './index';

type AuditRow = {
  id: string;
  tenant_id: string;
  actor_user_id: string | null;
  actor_type: string;
  action: string;
  entity_type: string;
  entity_id: string;
  changes: AuditChanges | null;
  metadata: Record<string, unknown> | null;
  created_at: Date | string;
};

/** Cursor format is `<iso timestamp>|<id>`; returns null for anything else. */
export function decodeAuditCursor(cursor: string): { createdAt: string; id: string } | null {
  const sep = cursor.lastIndexOf('|');
  if (sep <= 0 || sep === cursor.length - 1) return null;
  const createdAt = cursor.slice(0, sep);
  if (Number.isNaN(Date.parse(createdAt))) return null;
  return { createdAt, id: cursor.slice(sep + 1) };
}

export class DrizzleAuditLogger implements AuditLogger {
  async log(entry: AuditEntry): Promise<void> {
    const values = {
      id: generateUlid(),
      tenantId: entry.tenantId,
      actorUserId: entry.actorUserId ?? null,
      actorType: entry.actorType ?? 'user',
      action: entry.action,
      entityType: entry.entityType,
      entityId: entry.entityId,
      changes: entry.changes ?? null,
      metadata: entry.metadata ?? null,
    };

    try {
      if (entry.actorType === 'system') {
        await createAdminClient().insert(auditLogTable).values(values);
      } else {
        await withTenant(entry.tenantId, (tx) => tx.insert(auditLogTable).values(values));
      }
    } catch (error) {
      logger.error('Failed to write audit log entry', {
        tenantId: entry.tenantId,
        action: entry.action,
        entityType: entry.entityType,
        entityId: entry.entityId,
        error: errorFields(error),
      });
    }
  }

  async query(
    tenantId: string,
    filters: AuditQueryFilters,
  ): Promise<{ entries: (AuditEntry & { id: string; createdAt: string })[]; cursor?: string }> {
    const limit = Math.min(filters.limit ?? 50, 100);

    const conditions = [sql`tenant_id = ${tenantId}`];

    if (filters.entityType) {
      conditions.push(sql`entity_type = ${filters.entityType}`);
    }
    if (filters.entityId) {
      conditions.push(sql`entity_id = ${filters.entityId}`);
    }
    if (filters.actorUserId) {
      conditions.push(sql`actor_user_id = ${filters.actorUserId}`);
    }
    if (filters.action) {
      conditions.push(sql`action = ${filters.action}`);
    }
    if (filters.from) {
      conditions.push(sql`created_at >= ${filters.from.toISOString()}`);
    }
    if (filters.to) {
      conditions.push(sql`created_at < ${filters.to.toISOString()}`);
    }
    if (filters.cursor) {
      const decoded = decodeAuditCursor(filters.cursor);
      if (decoded) {
        conditions.push(sql`(created_at, id) < (${decoded.createdAt}, ${decoded.id})`);
      }
    }

    const whereClause = conditions.reduce((acc, cond) => sql`${acc} AND ${cond}`);

    const rows = await withTenant(tenantId, (tx) =>
      tx.execute<AuditRow>(
        sql`SELECT id, tenant_id, actor_user_id, actor_type, action,
                entity_type, entity_id, changes, metadata, created_at
         FROM audit_log
         WHERE ${whereClause}
         ORDER BY created_at DESC, id DESC
         LIMIT ${limit + 1}`,
      ),
    );

    const results = Array.from(rows);
    const hasMore = results.length > limit;
    const entries = results.slice(0, limit).map((row) => ({
      id: row.id,
      tenantId: row.tenant_id,
      actorUserId: row.actor_user_id ?? undefined,
      actorType: row.actor_type === 'system' ? ('system' as const) : ('user' as const),
      action: row.action,
      entityType: row.entity_type,
      entityId: row.entity_id,
      changes: row.changes ?? undefined,
      metadata: row.metadata ?? undefined,
      createdAt: new Date(row.created_at).toISOString(),
    }));

    const last = entries[entries.length - 1];
    const cursor = hasMore && last ? `${last.createdAt}|${last.id}` : undefined;

    return { entries, cursor };
  }
}
