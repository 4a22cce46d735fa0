import { and, eq, inArray } from 'drizzle-orm';
import { users } from '@expensox/db';
import type { Database } from '@expensox/db';
import { ValidationError } from '@expensox/shared';

/** Every referenced user must be active in the tenant; `field` is reported for one that is not. */
export async function assertActiveTenantUsers(
  tx: Database,
  tenantId: string,
  references: ReadonlyArray<{ userId: string; field: string }>,
): Promise<void> {
  if (references.length === 0) return;

  const ids = [...new Set(references.map((r) => r.userId))];
  const rows = await tx
    .select({ id: users.id, status: users.status })
    .from(users)
    .where(and(eq(users.tenantId, tenantId), inArray(users.id, ids)));
  const active = new Set(rows.filter((r) => r.status === 'active').map((r) => r.id));

  const details = references
    .filter((r) => !active.has(r.userId))
    .map((r) => ({ field: r.field, message: `User ${r.userId} is not an active user of this company` }));
  if (details.length > 0) {
    throw new ValidationError('Validation failed', details);
  }
}
