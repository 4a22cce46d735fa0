import { and, eq } from 'drizzle-orm';
import { expenseCategories } from '@expensox/db';
import type { Database } from '@expensox/db';
import { generateUlid } from '@expensox/shared';
import { DEFAULT_CATEGORY_NAME } from '@expensox/core/companies';
import type { CategoryRecord } from '../helpers/views';

/** Returns the tenant's General category, creating it on first use. */
export async function ensureDefaultCategory(tx: Database, tenantId: string): Promise<CategoryRecord> {
  const byName = and(
    eq(expenseCategories.tenantId, tenantId),
    eq(expenseCategories.name, DEFAULT_CATEGORY_NAME),
  );

  const [existing] = await tx.select().from(expenseCategories).where(byName).limit(1);
  if (existing) return existing;

  const [created] = await tx
    .insert(expenseCategories)
    .values({
      id: generateUlid(),
      tenantId,
      name: DEFAULT_CATEGORY_NAME,
      description: 'Default category',
      isActive: true,
    })
    .onConflictDoNothing()
    .returning();
  if (created) return created;

  // Lost a race with a concurrent insert.
  const [winner] = await tx.select().from(expenseCategories).where(byName).limit(1);
  if (!winner) throw new Error(`Default category missing for tenant ${tenantId}`);
  return winner;
}
