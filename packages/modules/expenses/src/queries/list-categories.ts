import { and, asc, eq } from 'drizzle-orm';
import { expenseCategories, withTenant } from '@expensox/db';
import { parseOrThrow } from '@expensox/shared';
import { listCategoriesSchema } from '../validation';
import type { ListCategoriesInput } from '../validation';
import { toCategoryView } from '../helpers/views';
import { ensureDefaultCategory } from '../commands/ensure-default-category';
import type { CategoryView } from '../helpers/views';

export async function listCategories(input: ListCategoriesInput): Promise<CategoryView[]> {
  const { tenantId, includeInactive } = parseOrThrow(listCategoriesSchema, input);

  return withTenant(tenantId, async (tx) => {
    const rows = await tx
      .select()
      .from(expenseCategories)
      .where(
        includeInactive
          ? eq(expenseCategories.tenantId, tenantId)
          : and(eq(expenseCategories.tenantId, tenantId), eq(expenseCategories.isActive, true)),
      )
      .orderBy(asc(expenseCategories.name));
    // A company always has at least its General category
    if (rows.length === 0) {
      return [toCategoryView(await ensureDefaultCategory(tx, tenantId))];
    }
    return rows.map(toCategoryView);
  });
}
