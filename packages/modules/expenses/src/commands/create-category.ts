import { and, eq } from 'drizzle-orm';
import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox, buildEventFromContext } from '@expensox/core/events';
import { auditLog } from '@expensox/core/audit';
import { expenseCategories } from '@expensox/db';
import { ConflictError, EXPENSE_EVENTS, generateUlid, parseOrThrow } from '@expensox/shared';
import { createCategorySchema } from '../validation';
import type { CreateCategoryInput } from '../validation';
import { toCategoryView } from '../helpers/views';
import type { CategoryView } from '../helpers/views';

export async function createCategory(
  ctx: RequestContext,
  input: CreateCategoryInput,
): Promise<CategoryView> {
  const parsed = parseOrThrow(createCategorySchema, input);

  const category = await publishWithOutbox(ctx, async (tx) => {
    const [existing] = await tx
      .select({ id: expenseCategories.id })
      .from(expenseCategories)
      .where(and(eq(expenseCategories.tenantId, ctx.tenantId), eq(expenseCategories.name, parsed.name)))
      .limit(1);
    if (existing) {
      throw new ConflictError(`Category "${parsed.name}" already exists`);
    }

    const [created] = await tx
      .insert(expenseCategories)
      .values({
        id: generateUlid(),
        tenantId: ctx.tenantId,
        name: parsed.name,
        description: parsed.description ?? null,
        isActive: true,
      })
      .returning();
    if (!created) throw new Error('Category insert returned no row');

    const event = buildEventFromContext(ctx, EXPENSE_EVENTS.CATEGORY_CREATED, {
      categoryId: created.id,
      name: created.name,
    });

    return { result: toCategoryView(created), events: [event] };
  });

  await auditLog(ctx, 'category.created', 'expense_category', category.id);
  return category;
}
