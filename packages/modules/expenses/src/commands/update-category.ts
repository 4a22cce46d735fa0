import { and, eq, ne } from 'drizzle-orm';
import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox, buildEventFromContext } from '@expensox/core/events';
import { auditLog, computeChanges } from '@expensox/core/audit';
import { expenseCategories } from '@expensox/db';
import { ConflictError, EXPENSE_EVENTS, NotFoundError, parseOrThrow } from '@expensox/shared';
import { updateCategorySchema } from '../validation';
import type { UpdateCategoryInput } from '../validation';
import { toCategoryView } from '../helpers/views';
import type { CategoryRecord, CategoryView } from '../helpers/views';

function auditable(row: CategoryRecord): Record<string, unknown> {
  return { name: row.name, description: row.description, isActive: row.isActive };
}

export async function updateCategory(
  ctx: RequestContext,
  categoryId: string,
  input: UpdateCategoryInput,
): Promise<CategoryView> {
  const parsed = parseOrThrow(updateCategorySchema, input);

  const { before, after } = await publishWithOutbox(ctx, async (tx) => {
    const [existing] = await tx
      .select()
      .from(expenseCategories)
      .where(and(eq(expenseCategories.tenantId, ctx.tenantId), eq(expenseCategories.id, categoryId)))
      .limit(1);
    if (!existing) throw new NotFoundError('Category', categoryId);

    if (parsed.name !== undefined && parsed.name !== existing.name) {
      const [clash] = await tx
        .select({ id: expenseCategories.id })
        .from(expenseCategories)
        .where(
          and(
            eq(expenseCategories.tenantId, ctx.tenantId),
            eq(expenseCategories.name, parsed.name),
            ne(expenseCategories.id, categoryId),
          ),
        )
        .limit(1);
      if (clash) throw new ConflictError(`Category "${parsed.name}" already exists`);
    }

    const [updated] = await tx
      .update(expenseCategories)
      .set({
        ...(parsed.name !== undefined && { name: parsed.name }),
        ...(parsed.description !== undefined && { description: parsed.description }),
        ...(parsed.isActive !== undefined && { isActive: parsed.isActive }),
        updatedAt: new Date(),
      })
      .where(and(eq(expenseCategories.tenantId, ctx.tenantId), eq(expenseCategories.id, categoryId)))
      .returning();
    if (!updated) throw new NotFoundError('Category', categoryId);

    const changes = computeChanges(auditable(existing), auditable(updated));
    const events = changes
      ? [buildEventFromContext(ctx, EXPENSE_EVENTS.CATEGORY_UPDATED, { categoryId, changes })]
      : [];

    return { result: { before: existing, after: updated }, events };
  });

  const changes = computeChanges(auditable(before), auditable(after));
  if (changes) {
    await auditLog(ctx, 'category.updated', 'expense_category', categoryId, changes);
  }
  return toCategoryView(after);
}
