import { and, eq } from 'drizzle-orm';
import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox, buildEventFromContext } from '@expensox/core/events';
import { auditLog } from '@expensox/core/audit';
import { budgets } from '@expensox/db';
import { EXPENSE_EVENTS, NotFoundError } from '@expensox/shared';

export async function deleteBudget(ctx: RequestContext, budgetId: string): Promise<void> {
  const removed = await publishWithOutbox(ctx, async (tx) => {
    const [deleted] = await tx
      .delete(budgets)
      .where(and(eq(budgets.tenantId, ctx.tenantId), eq(budgets.id, budgetId)))
      .returning();
    if (!deleted) throw new NotFoundError('Budget', budgetId);

    const event = buildEventFromContext(ctx, EXPENSE_EVENTS.BUDGET_DELETED, {
      budgetId,
      categoryId: deleted.categoryId,
    });
    return { result: deleted, events: [event] };
  });

  await auditLog(ctx, 'budget.deleted', 'budget', budgetId, undefined, {
    categoryId: removed.categoryId,
    amount: Number(removed.amount),
    periodStart: removed.periodStart,
    periodEnd: removed.periodEnd,
  });
}
