import { and, eq } from 'drizzle-orm';
import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox, buildEventFromContext } from '@expensox/core/events';
import { auditLog } from '@expensox/core/audit';
import { expenses } from '@expensox/db';
import { AuthorizationError, EXPENSE_EVENTS } from '@expensox/shared';
import { ExpenseStatusError } from '../errors';
import { loadExpense } from '../helpers/expense-view';

/** Only the submitter's own drafts can be deleted. */
export async function deleteExpense(ctx: RequestContext, expenseId: string): Promise<void> {
  const removed = await publishWithOutbox(ctx, async (tx) => {
    const existing = await loadExpense(tx, ctx.tenantId, expenseId);
    if (existing.submitterUserId !== ctx.user.id) {
      throw new AuthorizationError('Only the submitter can delete this expense');
    }
    if (existing.status !== 'draft') {
      throw new ExpenseStatusError(expenseId, existing.status, 'draft');
    }

    await tx
      .delete(expenses)
      .where(and(eq(expenses.tenantId, ctx.tenantId), eq(expenses.id, expenseId)));

    const event = buildEventFromContext(ctx, EXPENSE_EVENTS.DELETED, {
      expenseId,
      expenseNumber: existing.expenseNumber,
    });
    return { result: existing, events: [event] };
  });

  await auditLog(ctx, 'expense.deleted', 'expense', expenseId, undefined, {
    expenseNumber: removed.expenseNumber,
    amount: Number(removed.amount),
    currency: removed.currency,
  });
}
