import { and, eq } from 'drizzle-orm';
import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox, buildEventFromContext } from '@expensox/core/events';
import { auditLog } from '@expensox/core/audit';
import { expenses } from '@expensox/db';
import { ConflictError, EXPENSE_EVENTS, parseOrThrow } from '@expensox/shared';
import { markExpensePaidSchema } from '../validation';
import type { MarkExpensePaidInput } from '../validation';
import { ExpenseStatusError } from '../errors';
import { loadExpense, toExpenseView } from '../helpers/expense-view';
import type { ExpenseView } from '../helpers/expense-view';

export async function markExpensePaid(
  ctx: RequestContext,
  input: MarkExpensePaidInput,
): Promise<ExpenseView> {
  const parsed = parseOrThrow(markExpensePaidSchema, input);

  const expense = await publishWithOutbox(ctx, async (tx) => {
    const existing = await loadExpense(tx, ctx.tenantId, parsed.expenseId);
    if (existing.status !== 'approved') {
      throw new ExpenseStatusError(parsed.expenseId, existing.status, 'approved');
    }

    const now = new Date();
    const [updated] = await tx
      .update(expenses)
      .set({
        status: 'paid',
        paidAt: now,
        paidByUserId: ctx.user.id,
        paymentReference: parsed.reference ?? null,
        updatedAt: now,
        version: existing.version + 1,
      })
      .where(
        and(
          eq(expenses.tenantId, ctx.tenantId),
          eq(expenses.id, parsed.expenseId),
          eq(expenses.version, existing.version),
        ),
      )
      .returning();
    if (!updated) {
      throw new ConflictError('Expense was modified by another request; reload and try again');
    }

    const event = buildEventFromContext(ctx, EXPENSE_EVENTS.PAID, {
      expenseId: updated.id,
      submitterUserId: updated.submitterUserId,
      amountInCompanyCurrency: Number(updated.amountInCompanyCurrency),
      companyCurrency: updated.companyCurrency,
      paidBy: updated.paidBy,
      reference: updated.paymentReference,
    });

    return { result: toExpenseView(updated), events: [event] };
  });

  await auditLog(ctx, 'expense.paid', 'expense', expense.id, undefined, {
    reference: expense.paymentReference,
  });
  return expense;
}
