import { and, eq } from 'drizzle-orm';
import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox, buildEventFromContext } from '@expensox/core/events';
import { auditLog, computeChanges } from '@expensox/core/audit';
import { convertToCompanyCurrency } from '@expensox/core/currency';
import { expenses } from '@expensox/db';
import { AuthorizationError, ConflictError, EXPENSE_EVENTS, parseOrThrow } from '@expensox/shared';
import { updateExpenseSchema } from '../validation';
import type { UpdateExpenseInput } from '../validation';
import { ExpenseStatusError } from '../errors';
import { loadExpense, toExpenseView } from '../helpers/expense-view';
import type { ExpenseRecord, ExpenseView } from '../helpers/expense-view';
import { assertActiveCategory, assertNotFutureDate } from './create-expense';

function auditable(row: ExpenseRecord): Record<string, unknown> {
  return {
    title: row.title,
    description: row.description,
    categoryId: row.categoryId,
    expenseDate: row.expenseDate,
    amount: row.amount,
    currency: row.currency,
    amountInCompanyCurrency: row.amountInCompanyCurrency,
    paidBy: row.paidBy,
    receiptUrl: row.receiptUrl,
    status: row.status,
  };
}

/**
 * Edits a draft or rejected expense. Editing a rejected expense returns it to
 * draft so it can be resubmitted.
 */
export async function updateExpense(
  ctx: RequestContext,
  expenseId: string,
  input: UpdateExpenseInput,
): Promise<ExpenseView> {
  const parsed = parseOrThrow(updateExpenseSchema, input);
  if (parsed.expenseDate !== undefined) assertNotFutureDate(parsed.expenseDate);

  const { before, after } = await publishWithOutbox(ctx, async (tx) => {
    const existing = await loadExpense(tx, ctx.tenantId, expenseId);

    if (existing.submitterUserId !== ctx.user.id) {
      throw new AuthorizationError('Only the submitter can edit this expense');
    }
    if (existing.status !== 'draft' && existing.status !== 'rejected') {
      throw new ExpenseStatusError(expenseId, existing.status, 'draft or rejected');
    }
    if (parsed.expectedVersion !== undefined && parsed.expectedVersion !== existing.version) {
      throw new ConflictError(
        `Expense was modified (version ${existing.version}, expected ${parsed.expectedVersion})`,
      );
    }

    if (parsed.categoryId !== undefined && parsed.categoryId !== existing.categoryId) {
      await assertActiveCategory(tx, ctx.tenantId, parsed.categoryId);
    }

    const amount = parsed.amount ?? Number(existing.amount);
    const currency = parsed.currency ?? existing.currency;
    const expenseDate = parsed.expenseDate ?? existing.expenseDate;
    const needsConversion =
      amount !== Number(existing.amount) ||
      currency !== existing.currency ||
      expenseDate !== existing.expenseDate;

    const converted = needsConversion
      ? await convertToCompanyCurrency(tx, ctx.tenantId, amount, currency, existing.companyCurrency, expenseDate)
      : null;

    const wasRejected = existing.status === 'rejected';
    const now = new Date();

    const [updated] = await tx
      .update(expenses)
      .set({
        ...(parsed.title !== undefined && { title: parsed.title }),
        ...(parsed.description !== undefined && { description: parsed.description }),
        ...(parsed.categoryId !== undefined && { categoryId: parsed.categoryId }),
        ...(parsed.receiptUrl !== undefined && { receiptUrl: parsed.receiptUrl }),
        ...(parsed.paidBy !== undefined && { paidBy: parsed.paidBy }),
        ...(converted && {
          amount: amount.toFixed(2),
          currency,
          expenseDate,
          amountInCompanyCurrency: converted.amount.toFixed(2),
          exchangeRate: String(converted.rate),
        }),
        ...(wasRejected && {
          status: 'draft' as const,
          rejectedAt: null,
          rejectedBy: null,
          rejectionReason: null,
          currentStep: null,
        }),
        updatedAt: now,
        version: existing.version + 1,
      })
      .where(
        and(
          eq(expenses.tenantId, ctx.tenantId),
          eq(expenses.id, expenseId),
          eq(expenses.version, existing.version),
        ),
      )
      .returning();
    if (!updated) {
      throw new ConflictError('Expense was modified by another request; reload and try again');
    }

    const changes = computeChanges(auditable(existing), auditable(updated));
    const event = buildEventFromContext(ctx, EXPENSE_EVENTS.UPDATED, {
      expenseId,
      changes: changes ?? {},
      returnedToDraft: wasRejected,
    });

    return { result: { before: existing, after: updated }, events: [event] };
  });

  const changes = computeChanges(auditable(before), auditable(after));
  if (changes) {
    await auditLog(ctx, 'expense.updated', 'expense', expenseId, changes);
  }
  return toExpenseView(after);
}
