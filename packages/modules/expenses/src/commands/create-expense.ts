import { and, eq } from 'drizzle-orm';
import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox, buildEventFromContext } from '@expensox/core/events';
import { auditLog } from '@expensox/core/audit';
import { convertToCompanyCurrency } from '@expensox/core/currency';
import { expenseCategories, expenses } from '@expensox/db';
import type { Database } from '@expensox/db';
import {
  EXPENSE_EVENTS,
  NotFoundError,
  ValidationError,
  generateUlid,
  parseOrThrow,
  todayIsoDate,
} from '@expensox/shared';
import { createExpenseSchema } from '../validation';
import type { CreateExpenseInput } from '../validation';
import { CategoryInactiveError } from '../errors';
import { generateExpenseNumber, toExpenseView } from '../helpers/expense-view';
import type { ExpenseView } from '../helpers/expense-view';
import { loadCompanyCurrency } from '../helpers/views';

export function assertNotFutureDate(expenseDate: string, now: Date = new Date()): void {
  if (expenseDate > todayIsoDate(now)) {
    throw new ValidationError('Validation failed', [
      { field: 'expenseDate', message: 'Expense date cannot be in the future' },
    ]);
  }
}

export async function assertActiveCategory(
  tx: Database,
  tenantId: string,
  categoryId: string,
): Promise<void> {
  const [category] = await tx
    .select({ id: expenseCategories.id, isActive: expenseCategories.isActive })
    .from(expenseCategories)
    .where(and(eq(expenseCategories.tenantId, tenantId), eq(expenseCategories.id, categoryId)))
    .limit(1);
  if (!category) throw new NotFoundError('Category', categoryId);
  if (!category.isActive) throw new CategoryInactiveError(categoryId);
}

/**
 * Records a draft expense converted into the company currency at the rate
 * effective on the expense date. A repeated `clientRequestId` returns the
 * expense the first request created.
 */
export async function createExpense(
  ctx: RequestContext,
  input: CreateExpenseInput,
): Promise<ExpenseView> {
  const parsed = parseOrThrow(createExpenseSchema, input);
  assertNotFutureDate(parsed.expenseDate);

  const { expense, duplicate } = await publishWithOutbox(ctx, async (tx) => {
    if (parsed.clientRequestId) {
      const [original] = await tx
        .select()
        .from(expenses)
        .where(
          and(
            eq(expenses.tenantId, ctx.tenantId),
            eq(expenses.submitterUserId, ctx.user.id),
            eq(expenses.clientRequestId, parsed.clientRequestId),
          ),
        )
        .limit(1);
      if (original) {
        return { result: { expense: toExpenseView(original), duplicate: true }, events: [] };
      }
    }

    await assertActiveCategory(tx, ctx.tenantId, parsed.categoryId);

    const companyCurrency = await loadCompanyCurrency(tx, ctx.tenantId);
    const converted = await convertToCompanyCurrency(
      tx,
      ctx.tenantId,
      parsed.amount,
      parsed.currency,
      companyCurrency,
      parsed.expenseDate,
    );

    const expenseNumber = generateExpenseNumber();
    const [created] = await tx
      .insert(expenses)
      .values({
        id: generateUlid(),
        tenantId: ctx.tenantId,
        expenseNumber,
        submitterUserId: ctx.user.id,
        categoryId: parsed.categoryId,
        title: parsed.title,
        description: parsed.description ?? null,
        expenseDate: parsed.expenseDate,
        amount: parsed.amount.toFixed(2),
        currency: parsed.currency,
        amountInCompanyCurrency: converted.amount.toFixed(2),
        companyCurrency,
        exchangeRate: String(converted.rate),
        paidBy: parsed.paidBy,
        receiptUrl: parsed.receiptUrl ?? null,
        status: 'draft',
        clientRequestId: parsed.clientRequestId ?? null,
      })
      .returning();
    if (!created) throw new Error('Expense insert returned no row');

    const event = buildEventFromContext(ctx, EXPENSE_EVENTS.CREATED, {
      expenseId: created.id,
      expenseNumber,
      amount: parsed.amount,
      currency: parsed.currency,
      amountInCompanyCurrency: converted.amount,
      categoryId: parsed.categoryId,
      submitterUserId: ctx.user.id,
    });

    return { result: { expense: toExpenseView(created), duplicate: false }, events: [event] };
  });

  if (!duplicate) {
    await auditLog(ctx, 'expense.created', 'expense', expense.id, undefined, {
      expenseNumber: expense.expenseNumber,
      amount: expense.amount,
      currency: expense.currency,
    });
  }
  return expense;
}
