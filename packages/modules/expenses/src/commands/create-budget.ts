import { and, eq, gte, lte } from 'drizzle-orm';
import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox, buildEventFromContext } from '@expensox/core/events';
import { auditLog } from '@expensox/core/audit';
import { budgets, expenseCategories } from '@expensox/db';
import type { Database } from '@expensox/db';
import {
  EXPENSE_EVENTS,
  NotFoundError,
  ValidationError,
  generateUlid,
  parseOrThrow,
} from '@expensox/shared';
import { createBudgetSchema } from '../validation';
import type { CreateBudgetInput } from '../validation';
import { BudgetOverlapError } from '../errors';
import { loadCompanyCurrency, toBudgetView } from '../helpers/views';
import type { BudgetView } from '../helpers/views';

/** Throws when another budget for the category covers any day of the period. */
export async function assertNoBudgetOverlap(
  tx: Database,
  tenantId: string,
  categoryId: string,
  periodStart: string,
  periodEnd: string,
  excludeBudgetId?: string,
): Promise<void> {
  const rows = await tx
    .select({ id: budgets.id })
    .from(budgets)
    .where(
      and(
        eq(budgets.tenantId, tenantId),
        eq(budgets.categoryId, categoryId),
        lte(budgets.periodStart, periodEnd),
        gte(budgets.periodEnd, periodStart),
      ),
    );
  if (rows.some((r) => r.id !== excludeBudgetId)) {
    throw new BudgetOverlapError(categoryId, periodStart, periodEnd);
  }
}

export async function createBudget(ctx: RequestContext, input: CreateBudgetInput): Promise<BudgetView> {
  const parsed = parseOrThrow(createBudgetSchema, input);

  const budget = await publishWithOutbox(ctx, async (tx) => {
    const [category] = await tx
      .select({ id: expenseCategories.id })
      .from(expenseCategories)
      .where(and(eq(expenseCategories.tenantId, ctx.tenantId), eq(expenseCategories.id, parsed.categoryId)))
      .limit(1);
    if (!category) throw new NotFoundError('Category', parsed.categoryId);

    const companyCurrency = await loadCompanyCurrency(tx, ctx.tenantId);
    if (parsed.currency && parsed.currency !== companyCurrency) {
      throw new ValidationError('Validation failed', [
        { field: 'currency', message: `Budgets are kept in the company currency (${companyCurrency})` },
      ]);
    }

    await assertNoBudgetOverlap(tx, ctx.tenantId, parsed.categoryId, parsed.periodStart, parsed.periodEnd);

    const [created] = await tx
      .insert(budgets)
      .values({
        id: generateUlid(),
        tenantId: ctx.tenantId,
        categoryId: parsed.categoryId,
        amount: parsed.amount.toFixed(2),
        currency: companyCurrency,
        periodStart: parsed.periodStart,
        periodEnd: parsed.periodEnd,
        description: parsed.description ?? null,
        createdBy: ctx.user.id,
      })
      .returning();
    if (!created) throw new Error('Budget insert returned no row');

    const view = toBudgetView(created);
    const event = buildEventFromContext(ctx, EXPENSE_EVENTS.BUDGET_CREATED, {
      budgetId: view.id,
      categoryId: view.categoryId,
      amount: view.amount,
      periodStart: view.periodStart,
      periodEnd: view.periodEnd,
    });

    return { result: view, events: [event] };
  });

  await auditLog(ctx, 'budget.created', 'budget', budget.id, undefined, {
    categoryId: budget.categoryId,
    amount: budget.amount,
  });
  return budget;
}
