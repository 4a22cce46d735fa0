import { and, eq } from 'drizzle-orm';
import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox, buildEventFromContext } from '@expensox/core/events';
import { auditLog, computeChanges } from '@expensox/core/audit';
import { budgets } from '@expensox/db';
import { EXPENSE_EVENTS, NotFoundError, ValidationError, parseOrThrow } from '@expensox/shared';
import { updateBudgetSchema } from '../validation';
import type { UpdateBudgetInput } from '../validation';
import { toBudgetView } from '../helpers/views';
import type { BudgetView } from '../helpers/views';
import { assertNoBudgetOverlap } from './create-budget';

function auditable(view: BudgetView): Record<string, unknown> {
  return {
    amount: view.amount,
    periodStart: view.periodStart,
    periodEnd: view.periodEnd,
    description: view.description,
  };
}

export async function updateBudget(
  ctx: RequestContext,
  budgetId: string,
  input: UpdateBudgetInput,
): Promise<BudgetView> {
  const parsed = parseOrThrow(updateBudgetSchema, input);

  const { before, after } = await publishWithOutbox(ctx, async (tx) => {
    const [existing] = await tx
      .select()
      .from(budgets)
      .where(and(eq(budgets.tenantId, ctx.tenantId), eq(budgets.id, budgetId)))
      .limit(1);
    if (!existing) throw new NotFoundError('Budget', budgetId);

    const periodStart = parsed.periodStart ?? existing.periodStart;
    const periodEnd = parsed.periodEnd ?? existing.periodEnd;
    if (periodStart > periodEnd) {
      throw new ValidationError('Validation failed', [
        { field: 'periodEnd', message: 'Period start must be on or before period end' },
      ]);
    }
    if (periodStart !== existing.periodStart || periodEnd !== existing.periodEnd) {
      await assertNoBudgetOverlap(tx, ctx.tenantId, existing.categoryId, periodStart, periodEnd, budgetId);
    }

    const [updated] = await tx
      .update(budgets)
      .set({
        ...(parsed.amount !== undefined && { amount: parsed.amount.toFixed(2) }),
        ...(parsed.description !== undefined && { description: parsed.description }),
        periodStart,
        periodEnd,
        updatedAt: new Date(),
      })
      .where(and(eq(budgets.tenantId, ctx.tenantId), eq(budgets.id, budgetId)))
      .returning();
    if (!updated) throw new NotFoundError('Budget', budgetId);

    const before = toBudgetView(existing);
    const after = toBudgetView(updated);
    const changes = computeChanges(auditable(before), auditable(after));
    const events = changes
      ? [buildEventFromContext(ctx, EXPENSE_EVENTS.BUDGET_UPDATED, { budgetId, changes })]
      : [];

    return { result: { before, after }, events };
  });

  const changes = computeChanges(auditable(before), auditable(after));
  if (changes) {
    await auditLog(ctx, 'budget.updated', 'budget', budgetId, changes);
  }
  return after;
}
