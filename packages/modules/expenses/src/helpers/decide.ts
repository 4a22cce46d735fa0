import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox } from '@expensox/core/events';
import { auditLog } from '@expensox/core/audit';
import type { ApprovalState, DecisionOutcome } from '../engine/approval-engine';
import { loadApprovalState, persistDecision } from './approval-state';
import { loadExpense, toExpenseView } from './expense-view';
import type { ExpenseView } from './expense-view';

export interface DecisionResult {
  expense: ExpenseView;
  outcome: DecisionOutcome;
}

/** Loads the approval state, lets `decide` compute the outcome, and persists it. */
export async function runDecision(
  ctx: RequestContext,
  expenseId: string,
  decide: (state: ApprovalState, now: Date) => DecisionOutcome,
  auditAction: (outcome: DecisionOutcome) => string,
): Promise<DecisionResult> {
  const result = await publishWithOutbox(ctx, async (tx) => {
    const existing = await loadExpense(tx, ctx.tenantId, expenseId);
    const state = await loadApprovalState(tx, ctx.tenantId, existing);
    const now = new Date();
    const outcome = decide(state, now);
    const { expense, events } = await persistDecision(tx, ctx, existing, outcome, now);
    return { result: { expense: toExpenseView(expense), outcome }, events };
  });

  const decided = result.outcome.changes.find((c) => c.row.actedBy === ctx.user.id)?.row;
  await auditLog(ctx, auditAction(result.outcome), 'expense', expenseId, undefined, {
    stepNumber: decided?.stepNumber ?? null,
    stepName: decided?.stepName ?? null,
    comment: decided?.comment ?? null,
    status: result.outcome.status,
    ruleId: result.outcome.rule?.ruleId ?? null,
  });
  return result;
}
