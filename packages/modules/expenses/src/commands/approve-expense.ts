import type { RequestContext } from '@expensox/core/auth';
import { parseOrThrow } from '@expensox/shared';
import { approveExpenseSchema } from '../validation';
import type { ApproveExpenseInput } from '../validation';
import { applyDecision } from '../engine/approval-engine';
import { runDecision } from '../helpers/decide';
import type { DecisionResult } from '../helpers/decide';

export async function approveExpense(
  ctx: RequestContext,
  input: ApproveExpenseInput,
): Promise<DecisionResult> {
  const parsed = parseOrThrow(approveExpenseSchema, input);

  return runDecision(
    ctx,
    parsed.expenseId,
    (state, now) =>
      applyDecision(state, {
        actorId: ctx.user.id,
        actorRole: ctx.user.role,
        decision: 'approve',
        comment: parsed.comment ?? null,
        now,
      }),
    (outcome) => (outcome.finalDecision === 'approved' ? 'expense.approved' : 'expense.step_approved'),
  );
}
