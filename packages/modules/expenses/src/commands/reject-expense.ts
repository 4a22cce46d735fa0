import type { RequestContext } from '@expensox/core/auth';
import { parseOrThrow } from '@expensox/shared';
import { rejectExpenseSchema } from '../validation';
import type { RejectExpenseInput } from '../validation';
import { applyDecision } from '../engine/approval-engine';
import { runDecision } from '../helpers/decide';
import type { DecisionResult } from '../helpers/decide';

/** A rejection is final; the submitter may edit and resubmit. */
export async function rejectExpense(
  ctx: RequestContext,
  input: RejectExpenseInput,
): Promise<DecisionResult> {
  const parsed = parseOrThrow(rejectExpenseSchema, input);

  return runDecision(
    ctx,
    parsed.expenseId,
    (state, now) =>
      applyDecision(state, {
        actorId: ctx.user.id,
        actorRole: ctx.user.role,
        decision: 'reject',
        comment: parsed.comment,
        now,
      }),
    () => 'expense.rejected',
  );
}
