import type { RequestContext } from '@expensox/core/auth';
import { AuthorizationError, parseOrThrow } from '@expensox/shared';
import { overrideExpenseSchema } from '../validation';
import type { OverrideExpenseInput } from '../validation';
import { applyOverride } from '../engine/approval-engine';
import { runDecision } from '../helpers/decide';
import type { DecisionResult } from '../helpers/decide';

export async function overrideExpenseDecision(
  ctx: RequestContext,
  input: OverrideExpenseInput,
): Promise<DecisionResult> {
  const parsed = parseOrThrow(overrideExpenseSchema, input);
  if (ctx.user.role !== 'admin') {
    throw new AuthorizationError('Only admins can override approvals');
  }

  return runDecision(
    ctx,
    parsed.expenseId,
    (state, now) =>
      applyOverride(state, {
        actorId: ctx.user.id,
        decision: parsed.decision,
        comment: parsed.comment,
        now,
      }),
    (outcome) => `expense.override_${outcome.status}`,
  );
}
