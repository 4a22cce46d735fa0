import { and, eq } from 'drizzle-orm';
import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox, buildEventFromContext } from '@expensox/core/events';
import { auditLog, computeChanges } from '@expensox/core/audit';
import { approvalRules } from '@expensox/db';
import { EXPENSE_EVENTS, NotFoundError, parseOrThrow } from '@expensox/shared';
import { createApprovalRuleSchema, updateApprovalRuleSchema } from '../validation';
import type { UpdateApprovalRuleInput } from '../validation';
import { toRuleView } from '../helpers/views';
import type { ApprovalRuleView } from '../helpers/views';
import { assertRuleReferences, normalizeRule } from './create-approval-rule';

function auditable(view: ApprovalRuleView): Record<string, unknown> {
  return {
    name: view.name,
    ruleType: view.ruleType,
    percentageThreshold: view.percentageThreshold,
    specificApproverId: view.specificApproverId,
    flowId: view.flowId,
    isActive: view.isActive,
  };
}

export async function updateApprovalRule(
  ctx: RequestContext,
  ruleId: string,
  input: UpdateApprovalRuleInput,
): Promise<ApprovalRuleView> {
  const patch = parseOrThrow(updateApprovalRuleSchema, input);

  const { before, after } = await publishWithOutbox(ctx, async (tx) => {
    const [existing] = await tx
      .select()
      .from(approvalRules)
      .where(and(eq(approvalRules.tenantId, ctx.tenantId), eq(approvalRules.id, ruleId)))
      .limit(1);
    if (!existing) throw new NotFoundError('Approval rule', ruleId);

    const current = toRuleView(existing);
    // The merged rule must still be a valid rule of its type.
    const values = normalizeRule(
      parseOrThrow(createApprovalRuleSchema, {
        name: patch.name ?? current.name,
        ruleType: patch.ruleType ?? current.ruleType,
        percentageThreshold:
          patch.percentageThreshold !== undefined ? patch.percentageThreshold : current.percentageThreshold,
        specificApproverId:
          patch.specificApproverId !== undefined ? patch.specificApproverId : current.specificApproverId,
        flowId: patch.flowId !== undefined ? patch.flowId : current.flowId,
      }),
    );
    await assertRuleReferences(tx, ctx.tenantId, values);

    const [updated] = await tx
      .update(approvalRules)
      .set({
        ...values,
        ...(patch.isActive !== undefined && { isActive: patch.isActive }),
        updatedAt: new Date(),
      })
      .where(and(eq(approvalRules.tenantId, ctx.tenantId), eq(approvalRules.id, ruleId)))
      .returning();
    if (!updated) throw new NotFoundError('Approval rule', ruleId);

    const after = toRuleView(updated);
    const changes = computeChanges(auditable(current), auditable(after));
    const events = changes
      ? [buildEventFromContext(ctx, EXPENSE_EVENTS.RULE_UPDATED, { ruleId, changes })]
      : [];
    return { result: { before: current, after }, events };
  });

  const changes = computeChanges(auditable(before), auditable(after));
  if (changes) {
    await auditLog(ctx, 'approval_rule.updated', 'approval_rule', ruleId, changes);
  }
  return after;
}
