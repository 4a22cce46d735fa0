import { and, eq } from 'drizzle-orm';
import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox, buildEventFromContext } from '@expensox/core/events';
import { auditLog } from '@expensox/core/audit';
import { approvalFlows, approvalRules, users } from '@expensox/db';
import type { Database } from '@expensox/db';
import {
  EXPENSE_EVENTS,
  NotFoundError,
  ValidationError,
  generateUlid,
  isApproverRole,
  parseOrThrow,
} from '@expensox/shared';
import type { z } from 'zod';
import { createApprovalRuleSchema } from '../validation';
import type { CreateApprovalRuleInput } from '../validation';
import { toRuleView } from '../helpers/views';
import type { ApprovalRuleView } from '../helpers/views';

type RuleInput = z.output<typeof createApprovalRuleSchema>;

/** Drops the fields the rule type does not use. */
export function normalizeRule(rule: RuleInput) {
  return {
    name: rule.name,
    ruleType: rule.ruleType,
    percentageThreshold:
      rule.ruleType === 'specific' || rule.percentageThreshold == null
        ? null
        : rule.percentageThreshold.toFixed(2),
    specificApproverId:
      rule.ruleType === 'percentage' ? null : (rule.specificApproverId ?? null),
    flowId: rule.flowId ?? null,
  };
}

export async function assertRuleReferences(
  tx: Database,
  tenantId: string,
  rule: { specificApproverId: string | null; flowId: string | null },
): Promise<void> {
  if (rule.specificApproverId) {
    const [approver] = await tx
      .select({ role: users.role, status: users.status })
      .from(users)
      .where(and(eq(users.tenantId, tenantId), eq(users.id, rule.specificApproverId)))
      .limit(1);
    if (!approver || approver.status !== 'active' || !isApproverRole(approver.role)) {
      throw new ValidationError('Validation failed', [
        { field: 'specificApproverId', message: 'The specific approver must be an active manager or admin' },
      ]);
    }
  }

  if (rule.flowId) {
    const [flow] = await tx
      .select({ id: approvalFlows.id })
      .from(approvalFlows)
      .where(and(eq(approvalFlows.tenantId, tenantId), eq(approvalFlows.id, rule.flowId)))
      .limit(1);
    if (!flow) throw new NotFoundError('Approval flow', rule.flowId);
  }
}

export async function createApprovalRule(
  ctx: RequestContext,
  input: CreateApprovalRuleInput,
): Promise<ApprovalRuleView> {
  const values = normalizeRule(parseOrThrow(createApprovalRuleSchema, input));

  const rule = await publishWithOutbox(ctx, async (tx) => {
    await assertRuleReferences(tx, ctx.tenantId, values);

    const [created] = await tx
      .insert(approvalRules)
      .values({
        id: generateUlid(),
        tenantId: ctx.tenantId,
        ...values,
        isActive: true,
        createdBy: ctx.user.id,
      })
      .returning();
    if (!created) throw new Error('Approval rule insert returned no row');

    const view = toRuleView(created);
    const event = buildEventFromContext(ctx, EXPENSE_EVENTS.RULE_CREATED, {
      ruleId: view.id,
      ruleType: view.ruleType,
      flowId: view.flowId,
    });
    return { result: view, events: [event] };
  });

  await auditLog(ctx, 'approval_rule.created', 'approval_rule', rule.id, undefined, {
    name: rule.name,
    ruleType: rule.ruleType,
    percentageThreshold: rule.percentageThreshold,
    specificApproverId: rule.specificApproverId,
  });
  return rule;
}
