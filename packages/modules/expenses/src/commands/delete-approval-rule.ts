import { and, eq } from 'drizzle-orm';
import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox, buildEventFromContext } from '@expensox/core/events';
import { auditLog } from '@expensox/core/audit';
import { approvalRules } from '@expensox/db';
import { EXPENSE_EVENTS, NotFoundError } from '@expensox/shared';

export async function deleteApprovalRule(ctx: RequestContext, ruleId: string): Promise<void> {
  const removed = await publishWithOutbox(ctx, async (tx) => {
    const [deleted] = await tx
      .delete(approvalRules)
      .where(and(eq(approvalRules.tenantId, ctx.tenantId), eq(approvalRules.id, ruleId)))
      .returning();
    if (!deleted) throw new NotFoundError('Approval rule', ruleId);

    const event = buildEventFromContext(ctx, EXPENSE_EVENTS.RULE_DELETED, { ruleId });
    return { result: deleted, events: [event] };
  });

  await auditLog(ctx, 'approval_rule.deleted', 'approval_rule', ruleId, undefined, {
    name: removed.name,
    ruleType: removed.ruleType,
  });
}
