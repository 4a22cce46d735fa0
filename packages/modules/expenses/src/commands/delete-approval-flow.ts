import { and, eq } from 'drizzle-orm';
import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox, buildEventFromContext } from '@expensox/core/events';
import { auditLog } from '@expensox/core/audit';
import { approvalFlows } from '@expensox/db';
import { EXPENSE_EVENTS, NotFoundError } from '@expensox/shared';

/** Soft delete: the flow stays referenced by the expenses it routed. */
export async function deleteApprovalFlow(ctx: RequestContext, flowId: string): Promise<void> {
  await publishWithOutbox(ctx, async (tx) => {
    const [existing] = await tx
      .select({ id: approvalFlows.id, version: approvalFlows.version })
      .from(approvalFlows)
      .where(and(eq(approvalFlows.tenantId, ctx.tenantId), eq(approvalFlows.id, flowId)))
      .limit(1);
    if (!existing) throw new NotFoundError('Approval flow', flowId);

    await tx
      .update(approvalFlows)
      .set({ isActive: false, isDefault: false, version: existing.version + 1, updatedAt: new Date() })
      .where(and(eq(approvalFlows.tenantId, ctx.tenantId), eq(approvalFlows.id, flowId)));

    const event = buildEventFromContext(ctx, EXPENSE_EVENTS.FLOW_DELETED, { flowId });
    return { result: undefined, events: [event] };
  });

  await auditLog(ctx, 'approval_flow.deleted', 'approval_flow', flowId);
}
