import { and, asc, eq, inArray } from 'drizzle-orm';
import { approvalFlowSteps, approvalFlows, withTenant } from '@expensox/db';
import { NotFoundError, parseOrThrow } from '@expensox/shared';
import { listApprovalFlowsSchema } from '../validation';
import type { ListApprovalFlowsInput } from '../validation';
import { toFlowView } from '../helpers/views';
import type { ApprovalFlowView } from '../helpers/views';

export async function listApprovalFlows(input: ListApprovalFlowsInput): Promise<ApprovalFlowView[]> {
  const { tenantId, includeInactive } = parseOrThrow(listApprovalFlowsSchema, input);

  return withTenant(tenantId, async (tx) => {
    const flows = await tx
      .select()
      .from(approvalFlows)
      .where(
        includeInactive
          ? eq(approvalFlows.tenantId, tenantId)
          : and(eq(approvalFlows.tenantId, tenantId), eq(approvalFlows.isActive, true)),
      )
      .orderBy(asc(approvalFlows.name));
    if (flows.length === 0) return [];

    const steps = await tx
      .select()
      .from(approvalFlowSteps)
      .where(
        and(
          eq(approvalFlowSteps.tenantId, tenantId),
          inArray(
            approvalFlowSteps.flowId,
            flows.map((f) => f.id),
          ),
        ),
      )
      .orderBy(asc(approvalFlowSteps.sequence));

    return flows.map((flow) =>
      toFlowView(
        flow,
        steps.filter((s) => s.flowId === flow.id),
      ),
    );
  });
}

export async function getApprovalFlow(tenantId: string, flowId: string): Promise<ApprovalFlowView> {
  return withTenant(tenantId, async (tx) => {
    const [flow] = await tx
      .select()
      .from(approvalFlows)
      .where(and(eq(approvalFlows.tenantId, tenantId), eq(approvalFlows.id, flowId)))
      .limit(1);
    if (!flow) throw new NotFoundError('Approval flow', flowId);

    const steps = await tx
      .select()
      .from(approvalFlowSteps)
      .where(and(eq(approvalFlowSteps.tenantId, tenantId), eq(approvalFlowSteps.flowId, flowId)))
      .orderBy(asc(approvalFlowSteps.sequence));

    return toFlowView(flow, steps);
  });
}
