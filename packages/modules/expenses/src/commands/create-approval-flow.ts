import { and, eq } from 'drizzle-orm';
import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox, buildEventFromContext } from '@expensox/core/events';
import { auditLog } from '@expensox/core/audit';
import { approvalFlowSteps, approvalFlows } from '@expensox/db';
import type { Database } from '@expensox/db';
import { ConflictError, EXPENSE_EVENTS, generateUlid, parseOrThrow } from '@expensox/shared';
import type { z } from 'zod';
import { createApprovalFlowSchema } from '../validation';
import type { CreateApprovalFlowInput, flowStepSchema } from '../validation';
import { assertActiveTenantUsers } from '../helpers/approvers';
import { toFlowView } from '../helpers/views';
import type { ApprovalFlowView, FlowStepRecord } from '../helpers/views';

type FlowStep = z.output<typeof flowStepSchema>;

export async function assertFlowNameFree(
  tx: Database,
  tenantId: string,
  name: string,
  exceptFlowId?: string,
): Promise<void> {
  const rows = await tx
    .select({ id: approvalFlows.id })
    .from(approvalFlows)
    .where(and(eq(approvalFlows.tenantId, tenantId), eq(approvalFlows.name, name)));
  if (rows.some((r) => r.id !== exceptFlowId)) {
    throw new ConflictError(`An approval flow named "${name}" already exists`);
  }
}

/** Only one flow per tenant is the default. */
export async function clearDefaultFlow(tx: Database, tenantId: string): Promise<void> {
  await tx
    .update(approvalFlows)
    .set({ isDefault: false, updatedAt: new Date() })
    .where(and(eq(approvalFlows.tenantId, tenantId), eq(approvalFlows.isDefault, true)));
}

export async function insertFlowSteps(
  tx: Database,
  tenantId: string,
  flowId: string,
  steps: readonly FlowStep[],
): Promise<FlowStepRecord[]> {
  if (steps.length === 0) return [];

  await assertActiveTenantUsers(
    tx,
    tenantId,
    steps.flatMap((step, index) =>
      step.approverType === 'user' && step.approverUserId
        ? [{ userId: step.approverUserId, field: `steps.${index}.approverUserId` }]
        : [],
    ),
  );

  return tx
    .insert(approvalFlowSteps)
    .values(
      steps.map((step) => ({
        id: generateUlid(),
        tenantId,
        flowId,
        sequence: step.sequence,
        name: step.name,
        approverType: step.approverType,
        approverUserId: step.approverType === 'user' ? (step.approverUserId ?? null) : null,
        approverRole: step.approverType === 'role' ? (step.approverRole ?? null) : null,
      })),
    )
    .returning();
}

export async function createApprovalFlow(
  ctx: RequestContext,
  input: CreateApprovalFlowInput,
): Promise<ApprovalFlowView> {
  const parsed = parseOrThrow(createApprovalFlowSchema, input);

  const flow = await publishWithOutbox(ctx, async (tx) => {
    await assertFlowNameFree(tx, ctx.tenantId, parsed.name);
    if (parsed.isDefault) await clearDefaultFlow(tx, ctx.tenantId);

    const [created] = await tx
      .insert(approvalFlows)
      .values({
        id: generateUlid(),
        tenantId: ctx.tenantId,
        name: parsed.name,
        description: parsed.description ?? null,
        isManagerApprover: parsed.isManagerApprover,
        minAmount: parsed.minAmount == null ? null : parsed.minAmount.toFixed(2),
        isDefault: parsed.isDefault,
        isActive: true,
        createdBy: ctx.user.id,
      })
      .returning();
    if (!created) throw new Error('Approval flow insert returned no row');

    const steps = await insertFlowSteps(tx, ctx.tenantId, created.id, parsed.steps);
    const view = toFlowView(created, steps);

    const event = buildEventFromContext(ctx, EXPENSE_EVENTS.FLOW_CREATED, {
      flowId: view.id,
      name: view.name,
      minAmount: view.minAmount,
      steps: view.steps.length,
    });
    return { result: view, events: [event] };
  });

  await auditLog(ctx, 'approval_flow.created', 'approval_flow', flow.id, undefined, {
    name: flow.name,
    steps: flow.steps.length,
    isDefault: flow.isDefault,
  });
  return flow;
}
