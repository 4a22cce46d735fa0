import { and, asc, eq } from 'drizzle-orm';
import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox, buildEventFromContext } from '@expensox/core/events';
import { auditLog, computeChanges } from '@expensox/core/audit';
import { approvalFlowSteps, approvalFlows } from '@expensox/db';
import {
  ConflictError,
  EXPENSE_EVENTS,
  NotFoundError,
  ValidationError,
  parseOrThrow,
} from '@expensox/shared';
import { updateApprovalFlowSchema } from '../validation';
import type { UpdateApprovalFlowInput } from '../validation';
import { toFlowView } from '../helpers/views';
import type { ApprovalFlowView } from '../helpers/views';
import { assertFlowNameFree, clearDefaultFlow, insertFlowSteps } from './create-approval-flow';

function auditable(view: ApprovalFlowView): Record<string, unknown> {
  return {
    name: view.name,
    description: view.description,
    isManagerApprover: view.isManagerApprover,
    minAmount: view.minAmount,
    isDefault: view.isDefault,
    isActive: view.isActive,
    steps: view.steps,
  };
}

/**
 * Replaces the flow's settings and, when given, its steps. Expenses already
 * in approval keep the rows materialized at submission.
 */
export async function updateApprovalFlow(
  ctx: RequestContext,
  flowId: string,
  input: UpdateApprovalFlowInput,
): Promise<ApprovalFlowView> {
  const parsed = parseOrThrow(updateApprovalFlowSchema, input);

  const { before, after } = await publishWithOutbox(ctx, async (tx) => {
    const [existing] = await tx
      .select()
      .from(approvalFlows)
      .where(and(eq(approvalFlows.tenantId, ctx.tenantId), eq(approvalFlows.id, flowId)))
      .limit(1);
    if (!existing) throw new NotFoundError('Approval flow', flowId);

    if (parsed.expectedVersion !== undefined && parsed.expectedVersion !== existing.version) {
      throw new ConflictError(
        `Approval flow was modified (version ${existing.version}, expected ${parsed.expectedVersion})`,
      );
    }

    const existingSteps = await tx
      .select()
      .from(approvalFlowSteps)
      .where(and(eq(approvalFlowSteps.tenantId, ctx.tenantId), eq(approvalFlowSteps.flowId, flowId)))
      .orderBy(asc(approvalFlowSteps.sequence));

    const isManagerApprover = parsed.isManagerApprover ?? existing.isManagerApprover;
    const stepCount = parsed.steps?.length ?? existingSteps.length;
    if (stepCount === 0 && !isManagerApprover) {
      throw new ValidationError('Validation failed', [
        { field: 'steps', message: 'A flow needs at least one step unless the manager approves' },
      ]);
    }

    if (parsed.name !== undefined && parsed.name !== existing.name) {
      await assertFlowNameFree(tx, ctx.tenantId, parsed.name, flowId);
    }

    const isActive = parsed.isActive ?? existing.isActive;
    const isDefault = isActive && (parsed.isDefault ?? existing.isDefault);
    if (isDefault && !existing.isDefault) await clearDefaultFlow(tx, ctx.tenantId);

    const [updated] = await tx
      .update(approvalFlows)
      .set({
        ...(parsed.name !== undefined && { name: parsed.name }),
        ...(parsed.description !== undefined && { description: parsed.description }),
        ...(parsed.minAmount !== undefined && {
          minAmount: parsed.minAmount === null ? null : parsed.minAmount.toFixed(2),
        }),
        isManagerApprover,
        isDefault,
        isActive,
        version: existing.version + 1,
        updatedAt: new Date(),
      })
      .where(and(eq(approvalFlows.tenantId, ctx.tenantId), eq(approvalFlows.id, flowId)))
      .returning();
    if (!updated) throw new NotFoundError('Approval flow', flowId);

    let steps = existingSteps;
    if (parsed.steps) {
      await tx
        .delete(approvalFlowSteps)
        .where(and(eq(approvalFlowSteps.tenantId, ctx.tenantId), eq(approvalFlowSteps.flowId, flowId)));
      steps = await insertFlowSteps(tx, ctx.tenantId, flowId, parsed.steps);
    }

    const before = toFlowView(existing, existingSteps);
    const after = toFlowView(updated, steps);
    const changes = computeChanges(auditable(before), auditable(after));
    const event = buildEventFromContext(ctx, EXPENSE_EVENTS.FLOW_UPDATED, {
      flowId,
      version: after.version,
      changes: changes ?? {},
    });

    return { result: { before, after }, events: [event] };
  });

  const changes = computeChanges(auditable(before), auditable(after));
  if (changes) {
    await auditLog(ctx, 'approval_flow.updated', 'approval_flow', flowId, changes);
  }
  return after;
}
