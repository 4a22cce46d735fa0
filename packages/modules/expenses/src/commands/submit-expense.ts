import { and, eq } from 'drizzle-orm';
import type { RequestContext } from '@expensox/core/auth';
import { publishWithOutbox, buildEventFromContext } from '@expensox/core/events';
import { auditLog } from '@expensox/core/audit';
import { expenseApprovals, expenses } from '@expensox/db';
import {
  AuthorizationError,
  ConflictError,
  EXPENSE_EVENTS,
  SYSTEM_APPROVER,
} from '@expensox/shared';
import { ExpenseStatusError } from '../errors';
import { buildApprovalPlan, materializePlan, selectApprovalFlow } from '../engine/approval-engine';
import { loadActiveFlows, loadDirectory } from '../helpers/approval-state';
import { loadExpense, toExpenseView } from '../helpers/expense-view';
import type { ExpenseView } from '../helpers/expense-view';

/**
 * Routes a draft into approval. The plan is materialized into approval rows
 * now; later flow edits do not touch them. An empty plan approves at once.
 */
export async function submitExpense(ctx: RequestContext, expenseId: string): Promise<ExpenseView> {
  const { expense, flowId, steps } = await publishWithOutbox(ctx, async (tx) => {
    const existing = await loadExpense(tx, ctx.tenantId, expenseId);
    if (existing.submitterUserId !== ctx.user.id) {
      throw new AuthorizationError('Only the submitter can submit this expense');
    }
    if (existing.status !== 'draft') {
      throw new ExpenseStatusError(expenseId, existing.status, 'draft');
    }

    const flows = await loadActiveFlows(tx, ctx.tenantId);
    const flow = selectApprovalFlow(flows, Number(existing.amountInCompanyCurrency));
    const directory = await loadDirectory(tx, ctx.tenantId);
    const managerId = directory.find((u) => u.id === ctx.user.id)?.managerId ?? ctx.user.managerId;

    const plan = buildApprovalPlan({
      flow,
      submitter: { id: ctx.user.id, managerId },
      users: directory,
    });

    // Rows from an earlier, rejected round
    await tx
      .delete(expenseApprovals)
      .where(and(eq(expenseApprovals.tenantId, ctx.tenantId), eq(expenseApprovals.expenseId, expenseId)));

    const rows = materializePlan(plan);
    if (rows.length > 0) {
      await tx
        .insert(expenseApprovals)
        .values(rows.map((row) => ({ ...row, tenantId: ctx.tenantId, expenseId })));
    }

    const now = new Date();
    const autoApproved = rows.length === 0;
    const [updated] = await tx
      .update(expenses)
      .set({
        status: autoApproved ? 'approved' : 'pending',
        approvalFlowId: flow?.id ?? null,
        currentStep: autoApproved ? null : 1,
        submittedAt: now,
        ...(autoApproved && { approvedAt: now, approvedBy: SYSTEM_APPROVER }),
        updatedAt: now,
        version: existing.version + 1,
      })
      .where(
        and(
          eq(expenses.tenantId, ctx.tenantId),
          eq(expenses.id, expenseId),
          eq(expenses.version, existing.version),
        ),
      )
      .returning();
    if (!updated) {
      throw new ConflictError('Expense was modified by another request; reload and try again');
    }

    const events = [
      buildEventFromContext(ctx, EXPENSE_EVENTS.SUBMITTED, {
        expenseId,
        expenseNumber: updated.expenseNumber,
        approvalFlowId: flow?.id ?? null,
        steps: rows.length,
        amountInCompanyCurrency: Number(updated.amountInCompanyCurrency),
      }),
    ];
    const first = rows[0];
    if (first) {
      events.push(
        buildEventFromContext(ctx, EXPENSE_EVENTS.APPROVAL_REQUESTED, {
          expenseId,
          submitterUserId: ctx.user.id,
          stepNumber: first.stepNumber,
          stepName: first.stepName,
          approverUserId: first.approverUserId,
          approverRole: first.approverRole,
        }),
      );
    } else {
      events.push(
        buildEventFromContext(ctx, EXPENSE_EVENTS.APPROVED, {
          expenseId,
          submitterUserId: ctx.user.id,
          decidedBy: SYSTEM_APPROVER,
          autoApproved: true,
        }),
      );
    }

    return {
      result: { expense: toExpenseView(updated), flowId: flow?.id ?? null, steps: rows.length },
      events,
    };
  });

  await auditLog(ctx, 'expense.submitted', 'expense', expenseId, undefined, {
    approvalFlowId: flowId,
    steps,
    autoApproved: steps === 0,
  });
  return expense;
}
