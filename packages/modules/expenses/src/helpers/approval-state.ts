import { and, asc, eq } from 'drizzle-orm';
import {
  approvalFlowSteps,
  approvalFlows,
  approvalRules,
  expenseApprovals,
  expenses,
  users,
} from '@expensox/db';
import type { Database } from '@expensox/db';
import { ConflictError, isUserRole } from '@expensox/shared';
import type { RequestContext } from '@expensox/core/auth';
import { buildEventFromContext } from '@expensox/core/events';
import type { EventEnvelope } from '@expensox/shared';
import { applicableRules } from '../engine/approval-engine';
import type {
  ApprovalFlowDefinition,
  ApprovalRow,
  ApprovalRuleDefinition,
  ApprovalState,
  DecisionOutcome,
  DirectoryUser,
} from '../engine/approval-engine';
import type { ExpenseRecord } from './expense-view';

type ApprovalRecord = typeof expenseApprovals.$inferSelect;
type RuleRecord = typeof approvalRules.$inferSelect;

function toNumberOrNull(value: string | null): number | null {
  return value === null ? null : Number(value);
}

export function toApprovalRow(row: ApprovalRecord): ApprovalRow {
  return {
    id: row.id,
    stepNumber: row.stepNumber,
    stepName: row.stepName,
    approverType: row.approverType,
    approverUserId: row.approverUserId,
    approverRole: row.approverRole,
    status: row.status,
    actedBy: row.actedBy,
    comment: row.comment,
    actedAt: row.actedAt,
  };
}

export function toRuleDefinition(row: RuleRecord): ApprovalRuleDefinition {
  return {
    id: row.id,
    name: row.name,
    flowId: row.flowId,
    ruleType: row.ruleType,
    percentageThreshold: toNumberOrNull(row.percentageThreshold),
    specificApproverId: row.specificApproverId,
    isActive: row.isActive,
  };
}

export async function loadApprovalRows(
  tx: Database,
  tenantId: string,
  expenseId: string,
): Promise<ApprovalRow[]> {
  const rows = await tx
    .select()
    .from(expenseApprovals)
    .where(and(eq(expenseApprovals.tenantId, tenantId), eq(expenseApprovals.expenseId, expenseId)))
    .orderBy(asc(expenseApprovals.stepNumber), asc(expenseApprovals.createdAt));
  return rows.map(toApprovalRow);
}

export async function loadApprovalState(
  tx: Database,
  tenantId: string,
  expense: ExpenseRecord,
): Promise<ApprovalState> {
  const approvals = await loadApprovalRows(tx, tenantId, expense.id);
  const ruleRows = await tx
    .select()
    .from(approvalRules)
    .where(and(eq(approvalRules.tenantId, tenantId), eq(approvalRules.isActive, true)));

  return {
    expense: {
      id: expense.id,
      status: expense.status,
      submitterUserId: expense.submitterUserId,
    },
    approvals,
    rules: applicableRules(ruleRows.map(toRuleDefinition), expense.approvalFlowId),
  };
}

/** Tenant users in the shape the plan builder resolves approvers from. */
export async function loadDirectory(tx: Database, tenantId: string): Promise<DirectoryUser[]> {
  const rows = await tx
    .select({ id: users.id, role: users.role, status: users.status, managerId: users.managerId })
    .from(users)
    .where(eq(users.tenantId, tenantId));

  const directory: DirectoryUser[] = [];
  for (const row of rows) {
    if (!isUserRole(row.role)) continue;
    directory.push({ id: row.id, role: row.role, status: row.status, managerId: row.managerId });
  }
  return directory;
}

/** Active flows with their steps. */
export async function loadActiveFlows(
  tx: Database,
  tenantId: string,
): Promise<ApprovalFlowDefinition[]> {
  const flowRows = await tx
    .select()
    .from(approvalFlows)
    .where(and(eq(approvalFlows.tenantId, tenantId), eq(approvalFlows.isActive, true)));
  if (flowRows.length === 0) return [];

  const stepRows = await tx
    .select()
    .from(approvalFlowSteps)
    .where(eq(approvalFlowSteps.tenantId, tenantId))
    .orderBy(asc(approvalFlowSteps.sequence));

  return flowRows.map((flow) => ({
    id: flow.id,
    name: flow.name,
    isManagerApprover: flow.isManagerApprover,
    minAmount: toNumberOrNull(flow.minAmount),
    isDefault: flow.isDefault,
    isActive: flow.isActive,
    createdAt: flow.createdAt.toISOString(),
    steps: stepRows
      .filter((s) => s.flowId === flow.id)
      .map((s) => ({
        sequence: s.sequence,
        name: s.name,
        approverType: s.approverType,
        approverUserId: s.approverUserId,
        approverRole: s.approverRole,
      })),
  }));
}

/**
 * Writes an engine outcome: approval row changes, then the expense itself
 * guarded by its version. Returns the updated expense and the events to emit.
 */
export async function persistDecision(
  tx: Database,
  ctx: RequestContext,
  expense: ExpenseRecord,
  outcome: DecisionOutcome,
  now: Date,
): Promise<{ expense: ExpenseRecord; events: EventEnvelope[] }> {
  for (const change of outcome.changes) {
    const { row } = change;
    if (change.kind === 'insert') {
      await tx.insert(expenseApprovals).values({
        ...row,
        tenantId: ctx.tenantId,
        expenseId: expense.id,
      });
    } else {
      await tx
        .update(expenseApprovals)
        .set({ status: row.status, actedBy: row.actedBy, comment: row.comment, actedAt: row.actedAt })
        .where(and(eq(expenseApprovals.tenantId, ctx.tenantId), eq(expenseApprovals.id, row.id)));
    }
  }

  const decidedRow = outcome.changes.find((c) => c.row.actedBy === ctx.user.id)?.row ?? null;
  const [updated] = await tx
    .update(expenses)
    .set({
      status: outcome.status,
      currentStep: outcome.currentStep,
      ...(outcome.finalDecision === 'approved' && { approvedAt: now, approvedBy: ctx.user.id }),
      ...(outcome.finalDecision === 'rejected' && {
        rejectedAt: now,
        rejectedBy: ctx.user.id,
        rejectionReason: decidedRow?.comment ?? null,
      }),
      ...(decidedRow?.comment ? { managerNotes: decidedRow.comment } : {}),
      updatedAt: now,
      version: expense.version + 1,
    })
    .where(
      and(
        eq(expenses.tenantId, ctx.tenantId),
        eq(expenses.id, expense.id),
        eq(expenses.version, expense.version),
      ),
    )
    .returning();

  if (!updated) {
    throw new ConflictError('Expense was modified by another request; reload and try again');
  }

  const events = outcome.events.map((e) => buildEventFromContext(ctx, e.eventType, e.data));
  return { expense: updated, events };
}
