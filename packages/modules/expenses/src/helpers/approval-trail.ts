import { and, asc, eq, inArray } from 'drizzle-orm';
import { expenseApprovals, users } from '@expensox/db';
import type { Database } from '@expensox/db';
import type { ApprovalDecisionStatus, ApproverType } from '@expensox/shared';

export interface ApprovalTrailEntry {
  id: string;
  stepNumber: number;
  stepName: string;
  approverType: ApproverType;
  approverUserId: string | null;
  approverName: string | null;
  approverRole: string | null;
  status: ApprovalDecisionStatus;
  actedBy: string | null;
  actedByName: string | null;
  comment: string | null;
  actedAt: string | null;
}

/** Approval rows for an expense with approver and actor names resolved. */
export async function loadApprovalTrail(
  tx: Database,
  tenantId: string,
  expenseId: string,
): Promise<ApprovalTrailEntry[]> {
  const rows = await tx
    .select()
    .from(expenseApprovals)
    .where(and(eq(expenseApprovals.tenantId, tenantId), eq(expenseApprovals.expenseId, expenseId)))
    .orderBy(asc(expenseApprovals.stepNumber), asc(expenseApprovals.createdAt));

  const userIds = new Set<string>();
  for (const row of rows) {
    if (row.approverUserId) userIds.add(row.approverUserId);
    if (row.actedBy) userIds.add(row.actedBy);
  }

  const names = new Map<string, string>();
  if (userIds.size > 0) {
    const people = await tx
      .select({ id: users.id, firstName: users.firstName, lastName: users.lastName })
      .from(users)
      .where(and(eq(users.tenantId, tenantId), inArray(users.id, [...userIds])));
    for (const p of people) names.set(p.id, `${p.firstName} ${p.lastName}`);
  }

  return rows.map((row) => ({
    id: row.id,
    stepNumber: row.stepNumber,
    stepName: row.stepName,
    approverType: row.approverType,
    approverUserId: row.approverUserId,
    approverName: row.approverUserId ? (names.get(row.approverUserId) ?? null) : null,
    approverRole: row.approverRole,
    status: row.status,
    actedBy: row.actedBy,
    actedByName: row.actedBy ? (names.get(row.actedBy) ?? null) : null,
    comment: row.comment,
    actedAt: row.actedAt ? row.actedAt.toISOString() : null,
  }));
}
