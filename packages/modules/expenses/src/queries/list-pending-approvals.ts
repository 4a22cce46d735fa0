import { sql } from 'drizzle-orm';
import { withTenant } from '@expensox/db';
import { parseOrThrow } from '@expensox/shared';
import type { ExpenseStatus } from '@expensox/shared';
import { pendingApprovalsSchema } from '../validation';
import type { PendingApprovalsInput } from '../validation';
import { toIso, toIsoOrNull } from '../helpers/sql-values';

export interface PendingApprovalItem {
  approvalId: string;
  stepNumber: number;
  stepName: string;
  expenseId: string;
  expenseNumber: string;
  title: string;
  submitterUserId: string;
  submitterName: string;
  categoryName: string;
  expenseDate: string;
  amount: number;
  currency: string;
  amountInCompanyCurrency: number;
  companyCurrency: string;
  status: ExpenseStatus;
  submittedAt: string | null;
  waitingSince: string;
}

type PendingRow = {
  approval_id: string;
  step_number: number;
  step_name: string;
  expense_id: string;
  expense_number: string;
  title: string;
  submitter_user_id: string;
  submitter_first_name: string;
  submitter_last_name: string;
  category_name: string;
  expense_date: string;
  amount: string;
  currency: string;
  amount_in_company_currency: string;
  company_currency: string;
  status: ExpenseStatus;
  submitted_at: string | null;
  waiting_since: string;
};

/**
 * Current steps the user can act on: assigned to them by id, or to their role
 * when no user is named. Their own expenses and ones they already decided on
 * are left out.
 */
export async function listPendingApprovals(input: PendingApprovalsInput) {
  const { tenantId, approverUserId, approverRole, cursor, limit } = parseOrThrow(
    pendingApprovalsSchema,
    input,
  );

  return withTenant(tenantId, async (tx) => {
    const conditions: ReturnType<typeof sql>[] = [
      sql`a.tenant_id = ${tenantId}`,
      sql`a.status = 'pending'`,
      sql`e.status IN ('pending', 'in_progress')`,
      sql`(a.approver_user_id = ${approverUserId} OR (a.approver_user_id IS NULL AND a.approver_role = ${approverRole}))`,
      sql`e.submitter_user_id <> ${approverUserId}`,
      sql`NOT EXISTS (
        SELECT 1 FROM expense_approvals d
        WHERE d.expense_id = a.expense_id
          AND d.acted_by = ${approverUserId}
          AND d.status IN ('approved', 'rejected')
      )`,
    ];

    if (cursor) {
      conditions.push(sql`a.id < ${cursor}`);
    }

    const whereClause = conditions.reduce((a, b) => sql`${a} AND ${b}`);

    const rows = await tx.execute<PendingRow>(sql`
      SELECT
        a.id AS approval_id, a.step_number, a.step_name,
        e.id AS expense_id, e.expense_number, e.title, e.submitter_user_id,
        u.first_name AS submitter_first_name, u.last_name AS submitter_last_name,
        c.name AS category_name,
        e.expense_date, e.amount, e.currency,
        e.amount_in_company_currency, e.company_currency,
        e.status, e.submitted_at,
        COALESCE(prev.acted_at, e.submitted_at, a.created_at) AS waiting_since
      FROM expense_approvals a
      INNER JOIN expenses e ON e.id = a.expense_id
      INNER JOIN users u ON u.id = e.submitter_user_id
      INNER JOIN expense_categories c ON c.id = e.category_id
      LEFT JOIN LATERAL (
        SELECT MAX(p.acted_at) AS acted_at
        FROM expense_approvals p
        WHERE p.expense_id = a.expense_id AND p.step_number < a.step_number
      ) prev ON TRUE
      WHERE ${whereClause}
      ORDER BY a.id DESC
      LIMIT ${limit + 1}
    `);

    const items = Array.from(rows);
    const hasMore = items.length > limit;
    const result = hasMore ? items.slice(0, limit) : items;

    return {
      items: result.map(
        (r): PendingApprovalItem => ({
          approvalId: r.approval_id,
          stepNumber: Number(r.step_number),
          stepName: r.step_name,
          expenseId: r.expense_id,
          expenseNumber: r.expense_number,
          title: r.title,
          submitterUserId: r.submitter_user_id,
          submitterName: `${r.submitter_first_name} ${r.submitter_last_name}`,
          categoryName: r.category_name,
          expenseDate: String(r.expense_date),
          amount: Number(r.amount),
          currency: r.currency,
          amountInCompanyCurrency: Number(r.amount_in_company_currency),
          companyCurrency: r.company_currency,
          status: r.status,
          submittedAt: toIsoOrNull(r.submitted_at),
          waitingSince: toIso(r.waiting_since),
        }),
      ),
      cursor: hasMore ? (result.at(-1)?.approval_id ?? null) : null,
      hasMore,
    };
  });
}
