import { and, eq } from 'drizzle-orm';
import { expenseCategories, users, withTenant } from '@expensox/db';
import { loadExpense, toExpenseView } from '../helpers/expense-view';
import type { ExpenseView } from '../helpers/expense-view';
import { loadApprovalTrail } from '../helpers/approval-trail';
import type { ApprovalTrailEntry } from '../helpers/approval-trail';

export interface ExpenseDetail extends ExpenseView {
  category: { id: string; name: string };
  submitter: { id: string; name: string; email: string; managerId: string | null };
  approvals: ApprovalTrailEntry[];
}

export async function getExpense(tenantId: string, expenseId: string): Promise<ExpenseDetail> {
  return withTenant(tenantId, async (tx) => {
    const expense = await loadExpense(tx, tenantId, expenseId);

    const [category] = await tx
      .select({ id: expenseCategories.id, name: expenseCategories.name })
      .from(expenseCategories)
      .where(and(eq(expenseCategories.tenantId, tenantId), eq(expenseCategories.id, expense.categoryId)))
      .limit(1);

    const [submitter] = await tx
      .select({
        id: users.id,
        firstName: users.firstName,
        lastName: users.lastName,
        email: users.email,
        managerId: users.managerId,
      })
      .from(users)
      .where(and(eq(users.tenantId, tenantId), eq(users.id, expense.submitterUserId)))
      .limit(1);

    const approvals = await loadApprovalTrail(tx, tenantId, expenseId);

    return {
      ...toExpenseView(expense),
      category: category ?? { id: expense.categoryId, name: 'Unknown' },
      submitter: submitter
        ? {
            id: submitter.id,
            name: `${submitter.firstName} ${submitter.lastName}`,
            email: submitter.email,
            managerId: submitter.managerId,
          }
        : { id: expense.submitterUserId, name: 'Unknown', email: '', managerId: null },
      approvals,
    };
  });
}
