import type { UserRole } from '@expensox/shared';

export interface Viewer {
  id: string;
  role: UserRole;
}

interface VisibleExpense {
  submitterUserId: string;
  submitter: { managerId: string | null };
  approvals: ReadonlyArray<{
    approverUserId: string | null;
    approverRole: string | null;
    status: string;
    actedBy: string | null;
  }>;
}

/**
 * Admins see everything; others see their own expenses, a manager sees their
 * direct reports', and anyone who holds or held an approval step sees that expense.
 */
export function canViewExpense(viewer: Viewer, expense: VisibleExpense): boolean {
  if (viewer.role === 'admin') return true;
  if (expense.submitterUserId === viewer.id) return true;
  if (viewer.role === 'manager' && expense.submitter.managerId === viewer.id) return true;

  return expense.approvals.some(
    (a) =>
      a.actedBy === viewer.id ||
      a.approverUserId === viewer.id ||
      (a.approverRole === viewer.role && a.status !== 'waiting' && a.status !== 'skipped'),
  );
}
