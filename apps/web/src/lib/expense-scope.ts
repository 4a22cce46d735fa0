import type { RequestContext } from '@expensox/core/auth';

export interface ExpenseScope {
  submitterUserId?: string;
  managerId?: string;
}

/**
 * Which expenses a list or summary covers: employees their own, managers
 * their own plus their direct reports', admins everything. A requested
 * submitter narrows the scope further and never widens it.
 */
export function expenseScope(ctx: RequestContext, requestedSubmitter?: string): ExpenseScope {
  switch (ctx.user.role) {
    case 'admin':
      return requestedSubmitter ? { submitterUserId: requestedSubmitter } : {};
    case 'manager':
      return requestedSubmitter
        ? { managerId: ctx.user.id, submitterUserId: requestedSubmitter }
        : { managerId: ctx.user.id };
    case 'employee':
      return { submitterUserId: ctx.user.id };
  }
}
