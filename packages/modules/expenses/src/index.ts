import { registerModuleEvents } from '@expensox/core/events';
import type { EventBus } from '@expensox/core/events';
import { EXPENSE_EVENTS } from '@expensox/shared';
import { handleApprovalRequested } from './consumers/approval-requested';
import { handleExpenseDecided } from './consumers/expense-decided';

export const MODULE_KEY = 'expenses';
export const MODULE_NAME = 'Expenses';
export const MODULE_VERSION = '0.1.0';

// Validation
export * from './validation';
export * from './errors';

// Approval engine (pure)
export * from './engine/approval-engine';
export { summarizeBudget, defaultBudgetPeriod } from './helpers/budget-math';
export type { BudgetSummary } from './helpers/budget-math';
export { canViewExpense } from './helpers/access';
export type { Viewer } from './helpers/access';
export type { ExpenseView } from './helpers/expense-view';
export type {
  CategoryView,
  BudgetView,
  ApprovalFlowView,
  FlowStepView,
  ApprovalRuleView,
} from './helpers/views';
export type { DecisionResult } from './helpers/decide';

// Commands: categories & budgets
export { createCategory } from './commands/create-category';
export { updateCategory } from './commands/update-category';
export { ensureDefaultCategory } from './commands/ensure-default-category';
export { createBudget } from './commands/create-budget';
export { updateBudget } from './commands/update-budget';
export { deleteBudget } from './commands/delete-budget';

// Commands: expenses
export { createExpense } from './commands/create-expense';
export { updateExpense } from './commands/update-expense';
export { deleteExpense } from './commands/delete-expense';
export { submitExpense } from './commands/submit-expense';
export { approveExpense } from './commands/approve-expense';
export { rejectExpense } from './commands/reject-expense';
export { overrideExpenseDecision } from './commands/override-expense-decision';
export { markExpensePaid } from './commands/mark-expense-paid';

// Commands: approval configuration
export { createApprovalFlow } from './commands/create-approval-flow';
export { updateApprovalFlow } from './commands/update-approval-flow';
export { deleteApprovalFlow } from './commands/delete-approval-flow';
export { createApprovalRule } from './commands/create-approval-rule';
export { updateApprovalRule } from './commands/update-approval-rule';
export { deleteApprovalRule } from './commands/delete-approval-rule';

// Queries
export { listCategories } from './queries/list-categories';
export { getBudgetUtilization } from './queries/get-budget-utilization';
export type { BudgetUtilization } from './queries/get-budget-utilization';
export { listExpenses } from './queries/list-expenses';
export type { ExpenseListItem, ExpenseListResult } from './queries/list-expenses';
export { getExpense } from './queries/get-expense';
export type { ExpenseDetail } from './queries/get-expense';
export { listPendingApprovals } from './queries/list-pending-approvals';
export type { PendingApprovalItem } from './queries/list-pending-approvals';
export { getExpenseSummary } from './queries/get-expense-summary';
export type { ExpenseSummary } from './queries/get-expense-summary';
export type { ApprovalTrailEntry } from './helpers/approval-trail';
export { listApprovalFlows, getApprovalFlow } from './queries/list-approval-flows';
export { listApprovalRules } from './queries/list-approval-rules';

// Consumers (notifications)
export { handleApprovalRequested } from './consumers/approval-requested';
export { handleExpenseDecided } from './consumers/expense-decided';

export function registerExpenseConsumers(bus: EventBus): void {
  registerModuleEvents(bus, MODULE_KEY, {
    exact: [
      {
        eventType: EXPENSE_EVENTS.APPROVAL_REQUESTED,
        consumerName: 'approvalRequested',
        handler: handleApprovalRequested,
      },
      {
        eventType: EXPENSE_EVENTS.APPROVED,
        consumerName: 'expenseApproved',
        handler: handleExpenseDecided,
      },
      {
        eventType: EXPENSE_EVENTS.REJECTED,
        consumerName: 'expenseRejected',
        handler: handleExpenseDecided,
      },
    ],
  });
}
