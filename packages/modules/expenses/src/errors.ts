import { AppError } from '@expensox/shared';

export class ExpenseStatusError extends AppError {
  constructor(expenseId: string, currentStatus: string, requiredStatus: string) {
    super(
      'EXPENSE_STATUS_ERROR',
      `Expense ${expenseId} is ${currentStatus}, must be ${requiredStatus}`,
      409,
    );
  }
}

export class BudgetOverlapError extends AppError {
  constructor(categoryId: string, periodStart: string, periodEnd: string) {
    super(
      'BUDGET_OVERLAP',
      `Category ${categoryId} already has a budget overlapping ${periodStart} to ${periodEnd}`,
      409,
    );
  }
}

export class CategoryInactiveError extends AppError {
  constructor(categoryId: string) {
    super('CATEGORY_INACTIVE', `Category ${categoryId} is not active`, 400);
  }
}
