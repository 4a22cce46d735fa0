import { monthBounds, roundMoney, subtractMoney } from '@expensox/shared';

export interface BudgetSummary {
  spent: number;
  remaining: number;
  /** One decimal place; 0 for a zero budget. */
  utilizationPercent: number;
  isOverBudget: boolean;
}

export function summarizeBudget(budget: { amount: number }, spent: number): BudgetSummary {
  const roundedSpent = roundMoney(spent);
  return {
    spent: roundedSpent,
    remaining: subtractMoney(budget.amount, roundedSpent),
    utilizationPercent: budget.amount > 0 ? roundMoney((roundedSpent / budget.amount) * 100, 1) : 0,
    isOverBudget: roundedSpent > budget.amount,
  };
}

/** The calendar month containing `today`. */
export function defaultBudgetPeriod(today: Date = new Date()): { periodStart: string; periodEnd: string } {
  const { start, end } = monthBounds(today);
  return { periodStart: start, periodEnd: end };
}
