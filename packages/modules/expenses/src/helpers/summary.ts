import { addMoney, isExpenseStatus } from '@expensox/shared';
import type { ExpenseStatus } from '@expensox/shared';

export interface StatusTotal {
  count: number;
  total: number;
}

export interface MonthlyTotal {
  /** YYYY-MM */
  month: string;
  count: number;
  total: number;
}

/** The twelve calendar months ending with the month of `now`, oldest first. */
export function lastTwelveMonths(now: Date = new Date()): string[] {
  const months: string[] = [];
  for (let offset = 11; offset >= 0; offset--) {
    const d = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - offset, 1));
    months.push(d.toISOString().slice(0, 7));
  }
  return months;
}

/** Every status appears, with zeroes where no expense has it. Unknown statuses are ignored. */
export function totalsByStatus(
  rows: ReadonlyArray<{ status: string; count: number; total: number }>,
): Record<ExpenseStatus, StatusTotal> {
  const byStatus: Record<ExpenseStatus, StatusTotal> = {
    draft: { count: 0, total: 0 },
    pending: { count: 0, total: 0 },
    in_progress: { count: 0, total: 0 },
    approved: { count: 0, total: 0 },
    rejected: { count: 0, total: 0 },
    paid: { count: 0, total: 0 },
  };

  for (const row of rows) {
    if (!isExpenseStatus(row.status)) continue;
    const entry = byStatus[row.status];
    entry.count += row.count;
    entry.total = addMoney(entry.total, row.total);
  }
  return byStatus;
}

export function fillMonthlyTrend(
  rows: ReadonlyArray<{ month: string; count: number; total: number }>,
  months: readonly string[],
): MonthlyTotal[] {
  const found = new Map(rows.map((r) => [r.month, r]));
  return months.map((month) => {
    const row = found.get(month);
    return { month, count: row?.count ?? 0, total: row?.total ?? 0 };
  });
}
