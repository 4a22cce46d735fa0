import { sql } from 'drizzle-orm';
import { withTenant } from '@expensox/db';
import { addMoney, parseOrThrow } from '@expensox/shared';
import type { ExpenseStatus } from '@expensox/shared';
import { expenseSummarySchema } from '../validation';
import type { ExpenseSummaryInput } from '../validation';
import { loadCompanyCurrency } from '../helpers/views';
import { fillMonthlyTrend, lastTwelveMonths, totalsByStatus } from '../helpers/summary';
import type { MonthlyTotal, StatusTotal } from '../helpers/summary';

export interface ExpenseSummary {
  companyCurrency: string;
  totalCount: number;
  totalAmount: number;
  byStatus: Record<ExpenseStatus, StatusTotal>;
  monthlyTrend: MonthlyTotal[];
}

type StatusRow = { status: string; expense_count: number; total_amount: string };
type MonthRow = { month: string; expense_count: number; total_amount: string };

/** Amounts are in company currency. The trend counts non-draft expenses by expense date. */
export async function getExpenseSummary(
  input: ExpenseSummaryInput,
  now: Date = new Date(),
): Promise<ExpenseSummary> {
  const { tenantId, submitterUserId, managerId, fromDate, toDate } = parseOrThrow(
    expenseSummarySchema,
    input,
  );

  return withTenant(tenantId, async (tx) => {
    const companyCurrency = await loadCompanyCurrency(tx, tenantId);

    const conditions: ReturnType<typeof sql>[] = [sql`e.tenant_id = ${tenantId}`];

    if (submitterUserId) {
      conditions.push(sql`e.submitter_user_id = ${submitterUserId}`);
    }

    if (managerId) {
      conditions.push(sql`(e.submitter_user_id = ${managerId} OR u.manager_id = ${managerId})`);
    }

    if (fromDate) {
      conditions.push(sql`e.expense_date >= ${fromDate}`);
    }

    if (toDate) {
      conditions.push(sql`e.expense_date <= ${toDate}`);
    }

    const whereClause = conditions.reduce((a, b) => sql`${a} AND ${b}`);

    const statusRows = await tx.execute<StatusRow>(sql`
      SELECT e.status, COUNT(*)::int AS expense_count,
        COALESCE(SUM(e.amount_in_company_currency), 0) AS total_amount
      FROM expenses e
      INNER JOIN users u ON u.id = e.submitter_user_id
      WHERE ${whereClause}
      GROUP BY e.status
    `);

    const months = lastTwelveMonths(now);
    const trendStart = `${months[0] ?? now.toISOString().slice(0, 7)}-01`;

    const monthRows = await tx.execute<MonthRow>(sql`
      SELECT to_char(e.expense_date, 'YYYY-MM') AS month, COUNT(*)::int AS expense_count,
        COALESCE(SUM(e.amount_in_company_currency), 0) AS total_amount
      FROM expenses e
      INNER JOIN users u ON u.id = e.submitter_user_id
      WHERE ${whereClause} AND e.status <> 'draft' AND e.expense_date >= ${trendStart}
      GROUP BY 1
      ORDER BY 1
    `);

    const byStatus = totalsByStatus(
      Array.from(statusRows).map((r) => ({
        status: r.status,
        count: Number(r.expense_count),
        total: Number(r.total_amount),
      })),
    );

    let totalCount = 0;
    let totalAmount = 0;
    for (const entry of Object.values(byStatus)) {
      totalCount += entry.count;
      totalAmount = addMoney(totalAmount, entry.total);
    }

    return {
      companyCurrency,
      totalCount,
      totalAmount,
      byStatus,
      monthlyTrend: fillMonthlyTrend(
        Array.from(monthRows).map((r) => ({
          month: r.month,
          count: Number(r.expense_count),
          total: Number(r.total_amount),
        })),
        months,
      ),
    };
  });
}
