import { sql } from 'drizzle-orm';
import { withTenant } from '@expensox/db';
import { parseOrThrow } from '@expensox/shared';
import { budgetUtilizationSchema } from '../validation';
import type { BudgetUtilizationInput } from '../validation';
import { summarizeBudget } from '../helpers/budget-math';
import type { BudgetSummary } from '../helpers/budget-math';

export interface BudgetUtilization extends BudgetSummary {
  budgetId: string;
  categoryId: string;
  categoryName: string;
  amount: number;
  currency: string;
  periodStart: string;
  periodEnd: string;
  description: string | null;
}

type UtilizationRow = {
  id: string;
  category_id: string;
  category_name: string;
  amount: string;
  currency: string;
  period_start: string;
  period_end: string;
  description: string | null;
  spent: string;
};

/**
 * Spend against each budget: approved and paid expenses in the budget's
 * category dated inside its period. `asOf` limits the list to budgets whose
 * period contains that date.
 */
export async function getBudgetUtilization(input: BudgetUtilizationInput): Promise<BudgetUtilization[]> {
  const { tenantId, asOf, categoryId } = parseOrThrow(budgetUtilizationSchema, input);

  return withTenant(tenantId, async (tx) => {
    const conditions: ReturnType<typeof sql>[] = [sql`b.tenant_id = ${tenantId}`];

    if (asOf) {
      conditions.push(sql`b.period_start <= ${asOf} AND b.period_end >= ${asOf}`);
    }

    if (categoryId) {
      conditions.push(sql`b.category_id = ${categoryId}`);
    }

    const whereClause = conditions.reduce((a, b) => sql`${a} AND ${b}`);

    const rows = await tx.execute<UtilizationRow>(sql`
      SELECT
        b.id, b.category_id, c.name AS category_name,
        b.amount, b.currency, b.period_start, b.period_end, b.description,
        COALESCE(SUM(e.amount_in_company_currency), 0) AS spent
      FROM budgets b
      INNER JOIN expense_categories c ON c.id = b.category_id
      LEFT JOIN expenses e
        ON e.tenant_id = b.tenant_id
        AND e.category_id = b.category_id
        AND e.status IN ('approved', 'paid')
        AND e.expense_date BETWEEN b.period_start AND b.period_end
      WHERE ${whereClause}
      GROUP BY b.id, c.name
      ORDER BY b.period_start DESC, c.name ASC
    `);

    return Array.from(rows).map((r) => {
      const amount = Number(r.amount);
      return {
        budgetId: r.id,
        categoryId: r.category_id,
        categoryName: r.category_name,
        amount,
        currency: r.currency,
        periodStart: String(r.period_start),
        periodEnd: String(r.period_end),
        description: r.description ?? null,
        ...summarizeBudget({ amount }, Number(r.spent)),
      };
    });
  });
}
