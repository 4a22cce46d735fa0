import { sql } from 'drizzle-orm';
import { withTenant } from '@expensox/db';
import { parseOrThrow } from '@expensox/shared';
import type { ExpenseStatus } from '@expensox/shared';
import { listExpensesSchema } from '../validation';
import type { ListExpensesInput } from '../validation';
import { toIso, toIsoOrNull } from '../helpers/sql-values';

export interface ExpenseListItem {
  id: string;
  expenseNumber: string;
  title: string;
  submitterUserId: string;
  submitterName: string;
  categoryId: string;
  categoryName: string;
  expenseDate: string;
  amount: number;
  currency: string;
  amountInCompanyCurrency: number;
  companyCurrency: string;
  status: ExpenseStatus;
  currentStep: number | null;
  submittedAt: string | null;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export interface ExpenseListResult {
  items: ExpenseListItem[];
  cursor: string | null;
  hasMore: boolean;
}

type ExpenseListRow = {
  id: string;
  expense_number: string;
  title: string;
  submitter_user_id: string;
  submitter_first_name: string;
  submitter_last_name: string;
  category_id: string;
  category_name: string;
  expense_date: string;
  amount: string;
  currency: string;
  amount_in_company_currency: string;
  company_currency: string;
  status: ExpenseStatus;
  current_step: number | null;
  submitted_at: string | null;
  version: number;
  created_at: string;
  updated_at: string;
};

export async function listExpenses(input: ListExpensesInput): Promise<ExpenseListResult> {
  const {
    tenantId,
    submitterUserId,
    managerId,
    status,
    categoryId,
    fromDate,
    toDate,
    search,
    cursor,
    limit,
  } = parseOrThrow(listExpensesSchema, input);

  return withTenant(tenantId, async (tx) => {
    const conditions: ReturnType<typeof sql>[] = [sql`e.tenant_id = ${tenantId}`];

    if (submitterUserId) {
      conditions.push(sql`e.submitter_user_id = ${submitterUserId}`);
    }

    if (managerId) {
      conditions.push(sql`(e.submitter_user_id = ${managerId} OR u.manager_id = ${managerId})`);
    }

    if (status) {
      conditions.push(sql`e.status = ${status}`);
    }

    if (categoryId) {
      conditions.push(sql`e.category_id = ${categoryId}`);
    }

    if (fromDate) {
      conditions.push(sql`e.expense_date >= ${fromDate}`);
    }

    if (toDate) {
      conditions.push(sql`e.expense_date <= ${toDate}`);
    }

    if (search) {
      const pattern = `%${search}%`;
      conditions.push(sql`(
        e.expense_number ILIKE ${pattern} OR
        e.title ILIKE ${pattern} OR
        e.description ILIKE ${pattern}
      )`);
    }

    if (cursor) {
      conditions.push(sql`e.id < ${cursor}`);
    }

    const whereClause = conditions.reduce((a, b) => sql`${a} AND ${b}`);

    const rows = await tx.execute<ExpenseListRow>(sql`
      SELECT
        e.id, e.expense_number, e.title, e.submitter_user_id,
        u.first_name AS submitter_first_name, u.last_name AS submitter_last_name,
        e.category_id, c.name AS category_name,
        e.expense_date, e.amount, e.currency,
        e.amount_in_company_currency, e.company_currency,
        e.status, e.current_step, e.submitted_at, e.version,
        e.created_at, e.updated_at
      FROM expenses e
      INNER JOIN users u ON u.id = e.submitter_user_id
      INNER JOIN expense_categories c ON c.id = e.category_id
      WHERE ${whereClause}
      ORDER BY e.id DESC
      LIMIT ${limit + 1}
    `);

    const items = Array.from(rows);
    const hasMore = items.length > limit;
    const result = hasMore ? items.slice(0, limit) : items;

    return {
      items: result.map((r) => ({
        id: r.id,
        expenseNumber: r.expense_number,
        title: r.title,
        submitterUserId: r.submitter_user_id,
        submitterName: `${r.submitter_first_name} ${r.submitter_last_name}`,
        categoryId: r.category_id,
        categoryName: r.category_name,
        expenseDate: String(r.expense_date),
        amount: Number(r.amount),
        currency: r.currency,
        amountInCompanyCurrency: Number(r.amount_in_company_currency),
        companyCurrency: r.company_currency,
        status: r.status,
        currentStep: r.current_step ?? null,
        submittedAt: toIsoOrNull(r.submitted_at),
        version: Number(r.version),
        createdAt: toIso(r.created_at),
        updatedAt: toIso(r.updated_at),
      })),
      cursor: hasMore ? (result.at(-1)?.id ?? null) : null,
      hasMore,
    };
  });
}
