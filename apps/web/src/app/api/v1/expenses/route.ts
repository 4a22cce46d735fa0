import { NextResponse } from 'next/server';
import { withMiddleware } from '@expensox/core/auth/with-middleware';
import {
  createExpense,
  createExpenseSchema,
  listExpenses,
  listExpensesSchema,
} from '@expensox/module-expenses';
import { parseOrThrow } from '@expensox/shared';
import { optionalParam, readJsonObject, searchParams } from '@/lib/route-params';
import { expenseScope } from '@/lib/expense-scope';

// GET /api/v1/expenses: scoped to what the caller's role may see
export const GET = withMiddleware(
  async (request, ctx) => {
    const params = searchParams(request);
    const filters = parseOrThrow(listExpensesSchema, {
      tenantId: ctx.tenantId,
      ...expenseScope(ctx, optionalParam(params, 'submitterUserId')),
      status: optionalParam(params, 'status'),
      categoryId: optionalParam(params, 'categoryId'),
      fromDate: optionalParam(params, 'fromDate'),
      toDate: optionalParam(params, 'toDate'),
      search: optionalParam(params, 'search'),
      cursor: optionalParam(params, 'cursor'),
      limit: optionalParam(params, 'limit'),
    });
    const result = await listExpenses(filters);
    return NextResponse.json({
      data: result.items,
      meta: { cursor: result.cursor, hasMore: result.hasMore },
    });
  },
  { permission: 'expenses.view' },
);

// POST /api/v1/expenses: creates a draft; a repeated clientRequestId returns the first one
export const POST = withMiddleware(
  async (request, ctx) => {
    const input = parseOrThrow(createExpenseSchema, await readJsonObject(request));
    const expense = await createExpense(ctx, input);
    return NextResponse.json({ data: expense }, { status: 201 });
  },
  { permission: 'expenses.create' },
);
