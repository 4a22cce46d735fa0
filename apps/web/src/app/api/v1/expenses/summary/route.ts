import { NextResponse } from 'next/server';
import { withMiddleware } from '@expensox/core/auth/with-middleware';
import { expenseSummarySchema, getExpenseSummary } from '@expensox/module-expenses';
import { parseOrThrow } from '@expensox/shared';
import { optionalParam, searchParams } from '@/lib/route-params';
import { expenseScope } from '@/lib/expense-scope';

// GET /api/v1/expenses/summary: totals by status and a twelve-month trend
export const GET = withMiddleware(
  async (request, ctx) => {
    const params = searchParams(request);
    const filters = parseOrThrow(expenseSummarySchema, {
      tenantId: ctx.tenantId,
      ...expenseScope(ctx, optionalParam(params, 'submitterUserId')),
      fromDate: optionalParam(params, 'fromDate'),
      toDate: optionalParam(params, 'toDate'),
    });
    const summary = await getExpenseSummary(filters);
    return NextResponse.json({ data: summary });
  },
  { permission: 'expenses.view' },
);
