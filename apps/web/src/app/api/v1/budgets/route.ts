import { NextResponse } from 'next/server';
import { withMiddleware } from '@expensox/core/auth/with-middleware';
import { createBudget, createBudgetSchema, getBudgetUtilization } from '@expensox/module-expenses';
import { parseOrThrow } from '@expensox/shared';
import { optionalParam, readJsonObject, searchParams } from '@/lib/route-params';

// GET /api/v1/budgets?asOf=2026-03-31&categoryId=...: budgets with spend against them
export const GET = withMiddleware(
  async (request, ctx) => {
    const params = searchParams(request);
    const budgets = await getBudgetUtilization({
      tenantId: ctx.tenantId,
      asOf: optionalParam(params, 'asOf'),
      categoryId: optionalParam(params, 'categoryId'),
    });
    return NextResponse.json({ data: budgets });
  },
  { permission: 'budgets.view' },
);

// POST /api/v1/budgets
export const POST = withMiddleware(
  async (request, ctx) => {
    const input = parseOrThrow(createBudgetSchema, await readJsonObject(request));
    const budget = await createBudget(ctx, input);
    return NextResponse.json({ data: budget }, { status: 201 });
  },
  { permission: 'budgets.manage' },
);
