import { NextResponse } from 'next/server';
import { withMiddleware } from '@expensox/core/auth/with-middleware';
import { getCompany, updateCompany, updateCompanySchema } from '@expensox/core/companies';
import { parseOrThrow } from '@expensox/shared';
import { readJsonObject } from '@/lib/route-params';

// GET /api/v1/company
export const GET = withMiddleware(
  async (_request, ctx) => {
    const company = await getCompany(ctx.tenantId);
    return NextResponse.json({ data: company });
  },
  { permission: 'company.view' },
);

// PATCH /api/v1/company
export const PATCH = withMiddleware(
  async (request, ctx) => {
    const patch = parseOrThrow(updateCompanySchema, await readJsonObject(request));
    const company = await updateCompany(ctx, patch);
    return NextResponse.json({ data: company });
  },
  { permission: 'company.manage' },
);
