import { NextResponse } from 'next/server';
import { withMiddleware } from '@expensox/core/auth/with-middleware';
import { createCategory, createCategorySchema, listCategories } from '@expensox/module-expenses';
import { parseOrThrow } from '@expensox/shared';
import { parseBoolean, readJsonObject, searchParams } from '@/lib/route-params';

// GET /api/v1/categories?includeInactive=true
export const GET = withMiddleware(
  async (request, ctx) => {
    const categories = await listCategories({
      tenantId: ctx.tenantId,
      includeInactive: parseBoolean(searchParams(request).get('includeInactive')),
    });
    return NextResponse.json({ data: categories });
  },
  { permission: 'categories.view' },
);

// POST /api/v1/categories
export const POST = withMiddleware(
  async (request, ctx) => {
    const input = parseOrThrow(createCategorySchema, await readJsonObject(request));
    const category = await createCategory(ctx, input);
    return NextResponse.json({ data: category }, { status: 201 });
  },
  { permission: 'categories.manage' },
);
