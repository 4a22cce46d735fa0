import { NextResponse } from 'next/server';
import { withMiddleware } from '@expensox/core/auth/with-middleware';
import { createUser, createUserSchema, listUsers, listUsersSchema } from '@expensox/core/users';
import { parseOrThrow } from '@expensox/shared';
import { optionalParam, readJsonObject, searchParams } from '@/lib/route-params';

// GET /api/v1/users
export const GET = withMiddleware(
  async (request, ctx) => {
    const params = searchParams(request);
    const filters = parseOrThrow(listUsersSchema, {
      role: optionalParam(params, 'role'),
      status: optionalParam(params, 'status'),
      search: optionalParam(params, 'search'),
      cursor: optionalParam(params, 'cursor'),
      limit: optionalParam(params, 'limit'),
    });
    const result = await listUsers(ctx.tenantId, filters);
    return NextResponse.json({
      data: result.items,
      meta: { cursor: result.cursor, hasMore: result.hasMore },
    });
  },
  { permission: 'users.view' },
);

// POST /api/v1/users
export const POST = withMiddleware(
  async (request, ctx) => {
    const input = parseOrThrow(createUserSchema, await readJsonObject(request));
    const user = await createUser(ctx, input);
    return NextResponse.json({ data: user }, { status: 201 });
  },
  { permission: 'users.manage' },
);
