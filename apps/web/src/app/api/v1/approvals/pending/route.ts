import { NextResponse } from 'next/server';
import { withMiddleware } from '@expensox/core/auth/with-middleware';
import { listPendingApprovals, pendingApprovalsSchema } from '@expensox/module-expenses';
import { parseOrThrow } from '@expensox/shared';
import { optionalParam, searchParams } from '@/lib/route-params';

// GET /api/v1/approvals/pending: steps waiting on the caller
export const GET = withMiddleware(
  async (request, ctx) => {
    const params = searchParams(request);
    const filters = parseOrThrow(pendingApprovalsSchema, {
      tenantId: ctx.tenantId,
      approverUserId: ctx.user.id,
      approverRole: ctx.user.role,
      cursor: optionalParam(params, 'cursor'),
      limit: optionalParam(params, 'limit'),
    });
    const result = await listPendingApprovals(filters);
    return NextResponse.json({
      data: result.items,
      meta: { cursor: result.cursor, hasMore: result.hasMore },
    });
  },
  { permission: 'approvals.view' },
);
