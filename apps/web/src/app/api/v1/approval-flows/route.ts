import { NextResponse } from 'next/server';
import { withMiddleware } from '@expensox/core/auth/with-middleware';
import {
  createApprovalFlow,
  createApprovalFlowSchema,
  listApprovalFlows,
} from '@expensox/module-expenses';
import { parseOrThrow } from '@expensox/shared';
import { parseBoolean, readJsonObject, searchParams } from '@/lib/route-params';

// GET /api/v1/approval-flows?includeInactive=true
export const GET = withMiddleware(
  async (request, ctx) => {
    const flows = await listApprovalFlows({
      tenantId: ctx.tenantId,
      includeInactive: parseBoolean(searchParams(request).get('includeInactive')),
    });
    return NextResponse.json({ data: flows });
  },
  { permission: 'approvals.configure' },
);

// POST /api/v1/approval-flows
export const POST = withMiddleware(
  async (request, ctx) => {
    const input = parseOrThrow(createApprovalFlowSchema, await readJsonObject(request));
    const flow = await createApprovalFlow(ctx, input);
    return NextResponse.json({ data: flow }, { status: 201 });
  },
  { permission: 'approvals.configure' },
);
