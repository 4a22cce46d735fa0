import { NextResponse } from 'next/server';
import { withMiddleware } from '@expensox/core/auth/with-middleware';
import {
  createApprovalRule,
  createApprovalRuleSchema,
  listApprovalRules,
} from '@expensox/module-expenses';
import { parseOrThrow } from '@expensox/shared';
import { optionalParam, parseBoolean, readJsonObject, searchParams } from '@/lib/route-params';

// GET /api/v1/approval-rules?flowId=...: a flow's rules plus the global ones
export const GET = withMiddleware(
  async (request, ctx) => {
    const params = searchParams(request);
    const rules = await listApprovalRules({
      tenantId: ctx.tenantId,
      flowId: optionalParam(params, 'flowId'),
      includeInactive: parseBoolean(params.get('includeInactive')),
    });
    return NextResponse.json({ data: rules });
  },
  { permission: 'approvals.configure' },
);

// POST /api/v1/approval-rules
export const POST = withMiddleware(
  async (request, ctx) => {
    const input = parseOrThrow(createApprovalRuleSchema, await readJsonObject(request));
    const rule = await createApprovalRule(ctx, input);
    return NextResponse.json({ data: rule }, { status: 201 });
  },
  { permission: 'approvals.configure' },
);
