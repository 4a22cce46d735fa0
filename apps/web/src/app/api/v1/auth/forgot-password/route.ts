import { NextResponse } from 'next/server';
import { withPublicMiddleware } from '@expensox/core/auth/with-middleware';
import { getAuthAdapter } from '@expensox/core/auth';
import { parseOrThrow } from '@expensox/shared';
import { readJsonObject } from '@/lib/route-params';
import { forgotPasswordSchema } from '@/lib/auth-schemas';

// POST /api/v1/auth/forgot-password: always 202 so unknown emails are not revealed
export const POST = withPublicMiddleware(async (request) => {
  const { email } = parseOrThrow(forgotPasswordSchema, await readJsonObject(request));
  await getAuthAdapter().requestPasswordReset(email);
  return NextResponse.json({ data: { requested: true } }, { status: 202 });
});
