import { NextResponse } from 'next/server';
import { withPublicMiddleware } from '@expensox/core/auth/with-middleware';
import { getAuthAdapter } from '@expensox/core/auth';
import { parseOrThrow } from '@expensox/shared';
import { readJsonObject } from '@/lib/route-params';
import { resetPasswordSchema } from '@/lib/auth-schemas';

// POST /api/v1/auth/reset-password
export const POST = withPublicMiddleware(async (request) => {
  const { email, code, newPassword } = parseOrThrow(resetPasswordSchema, await readJsonObject(request));
  await getAuthAdapter().resetPassword(email, code, newPassword);
  return NextResponse.json({ data: { reset: true } });
});
