import { NextResponse } from 'next/server';
import { withPublicMiddleware } from '@expensox/core/auth/with-middleware';
import { getAuthAdapter } from '@expensox/core/auth';
import { parseOrThrow } from '@expensox/shared';
import { readJsonObject } from '@/lib/route-params';
import { verifyOtpSchema } from '@/lib/auth-schemas';

// POST /api/v1/auth/verify-otp
export const POST = withPublicMiddleware(async (request) => {
  const { userId, purpose, code } = parseOrThrow(verifyOtpSchema, await readJsonObject(request));
  const token = await getAuthAdapter().completeOtpSignIn(userId, purpose, code);
  return NextResponse.json({ data: token });
});
