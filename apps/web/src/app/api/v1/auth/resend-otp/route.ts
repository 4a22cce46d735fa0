import { NextResponse } from 'next/server';
import { withPublicMiddleware } from '@expensox/core/auth/with-middleware';
import { getAuthAdapter } from '@expensox/core/auth';
import { parseOrThrow } from '@expensox/shared';
import { readJsonObject } from '@/lib/route-params';
import { resendOtpSchema } from '@/lib/auth-schemas';

// POST /api/v1/auth/resend-otp
export const POST = withPublicMiddleware(async (request) => {
  const { userId, purpose } = parseOrThrow(resendOtpSchema, await readJsonObject(request));
  const result = await getAuthAdapter().resendOtp(userId, purpose);
  return NextResponse.json({ data: result });
});
