import { NextResponse } from 'next/server';
import { withPublicMiddleware } from '@expensox/core/auth/with-middleware';
import { getAuthAdapter } from '@expensox/core/auth';
import { parseOrThrow } from '@expensox/shared';
import { readJsonObject } from '@/lib/route-params';
import { loginSchema } from '@/lib/auth-schemas';

// POST /api/v1/auth/login: returns a token, or the OTP step still to complete
export const POST = withPublicMiddleware(async (request) => {
  const { email, password } = parseOrThrow(loginSchema, await readJsonObject(request));
  const result = await getAuthAdapter().signIn(email, password);
  return NextResponse.json({ data: result });
});
