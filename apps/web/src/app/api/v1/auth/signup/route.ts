import { NextResponse } from 'next/server';
import { withPublicMiddleware } from '@expensox/core/auth/with-middleware';
import { signUpCompany, signUpCompanySchema } from '@expensox/core/companies';
import { parseOrThrow } from '@expensox/shared';
import { readJsonObject } from '@/lib/route-params';

// POST /api/v1/auth/signup: create a company and its first admin
export const POST = withPublicMiddleware(async (request) => {
  const input = parseOrThrow(signUpCompanySchema, await readJsonObject(request));
  const result = await signUpCompany(input);
  return NextResponse.json({ data: result }, { status: 201 });
});
