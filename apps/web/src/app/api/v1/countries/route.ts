import { NextResponse } from 'next/server';
import { withPublicMiddleware } from '@expensox/core/auth/with-middleware';
import { listCountries } from '@expensox/core/companies';

// GET /api/v1/countries: country → currency table for the signup form
export const GET = withPublicMiddleware(
  async () => NextResponse.json({ data: listCountries() }),
  { cache: 'public, max-age=86400' },
);
