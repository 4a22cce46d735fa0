import { NextResponse } from 'next/server';
import { withMiddleware } from '@expensox/core/auth/with-middleware';
import {
  listExchangeRates,
  listExchangeRatesSchema,
  upsertExchangeRate,
  upsertExchangeRateSchema,
} from '@expensox/core/currency';
import { parseOrThrow } from '@expensox/shared';
import { optionalParam, readJsonObject, searchParams } from '@/lib/route-params';

// GET /api/v1/exchange-rates?fromCurrency=EUR&toCurrency=USD
export const GET = withMiddleware(
  async (request, ctx) => {
    const params = searchParams(request);
    const filters = parseOrThrow(listExchangeRatesSchema, {
      fromCurrency: optionalParam(params, 'fromCurrency'),
      toCurrency: optionalParam(params, 'toCurrency'),
    });
    const rates = await listExchangeRates(ctx.tenantId, filters);
    return NextResponse.json({ data: rates });
  },
  { permission: 'currency.view' },
);

// POST /api/v1/exchange-rates: one rate per pair and date, replaced when it exists
export const POST = withMiddleware(
  async (request, ctx) => {
    const input = parseOrThrow(upsertExchangeRateSchema, await readJsonObject(request));
    const rate = await upsertExchangeRate(ctx, input);
    return NextResponse.json({ data: rate }, { status: 201 });
  },
  { permission: 'currency.manage' },
);
