import { and, desc, eq, lte, or } from 'drizzle-orm';
import { z } from 'zod';
import { exchangeRates, withTenant } from '@expensox/db';
import type { Database } from '@expensox/db';
import {
  ExchangeRateUnavailableError,
  FINANCE_EVENTS,
  MAX_MONEY_AMOUNT,
  ValidationError,
  currencyCodeSchema,
  generateUlid,
  getCurrencyDecimals,
  isoDateSchema,
  parseOrThrow,
  roundMoney,
} from '@expensox/shared';
import type { RequestContext } from '../auth/context';
import { publishWithOutbox } from '../events/publish-with-outbox';
import { buildEventFromContext } from '../events/build-event';
import { auditLog } from '../audit/helpers';

/** Rates carry 8 decimal places in the database. */
const RATE_DECIMALS = 8;

export interface ExchangeRateRecord {
  fromCurrency: string;
  toCurrency: string;
  rate: number;
  /** YYYY-MM-DD */
  effectiveDate: string;
}

export interface ExchangeRateView extends ExchangeRateRecord {
  id: string;
  source: string;
  createdBy: string | null;
  createdAt: string;
}

export interface ConvertedAmount {
  amount: number;
  rate: number;
}

export const upsertExchangeRateSchema = z
  .object({
    fromCurrency: currencyCodeSchema,
    toCurrency: currencyCodeSchema,
    rate: z.coerce.number().positive().max(1_000_000_000),
    effectiveDate: isoDateSchema,
    source: z.string().trim().min(1).max(50).default('manual'),
  })
  .refine((v) => v.fromCurrency !== v.toCurrency, {
    message: 'Currencies must differ',
    path: ['toCurrency'],
  });

export type UpsertExchangeRateInput = z.input<typeof upsertExchangeRateSchema>;

export const listExchangeRatesSchema = z.object({
  fromCurrency: currencyCodeSchema.optional(),
  toCurrency: currencyCodeSchema.optional(),
});

export type ListExchangeRatesInput = z.input<typeof listExchangeRatesSchema>;

// ── Pure helpers ─────────────────────────────────────────────────

function latestOnOrBefore(
  rates: readonly ExchangeRateRecord[],
  from: string,
  to: string,
  onDate: string,
): ExchangeRateRecord | null {
  let best: ExchangeRateRecord | null = null;
  for (const r of rates) {
    if (r.fromCurrency !== from || r.toCurrency !== to || r.effectiveDate > onDate) continue;
    if (!best || r.effectiveDate > best.effectiveDate) best = r;
  }
  return best;
}

/**
 * Rate to multiply a `from` amount by to get `to`. Prefers the latest direct
 * rate effective on or before `onDate`, then the inverse of the latest
 * reverse rate. Null when neither exists.
 */
export function resolveRate(
  rates: readonly ExchangeRateRecord[],
  from: string,
  to: string,
  onDate: string,
): number | null {
  if (from === to) return 1;

  const direct = latestOnOrBefore(rates, from, to, onDate);
  if (direct) return direct.rate;

  const reverse = latestOnOrBefore(rates, to, from, onDate);
  if (reverse && reverse.rate > 0) return roundMoney(1 / reverse.rate, RATE_DECIMALS);

  return null;
}

export function convertAmount(amount: number, rate: number, toCurrency: string): number {
  return roundMoney(amount * rate, getCurrencyDecimals(toCurrency));
}

function toView(row: typeof exchangeRates.$inferSelect): ExchangeRateView {
  return {
    id: row.id,
    fromCurrency: row.fromCurrency,
    toCurrency: row.toCurrency,
    rate: Number(row.rate),
    effectiveDate: row.effectiveDate,
    source: row.source,
    createdBy: row.createdBy,
    createdAt: row.createdAt.toISOString(),
  };
}

// ── Persistence ──────────────────────────────────────────────────

function storableAmount(amount: number, rate: number, toCurrency: string): number {
  const converted = convertAmount(amount, rate, toCurrency);
  if (converted > MAX_MONEY_AMOUNT) {
    throw new ValidationError('Validation failed', [
      {
        field: 'amount',
        message: `Amount exceeds ${MAX_MONEY_AMOUNT} ${toCurrency} once converted`,
      },
    ]);
  }
  return converted;
}

/**
 * Converts `amount` into the company currency using the tenant's rates on
 * `onDate`. Runs on the caller's transaction.
 */
export async function convertToCompanyCurrency(
  tx: Database,
  tenantId: string,
  amount: number,
  fromCurrency: string,
  companyCurrency: string,
  onDate: string,
): Promise<ConvertedAmount> {
  if (fromCurrency === companyCurrency) {
    return { amount: storableAmount(amount, 1, companyCurrency), rate: 1 };
  }

  const rows = await tx
    .select({
      fromCurrency: exchangeRates.fromCurrency,
      toCurrency: exchangeRates.toCurrency,
      rate: exchangeRates.rate,
      effectiveDate: exchangeRates.effectiveDate,
    })
    .from(exchangeRates)
    .where(
      and(
        eq(exchangeRates.tenantId, tenantId),
        lte(exchangeRates.effectiveDate, onDate),
        or(
          and(eq(exchangeRates.fromCurrency, fromCurrency), eq(exchangeRates.toCurrency, companyCurrency)),
          and(eq(exchangeRates.fromCurrency, companyCurrency), eq(exchangeRates.toCurrency, fromCurrency)),
        ),
      ),
    );

  const rate = resolveRate(
    rows.map((r) => ({ ...r, rate: Number(r.rate) })),
    fromCurrency,
    companyCurrency,
    onDate,
  );
  if (rate === null) {
    throw new ExchangeRateUnavailableError(fromCurrency, companyCurrency, onDate);
  }

  return { amount: storableAmount(amount, rate, companyCurrency), rate };
}

export async function upsertExchangeRate(
  ctx: RequestContext,
  input: UpsertExchangeRateInput,
): Promise<ExchangeRateView> {
  const parsed = parseOrThrow(upsertExchangeRateSchema, input);
  const rate = roundMoney(parsed.rate, RATE_DECIMALS);
  if (rate <= 0) {
    throw new ValidationError('Validation failed', [
      { field: 'rate', message: 'Rate is too small to store' },
    ]);
  }

  const view = await publishWithOutbox(ctx, async (tx) => {
    const [row] = await tx
      .insert(exchangeRates)
      .values({
        id: generateUlid(),
        tenantId: ctx.tenantId,
        fromCurrency: parsed.fromCurrency,
        toCurrency: parsed.toCurrency,
        rate: String(rate),
        effectiveDate: parsed.effectiveDate,
        source: parsed.source,
        createdBy: ctx.user.id,
      })
      .onConflictDoUpdate({
        target: [
          exchangeRates.tenantId,
          exchangeRates.fromCurrency,
          exchangeRates.toCurrency,
          exchangeRates.effectiveDate,
        ],
        set: { rate: String(rate), source: parsed.source, createdBy: ctx.user.id },
      })
      .returning();

    if (!row) throw new Error('Exchange rate upsert returned no row');
    const saved = toView(row);

    const event = buildEventFromContext(ctx, FINANCE_EVENTS.EXCHANGE_RATE_UPDATED, {
      exchangeRateId: saved.id,
      fromCurrency: saved.fromCurrency,
      toCurrency: saved.toCurrency,
      rate: saved.rate,
      effectiveDate: saved.effectiveDate,
    });

    return { result: saved, events: [event] };
  });

  await auditLog(ctx, 'exchange_rate.upserted', 'exchange_rate', view.id, undefined, {
    pair: `${view.fromCurrency}/${view.toCurrency}`,
    rate: view.rate,
    effectiveDate: view.effectiveDate,
  });

  return view;
}

export async function listExchangeRates(
  tenantId: string,
  input: ListExchangeRatesInput = {},
): Promise<ExchangeRateView[]> {
  const filters = parseOrThrow(listExchangeRatesSchema, input);

  return withTenant(tenantId, async (tx) => {
    const conditions = [eq(exchangeRates.tenantId, tenantId)];
    if (filters.fromCurrency) conditions.push(eq(exchangeRates.fromCurrency, filters.fromCurrency));
    if (filters.toCurrency) conditions.push(eq(exchangeRates.toCurrency, filters.toCurrency));

    const rows = await tx
      .select()
      .from(exchangeRates)
      .where(and(...conditions))
      .orderBy(
        exchangeRates.fromCurrency,
        exchangeRates.toCurrency,
        desc(exchangeRates.effectiveDate),
      );

    return rows.map(toView);
  });
}
