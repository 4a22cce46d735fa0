import { pgTable, text, timestamp, numeric, uniqueIndex, date } from 'drizzle-orm/pg-core';
import { generateUlid } from '@expensox/shared';
import { tenants } from './core';

// ── exchange_rates ──────────────────────────────────────────────────────────
// Tenant-managed rates; one row per pair per effective date.

export const exchangeRates = pgTable(
  'exchange_rates',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    tenantId: text('tenant_id')
      .notNull()
      .references(() => tenants.id),
    fromCurrency: text('from_currency').notNull(),
    toCurrency: text('to_currency').notNull(),
    rate: numeric('rate', { precision: 18, scale: 8 }).notNull(),
    effectiveDate: date('effective_date').notNull(),
    source: text('source').notNull().default('manual'),
    createdBy: text('created_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_exchange_rates_pair_date').on(
      table.tenantId,
      table.fromCurrency,
      table.toCurrency,
      table.effectiveDate,
    ),
  ],
);
