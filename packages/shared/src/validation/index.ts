import { z } from 'zod';
import { ValidationError } from '../errors';
import { isValidCurrency } from '../constants/currencies';

export const paginationSchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

export const tenantIdSchema = z.string().min(1);

// Date.parse rolls 2025-02-30 over to March; reading the date back catches it.
function isCalendarDate(value: string): boolean {
  const time = Date.parse(`${value}T00:00:00Z`);
  return !Number.isNaN(time) && new Date(time).toISOString().slice(0, 10) === value;
}

/** YYYY-MM-DD calendar date. */
export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date formatted YYYY-MM-DD')
  .refine(isCalendarDate, 'Invalid date');

export const currencyCodeSchema = z
  .string()
  .trim()
  .toUpperCase()
  .refine(isValidCurrency, 'Unsupported currency');

/** Largest value a numeric(12,2) money column holds. */
export const MAX_MONEY_AMOUNT = 9_999_999_999.99;

export const moneyAmountSchema = z
  .number()
  .positive()
  .max(MAX_MONEY_AMOUNT)
  .refine((value) => Math.abs(value * 100 - Math.round(value * 100)) < 1e-6, 'At most 2 decimal places');

/**
 * Assert that a Zod safeParse result succeeded, throwing a ValidationError if not.
 * After calling this, `parsed.data` is type-safe.
 *
 * @example
 * ```ts
 * const parsed = schema.safeParse(body);
 * assertValidated(parsed);
 * // parsed.data is now typed
 * ```
 */
export function assertValidated<T>(
  parsed: z.SafeParseReturnType<unknown, T>,
  message = 'Validation failed',
): asserts parsed is z.SafeParseSuccess<T> {
  if (!parsed.success) {
    throw new ValidationError(message, toValidationDetails(parsed.error));
  }
}

/** Parse `input` with `schema` or throw a ValidationError. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Validation failed', toValidationDetails(parsed.error));
  }
  return parsed.data;
}

function toValidationDetails(error: z.ZodError): Array<{ field: string; message: string }> {
  return error.issues.map((i) => ({
    field: i.path.join('.'),
    message: i.message,
  }));
}
