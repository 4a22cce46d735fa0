/**
 * ISO 4217 currencies an expense may be recorded in, with their minor-unit
 * precision. Amounts are rounded to `decimals` after conversion.
 */

export interface CurrencyDefinition {
  /** ISO 4217 3-letter code */
  code: string;
  symbol: string;
  name: string;
  /** Minor units (2 for USD, 0 for JPY) */
  decimals: number;
  sortOrder: number;
}

export const SUPPORTED_CURRENCIES: Record<string, CurrencyDefinition> = {
  USD: { code: 'USD', symbol: '$', name: 'US Dollar', decimals: 2, sortOrder: 1 },
  EUR: { code: 'EUR', symbol: '€', name: 'Euro', decimals: 2, sortOrder: 2 },
  GBP: { code: 'GBP', symbol: '£', name: 'British Pound', decimals: 2, sortOrder: 3 },
  INR: { code: 'INR', symbol: '₹', name: 'Indian Rupee', decimals: 2, sortOrder: 4 },
  CAD: { code: 'CAD', symbol: 'CA$', name: 'Canadian Dollar', decimals: 2, sortOrder: 5 },
  AUD: { code: 'AUD', symbol: 'A$', name: 'Australian Dollar', decimals: 2, sortOrder: 6 },
  JPY: { code: 'JPY', symbol: '¥', name: 'Japanese Yen', decimals: 0, sortOrder: 7 },
  CNY: { code: 'CNY', symbol: 'CN¥', name: 'Chinese Yuan', decimals: 2, sortOrder: 8 },
  CHF: { code: 'CHF', symbol: 'CHF', name: 'Swiss Franc', decimals: 2, sortOrder: 9 },
  SGD: { code: 'SGD', symbol: 'S$', name: 'Singapore Dollar', decimals: 2, sortOrder: 10 },
  AED: { code: 'AED', symbol: 'د.إ', name: 'UAE Dirham', decimals: 2, sortOrder: 11 },
  MXN: { code: 'MXN', symbol: 'MX$', name: 'Mexican Peso', decimals: 2, sortOrder: 12 },
  BRL: { code: 'BRL', symbol: 'R$', name: 'Brazilian Real', decimals: 2, sortOrder: 13 },
  KRW: { code: 'KRW', symbol: '₩', name: 'South Korean Won', decimals: 0, sortOrder: 14 },
  HKD: { code: 'HKD', symbol: 'HK$', name: 'Hong Kong Dollar', decimals: 2, sortOrder: 15 },
  NZD: { code: 'NZD', symbol: 'NZ$', name: 'New Zealand Dollar', decimals: 2, sortOrder: 16 },
  SEK: { code: 'SEK', symbol: 'kr', name: 'Swedish Krona', decimals: 2, sortOrder: 17 },
  NOK: { code: 'NOK', symbol: 'kr', name: 'Norwegian Krone', decimals: 2, sortOrder: 18 },
  DKK: { code: 'DKK', symbol: 'kr', name: 'Danish Krone', decimals: 2, sortOrder: 19 },
  ZAR: { code: 'ZAR', symbol: 'R', name: 'South African Rand', decimals: 2, sortOrder: 20 },
  PHP: { code: 'PHP', symbol: '₱', name: 'Philippine Peso', decimals: 2, sortOrder: 21 },
  THB: { code: 'THB', symbol: '฿', name: 'Thai Baht', decimals: 2, sortOrder: 22 },
  KWD: { code: 'KWD', symbol: 'KD', name: 'Kuwaiti Dinar', decimals: 3, sortOrder: 23 },
};

export const CURRENCY_CODES = Object.keys(SUPPORTED_CURRENCIES);

export function getCurrencySymbol(code: string): string {
  return SUPPORTED_CURRENCIES[code]?.symbol ?? code;
}

/** Defaults to 2 for codes outside the supported list. */
export function getCurrencyDecimals(code: string): number {
  return SUPPORTED_CURRENCIES[code]?.decimals ?? 2;
}

export function formatCurrencyAmount(amount: number | string, currencyCode: string): string {
  const num = typeof amount === 'string' ? Number(amount) : amount;
  return `${getCurrencySymbol(currencyCode)}${num.toFixed(getCurrencyDecimals(currencyCode))}`;
}

export function isValidCurrency(code: string): boolean {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_CURRENCIES, code);
}
