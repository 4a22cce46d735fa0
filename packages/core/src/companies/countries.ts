import countryCurrencies from './country-currencies.json';

export interface CountryCurrency {
  country: string;
  currencyCode: string;
}

const byLowerName = new Map<string, CountryCurrency>(
  Object.entries(countryCurrencies).map(([country, currencyCode]) => [
    country.toLowerCase(),
    { country, currencyCode },
  ]),
);

/** Case-insensitive; null for countries outside the bundled table. */
export function findCountry(country: string): CountryCurrency | null {
  return byLowerName.get(country.trim().toLowerCase()) ?? null;
}

export function getCurrencyForCountry(country: string): string | null {
  return findCountry(country)?.currencyCode ?? null;
}

export function listCountries(): CountryCurrency[] {
  return [...byLowerName.values()].sort((a, b) => a.country.localeCompare(b.country));
}
