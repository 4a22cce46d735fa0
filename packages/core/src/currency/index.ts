export {
  resolveRate,
  convertAmount,
  convertToCompanyCurrency,
  upsertExchangeRate,
  listExchangeRates,
  upsertExchangeRateSchema,
  listExchangeRatesSchema,
} from './exchange-rates';
export type {
  ExchangeRateRecord,
  ExchangeRateView,
  ConvertedAmount,
  UpsertExchangeRateInput,
  ListExchangeRatesInput,
} from './exchange-rates';
