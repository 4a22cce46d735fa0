export { generateUlid, isValidUlid, generateShortCode } from './ulid';
export {
  toCents,
  toDollars,
  addMoney,
  subtractMoney,
  multiplyMoney,
  roundMoney,
  formatMoney,
} from './money';
export { toIsoDate, todayIsoDate, monthBounds } from './date';
export { generateSlug } from './slug';
