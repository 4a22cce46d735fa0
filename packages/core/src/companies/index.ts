export {
  signUpCompany,
  getCompany,
  updateCompany,
  signUpCompanySchema,
  updateCompanySchema,
  DEFAULT_CATEGORY_NAME,
} from './companies';
export type { CompanyView, SignUpResult, SignUpCompanyInput, UpdateCompanyInput } from './companies';
export { findCountry, getCurrencyForCountry, listCountries } from './countries';
export type { CountryCurrency } from './countries';
