export type { AuthUser, AuthAdapter, AccessToken, SignInResult } from './auth';
export {
  LocalAuthAdapter,
  getAuthAdapter,
  setAuthAdapter,
  requestContext,
  getRequestContext,
  authenticate,
  resolveTenant,
  withMiddleware,
  withPublicMiddleware,
} from './auth';
export type { RequestContext, RouteHandler, PublicRouteHandler, MiddlewareOptions } from './auth';
export {
  ROLE_PERMISSIONS,
  matchPermission,
  getRolePermissions,
  hasPermission,
  requirePermission,
} from './permissions';
export type { EventHandler, EventBus, OutboxWriter, ProcessedEventStore, DeadLetter } from './events';
export {
  InMemoryEventBus,
  DrizzleOutboxWriter,
  DrizzleProcessedEventStore,
  MemoryProcessedEventStore,
  OutboxWorker,
  buildEvent,
  buildEventFromContext,
  publishWithOutbox,
  publishEventsOnly,
  registerModuleEvents,
  matchEventPattern,
  getEventBus,
  setEventBus,
  getOutboxWriter,
  setOutboxWriter,
  getOutboxWorker,
  setOutboxWorker,
  initializeEventSystem,
  shutdownEventSystem,
} from './events';
export type { ModuleEventRegistration, EventRegistration, PatternRegistration } from './events';
export type { AuditLogger, AuditEntry, AuditChanges, AuditQueryFilters } from './audit';
export {
  getAuditLogger,
  setAuditLogger,
  DrizzleAuditLogger,
  auditLog,
  auditLogSystem,
  computeChanges,
} from './audit';
export {
  sendEmail,
  escapeHtml,
  otpEmail,
  welcomeEmail,
  approvalRequestedEmail,
  expenseDecisionEmail,
} from './email';
export type { EmailMessage, ExpenseSummaryForEmail } from './email';
export {
  generateOtpCode,
  evaluateOtp,
  secondsRemaining,
  issueOtp,
  verifyOtp,
  resendOtp,
  getOtpStatus,
  cleanupExpiredOtps,
} from './otp';
export type { OtpFailureReason, OtpVerifyResult, OtpStatus } from './otp';
export {
  resolveRate,
  convertAmount,
  convertToCompanyCurrency,
  upsertExchangeRate,
  listExchangeRates,
} from './currency';
export type { ExchangeRateRecord, ExchangeRateView, ConvertedAmount } from './currency';
export {
  signUpCompany,
  getCompany,
  updateCompany,
  findCountry,
  getCurrencyForCountry,
  listCountries,
  DEFAULT_CATEGORY_NAME,
} from './companies';
export type { CompanyView, SignUpResult, CountryCurrency } from './companies';
export {
  normalizeEmail,
  hashSecret,
  verifySecret,
  validatePassword,
  assertValidPassword,
  assertNoManagerCycle,
  createUser,
  updateUser,
  deactivateUser,
  reactivateUser,
  listUsers,
  getUser,
} from './users';
export type { UserView, CreateUserInput, UpdateUserInput, ListUsersInput } from './users';
export { getAppConfig, loadAppConfig, resetAppConfig } from './config';
export type { AppConfig } from './config';
export { logger, errorFields, setLogLevel } from './observability';
