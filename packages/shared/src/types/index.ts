export { EventEnvelopeSchema, EXPENSE_EVENTS, IDENTITY_EVENTS, FINANCE_EVENTS } from './events';
export type { EventEnvelope, EventType } from './events';
export type { ApiResponse, ApiError, ApiResult, Paginated } from './api';
