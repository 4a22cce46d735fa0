import { z } from 'zod';

export const EventEnvelopeSchema = z.object({
  eventId: z.string().min(1),
  eventType: z.string().regex(/^[a-z]+\.[a-z_]+\.[a-z_]+\.v\d+$/),
  occurredAt: z.string().datetime(),
  tenantId: z.string().min(1),
  actorUserId: z.string().optional(),
  idempotencyKey: z.string().min(1),
  correlationId: z.string().optional(),
  data: z.record(z.unknown()),
});

export type EventEnvelope = z.infer<typeof EventEnvelopeSchema>;

export const EXPENSE_EVENTS = {
  CREATED: 'expense.expense.created.v1',
  UPDATED: 'expense.expense.updated.v1',
  DELETED: 'expense.expense.deleted.v1',
  SUBMITTED: 'expense.expense.submitted.v1',
  APPROVAL_REQUESTED: 'expense.approval.requested.v1',
  APPROVAL_RECORDED: 'expense.approval.recorded.v1',
  APPROVED: 'expense.expense.approved.v1',
  REJECTED: 'expense.expense.rejected.v1',
  PAID: 'expense.expense.paid.v1',
  FLOW_CREATED: 'expense.flow.created.v1',
  FLOW_UPDATED: 'expense.flow.updated.v1',
  FLOW_DELETED: 'expense.flow.deleted.v1',
  RULE_CREATED: 'expense.rule.created.v1',
  RULE_UPDATED: 'expense.rule.updated.v1',
  RULE_DELETED: 'expense.rule.deleted.v1',
  CATEGORY_CREATED: 'expense.category.created.v1',
  CATEGORY_UPDATED: 'expense.category.updated.v1',
  BUDGET_CREATED: 'expense.budget.created.v1',
  BUDGET_UPDATED: 'expense.budget.updated.v1',
  BUDGET_DELETED: 'expense.budget.deleted.v1',
} as const;

export const IDENTITY_EVENTS = {
  COMPANY_CREATED: 'identity.company.created.v1',
  COMPANY_UPDATED: 'identity.company.updated.v1',
  USER_CREATED: 'identity.user.created.v1',
  USER_UPDATED: 'identity.user.updated.v1',
} as const;

export const FINANCE_EVENTS = {
  EXCHANGE_RATE_UPDATED: 'finance.exchange_rate.updated.v1',
} as const;

type ValueOf<T> = T[keyof T];

export type EventType =
  | ValueOf<typeof EXPENSE_EVENTS>
  | ValueOf<typeof IDENTITY_EVENTS>
  | ValueOf<typeof FINANCE_EVENTS>;
