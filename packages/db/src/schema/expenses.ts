import {
  pgTable,
  text,
  timestamp,
  numeric,
  integer,
  boolean,
  index,
  uniqueIndex,
  date,
} from 'drizzle-orm/pg-core';
import { generateUlid } from '@expensox/shared';
import type {
  ApprovalDecisionStatus,
  ApprovalRuleType,
  ApproverRole,
  ApproverType,
  ExpensePaidBy,
  ExpenseStatus,
} from '@expensox/shared';
import { tenants, users } from './core';

// ── expense_categories ──────────────────────────────────────────────────────

export const expenseCategories = pgTable(
  'expense_categories',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    tenantId: text('tenant_id')
      .notNull()
      .references(() => tenants.id),
    name: text('name').notNull(),
    description: text('description'),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [uniqueIndex('uq_expense_categories_tenant_name').on(table.tenantId, table.name)],
);

// ── budgets ─────────────────────────────────────────────────────────────────

export const budgets = pgTable(
  'budgets',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    tenantId: text('tenant_id')
      .notNull()
      .references(() => tenants.id),
    categoryId: text('category_id')
      .notNull()
      .references(() => expenseCategories.id),
    amount: numeric('amount', { precision: 12, scale: 2 }).notNull(),
    currency: text('currency').notNull(),
    periodStart: date('period_start').notNull(),
    periodEnd: date('period_end').notNull(),
    description: text('description'),
    createdBy: text('created_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_budgets_tenant_category').on(table.tenantId, table.categoryId, table.periodStart),
  ],
);

// ── approval_flows ──────────────────────────────────────────────────────────

export const approvalFlows = pgTable(
  'approval_flows',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    tenantId: text('tenant_id')
      .notNull()
      .references(() => tenants.id),
    name: text('name').notNull(),
    description: text('description'),
    isManagerApprover: boolean('is_manager_approver').notNull().default(false),
    minAmount: numeric('min_amount', { precision: 12, scale: 2 }),
    isDefault: boolean('is_default').notNull().default(false),
    isActive: boolean('is_active').notNull().default(true),
    version: integer('version').notNull().default(1),
    createdBy: text('created_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_approval_flows_tenant_name').on(table.tenantId, table.name),
    index('idx_approval_flows_tenant_active').on(table.tenantId, table.isActive),
  ],
);

// ── approval_flow_steps ─────────────────────────────────────────────────────

export const approvalFlowSteps = pgTable(
  'approval_flow_steps',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    tenantId: text('tenant_id')
      .notNull()
      .references(() => tenants.id),
    flowId: text('flow_id')
      .notNull()
      .references(() => approvalFlows.id, { onDelete: 'cascade' }),
    sequence: integer('sequence').notNull(),
    name: text('name').notNull(),
    approverType: text('approver_type').$type<ApproverType>().notNull(),
    approverUserId: text('approver_user_id').references(() => users.id),
    approverRole: text('approver_role').$type<ApproverRole>(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [uniqueIndex('uq_approval_flow_steps_sequence').on(table.flowId, table.sequence)],
);

// ── approval_rules ──────────────────────────────────────────────────────────

export const approvalRules = pgTable(
  'approval_rules',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    tenantId: text('tenant_id')
      .notNull()
      .references(() => tenants.id),
    flowId: text('flow_id').references(() => approvalFlows.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    ruleType: text('rule_type').$type<ApprovalRuleType>().notNull(),
    percentageThreshold: numeric('percentage_threshold', { precision: 5, scale: 2 }),
    specificApproverId: text('specific_approver_id').references(() => users.id),
    isActive: boolean('is_active').notNull().default(true),
    createdBy: text('created_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_approval_rules_tenant_flow').on(table.tenantId, table.flowId)],
);

// ── expenses ────────────────────────────────────────────────────────────────

export const expenses = pgTable(
  'expenses',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    tenantId: text('tenant_id')
      .notNull()
      .references(() => tenants.id),
    expenseNumber: text('expense_number').notNull(),
    submitterUserId: text('submitter_user_id')
      .notNull()
      .references(() => users.id),
    categoryId: text('category_id')
      .notNull()
      .references(() => expenseCategories.id),

    title: text('title').notNull(),
    description: text('description'),
    expenseDate: date('expense_date').notNull(),
    amount: numeric('amount', { precision: 12, scale: 2 }).notNull(),
    currency: text('currency').notNull(),
    amountInCompanyCurrency: numeric('amount_in_company_currency', { precision: 12, scale: 2 }).notNull(),
    companyCurrency: text('company_currency').notNull(),
    exchangeRate: numeric('exchange_rate', { precision: 18, scale: 8 }).notNull().default('1'),
    paidBy: text('paid_by').$type<ExpensePaidBy>().notNull().default('employee'),
    receiptUrl: text('receipt_url'),

    status: text('status').$type<ExpenseStatus>().notNull().default('draft'),
    approvalFlowId: text('approval_flow_id').references(() => approvalFlows.id),
    currentStep: integer('current_step'),

    submittedAt: timestamp('submitted_at', { withTimezone: true }),
    approvedAt: timestamp('approved_at', { withTimezone: true }),
    approvedBy: text('approved_by'),
    rejectedAt: timestamp('rejected_at', { withTimezone: true }),
    rejectedBy: text('rejected_by'),
    rejectionReason: text('rejection_reason'),
    paidAt: timestamp('paid_at', { withTimezone: true }),
    paidByUserId: text('paid_by_user_id'),
    paymentReference: text('payment_reference'),
    managerNotes: text('manager_notes'),

    clientRequestId: text('client_request_id'),
    version: integer('version').notNull().default(1),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_expenses_tenant_number').on(table.tenantId, table.expenseNumber),
    uniqueIndex('uq_expenses_client_request').on(
      table.tenantId,
      table.submitterUserId,
      table.clientRequestId,
    ),
    index('idx_expenses_tenant_status').on(table.tenantId, table.status),
    index('idx_expenses_tenant_submitter').on(table.tenantId, table.submitterUserId),
    index('idx_expenses_tenant_date').on(table.tenantId, table.expenseDate),
    index('idx_expenses_tenant_category').on(table.tenantId, table.categoryId),
  ],
);

// ── expense_approvals ───────────────────────────────────────────────────────
// One row per materialized approval step. Step 0 records an out-of-turn
// approval by a rule's specific approver.

export const expenseApprovals = pgTable(
  'expense_approvals',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    tenantId: text('tenant_id')
      .notNull()
      .references(() => tenants.id),
    expenseId: text('expense_id')
      .notNull()
      .references(() => expenses.id, { onDelete: 'cascade' }),
    stepNumber: integer('step_number').notNull(),
    stepName: text('step_name').notNull(),
    approverType: text('approver_type').$type<ApproverType>().notNull(),
    approverUserId: text('approver_user_id'),
    approverRole: text('approver_role'),
    status: text('status').$type<ApprovalDecisionStatus>().notNull().default('waiting'),
    actedBy: text('acted_by'),
    comment: text('comment'),
    actedAt: timestamp('acted_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_expense_approvals_expense').on(table.expenseId, table.stepNumber),
    index('idx_expense_approvals_pending').on(table.tenantId, table.status, table.approverUserId),
  ],
);
