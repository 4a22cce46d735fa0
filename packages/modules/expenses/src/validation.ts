import { z } from 'zod';
import {
  APPROVAL_RULE_TYPES,
  APPROVER_ROLES,
  EXPENSE_STATUS_VALUES,
  currencyCodeSchema,
  isoDateSchema,
  moneyAmountSchema,
} from '@expensox/shared';

const idSchema = z.string().trim().min(1);
const limitSchema = z.coerce.number().int().min(1).max(100).default(50);

// ── Categories ──────────────────────────────────────────────────────────────

export const createCategorySchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().trim().max(500).optional(),
});

export const updateCategorySchema = z.object({
  name: z.string().trim().min(1).max(100).optional(),
  description: z.string().trim().max(500).optional().nullable(),
  isActive: z.boolean().optional(),
});

export const listCategoriesSchema = z.object({
  tenantId: idSchema,
  includeInactive: z.boolean().default(false),
});

// ── Budgets ─────────────────────────────────────────────────────────────────

export const createBudgetSchema = z
  .object({
    categoryId: idSchema,
    amount: moneyAmountSchema,
    currency: currencyCodeSchema.optional(),
    periodStart: isoDateSchema,
    periodEnd: isoDateSchema,
    description: z.string().trim().max(500).optional(),
  })
  .refine((v) => v.periodStart <= v.periodEnd, {
    message: 'Period start must be on or before period end',
    path: ['periodEnd'],
  });

export const updateBudgetSchema = z.object({
  amount: moneyAmountSchema.optional(),
  periodStart: isoDateSchema.optional(),
  periodEnd: isoDateSchema.optional(),
  description: z.string().trim().max(500).optional().nullable(),
});

export const budgetUtilizationSchema = z.object({
  tenantId: idSchema,
  asOf: isoDateSchema.optional(),
  categoryId: idSchema.optional(),
});

// ── Expense CRUD ────────────────────────────────────────────────────────────

export const createExpenseSchema = z.object({
  title: z.string().trim().min(1).max(200),
  categoryId: idSchema,
  expenseDate: isoDateSchema,
  amount: moneyAmountSchema,
  currency: currencyCodeSchema,
  description: z.string().trim().max(2000).optional(),
  receiptUrl: z.string().trim().url().max(2000).optional(),
  paidBy: z.enum(['employee', 'company']).default('employee'),
  clientRequestId: z.string().trim().min(1).max(128).optional(),
});

export const updateExpenseSchema = z.object({
  title: z.string().trim().min(1).max(200).optional(),
  categoryId: idSchema.optional(),
  expenseDate: isoDateSchema.optional(),
  amount: moneyAmountSchema.optional(),
  currency: currencyCodeSchema.optional(),
  description: z.string().trim().max(2000).optional().nullable(),
  receiptUrl: z.string().trim().url().max(2000).optional().nullable(),
  paidBy: z.enum(['employee', 'company']).optional(),
  expectedVersion: z.number().int().optional(),
});

// ── Decisions ───────────────────────────────────────────────────────────────

export const approveExpenseSchema = z.object({
  expenseId: idSchema,
  comment: z.string().trim().max(1000).optional(),
});

export const rejectExpenseSchema = z.object({
  expenseId: idSchema,
  comment: z.string().trim().min(1, 'A comment is required to reject').max(1000),
});

export const overrideExpenseSchema = z.object({
  expenseId: idSchema,
  decision: z.enum(['approve', 'reject']),
  comment: z.string().trim().min(1).max(1000),
});

export const markExpensePaidSchema = z.object({
  expenseId: idSchema,
  reference: z.string().trim().max(200).optional(),
});

// ── Approval flows & rules ──────────────────────────────────────────────────

export const flowStepSchema = z
  .object({
    sequence: z.number().int().min(1),
    name: z.string().trim().min(1).max(100),
    approverType: z.enum(['user', 'role', 'manager']),
    approverUserId: idSchema.optional().nullable(),
    approverRole: z.enum(APPROVER_ROLES).optional().nullable(),
  })
  .superRefine((step, ctx) => {
    if (step.approverType === 'user' && !step.approverUserId) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'User steps need an approver', path: ['approverUserId'] });
    }
    if (step.approverType === 'role' && !step.approverRole) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Role steps need a role', path: ['approverRole'] });
    }
  });

function uniqueSequences(steps: Array<{ sequence: number }>): boolean {
  return new Set(steps.map((s) => s.sequence)).size === steps.length;
}

export const createApprovalFlowSchema = z
  .object({
    name: z.string().trim().min(1).max(100),
    description: z.string().trim().max(500).optional(),
    isManagerApprover: z.boolean().default(false),
    minAmount: moneyAmountSchema.optional().nullable(),
    isDefault: z.boolean().default(false),
    steps: z.array(flowStepSchema).max(20).default([]),
  })
  .refine((v) => v.steps.length > 0 || v.isManagerApprover, {
    message: 'A flow needs at least one step unless the manager approves',
    path: ['steps'],
  })
  .refine((v) => uniqueSequences(v.steps), {
    message: 'Step sequences must be unique',
    path: ['steps'],
  });

export const updateApprovalFlowSchema = z
  .object({
    name: z.string().trim().min(1).max(100).optional(),
    description: z.string().trim().max(500).optional().nullable(),
    isManagerApprover: z.boolean().optional(),
    minAmount: moneyAmountSchema.optional().nullable(),
    isDefault: z.boolean().optional(),
    isActive: z.boolean().optional(),
    steps: z.array(flowStepSchema).max(20).optional(),
    expectedVersion: z.number().int().optional(),
  })
  .refine((v) => !v.steps || uniqueSequences(v.steps), {
    message: 'Step sequences must be unique',
    path: ['steps'],
  });

const percentageSchema = z.coerce.number().gt(0).max(100);

export const createApprovalRuleSchema = z
  .object({
    name: z.string().trim().min(1).max(100),
    ruleType: z.enum(APPROVAL_RULE_TYPES),
    percentageThreshold: percentageSchema.optional().nullable(),
    specificApproverId: idSchema.optional().nullable(),
    flowId: idSchema.optional().nullable(),
  })
  .superRefine((rule, ctx) => {
    const needsPercentage = rule.ruleType === 'percentage' || rule.ruleType === 'hybrid';
    const needsApprover = rule.ruleType === 'specific' || rule.ruleType === 'hybrid';
    if (needsPercentage && rule.percentageThreshold == null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'A percentage threshold is required', path: ['percentageThreshold'] });
    }
    if (needsApprover && !rule.specificApproverId) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'A specific approver is required', path: ['specificApproverId'] });
    }
  });

export const updateApprovalRuleSchema = z.object({
  name: z.string().trim().min(1).max(100).optional(),
  ruleType: z.enum(APPROVAL_RULE_TYPES).optional(),
  percentageThreshold: percentageSchema.optional().nullable(),
  specificApproverId: idSchema.optional().nullable(),
  flowId: idSchema.optional().nullable(),
  isActive: z.boolean().optional(),
});

// ── Query Filters ───────────────────────────────────────────────────────────

export const listExpensesSchema = z.object({
  tenantId: idSchema,
  submitterUserId: idSchema.optional(),
  /** Limits to the manager's own expenses and their direct reports'. */
  managerId: idSchema.optional(),
  status: z.enum(EXPENSE_STATUS_VALUES).optional(),
  categoryId: idSchema.optional(),
  fromDate: isoDateSchema.optional(),
  toDate: isoDateSchema.optional(),
  search: z.string().trim().max(100).optional(),
  cursor: z.string().optional(),
  limit: limitSchema,
});

export const pendingApprovalsSchema = z.object({
  tenantId: idSchema,
  approverUserId: idSchema,
  approverRole: z.enum(['admin', 'manager', 'employee']),
  cursor: z.string().optional(),
  limit: limitSchema,
});

export const expenseSummarySchema = z.object({
  tenantId: idSchema,
  submitterUserId: idSchema.optional(),
  managerId: idSchema.optional(),
  fromDate: isoDateSchema.optional(),
  toDate: isoDateSchema.optional(),
});

export const listApprovalFlowsSchema = z.object({
  tenantId: idSchema,
  includeInactive: z.boolean().default(false),
});

export const listApprovalRulesSchema = z.object({
  tenantId: idSchema,
  flowId: idSchema.optional(),
  includeInactive: z.boolean().default(false),
});

export type CreateCategoryInput = z.input<typeof createCategorySchema>;
export type UpdateCategoryInput = z.input<typeof updateCategorySchema>;
export type ListCategoriesInput = z.input<typeof listCategoriesSchema>;
export type CreateBudgetInput = z.input<typeof createBudgetSchema>;
export type UpdateBudgetInput = z.input<typeof updateBudgetSchema>;
export type BudgetUtilizationInput = z.input<typeof budgetUtilizationSchema>;
export type CreateExpenseInput = z.input<typeof createExpenseSchema>;
export type UpdateExpenseInput = z.input<typeof updateExpenseSchema>;
export type ApproveExpenseInput = z.input<typeof approveExpenseSchema>;
export type RejectExpenseInput = z.input<typeof rejectExpenseSchema>;
export type OverrideExpenseInput = z.input<typeof overrideExpenseSchema>;
export type MarkExpensePaidInput = z.input<typeof markExpensePaidSchema>;
export type FlowStepInput = z.input<typeof flowStepSchema>;
export type CreateApprovalFlowInput = z.input<typeof createApprovalFlowSchema>;
export type UpdateApprovalFlowInput = z.input<typeof updateApprovalFlowSchema>;
export type CreateApprovalRuleInput = z.input<typeof createApprovalRuleSchema>;
export type UpdateApprovalRuleInput = z.input<typeof updateApprovalRuleSchema>;
export type ListExpensesInput = z.input<typeof listExpensesSchema>;
export type PendingApprovalsInput = z.input<typeof pendingApprovalsSchema>;
export type ExpenseSummaryInput = z.input<typeof expenseSummarySchema>;
export type ListApprovalFlowsInput = z.input<typeof listApprovalFlowsSchema>;
export type ListApprovalRulesInput = z.input<typeof listApprovalRulesSchema>;
