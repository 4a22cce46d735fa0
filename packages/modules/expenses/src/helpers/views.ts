import { eq } from 'drizzle-orm';
import {
  approvalFlowSteps,
  approvalFlows,
  approvalRules,
  budgets,
  expenseCategories,
  tenants,
} from '@expensox/db';
import type { Database } from '@expensox/db';
import { NotFoundError } from '@expensox/shared';
import type { ApprovalRuleType, ApproverRole, ApproverType } from '@expensox/shared';

// ── Categories ──────────────────────────────────────────────────────────────

export type CategoryRecord = typeof expenseCategories.$inferSelect;

export interface CategoryView {
  id: string;
  name: string;
  description: string | null;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export function toCategoryView(row: CategoryRecord): CategoryView {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    isActive: row.isActive,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

// ── Budgets ─────────────────────────────────────────────────────────────────

export type BudgetRecord = typeof budgets.$inferSelect;

export interface BudgetView {
  id: string;
  categoryId: string;
  amount: number;
  currency: string;
  periodStart: string;
  periodEnd: string;
  description: string | null;
  createdAt: string;
  updatedAt: string;
}

export function toBudgetView(row: BudgetRecord): BudgetView {
  return {
    id: row.id,
    categoryId: row.categoryId,
    amount: Number(row.amount),
    currency: row.currency,
    periodStart: row.periodStart,
    periodEnd: row.periodEnd,
    description: row.description,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

// ── Approval flows ──────────────────────────────────────────────────────────

export type FlowRecord = typeof approvalFlows.$inferSelect;
export type FlowStepRecord = typeof approvalFlowSteps.$inferSelect;

export interface FlowStepView {
  sequence: number;
  name: string;
  approverType: ApproverType;
  approverUserId: string | null;
  approverRole: ApproverRole | null;
}

export interface ApprovalFlowView {
  id: string;
  name: string;
  description: string | null;
  isManagerApprover: boolean;
  minAmount: number | null;
  isDefault: boolean;
  isActive: boolean;
  version: number;
  steps: FlowStepView[];
  createdAt: string;
  updatedAt: string;
}

export function toFlowView(row: FlowRecord, steps: readonly FlowStepRecord[]): ApprovalFlowView {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    isManagerApprover: row.isManagerApprover,
    minAmount: row.minAmount === null ? null : Number(row.minAmount),
    isDefault: row.isDefault,
    isActive: row.isActive,
    version: row.version,
    steps: [...steps]
      .sort((a, b) => a.sequence - b.sequence)
      .map((s) => ({
        sequence: s.sequence,
        name: s.name,
        approverType: s.approverType,
        approverUserId: s.approverUserId,
        approverRole: s.approverRole,
      })),
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

// ── Approval rules ──────────────────────────────────────────────────────────

export type RuleRecord = typeof approvalRules.$inferSelect;

export interface ApprovalRuleView {
  id: string;
  name: string;
  flowId: string | null;
  ruleType: ApprovalRuleType;
  percentageThreshold: number | null;
  specificApproverId: string | null;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export function toRuleView(row: RuleRecord): ApprovalRuleView {
  return {
    id: row.id,
    name: row.name,
    flowId: row.flowId,
    ruleType: row.ruleType,
    percentageThreshold: row.percentageThreshold === null ? null : Number(row.percentageThreshold),
    specificApproverId: row.specificApproverId,
    isActive: row.isActive,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

// ── Company ─────────────────────────────────────────────────────────────────

export async function loadCompanyCurrency(tx: Database, tenantId: string): Promise<string> {
  const [tenant] = await tx
    .select({ currencyCode: tenants.currencyCode })
    .from(tenants)
    .where(eq(tenants.id, tenantId))
    .limit(1);
  if (!tenant) throw new NotFoundError('Company', tenantId);
  return tenant.currencyCode;
}
