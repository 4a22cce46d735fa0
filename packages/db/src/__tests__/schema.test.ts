import { describe, it, expect } from 'vitest';
import { getTableConfig } from 'drizzle-orm/pg-core';
import {
  tenants,
  users,
  otpVerifications,
  expenses,
  expenseApprovals,
  approvalFlows,
  approvalFlowSteps,
  approvalRules,
  budgets,
  exchangeRates,
} from '../schema';

function columnNames(table: Parameters<typeof getTableConfig>[0]): string[] {
  return getTableConfig(table).columns.map((c) => c.name);
}

function uniqueIndexNames(table: Parameters<typeof getTableConfig>[0]): string[] {
  return getTableConfig(table)
    .indexes.filter((i) => i.config.unique)
    .map((i) => i.config.name ?? '');
}

describe('tenant scoping', () => {
  it.each([
    ['users', users],
    ['otp_verifications', otpVerifications],
    ['expenses', expenses],
    ['expense_approvals', expenseApprovals],
    ['approval_flows', approvalFlows],
    ['approval_flow_steps', approvalFlowSteps],
    ['approval_rules', approvalRules],
    ['budgets', budgets],
    ['exchange_rates', exchangeRates],
  ])('%s carries a non-null tenant_id', (_name, table) => {
    const tenantColumn = getTableConfig(table).columns.find((c) => c.name === 'tenant_id');
    expect(tenantColumn?.notNull).toBe(true);
  });
});

describe('companies and users', () => {
  it('stores the company currency on the tenant', () => {
    expect(columnNames(tenants)).toEqual(
      expect.arrayContaining(['country', 'currency_code', 'slug', 'status']),
    );
  });

  it('links users to their manager', () => {
    const fk = getTableConfig(users).foreignKeys.map((f) => f.reference());
    const managerFk = fk.find((ref) => ref.columns[0]?.name === 'manager_id');
    expect(managerFk?.foreignTable).toBe(users);
  });

  it('never stores OTP codes in clear', () => {
    const names = columnNames(otpVerifications);
    expect(names).toContain('code_hash');
    expect(names).not.toContain('code');
  });
});

describe('expenses', () => {
  it('keeps both the original and the converted amount', () => {
    expect(columnNames(expenses)).toEqual(
      expect.arrayContaining([
        'amount',
        'currency',
        'amount_in_company_currency',
        'company_currency',
        'exchange_rate',
      ]),
    );
  });

  it('enforces unique numbers and client request ids per tenant', () => {
    expect(uniqueIndexNames(expenses)).toEqual(
      expect.arrayContaining(['uq_expenses_tenant_number', 'uq_expenses_client_request']),
    );
  });

  it('allows one step per sequence in a flow', () => {
    expect(uniqueIndexNames(approvalFlowSteps)).toEqual(['uq_approval_flow_steps_sequence']);
  });

  it('allows one exchange rate per pair per day', () => {
    expect(uniqueIndexNames(exchangeRates)).toEqual(['uq_exchange_rates_pair_date']);
  });
});
