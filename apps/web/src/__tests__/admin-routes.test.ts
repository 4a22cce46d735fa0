import { describe, it, expect, vi, beforeEach } from 'vitest';
import { NextRequest } from 'next/server';
import type { RequestContext } from '@expensox/core/auth';

// ── Hoisted mocks ─────────────────────────────────────────────

const { mocks, ctx } = vi.hoisted(() => ({
  mocks: {
    // core
    getCompany: vi.fn(),
    updateCompany: vi.fn(),
    listUsers: vi.fn(),
    createUser: vi.fn(),
    getUser: vi.fn(),
    updateUser: vi.fn(),
    deactivateUser: vi.fn(),
    reactivateUser: vi.fn(),
    listExchangeRates: vi.fn(),
    upsertExchangeRate: vi.fn(),
    // expenses module
    listCategories: vi.fn(),
    createCategory: vi.fn(),
    updateCategory: vi.fn(),
    getBudgetUtilization: vi.fn(),
    createBudget: vi.fn(),
    updateBudget: vi.fn(),
    deleteBudget: vi.fn(),
    listApprovalFlows: vi.fn(),
    createApprovalFlow: vi.fn(),
    getApprovalFlow: vi.fn(),
    updateApprovalFlow: vi.fn(),
    deleteApprovalFlow: vi.fn(),
    listApprovalRules: vi.fn(),
    createApprovalRule: vi.fn(),
    updateApprovalRule: vi.fn(),
    deleteApprovalRule: vi.fn(),
  },
  ctx: {
    tenantId: 'tenant-1',
    requestId: 'req-1',
    user: {
      id: 'adm-1',
      email: 'admin@example.com',
      name: 'Admin',
      tenantId: 'tenant-1',
      role: 'admin',
      managerId: null,
      tenantStatus: 'active',
      membershipStatus: 'active',
    },
  } satisfies RequestContext,
}));

vi.mock('@expensox/core/auth/with-middleware', () => ({
  withMiddleware: (
    handler: (request: NextRequest, context: RequestContext) => Promise<Response>,
    options?: { permission?: string },
  ) =>
    Object.assign((request: NextRequest) => handler(request, ctx), {
      permission: options?.permission,
    }),
}));

vi.mock('@expensox/core/companies', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@expensox/core/companies')>()),
  getCompany: mocks.getCompany,
  updateCompany: mocks.updateCompany,
}));

vi.mock('@expensox/core/users', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@expensox/core/users')>()),
  listUsers: mocks.listUsers,
  createUser: mocks.createUser,
  getUser: mocks.getUser,
  updateUser: mocks.updateUser,
  deactivateUser: mocks.deactivateUser,
  reactivateUser: mocks.reactivateUser,
}));

vi.mock('@expensox/core/currency', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@expensox/core/currency')>()),
  listExchangeRates: mocks.listExchangeRates,
  upsertExchangeRate: mocks.upsertExchangeRate,
}));

vi.mock('@expensox/module-expenses', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@expensox/module-expenses')>()),
  listCategories: mocks.listCategories,
  createCategory: mocks.createCategory,
  updateCategory: mocks.updateCategory,
  getBudgetUtilization: mocks.getBudgetUtilization,
  createBudget: mocks.createBudget,
  updateBudget: mocks.updateBudget,
  deleteBudget: mocks.deleteBudget,
  listApprovalFlows: mocks.listApprovalFlows,
  createApprovalFlow: mocks.createApprovalFlow,
  getApprovalFlow: mocks.getApprovalFlow,
  updateApprovalFlow: mocks.updateApprovalFlow,
  deleteApprovalFlow: mocks.deleteApprovalFlow,
  listApprovalRules: mocks.listApprovalRules,
  createApprovalRule: mocks.createApprovalRule,
  updateApprovalRule: mocks.updateApprovalRule,
  deleteApprovalRule: mocks.deleteApprovalRule,
}));

// ── Route imports (after mocks) ───────────────────────────────

import * as companyRoute from '../app/api/v1/company/route';
import * as usersRoute from '../app/api/v1/users/route';
import * as userRoute from '../app/api/v1/users/[id]/route';
import * as reactivateRoute from '../app/api/v1/users/[id]/reactivate/route';
import * as ratesRoute from '../app/api/v1/exchange-rates/route';
import * as categoriesRoute from '../app/api/v1/categories/route';
import * as categoryRoute from '../app/api/v1/categories/[id]/route';
import * as budgetsRoute from '../app/api/v1/budgets/route';
import * as budgetRoute from '../app/api/v1/budgets/[id]/route';
import * as flowsRoute from '../app/api/v1/approval-flows/route';
import * as flowRoute from '../app/api/v1/approval-flows/[id]/route';
import * as rulesRoute from '../app/api/v1/approval-rules/route';
import * as ruleRoute from '../app/api/v1/approval-rules/[id]/route';

// ── Helpers ───────────────────────────────────────────────────

const BASE = 'http://localhost/api/v1';

function get(path: string): NextRequest {
  return new NextRequest(`${BASE}${path}`);
}

function send(path: string, method: string, body?: unknown): NextRequest {
  return new NextRequest(`${BASE}${path}`, {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

function permissionOf(route: unknown): unknown {
  return typeof route === 'function' ? Reflect.get(route, 'permission') : undefined;
}

beforeEach(() => {
  vi.clearAllMocks();
});

// ═══════════════════════════════════════════════════════════════
// Company & users
// ═══════════════════════════════════════════════════════════════

describe('/api/v1/company', () => {
  it('reads the caller’s company', async () => {
    mocks.getCompany.mockResolvedValue({ id: 'tenant-1', currencyCode: 'USD' });

    const res = await companyRoute.GET(get('/company'));

    expect(await res.json()).toEqual({ data: { id: 'tenant-1', currencyCode: 'USD' } });
    expect(mocks.getCompany).toHaveBeenCalledWith('tenant-1');
  });

  it('updates with an upper-cased currency', async () => {
    mocks.updateCompany.mockResolvedValue({ id: 'tenant-1', currencyCode: 'EUR' });

    await companyRoute.PATCH(send('/company', 'PATCH', { currencyCode: 'eur' }));

    expect(mocks.updateCompany).toHaveBeenCalledWith(ctx, { currencyCode: 'EUR' });
    expect(permissionOf(companyRoute.PATCH)).toBe('company.manage');
  });
});

describe('/api/v1/users', () => {
  it('lists users with filters and paging meta', async () => {
    mocks.listUsers.mockResolvedValue({ items: [{ id: 'usr-1' }], cursor: null, hasMore: false });

    const res = await usersRoute.GET(get('/users?role=manager&limit=10'));

    expect(await res.json()).toEqual({ data: [{ id: 'usr-1' }], meta: { cursor: null, hasMore: false } });
    expect(mocks.listUsers).toHaveBeenCalledWith('tenant-1', { role: 'manager', limit: 10 });
  });

  it('rejects an unknown role filter', async () => {
    await expect(usersRoute.GET(get('/users?role=owner'))).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
  });

  it('creates an employee by default', async () => {
    mocks.createUser.mockResolvedValue({ id: 'usr-2' });

    const res = await usersRoute.POST(
      send('/users', 'POST', { firstName: 'Ben', lastName: 'Ortiz', email: 'ben@example.com' }),
    );

    expect(res.status).toBe(201);
    expect(mocks.createUser).toHaveBeenCalledWith(ctx, {
      firstName: 'Ben',
      lastName: 'Ortiz',
      email: 'ben@example.com',
      role: 'employee',
      isManagerApprover: false,
    });
    expect(permissionOf(usersRoute.POST)).toBe('users.manage');
  });

  it('reads, updates and deactivates by id', async () => {
    mocks.getUser.mockResolvedValue({ id: 'usr-2' });
    mocks.updateUser.mockResolvedValue({ id: 'usr-2', role: 'manager' });
    mocks.deactivateUser.mockResolvedValue({ id: 'usr-2', status: 'inactive' });

    await userRoute.GET(get('/users/usr-2'));
    await userRoute.PATCH(send('/users/usr-2', 'PATCH', { role: 'manager' }));
    const res = await userRoute.DELETE(send('/users/usr-2', 'DELETE'));

    expect(mocks.getUser).toHaveBeenCalledWith('tenant-1', 'usr-2');
    expect(mocks.updateUser).toHaveBeenCalledWith(ctx, 'usr-2', { role: 'manager' });
    expect(await res.json()).toEqual({ data: { id: 'usr-2', status: 'inactive' } });
  });

  it('reactivates a user', async () => {
    mocks.reactivateUser.mockResolvedValue({ id: 'usr-2', status: 'active' });

    await reactivateRoute.POST(send('/users/usr-2/reactivate', 'POST'));

    expect(mocks.reactivateUser).toHaveBeenCalledWith(ctx, 'usr-2');
  });
});

describe('/api/v1/exchange-rates', () => {
  it('filters by currency pair', async () => {
    mocks.listExchangeRates.mockResolvedValue([]);

    await ratesRoute.GET(get('/exchange-rates?fromCurrency=eur&toCurrency=USD'));

    expect(mocks.listExchangeRates).toHaveBeenCalledWith('tenant-1', { fromCurrency: 'EUR', toCurrency: 'USD' });
    expect(permissionOf(ratesRoute.GET)).toBe('currency.view');
  });

  it('stores a manual rate', async () => {
    mocks.upsertExchangeRate.mockResolvedValue({ id: 'fx-1' });

    const res = await ratesRoute.POST(
      send('/exchange-rates', 'POST', { fromCurrency: 'EUR', toCurrency: 'USD', rate: '1.0842', effectiveDate: '2026-03-01' }),
    );

    expect(res.status).toBe(201);
    expect(mocks.upsertExchangeRate).toHaveBeenCalledWith(ctx, {
      fromCurrency: 'EUR',
      toCurrency: 'USD',
      rate: 1.0842,
      effectiveDate: '2026-03-01',
      source: 'manual',
    });
  });

  it('refuses a rate between the same currency', async () => {
    await expect(
      ratesRoute.POST(
        send('/exchange-rates', 'POST', { fromCurrency: 'USD', toCurrency: 'USD', rate: 1, effectiveDate: '2026-03-01' }),
      ),
    ).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      details: [{ field: 'toCurrency', message: 'Currencies must differ' }],
    });
  });
});

// ═══════════════════════════════════════════════════════════════
// Categories & budgets
// ═══════════════════════════════════════════════════════════════

describe('/api/v1/categories', () => {
  it('includes inactive categories on request', async () => {
    mocks.listCategories.mockResolvedValue([]);

    await categoriesRoute.GET(get('/categories?includeInactive=true'));
    await categoriesRoute.GET(get('/categories'));

    expect(mocks.listCategories.mock.calls).toEqual([
      [{ tenantId: 'tenant-1', includeInactive: true }],
      [{ tenantId: 'tenant-1', includeInactive: undefined }],
    ]);
  });

  it('creates and renames', async () => {
    mocks.createCategory.mockResolvedValue({ id: 'cat-1' });
    mocks.updateCategory.mockResolvedValue({ id: 'cat-1' });

    const created = await categoriesRoute.POST(send('/categories', 'POST', { name: ' Travel ' }));
    await categoryRoute.PATCH(send('/categories/cat-1', 'PATCH', { name: 'Trips' }));

    expect(created.status).toBe(201);
    expect(mocks.createCategory).toHaveBeenCalledWith(ctx, { name: 'Travel' });
    expect(mocks.updateCategory).toHaveBeenCalledWith(ctx, 'cat-1', { name: 'Trips' });
    expect(permissionOf(categoriesRoute.GET)).toBe('categories.view');
    expect(permissionOf(categoryRoute.PATCH)).toBe('categories.manage');
  });
});

describe('/api/v1/budgets', () => {
  it('reports utilization as of a date', async () => {
    mocks.getBudgetUtilization.mockResolvedValue([]);

    await budgetsRoute.GET(get('/budgets?asOf=2026-03-31'));

    expect(mocks.getBudgetUtilization).toHaveBeenCalledWith({
      tenantId: 'tenant-1',
      asOf: '2026-03-31',
      categoryId: undefined,
    });
  });

  it('validates the period before creating', async () => {
    await expect(
      budgetsRoute.POST(
        send('/budgets', 'POST', { categoryId: 'cat-1', amount: 500, periodStart: '2026-04-01', periodEnd: '2026-03-01' }),
      ),
    ).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      details: [{ field: 'periodEnd', message: 'Period start must be on or before period end' }],
    });
    expect(mocks.createBudget).not.toHaveBeenCalled();
  });

  it('updates and deletes by id', async () => {
    mocks.updateBudget.mockResolvedValue({ id: 'bud-1' });
    mocks.deleteBudget.mockResolvedValue(undefined);

    await budgetRoute.PATCH(send('/budgets/bud-1', 'PATCH', { amount: 750 }));
    const res = await budgetRoute.DELETE(send('/budgets/bud-1', 'DELETE'));

    expect(mocks.updateBudget).toHaveBeenCalledWith(ctx, 'bud-1', { amount: 750 });
    expect(res.status).toBe(204);
    expect(mocks.deleteBudget).toHaveBeenCalledWith(ctx, 'bud-1');
  });
});

// ═══════════════════════════════════════════════════════════════
// Approval configuration
// ═══════════════════════════════════════════════════════════════

describe('/api/v1/approval-flows', () => {
  it('creates a flow with its steps', async () => {
    mocks.createApprovalFlow.mockResolvedValue({ id: 'flow-1' });

    const res = await flowsRoute.POST(
      send('/approval-flows', 'POST', {
        name: 'Travel',
        isManagerApprover: true,
        steps: [{ sequence: 1, name: 'Finance', approverType: 'role', approverRole: 'admin' }],
      }),
    );

    expect(res.status).toBe(201);
    expect(mocks.createApprovalFlow).toHaveBeenCalledWith(ctx, {
      name: 'Travel',
      isManagerApprover: true,
      isDefault: false,
      steps: [{ sequence: 1, name: 'Finance', approverType: 'role', approverRole: 'admin' }],
    });
  });

  it('rejects a flow with no approvers', async () => {
    await expect(flowsRoute.POST(send('/approval-flows', 'POST', { name: 'Empty' }))).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      details: [{ field: 'steps', message: 'A flow needs at least one step unless the manager approves' }],
    });
  });

  it('reads, patches and deactivates by id', async () => {
    mocks.getApprovalFlow.mockResolvedValue({ id: 'flow-1' });
    mocks.updateApprovalFlow.mockResolvedValue({ id: 'flow-1' });
    mocks.deleteApprovalFlow.mockResolvedValue(undefined);

    await flowRoute.GET(get('/approval-flows/flow-1'));
    await flowRoute.PATCH(send('/approval-flows/flow-1', 'PATCH', { isDefault: true, expectedVersion: 4 }));
    const res = await flowRoute.DELETE(send('/approval-flows/flow-1', 'DELETE'));

    expect(mocks.getApprovalFlow).toHaveBeenCalledWith('tenant-1', 'flow-1');
    expect(mocks.updateApprovalFlow).toHaveBeenCalledWith(ctx, 'flow-1', { isDefault: true, expectedVersion: 4 });
    expect(res.status).toBe(204);
    expect(permissionOf(flowsRoute.GET)).toBe('approvals.configure');
  });
});

describe('/api/v1/approval-rules', () => {
  it('lists a flow’s rules', async () => {
    mocks.listApprovalRules.mockResolvedValue([]);

    await rulesRoute.GET(get('/approval-rules?flowId=flow-1'));

    expect(mocks.listApprovalRules).toHaveBeenCalledWith({
      tenantId: 'tenant-1',
      flowId: 'flow-1',
      includeInactive: undefined,
    });
  });

  it('creates a percentage rule', async () => {
    mocks.createApprovalRule.mockResolvedValue({ id: 'rule-1' });

    await rulesRoute.POST(
      send('/approval-rules', 'POST', { name: 'Majority', ruleType: 'percentage', percentageThreshold: 60 }),
    );

    expect(mocks.createApprovalRule).toHaveBeenCalledWith(ctx, {
      name: 'Majority',
      ruleType: 'percentage',
      percentageThreshold: 60,
    });
  });

  it('requires an approver for a specific rule', async () => {
    await expect(
      rulesRoute.POST(send('/approval-rules', 'POST', { name: 'CFO', ruleType: 'specific' })),
    ).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      details: [{ field: 'specificApproverId', message: 'A specific approver is required' }],
    });
  });

  it('patches and deletes by id', async () => {
    mocks.updateApprovalRule.mockResolvedValue({ id: 'rule-1' });
    mocks.deleteApprovalRule.mockResolvedValue(undefined);

    await ruleRoute.PATCH(send('/approval-rules/rule-1', 'PATCH', { isActive: false }));
    const res = await ruleRoute.DELETE(send('/approval-rules/rule-1', 'DELETE'));

    expect(mocks.updateApprovalRule).toHaveBeenCalledWith(ctx, 'rule-1', { isActive: false });
    expect(res.status).toBe(204);
    expect(mocks.deleteApprovalRule).toHaveBeenCalledWith(ctx, 'rule-1');
  });
});
