import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { RequestContext } from '@expensox/core/auth';
import { MockTx } from '@expensox/db/testing';
import type { Row } from '@expensox/db/testing';

// ── Mocks (hoisted) ─────────────────────────────────────────────

vi.mock('@expensox/db', async (importOriginal) => {
  const original = await importOriginal<typeof import('@expensox/db')>();
  return {
    ...original,
    withTenant: vi.fn((_tenantId: string, cb: (tx: MockTx) => Promise<unknown>) => cb(mockTx)),
  };
});

vi.mock('@expensox/core/events', () => ({
  publishWithOutbox: vi.fn(
    async (_ctx: unknown, fn: (tx: MockTx) => Promise<{ result: unknown; events: unknown[] }>) => {
      const { result, events } = await fn(mockTx);
      lastEmittedEvents = events;
      return result;
    },
  ),
  buildEventFromContext: vi.fn((_ctx: unknown, type: string, data: Record<string, unknown>) => ({
    type,
    data,
  })),
}));

vi.mock('@expensox/core/audit', () => ({
  auditLog: vi.fn(),
}));

// ── Imports ─────────────────────────────────────────────────────

import { approvalRules, expenseApprovals, expenses } from '@expensox/db';
import { auditLog } from '@expensox/core/audit';
import { approveExpense } from '../commands/approve-expense';
import { rejectExpense } from '../commands/reject-expense';
import { overrideExpenseDecision } from '../commands/override-expense-decision';

// ── Helpers ─────────────────────────────────────────────────────

const TENANT_ID = 'tenant-1';
const EMPLOYEE_ID = 'emp-1';
const MANAGER_ID = 'mgr-1';
const ADMIN_ID = 'admin-1';

let mockTx = new MockTx();
let lastEmittedEvents: unknown[] = [];

function eventTypes(): string[] {
  return lastEmittedEvents.map((e) => (e as { type: string }).type);
}

function eventData(index: number): Record<string, unknown> {
  return (lastEmittedEvents[index] as { data: Record<string, unknown> }).data;
}

function makeCtx(userId: string, role: 'admin' | 'manager' | 'employee'): RequestContext {
  return {
    tenantId: TENANT_ID,
    requestId: 'req-1',
    user: {
      id: userId,
      email: `${userId}@example.com`,
      name: userId,
      tenantId: TENANT_ID,
      role,
      managerId: null,
      tenantStatus: 'active',
      membershipStatus: 'active',
    },
  };
}

function makeExpense(overrides: Row = {}): Row {
  return {
    id: 'exp-1',
    tenantId: TENANT_ID,
    expenseNumber: 'EXP-20260310-AB12CD',
    submitterUserId: EMPLOYEE_ID,
    categoryId: 'cat-1',
    title: 'Conference hotel',
    description: null,
    expenseDate: '2026-03-10',
    amount: '420.00',
    currency: 'USD',
    amountInCompanyCurrency: '420.00',
    companyCurrency: 'USD',
    exchangeRate: '1',
    paidBy: 'employee',
    receiptUrl: null,
    status: 'pending',
    approvalFlowId: null,
    currentStep: 1,
    submittedAt: new Date('2026-03-11T09:00:00Z'),
    approvedAt: null,
    approvedBy: null,
    rejectedAt: null,
    rejectedBy: null,
    rejectionReason: null,
    paidAt: null,
    paidByUserId: null,
    paymentReference: null,
    managerNotes: null,
    clientRequestId: null,
    version: 2,
    createdAt: new Date('2026-03-10T12:00:00Z'),
    updatedAt: new Date('2026-03-11T09:00:00Z'),
    ...overrides,
  };
}

function managerStep(overrides: Row = {}): Row {
  return {
    id: 'apr-1',
    stepNumber: 1,
    stepName: 'Manager',
    approverType: 'manager',
    approverUserId: MANAGER_ID,
    approverRole: null,
    status: 'pending',
    actedBy: null,
    comment: null,
    actedAt: null,
    ...overrides,
  };
}

function financeStep(overrides: Row = {}): Row {
  return {
    id: 'apr-2',
    stepNumber: 2,
    stepName: 'Finance',
    approverType: 'role',
    approverUserId: null,
    approverRole: 'admin',
    status: 'waiting',
    actedBy: null,
    comment: null,
    actedAt: null,
    ...overrides,
  };
}

function queueState(expense: Row, approvals: Row[], rules: Row[] = []) {
  mockTx
    .queueSelect(expenses, [expense])
    .queueSelect(expenseApprovals, approvals)
    .queueSelect(approvalRules, rules);
}

beforeEach(() => {
  vi.clearAllMocks();
  mockTx = new MockTx();
  lastEmittedEvents = [];
});

// ── approveExpense ──────────────────────────────────────────────

describe('approveExpense', () => {
  it('advances to the next step after the manager approves', async () => {
    queueState(makeExpense(), [managerStep(), financeStep()]);
    mockTx.queueReturning(expenses, [makeExpense({ status: 'in_progress', currentStep: 2, version: 3 })]);

    const result = await approveExpense(makeCtx(MANAGER_ID, 'manager'), {
      expenseId: 'exp-1',
      comment: 'Looks fine',
    });

    expect(result.outcome.status).toBe('in_progress');
    expect(result.expense.currentStep).toBe(2);

    const approvalSets = mockTx.updatesOf(expenseApprovals);
    expect(approvalSets).toHaveLength(2);
    expect(approvalSets[0]).toMatchObject({ status: 'approved', actedBy: MANAGER_ID, comment: 'Looks fine' });
    expect(approvalSets[1]).toMatchObject({ status: 'pending', actedBy: null });

    const expenseSet = mockTx.updatesOf(expenses)[0];
    expect(expenseSet).toMatchObject({
      status: 'in_progress',
      currentStep: 2,
      managerNotes: 'Looks fine',
      version: 3,
    });
    expect(expenseSet).not.toHaveProperty('approvedAt');

    expect(eventTypes()).toEqual(['expense.approval.recorded.v1', 'expense.approval.requested.v1']);
    expect(eventData(1)).toMatchObject({ stepNumber: 2, approverRole: 'admin' });
    expect(auditLog).toHaveBeenCalledWith(expect.anything(), 'expense.step_approved', 'expense', 'exp-1', undefined, {
      stepNumber: 1,
      stepName: 'Manager',
      comment: 'Looks fine',
      status: 'in_progress',
      ruleId: null,
    });
  });

  it('approves the expense on the last step', async () => {
    queueState(makeExpense({ status: 'in_progress', currentStep: 2 }), [
      managerStep({ status: 'approved', actedBy: MANAGER_ID, actedAt: new Date('2026-03-11T10:00:00Z') }),
      financeStep({ status: 'pending' }),
    ]);
    mockTx.queueReturning(expenses, [makeExpense({ status: 'approved', currentStep: null, version: 3 })]);

    const result = await approveExpense(makeCtx(ADMIN_ID, 'admin'), { expenseId: 'exp-1' });

    expect(result.outcome.finalDecision).toBe('approved');
    expect(mockTx.updatesOf(expenses)[0]).toMatchObject({
      status: 'approved',
      currentStep: null,
      approvedBy: ADMIN_ID,
    });
    expect(mockTx.updatesOf(expenses)[0]).not.toHaveProperty('managerNotes');
    expect(eventTypes()).toEqual(['expense.approval.recorded.v1', 'expense.expense.approved.v1']);
    expect(auditLog).toHaveBeenCalledWith(
      expect.anything(),
      'expense.approved',
      'expense',
      'exp-1',
      undefined,
      expect.objectContaining({ stepNumber: 2, status: 'approved' }),
    );
  });

  it('lets a specific approver finish the expense out of turn', async () => {
    queueState(
      makeExpense(),
      [managerStep(), financeStep()],
      [
        {
          id: 'rule-1',
          name: 'CFO sign-off',
          flowId: null,
          ruleType: 'specific',
          percentageThreshold: null,
          specificApproverId: ADMIN_ID,
          isActive: true,
        },
      ],
    );
    mockTx.queueReturning(expenses, [makeExpense({ status: 'approved', currentStep: null, version: 3 })]);

    const result = await approveExpense(makeCtx(ADMIN_ID, 'admin'), { expenseId: 'exp-1' });

    expect(result.outcome.rule?.ruleId).toBe('rule-1');
    const approvalSets = mockTx.updatesOf(expenseApprovals);
    expect(approvalSets.map((s) => s.status)).toEqual(['approved', 'skipped']);
    expect(eventData(1)).toMatchObject({
      ruleId: 'rule-1',
      reason: 'CFO sign-off: approved by the designated approver',
    });
  });

  it('refuses the submitter', async () => {
    queueState(makeExpense(), [managerStep(), financeStep()]);

    await expect(
      approveExpense(makeCtx(EMPLOYEE_ID, 'employee'), { expenseId: 'exp-1' }),
    ).rejects.toMatchObject({
      code: 'AUTHORIZATION_DENIED',
      message: 'You cannot approve or reject your own expense',
    });
    expect(mockTx.updates).toEqual([]);
  });

  it('refuses an approver whose step is not current', async () => {
    queueState(makeExpense(), [managerStep(), financeStep()]);

    await expect(
      approveExpense(makeCtx(ADMIN_ID, 'admin'), { expenseId: 'exp-1' }),
    ).rejects.toMatchObject({ message: 'You are not an approver for the current step' });
  });

  it('reports a concurrent decision when the version guard fails', async () => {
    queueState(makeExpense(), [managerStep(), financeStep()]);

    await expect(
      approveExpense(makeCtx(MANAGER_ID, 'manager'), { expenseId: 'exp-1' }),
    ).rejects.toMatchObject({ code: 'CONFLICT' });
  });
});

// ── rejectExpense ───────────────────────────────────────────────

describe('rejectExpense', () => {
  it('rejects and skips the remaining steps', async () => {
    queueState(makeExpense(), [managerStep(), financeStep()]);
    mockTx.queueReturning(expenses, [makeExpense({ status: 'rejected', currentStep: null, version: 3 })]);

    const result = await rejectExpense(makeCtx(MANAGER_ID, 'manager'), {
      expenseId: 'exp-1',
      comment: 'No receipt attached',
    });

    expect(result.outcome.finalDecision).toBe('rejected');
    expect(mockTx.updatesOf(expenseApprovals).map((s) => s.status)).toEqual(['rejected', 'skipped']);
    expect(mockTx.updatesOf(expenses)[0]).toMatchObject({
      status: 'rejected',
      rejectedBy: MANAGER_ID,
      rejectionReason: 'No receipt attached',
      managerNotes: 'No receipt attached',
    });
    expect(eventTypes()).toEqual(['expense.approval.recorded.v1', 'expense.expense.rejected.v1']);
    expect(eventData(1)).toMatchObject({ reason: 'No receipt attached', decidedBy: MANAGER_ID });
  });

  it('requires a comment', async () => {
    await expect(
      rejectExpense(makeCtx(MANAGER_ID, 'manager'), { expenseId: 'exp-1', comment: '  ' }),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
  });

  it('refuses a second decision by the same approver', async () => {
    queueState(makeExpense({ status: 'in_progress', currentStep: 2 }), [
      managerStep({ status: 'approved', actedBy: MANAGER_ID }),
      financeStep({ status: 'pending', approverType: 'manager', approverUserId: MANAGER_ID, approverRole: null }),
    ]);

    await expect(
      rejectExpense(makeCtx(MANAGER_ID, 'manager'), { expenseId: 'exp-1', comment: 'Changed my mind' }),
    ).rejects.toMatchObject({ code: 'CONFLICT' });
  });

  it('refuses to decide on an expense that is already final', async () => {
    queueState(makeExpense({ status: 'approved', currentStep: null }), [
      managerStep({ status: 'approved', actedBy: MANAGER_ID }),
    ]);

    await expect(
      rejectExpense(makeCtx(ADMIN_ID, 'admin'), { expenseId: 'exp-1', comment: 'Too late' }),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
  });
});

// ── overrideExpenseDecision ─────────────────────────────────────

describe('overrideExpenseDecision', () => {
  it('closes every open step and records the override', async () => {
    queueState(makeExpense(), [managerStep(), financeStep()]);
    mockTx.queueReturning(expenses, [makeExpense({ status: 'rejected', currentStep: null, version: 3 })]);

    const result = await overrideExpenseDecision(makeCtx(ADMIN_ID, 'admin'), {
      expenseId: 'exp-1',
      decision: 'reject',
      comment: 'Duplicate of EXP-20260301-ZZ9Y8X',
    });

    expect(result.outcome.status).toBe('rejected');
    expect(mockTx.updatesOf(expenseApprovals).map((s) => s.status)).toEqual(['skipped', 'skipped']);
    const [entry] = mockTx.insertsInto(expenseApprovals);
    expect(entry).toMatchObject({
      tenantId: TENANT_ID,
      expenseId: 'exp-1',
      stepNumber: 0,
      stepName: 'Admin override',
      approverRole: 'admin',
      status: 'rejected',
      actedBy: ADMIN_ID,
    });
    expect(mockTx.updatesOf(expenses)[0]).toMatchObject({
      rejectedBy: ADMIN_ID,
      rejectionReason: 'Duplicate of EXP-20260301-ZZ9Y8X',
    });
    expect(eventData(1)).toMatchObject({ override: true });
    expect(auditLog).toHaveBeenCalledWith(
      expect.anything(),
      'expense.override_rejected',
      'expense',
      'exp-1',
      undefined,
      expect.objectContaining({ stepNumber: 0, stepName: 'Admin override' }),
    );
  });

  it('is reserved for admins', async () => {
    await expect(
      overrideExpenseDecision(makeCtx(MANAGER_ID, 'manager'), {
        expenseId: 'exp-1',
        decision: 'approve',
        comment: 'Urgent',
      }),
    ).rejects.toMatchObject({ code: 'AUTHORIZATION_DENIED' });
  });

  it('never lets admins override their own expense', async () => {
    queueState(makeExpense({ submitterUserId: ADMIN_ID }), [managerStep()]);

    await expect(
      overrideExpenseDecision(makeCtx(ADMIN_ID, 'admin'), {
        expenseId: 'exp-1',
        decision: 'approve',
        comment: 'Urgent',
      }),
    ).rejects.toMatchObject({ code: 'AUTHORIZATION_DENIED' });
  });
});
