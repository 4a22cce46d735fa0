import { describe, it, expect } from 'vitest';
import { summarizeBudget, defaultBudgetPeriod } from '../helpers/budget-math';
import { fillMonthlyTrend, lastTwelveMonths, totalsByStatus } from '../helpers/summary';
import { canViewExpense } from '../helpers/access';
import { toIso, toIsoOrNull } from '../helpers/sql-values';

describe('summarizeBudget', () => {
  it('reports remaining budget and utilization', () => {
    expect(summarizeBudget({ amount: 2000 }, 500.25)).toEqual({
      spent: 500.25,
      remaining: 1499.75,
      utilizationPercent: 25,
      isOverBudget: false,
    });
  });

  it('flags spending beyond the budget', () => {
    expect(summarizeBudget({ amount: 300 }, 450)).toEqual({
      spent: 450,
      remaining: -150,
      utilizationPercent: 150,
      isOverBudget: true,
    });
  });

  it('reports zero utilization for a zero budget', () => {
    expect(summarizeBudget({ amount: 0 }, 0).utilizationPercent).toBe(0);
  });

  it('defaults to the calendar month', () => {
    expect(defaultBudgetPeriod(new Date('2026-02-14T12:00:00Z'))).toEqual({
      periodStart: '2026-02-01',
      periodEnd: '2026-02-28',
    });
  });
});

describe('summary helpers', () => {
  it('lists twelve months ending with the current one', () => {
    const months = lastTwelveMonths(new Date('2026-03-10T00:00:00Z'));
    expect(months).toHaveLength(12);
    expect(months[0]).toBe('2025-04');
    expect(months[11]).toBe('2026-03');
  });

  it('fills every status and ignores unknown ones', () => {
    const totals = totalsByStatus([
      { status: 'approved', count: 2, total: 100.1 },
      { status: 'approved', count: 1, total: 0.2 },
      { status: 'archived', count: 9, total: 999 },
    ]);
    expect(totals.approved).toEqual({ count: 3, total: 100.3 });
    expect(totals.draft).toEqual({ count: 0, total: 0 });
    expect(Object.keys(totals)).toEqual(['draft', 'pending', 'in_progress', 'approved', 'rejected', 'paid']);
  });

  it('fills months without expenses with zeroes', () => {
    expect(fillMonthlyTrend([{ month: '2026-02', count: 4, total: 80 }], ['2026-01', '2026-02'])).toEqual([
      { month: '2026-01', count: 0, total: 0 },
      { month: '2026-02', count: 4, total: 80 },
    ]);
  });
});

describe('canViewExpense', () => {
  const expense = {
    submitterUserId: 'emp-1',
    submitter: { managerId: 'mgr-1' },
    approvals: [
      { approverUserId: 'mgr-1', approverRole: null, status: 'approved', actedBy: 'mgr-1' },
      { approverUserId: null, approverRole: 'admin', status: 'waiting', actedBy: null },
      { approverUserId: 'usr-cfo', approverRole: null, status: 'waiting', actedBy: null },
    ],
  };

  it('lets admins, the submitter and their manager view', () => {
    expect(canViewExpense({ id: 'adm-9', role: 'admin' }, expense)).toBe(true);
    expect(canViewExpense({ id: 'emp-1', role: 'employee' }, expense)).toBe(true);
    expect(canViewExpense({ id: 'mgr-1', role: 'manager' }, { ...expense, approvals: [] })).toBe(true);
  });

  it('lets a named approver view before their turn', () => {
    expect(canViewExpense({ id: 'usr-cfo', role: 'manager' }, expense)).toBe(true);
  });

  it('hides the expense from unrelated users', () => {
    expect(canViewExpense({ id: 'emp-2', role: 'employee' }, expense)).toBe(false);
    expect(canViewExpense({ id: 'mgr-2', role: 'manager' }, expense)).toBe(false);
  });

  it('shows a role step only once it is reached', () => {
    const reached = {
      ...expense,
      approvals: [{ approverUserId: null, approverRole: 'manager', status: 'pending', actedBy: null }],
    };
    expect(canViewExpense({ id: 'mgr-2', role: 'manager' }, reached)).toBe(true);
  });
});

describe('sql values', () => {
  it('normalizes timestamps to ISO strings', () => {
    expect(toIso('2026-03-01T10:15:00Z')).toBe('2026-03-01T10:15:00.000Z');
    expect(toIso(new Date(Date.UTC(2026, 2, 1)))).toBe('2026-03-01T00:00:00.000Z');
    expect(toIsoOrNull(null)).toBeNull();
  });
});
