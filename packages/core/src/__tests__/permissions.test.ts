import { describe, it, expect } from 'vitest';
import { AuthorizationError } from '@expensox/shared';
import type { UserRole } from '@expensox/shared';
import {
  getRolePermissions,
  hasPermission,
  matchPermission,
  requirePermission,
} from '../permissions';
import type { RequestContext } from '../auth/context';

function ctxFor(role: UserRole): RequestContext {
  return {
    user: {
      id: 'usr_1',
      email: 'user@example.com',
      name: 'Test User',
      tenantId: 'tnt_1',
      role,
      managerId: null,
      tenantStatus: 'active',
      membershipStatus: 'active',
    },
    tenantId: 'tnt_1',
    requestId: 'req_1',
  };
}

describe('matchPermission', () => {
  it('grants everything for *', () => {
    expect(matchPermission('*', 'approvals.configure')).toBe(true);
  });

  it('grants a whole module for module.*', () => {
    expect(matchPermission('expenses.*', 'expenses.pay')).toBe(true);
    expect(matchPermission('expenses.*', 'approvals.decide')).toBe(false);
  });

  it('requires an exact match otherwise', () => {
    expect(matchPermission('expenses.view', 'expenses.view')).toBe(true);
    expect(matchPermission('expenses.view', 'expenses.view_team')).toBe(false);
  });
});

describe('role matrix', () => {
  it('gives admins every permission', () => {
    expect(getRolePermissions('admin')).toEqual(['*']);
    expect(hasPermission('admin', 'users.manage')).toBe(true);
    expect(hasPermission('admin', 'approvals.override')).toBe(true);
  });

  it('lets managers decide approvals but not configure them', () => {
    expect(hasPermission('manager', 'approvals.decide')).toBe(true);
    expect(hasPermission('manager', 'expenses.view_team')).toBe(true);
    expect(hasPermission('manager', 'approvals.configure')).toBe(false);
    expect(hasPermission('manager', 'expenses.pay')).toBe(false);
  });

  it('limits employees to their own expenses', () => {
    expect(hasPermission('employee', 'expenses.create')).toBe(true);
    expect(hasPermission('employee', 'categories.view')).toBe(true);
    expect(hasPermission('employee', 'approvals.decide')).toBe(false);
    expect(hasPermission('employee', 'expenses.view_team')).toBe(false);
    expect(hasPermission('employee', 'budgets.view')).toBe(false);
  });
});

describe('requirePermission', () => {
  it('resolves when the role grants the permission', async () => {
    await expect(requirePermission('approvals.decide')(ctxFor('manager'))).resolves.toBeUndefined();
  });

  it('throws AuthorizationError naming the missing permission', async () => {
    const check = requirePermission('users.manage')(ctxFor('employee'));
    await expect(check).rejects.toBeInstanceOf(AuthorizationError);
    await expect(requirePermission('users.manage')(ctxFor('employee'))).rejects.toThrow(
      'Missing required permission: users.manage',
    );
  });
});
