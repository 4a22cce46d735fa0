import type { UserRole } from '@expensox/shared';

/**
 * Role → granted permissions. `*` grants everything, `module.*` grants every
 * permission of that module.
 */
export const ROLE_PERMISSIONS: Readonly<Record<UserRole, readonly string[]>> = {
  admin: ['*'],
  manager: [
    'expenses.view',
    'expenses.create',
    'expenses.view_team',
    'approvals.view',
    'approvals.decide',
    'reports.view',
    'currency.view',
    'categories.view',
  ],
  employee: ['expenses.view', 'expenses.create', 'currency.view', 'categories.view'],
};

export function matchPermission(granted: string, requested: string): boolean {
  if (granted === '*') return true;
  if (granted === requested) return true;
  if (granted.endsWith('.*')) {
    const grantedModule = granted.slice(0, -2);
    const requestedModule = requested.split('.')[0];
    return grantedModule === requestedModule;
  }
  return false;
}

export function getRolePermissions(role: UserRole): readonly string[] {
  return ROLE_PERMISSIONS[role];
}

export function hasPermission(role: UserRole, permission: string): boolean {
  return getRolePermissions(role).some((granted) => matchPermission(granted, permission));
}
