export const USER_ROLES = ['admin', 'manager', 'employee'] as const;

export type UserRole = (typeof USER_ROLES)[number];

/** Roles that may be named as an approver on a flow step or as a user's manager. */
export const APPROVER_ROLES = ['admin', 'manager'] as const;

export type ApproverRole = (typeof APPROVER_ROLES)[number];

export function isUserRole(value: string): value is UserRole {
  return USER_ROLES.some((role) => role === value);
}

export function isApproverRole(value: string): value is ApproverRole {
  return APPROVER_ROLES.some((role) => role === value);
}
