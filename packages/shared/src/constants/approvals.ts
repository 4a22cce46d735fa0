export const APPROVER_TYPES = ['user', 'role', 'manager'] as const;
export type ApproverType = (typeof APPROVER_TYPES)[number];

export const APPROVAL_DECISION_STATUSES = [
  'waiting',
  'pending',
  'approved',
  'rejected',
  'skipped',
] as const;
export type ApprovalDecisionStatus = (typeof APPROVAL_DECISION_STATUSES)[number];

export const APPROVAL_RULE_TYPES = ['percentage', 'specific', 'hybrid'] as const;
export type ApprovalRuleType = (typeof APPROVAL_RULE_TYPES)[number];

/** Sentinel actor recorded when an expense is approved with no approver to route to. */
export const SYSTEM_APPROVER = 'system';
