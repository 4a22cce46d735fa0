// ── Expense Statuses ────────────────────────────────────────────────────────

export const EXPENSE_STATUS_VALUES = [
  'draft',
  'pending',
  'in_progress',
  'approved',
  'rejected',
  'paid',
] as const;

export type ExpenseStatus = (typeof EXPENSE_STATUS_VALUES)[number];

/** Statuses that still have an approver step to act on. */
export const OPEN_EXPENSE_STATUSES: readonly ExpenseStatus[] = ['pending', 'in_progress'];

// ── Paid By ─────────────────────────────────────────────────────────────────

export const EXPENSE_PAID_BY = {
  employee: { label: 'Employee', description: 'Paid out of pocket, to be reimbursed' },
  company: { label: 'Company', description: 'Paid with company funds' },
} as const;

export type ExpensePaidBy = keyof typeof EXPENSE_PAID_BY;

// ── Status transition validation ────────────────────────────────────────────

export const EXPENSE_STATUS_TRANSITIONS: Record<ExpenseStatus, ExpenseStatus[]> = {
  draft: ['pending', 'approved'],
  pending: ['in_progress', 'approved', 'rejected'],
  in_progress: ['approved', 'rejected'],
  approved: ['paid'],
  rejected: ['draft'], // edited before resubmission
  paid: [],
};

export function canTransition(from: ExpenseStatus, to: ExpenseStatus): boolean {
  return EXPENSE_STATUS_TRANSITIONS[from].includes(to);
}

export function isExpenseStatus(value: string): value is ExpenseStatus {
  return EXPENSE_STATUS_VALUES.some((status) => status === value);
}
