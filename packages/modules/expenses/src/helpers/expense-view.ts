import { and, eq } from 'drizzle-orm';
import { expenses } from '@expensox/db';
import type { Database } from '@expensox/db';
import { NotFoundError, generateUlid } from '@expensox/shared';
import type { ExpensePaidBy, ExpenseStatus } from '@expensox/shared';

export type ExpenseRecord = typeof expenses.$inferSelect;

export interface ExpenseView {
  id: string;
  expenseNumber: string;
  submitterUserId: string;
  categoryId: string;
  title: string;
  description: string | null;
  expenseDate: string;
  amount: number;
  currency: string;
  amountInCompanyCurrency: number;
  companyCurrency: string;
  exchangeRate: number;
  paidBy: ExpensePaidBy;
  receiptUrl: string | null;
  status: ExpenseStatus;
  approvalFlowId: string | null;
  currentStep: number | null;
  submittedAt: string | null;
  approvedAt: string | null;
  approvedBy: string | null;
  rejectedAt: string | null;
  rejectedBy: string | null;
  rejectionReason: string | null;
  paidAt: string | null;
  paidByUserId: string | null;
  paymentReference: string | null;
  managerNotes: string | null;
  version: number;
  createdAt: string;
  updatedAt: string;
}

function iso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

export function toExpenseView(row: ExpenseRecord): ExpenseView {
  return {
    id: row.id,
    expenseNumber: row.expenseNumber,
    submitterUserId: row.submitterUserId,
    categoryId: row.categoryId,
    title: row.title,
    description: row.description,
    expenseDate: row.expenseDate,
    amount: Number(row.amount),
    currency: row.currency,
    amountInCompanyCurrency: Number(row.amountInCompanyCurrency),
    companyCurrency: row.companyCurrency,
    exchangeRate: Number(row.exchangeRate),
    paidBy: row.paidBy,
    receiptUrl: row.receiptUrl,
    status: row.status,
    approvalFlowId: row.approvalFlowId,
    currentStep: row.currentStep,
    submittedAt: iso(row.submittedAt),
    approvedAt: iso(row.approvedAt),
    approvedBy: row.approvedBy,
    rejectedAt: iso(row.rejectedAt),
    rejectedBy: row.rejectedBy,
    rejectionReason: row.rejectionReason,
    paidAt: iso(row.paidAt),
    paidByUserId: row.paidByUserId,
    paymentReference: row.paymentReference,
    managerNotes: row.managerNotes,
    version: row.version,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

export async function loadExpense(
  tx: Database,
  tenantId: string,
  expenseId: string,
): Promise<ExpenseRecord> {
  const [row] = await tx
    .select()
    .from(expenses)
    .where(and(eq(expenses.tenantId, tenantId), eq(expenses.id, expenseId)))
    .limit(1);
  if (!row) {
    throw new NotFoundError('Expense', expenseId);
  }
  return row;
}

/** EXP-YYYYMMDD-XXXXXX */
export function generateExpenseNumber(now: Date = new Date()): string {
  const dateStr = now.toISOString().slice(0, 10).replace(/-/g, '');
  const suffix = generateUlid().slice(-6).toUpperCase();
  return `EXP-${dateStr}-${suffix}`;
}
