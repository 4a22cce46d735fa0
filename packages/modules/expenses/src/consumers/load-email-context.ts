import { and, eq } from 'drizzle-orm';
import { expenses, users } from '@expensox/db';
import type { Database } from '@expensox/db';
import type { ExpenseSummaryForEmail } from '@expensox/core/email';

export interface Recipient {
  id: string;
  email: string;
  name: string;
}

export interface ExpenseEmailContext {
  summary: ExpenseSummaryForEmail;
  submitter: Recipient;
  rejectionReason: string | null;
  managerNotes: string | null;
}

/** The expense and its submitter, or null when either is gone. */
export async function loadExpenseEmailContext(
  tx: Database,
  tenantId: string,
  expenseId: string,
): Promise<ExpenseEmailContext | null> {
  const [row] = await tx
    .select({
      expenseNumber: expenses.expenseNumber,
      title: expenses.title,
      amount: expenses.amount,
      currency: expenses.currency,
      rejectionReason: expenses.rejectionReason,
      managerNotes: expenses.managerNotes,
      submitterId: users.id,
      submitterEmail: users.email,
      submitterFirstName: users.firstName,
      submitterLastName: users.lastName,
    })
    .from(expenses)
    .innerJoin(users, eq(users.id, expenses.submitterUserId))
    .where(and(eq(expenses.tenantId, tenantId), eq(expenses.id, expenseId)))
    .limit(1);
  if (!row) return null;

  const submitterName = `${row.submitterFirstName} ${row.submitterLastName}`;
  return {
    summary: {
      expenseNumber: row.expenseNumber,
      title: row.title,
      amount: Number(row.amount),
      currency: row.currency,
      submitterName,
    },
    submitter: { id: row.submitterId, email: row.submitterEmail, name: submitterName },
    rejectionReason: row.rejectionReason,
    managerNotes: row.managerNotes,
  };
}
