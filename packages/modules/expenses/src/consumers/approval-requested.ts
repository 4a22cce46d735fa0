import { and, eq, ne } from 'drizzle-orm';
import { users, withTenant } from '@expensox/db';
import type { EventEnvelope } from '@expensox/shared';
import { approvalRequestedEmail, sendEmail } from '@expensox/core/email';
import { errorFields, logger } from '@expensox/core/observability';
import { z } from 'zod';
import { loadExpenseEmailContext } from './load-email-context';
import type { Recipient } from './load-email-context';

const approvalRequestedSchema = z.object({
  expenseId: z.string(),
  submitterUserId: z.string(),
  stepNumber: z.number(),
  stepName: z.string(),
  approverUserId: z.string().nullable(),
  approverRole: z.string().nullable(),
});

const CONSUMER_NAME = 'expenses.approvalRequested';

/**
 * Handles expense.approval.requested.v1: emails whoever can act on the step,
 * the named approver or every active holder of the step's role. A failed send
 * is logged and does not stop the others.
 */
export async function handleApprovalRequested(event: EventEnvelope): Promise<void> {
  const parsed = approvalRequestedSchema.safeParse(event.data);
  if (!parsed.success) {
    logger.error('Invalid event payload', {
      consumer: CONSUMER_NAME,
      eventId: event.eventId,
      issues: parsed.error.issues,
    });
    return;
  }
  const data = parsed.data;

  const loaded = await withTenant(event.tenantId, async (tx) => {
    const context = await loadExpenseEmailContext(tx, event.tenantId, data.expenseId);
    if (!context) return null;

    const scope = data.approverUserId
      ? eq(users.id, data.approverUserId)
      : data.approverRole
        ? eq(users.role, data.approverRole)
        : null;
    if (!scope) return { context, recipients: [] };

    const rows = await tx
      .select({ id: users.id, email: users.email, firstName: users.firstName, lastName: users.lastName })
      .from(users)
      .where(
        and(
          eq(users.tenantId, event.tenantId),
          eq(users.status, 'active'),
          ne(users.id, data.submitterUserId),
          scope,
        ),
      );
    const recipients: Recipient[] = rows.map((r) => ({
      id: r.id,
      email: r.email,
      name: `${r.firstName} ${r.lastName}`,
    }));
    return { context, recipients };
  });

  if (!loaded) {
    logger.warn('Expense not found for approval request', {
      consumer: CONSUMER_NAME,
      tenantId: event.tenantId,
      expenseId: data.expenseId,
    });
    return;
  }

  for (const recipient of loaded.recipients) {
    const message = approvalRequestedEmail(recipient.name, loaded.context.summary, data.stepName);
    try {
      await sendEmail(recipient.email, message.subject, message.html);
    } catch (err) {
      logger.error('Approval request email failed', {
        consumer: CONSUMER_NAME,
        tenantId: event.tenantId,
        expenseId: data.expenseId,
        userId: recipient.id,
        error: errorFields(err),
      });
    }
  }
}
