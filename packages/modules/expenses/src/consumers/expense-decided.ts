import { withTenant } from '@expensox/db';
import { EXPENSE_EVENTS } from '@expensox/shared';
import type { EventEnvelope } from '@expensox/shared';
import { expenseDecisionEmail, sendEmail } from '@expensox/core/email';
import { errorFields, logger } from '@expensox/core/observability';
import { z } from 'zod';
import { loadExpenseEmailContext } from './load-email-context';

const expenseDecidedSchema = z.object({
  expenseId: z.string(),
  submitterUserId: z.string(),
  decidedBy: z.string(),
});

const CONSUMER_NAME = 'expenses.expenseDecided';

/** Handles expense approved/rejected events: tells the submitter the outcome. */
export async function handleExpenseDecided(event: EventEnvelope): Promise<void> {
  const parsed = expenseDecidedSchema.safeParse(event.data);
  if (!parsed.success) {
    logger.error('Invalid event payload', {
      consumer: CONSUMER_NAME,
      eventId: event.eventId,
      issues: parsed.error.issues,
    });
    return;
  }
  const data = parsed.data;
  const decision = event.eventType === EXPENSE_EVENTS.REJECTED ? 'rejected' : 'approved';

  const context = await withTenant(event.tenantId, (tx) =>
    loadExpenseEmailContext(tx, event.tenantId, data.expenseId),
  );
  if (!context) {
    logger.warn('Expense not found for decision email', {
      consumer: CONSUMER_NAME,
      tenantId: event.tenantId,
      expenseId: data.expenseId,
    });
    return;
  }

  const comment = decision === 'rejected' ? context.rejectionReason : context.managerNotes;
  const message = expenseDecisionEmail(context.submitter.name, context.summary, decision, comment);
  try {
    await sendEmail(context.submitter.email, message.subject, message.html);
  } catch (err) {
    logger.error('Decision email failed', {
      consumer: CONSUMER_NAME,
      tenantId: event.tenantId,
      expenseId: data.expenseId,
      error: errorFields(err),
    });
  }
}
