export { sendEmail } from './send-email';
export {
  escapeHtml,
  otpEmail,
  welcomeEmail,
  approvalRequestedEmail,
  expenseDecisionEmail,
} from './templates';
export type { EmailMessage, ExpenseSummaryForEmail } from './templates';
