import { OTP_EMAIL_SUBJECTS, formatCurrencyAmount } from '@expensox/shared';
import type { OtpPurpose } from '@expensox/shared';

export interface EmailMessage {
  subject: string;
  html: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function layout(title: string, body: string): string {
  return `
<!DOCTYPE html>
<html>
<head><meta charset="utf-8"></head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; max-width: 520px; margin: 0 auto; padding: 24px; color: #1a1a1a;">
  <h2 style="margin: 0 0 16px; font-size: 20px;">${escapeHtml(title)}</h2>
  ${body}
</body>
</html>`.trim();
}

const OTP_INTROS: Record<OtpPurpose, string> = {
  signup: 'Use this code to verify your email address and finish creating your account.',
  login: 'Use this code to finish signing in.',
  password_reset: 'Use this code to reset your password.',
  two_factor: 'Use this code to finish signing in.',
};

export function otpEmail(
  code: string,
  purpose: OtpPurpose,
  name: string,
  expiryMinutes: number,
): EmailMessage {
  return {
    subject: `${code} is your ExpensoX code: ${OTP_EMAIL_SUBJECTS[purpose]}`,
    html: layout(
      OTP_EMAIL_SUBJECTS[purpose],
      `
  <p style="margin: 0 0 8px; font-size: 15px;">Hi ${escapeHtml(name)},</p>
  <p style="margin: 0 0 16px; font-size: 15px;">${OTP_INTROS[purpose]}</p>
  <div style="background: #f4f4f5; border-radius: 8px; padding: 24px; text-align: center; margin: 0 0 16px;">
    <span style="font-size: 32px; font-weight: 700; letter-spacing: 6px; font-family: monospace;">${escapeHtml(code)}</span>
  </div>
  <p style="margin: 0; font-size: 13px; color: #71717a;">
    This code expires in ${expiryMinutes} minutes. If you didn't request it, ignore this email.
  </p>`,
    ),
  };
}

export function welcomeEmail(
  name: string,
  companyName: string,
  temporaryPassword: string | null,
): EmailMessage {
  const passwordLine = temporaryPassword
    ? `<p style="margin: 0 0 8px; font-size: 15px;">Your temporary password is <strong style="font-family: monospace;">${escapeHtml(temporaryPassword)}</strong>. Change it after your first sign-in.</p>`
    : '';
  return {
    subject: `You've been added to ${companyName} on ExpensoX`,
    html: layout(
      'Welcome to ExpensoX',
      `
  <p style="margin: 0 0 8px; font-size: 15px;">Hi ${escapeHtml(name)},</p>
  <p style="margin: 0 0 8px; font-size: 15px;">An administrator at <strong>${escapeHtml(companyName)}</strong> created an account for you.</p>
  ${passwordLine}`,
    ),
  };
}

export interface ExpenseSummaryForEmail {
  expenseNumber: string;
  title: string;
  amount: number;
  currency: string;
  submitterName: string;
}

export function approvalRequestedEmail(
  approverName: string,
  expense: ExpenseSummaryForEmail,
  stepName: string,
): EmailMessage {
  const amount = formatCurrencyAmount(expense.amount, expense.currency);
  return {
    subject: `Approval needed: ${expense.expenseNumber} (${amount})`,
    html: layout(
      'An expense is waiting for your approval',
      `
  <p style="margin: 0 0 8px; font-size: 15px;">Hi ${escapeHtml(approverName)},</p>
  <p style="margin: 0 0 8px; font-size: 15px;">
    ${escapeHtml(expense.submitterName)} submitted <strong>${escapeHtml(expense.title)}</strong>
    (${escapeHtml(expense.expenseNumber)}) for ${escapeHtml(amount)}.
  </p>
  <p style="margin: 0; font-size: 15px;">You are the approver for the <strong>${escapeHtml(stepName)}</strong> step.</p>`,
    ),
  };
}

export function expenseDecisionEmail(
  submitterName: string,
  expense: ExpenseSummaryForEmail,
  decision: 'approved' | 'rejected',
  comment: string | null,
): EmailMessage {
  const amount = formatCurrencyAmount(expense.amount, expense.currency);
  const commentLine = comment
    ? `<p style="margin: 0 0 8px; font-size: 15px;">Comment: <em>${escapeHtml(comment)}</em></p>`
    : '';
  return {
    subject: `Expense ${expense.expenseNumber} was ${decision}`,
    html: layout(
      decision === 'approved' ? 'Your expense was approved' : 'Your expense was rejected',
      `
  <p style="margin: 0 0 8px; font-size: 15px;">Hi ${escapeHtml(submitterName)},</p>
  <p style="margin: 0 0 8px; font-size: 15px;">
    <strong>${escapeHtml(expense.title)}</strong> (${escapeHtml(expense.expenseNumber)}, ${escapeHtml(amount)}) was ${decision}.
  </p>
  ${commentLine}`,
    ),
  };
}
