import { getAppConfig } from '../config';
import { logger } from '../observability/logger';

/**
 * Sends through the Resend HTTP API with `fetch` when RESEND_API_KEY is set.
 * Without a key the message is logged instead.
 */

const RESEND_API_URL = 'https://api.resend.com/emails';

export async function sendEmail(
  to: string,
  subject: string,
  html: string,
): Promise<void> {
  const { email } = getAppConfig();

  if (!email.resendApiKey) {
    logger.info('Email (dev mode, no RESEND_API_KEY)', { to, subject, html });
    return;
  }

  const res = await fetch(RESEND_API_URL, {
    method: 'POST',
    headers: {
      'Authorization': `Bearer ${email.resendApiKey}`,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({ from: email.from, to: [to], subject, html }),
  });

  if (!res.ok) {
    const body = await res.text().catch(() => '(no body)');
    logger.error('Resend API error', { status: res.status, body, to, subject });
    throw new Error(`Email send failed: ${res.status}`);
  }
}
