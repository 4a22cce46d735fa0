import { createHash, randomInt, timingSafeEqual } from 'node:crypto';
import { and, desc, eq, isNull, lt, sql } from 'drizzle-orm';
import { createAdminClient, otpVerifications, users } from '@expensox/db';
import { NotFoundError, RateLimitedError, generateUlid } from '@expensox/shared';
import type { OtpPurpose } from '@expensox/shared';
import { getAppConfig } from '../config';
import { sendEmail } from '../email/send-email';
import { otpEmail } from '../email/templates';
import { logger, errorFields } from '../observability/logger';

export interface OtpRecord {
  id: string;
  codeHash: string;
  attempts: number;
  maxAttempts: number;
  expiresAt: Date;
  usedAt: Date | null;
  createdAt: Date;
}

export type OtpFailureReason = 'not_found' | 'expired' | 'too_many_attempts' | 'invalid_code';

export type OtpVerifyResult =
  | { ok: true }
  | { ok: false; reason: OtpFailureReason; attemptsRemaining: number };

export interface OtpStatus {
  exists: boolean;
  isValid: boolean;
  secondsRemaining: number;
  attemptsRemaining: number;
}

const CODE_PATTERN = /^\d{6}$/;

/** Six digits, never starting with zero. */
export function generateOtpCode(): string {
  return String(randomInt(100000, 1000000));
}

export function hashOtpCode(code: string): string {
  return createHash('sha256').update(code).digest('hex');
}

function codeMatches(code: string, codeHash: string): boolean {
  const candidate = Buffer.from(hashOtpCode(code), 'hex');
  const stored = Buffer.from(codeHash, 'hex');
  return candidate.length === stored.length && timingSafeEqual(candidate, stored);
}

export function secondsRemaining(record: Pick<OtpRecord, 'expiresAt'>, now: Date): number {
  return Math.max(0, Math.floor((record.expiresAt.getTime() - now.getTime()) / 1000));
}

/**
 * Judges `code` against the newest unused record. The caller counts an
 * attempt against the record whenever one exists.
 */
export function evaluateOtp(record: OtpRecord | null, code: string, now: Date): OtpVerifyResult {
  if (!record || record.usedAt) {
    return { ok: false, reason: 'not_found', attemptsRemaining: 0 };
  }
  if (now.getTime() > record.expiresAt.getTime()) {
    return {
      ok: false,
      reason: 'expired',
      attemptsRemaining: Math.max(0, record.maxAttempts - record.attempts),
    };
  }
  if (record.attempts >= record.maxAttempts) {
    return { ok: false, reason: 'too_many_attempts', attemptsRemaining: 0 };
  }
  if (!CODE_PATTERN.test(code) || !codeMatches(code, record.codeHash)) {
    return {
      ok: false,
      reason: 'invalid_code',
      attemptsRemaining: Math.max(0, record.maxAttempts - record.attempts - 1),
    };
  }
  return { ok: true };
}

function isActive(record: OtpRecord, now: Date): boolean {
  return (
    !record.usedAt &&
    record.attempts < record.maxAttempts &&
    now.getTime() <= record.expiresAt.getTime()
  );
}

async function findLatestUnused(userId: string, purpose: OtpPurpose): Promise<OtpRecord | null> {
  const [row] = await createAdminClient()
    .select({
      id: otpVerifications.id,
      codeHash: otpVerifications.codeHash,
      attempts: otpVerifications.attempts,
      maxAttempts: otpVerifications.maxAttempts,
      expiresAt: otpVerifications.expiresAt,
      usedAt: otpVerifications.usedAt,
      createdAt: otpVerifications.createdAt,
    })
    .from(otpVerifications)
    .where(
      and(
        eq(otpVerifications.userId, userId),
        eq(otpVerifications.purpose, purpose),
        isNull(otpVerifications.usedAt),
      ),
    )
    .orderBy(desc(otpVerifications.createdAt))
    .limit(1);
  return row ?? null;
}

export interface IssueOtpInput {
  tenantId: string;
  userId: string;
  email: string;
  purpose: OtpPurpose;
  name?: string;
}

/**
 * Invalidates the user's open codes for `purpose`, stores a fresh one and
 * emails it. A failed delivery is logged; the code stays valid for resend.
 */
export async function issueOtp(
  input: IssueOtpInput,
): Promise<{ otpId: string; expiresAt: string; delivered: boolean }> {
  const { otp } = getAppConfig();
  const code = generateOtpCode();
  const now = new Date();
  const expiresAt = new Date(now.getTime() + otp.expiryMinutes * 60_000);
  const otpId = generateUlid();

  await createAdminClient().transaction(async (tx) => {
    await tx
      .update(otpVerifications)
      .set({ usedAt: now })
      .where(
        and(
          eq(otpVerifications.userId, input.userId),
          eq(otpVerifications.purpose, input.purpose),
          isNull(otpVerifications.usedAt),
        ),
      );

    await tx.insert(otpVerifications).values({
      id: otpId,
      tenantId: input.tenantId,
      userId: input.userId,
      purpose: input.purpose,
      email: input.email,
      codeHash: hashOtpCode(code),
      attempts: 0,
      maxAttempts: otp.maxAttempts,
      expiresAt,
      createdAt: now,
    });
  });

  const message = otpEmail(code, input.purpose, input.name ?? input.email, otp.expiryMinutes);
  let delivered = true;
  try {
    await sendEmail(input.email, message.subject, message.html);
  } catch (error) {
    delivered = false;
    logger.error('OTP email delivery failed', {
      tenantId: input.tenantId,
      userId: input.userId,
      purpose: input.purpose,
      error: errorFields(error),
    });
  }

  logger.info('OTP issued', { tenantId: input.tenantId, userId: input.userId, purpose: input.purpose });
  return { otpId, expiresAt: expiresAt.toISOString(), delivered };
}

export async function verifyOtp(input: {
  userId: string;
  purpose: OtpPurpose;
  code: string;
}): Promise<OtpVerifyResult> {
  const now = new Date();
  const record = await findLatestUnused(input.userId, input.purpose);
  if (!record) return evaluateOtp(null, input.code, now);

  const admin = createAdminClient();
  // Each check claims one attempt in SQL; concurrent guesses cannot share one.
  const [claimed] = await admin
    .update(otpVerifications)
    .set({ attempts: sql`${otpVerifications.attempts} + 1` })
    .where(
      and(
        eq(otpVerifications.id, record.id),
        isNull(otpVerifications.usedAt),
        lt(otpVerifications.attempts, otpVerifications.maxAttempts),
      ),
    )
    .returning({ attempts: otpVerifications.attempts });

  const result: OtpVerifyResult = claimed
    ? evaluateOtp({ ...record, attempts: claimed.attempts - 1 }, input.code.trim(), now)
    : { ok: false, reason: 'too_many_attempts', attemptsRemaining: 0 };

  if (!result.ok) {
    logger.warn('OTP verification failed', {
      userId: input.userId,
      purpose: input.purpose,
      reason: result.reason,
    });
    return result;
  }

  return admin.transaction(async (tx): Promise<OtpVerifyResult> => {
    const [consumed] = await tx
      .update(otpVerifications)
      .set({ usedAt: now, verifiedAt: now })
      .where(and(eq(otpVerifications.id, record.id), isNull(otpVerifications.usedAt)))
      .returning({ id: otpVerifications.id });
    if (!consumed) {
      return { ok: false, reason: 'not_found', attemptsRemaining: 0 };
    }

    if (input.purpose === 'signup') {
      await tx
        .update(users)
        .set({ isEmailVerified: true, updatedAt: now })
        .where(eq(users.id, input.userId));
    }
    return { ok: true };
  });
}

export async function resendOtp(input: {
  userId: string;
  purpose: OtpPurpose;
}): Promise<{ otpId: string; expiresAt: string; delivered: boolean }> {
  const [user] = await createAdminClient()
    .select({
      id: users.id,
      tenantId: users.tenantId,
      email: users.email,
      firstName: users.firstName,
    })
    .from(users)
    .where(eq(users.id, input.userId))
    .limit(1);

  if (!user) {
    throw new NotFoundError('User', input.userId);
  }

  const now = new Date();
  const existing = await findLatestUnused(input.userId, input.purpose);
  if (existing && isActive(existing, now)) {
    const cooldownMs = getAppConfig().otp.resendCooldownSeconds * 1000;
    const waitMs = existing.createdAt.getTime() + cooldownMs - now.getTime();
    if (waitMs > 0) {
      throw new RateLimitedError(
        'Please wait before requesting a new code',
        Math.ceil(waitMs / 1000),
      );
    }
  }

  return issueOtp({
    tenantId: user.tenantId,
    userId: user.id,
    email: user.email,
    purpose: input.purpose,
    name: user.firstName,
  });
}

export async function getOtpStatus(input: {
  userId: string;
  purpose: OtpPurpose;
}): Promise<OtpStatus> {
  const now = new Date();
  const record = await findLatestUnused(input.userId, input.purpose);
  if (!record) {
    return { exists: false, isValid: false, secondsRemaining: 0, attemptsRemaining: 0 };
  }
  return {
    exists: true,
    isValid: isActive(record, now),
    secondsRemaining: secondsRemaining(record, now),
    attemptsRemaining: Math.max(0, record.maxAttempts - record.attempts),
  };
}

/** Deletes codes that expired before `now`. Returns how many rows went. */
export async function cleanupExpiredOtps(now: Date = new Date()): Promise<number> {
  const deleted = await createAdminClient()
    .delete(otpVerifications)
    .where(lt(otpVerifications.expiresAt, now))
    .returning({ id: otpVerifications.id });
  if (deleted.length > 0) {
    logger.info('Expired OTP codes removed', { count: deleted.length });
  }
  return deleted.length;
}
