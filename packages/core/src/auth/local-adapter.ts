import jwt from 'jsonwebtoken';
import { eq } from 'drizzle-orm';
import { createAdminClient, tenants, users } from '@expensox/db';
import { AuthenticationError, ValidationError, isUserRole } from '@expensox/shared';
import type { OtpPurpose } from '@expensox/shared';
import { getAppConfig } from '../config';
import { issueOtp, resendOtp, verifyOtp } from '../otp/otp-service';
import type { OtpFailureReason } from '../otp/otp-service';
import { assertValidPassword, hashSecret, normalizeEmail, verifySecret } from '../users';
import { auditLogSystem } from '../audit/helpers';
import { logger } from '../observability/logger';
import type { AccessToken, AuthAdapter, AuthUser, SignInResult } from './index';

const INVALID_CREDENTIALS = 'Invalid email or password';

const OTP_FAILURE_MESSAGES: Record<OtpFailureReason, string> = {
  not_found: 'No valid verification code found. Request a new one.',
  expired: 'Verification code has expired. Request a new one.',
  too_many_attempts: 'Maximum verification attempts exceeded. Request a new code.',
  invalid_code: 'Invalid verification code',
};

/** Purposes that end in a session once the code checks out. */
const SIGN_IN_PURPOSES: readonly OtpPurpose[] = ['signup', 'login', 'two_factor'];

type AccountRow = {
  id: string;
  tenantId: string;
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
  role: string;
  managerId: string | null;
  status: string;
  isEmailVerified: boolean;
  twoFactorEnabled: boolean;
  tenantStatus: string;
};

let _dummyHash: string | null = null;

/** Hash checked for unknown emails so both paths cost one scrypt. */
function dummyHash(): string {
  if (!_dummyHash) {
    _dummyHash = hashSecret('timing-equalizer-password');
  }
  return _dummyHash;
}

async function findAccount(where: { id: string } | { email: string }): Promise<AccountRow | null> {
  const condition = 'id' in where ? eq(users.id, where.id) : eq(users.email, where.email);
  const [row] = await createAdminClient()
    .select({
      id: users.id,
      tenantId: users.tenantId,
      email: users.email,
      firstName: users.firstName,
      lastName: users.lastName,
      passwordHash: users.passwordHash,
      role: users.role,
      managerId: users.managerId,
      status: users.status,
      isEmailVerified: users.isEmailVerified,
      twoFactorEnabled: users.twoFactorEnabled,
      tenantStatus: tenants.status,
    })
    .from(users)
    .innerJoin(tenants, eq(tenants.id, users.tenantId))
    .where(condition)
    .limit(1);
  return row ?? null;
}

function toAuthUser(row: AccountRow): AuthUser | null {
  if (!isUserRole(row.role)) return null;
  return {
    id: row.id,
    email: row.email,
    name: `${row.firstName} ${row.lastName}`.trim(),
    tenantId: row.tenantId,
    role: row.role,
    managerId: row.managerId,
    tenantStatus: row.tenantStatus,
    membershipStatus: row.status,
  };
}

function isUsable(row: AccountRow): boolean {
  return row.status === 'active' && row.tenantStatus === 'active';
}

function otpFailure(reason: OtpFailureReason, attemptsRemaining: number): ValidationError {
  return new ValidationError(OTP_FAILURE_MESSAGES[reason], [
    { field: 'code', message: `${reason}; ${attemptsRemaining} attempts remaining` },
  ]);
}

/**
 * Email + password accounts stored in `users`, HS256 bearer tokens, and OTP
 * codes for email verification, second factor and password reset.
 */
export class LocalAuthAdapter implements AuthAdapter {
  issueToken(user: { id: string; tenantId: string; role: string }): AccessToken {
    const { auth } = getAppConfig();
    const accessToken = jwt.sign(
      { sub: user.id, tid: user.tenantId, role: user.role },
      auth.tokenSecret,
      { algorithm: 'HS256', expiresIn: auth.tokenTtlSeconds },
    );
    return { accessToken, expiresIn: auth.tokenTtlSeconds };
  }

  async validateToken(token: string): Promise<AuthUser | null> {
    let subject: string;
    let tenantId: string;
    try {
      const decoded = jwt.verify(token, getAppConfig().auth.tokenSecret, {
        algorithms: ['HS256'],
      });
      if (typeof decoded === 'string' || typeof decoded.sub !== 'string' || typeof decoded.tid !== 'string') {
        return null;
      }
      subject = decoded.sub;
      tenantId = decoded.tid;
    } catch (error) {
      if (error instanceof jwt.JsonWebTokenError) {
        logger.debug('Token rejected', { reason: error.message });
        return null;
      }
      throw error;
    }

    const account = await findAccount({ id: subject });
    if (!account || account.tenantId !== tenantId) return null;
    return toAuthUser(account);
  }

  async signIn(email: string, password: string): Promise<SignInResult> {
    const account = await findAccount({ email: normalizeEmail(email) });

    if (!account) {
      verifySecret(password, dummyHash());
      throw new AuthenticationError(INVALID_CREDENTIALS);
    }
    if (!verifySecret(password, account.passwordHash) || !isUsable(account)) {
      throw new AuthenticationError(INVALID_CREDENTIALS);
    }

    const purpose: OtpPurpose | null = !account.isEmailVerified
      ? 'signup'
      : account.twoFactorEnabled
        ? 'two_factor'
        : null;

    if (purpose) {
      const { expiresAt } = await issueOtp({
        tenantId: account.tenantId,
        userId: account.id,
        email: account.email,
        purpose,
        name: account.firstName,
      });
      return { status: 'otp_required', userId: account.id, purpose, expiresAt };
    }

    return { status: 'authenticated', userId: account.id, ...(await this.startSession(account)) };
  }

  async completeOtpSignIn(userId: string, purpose: OtpPurpose, code: string): Promise<AccessToken> {
    if (!SIGN_IN_PURPOSES.includes(purpose)) {
      throw new ValidationError('Validation failed', [
        { field: 'purpose', message: 'This code cannot be used to sign in' },
      ]);
    }

    const account = await findAccount({ id: userId });
    if (!account || !isUsable(account)) {
      throw new AuthenticationError(INVALID_CREDENTIALS);
    }

    const result = await verifyOtp({ userId, purpose, code });
    if (!result.ok) {
      throw otpFailure(result.reason, result.attemptsRemaining);
    }

    return this.startSession(account);
  }

  async resendOtp(userId: string, purpose: OtpPurpose): Promise<{ expiresAt: string }> {
    const { expiresAt } = await resendOtp({ userId, purpose });
    return { expiresAt };
  }

  async requestPasswordReset(email: string): Promise<void> {
    const account = await findAccount({ email: normalizeEmail(email) });
    if (!account || !isUsable(account)) {
      logger.info('Password reset requested for unknown or inactive account');
      return;
    }
    await issueOtp({
      tenantId: account.tenantId,
      userId: account.id,
      email: account.email,
      purpose: 'password_reset',
      name: account.firstName,
    });
  }

  async resetPassword(email: string, code: string, newPassword: string): Promise<void> {
    assertValidPassword(newPassword, 'newPassword');

    const account = await findAccount({ email: normalizeEmail(email) });
    if (!account || !isUsable(account)) {
      throw otpFailure('not_found', 0);
    }

    const result = await verifyOtp({ userId: account.id, purpose: 'password_reset', code });
    if (!result.ok) {
      throw otpFailure(result.reason, result.attemptsRemaining);
    }

    await createAdminClient()
      .update(users)
      .set({ passwordHash: hashSecret(newPassword), updatedAt: new Date() })
      .where(eq(users.id, account.id));

    await auditLogSystem(account.tenantId, 'user.password_reset', 'user', account.id);
  }

  private async startSession(account: AccountRow): Promise<AccessToken> {
    await createAdminClient()
      .update(users)
      .set({ lastLoginAt: new Date() })
      .where(eq(users.id, account.id));
    logger.info('User signed in', { tenantId: account.tenantId, userId: account.id });
    return this.issueToken(account);
  }
}
