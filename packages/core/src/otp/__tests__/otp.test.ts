import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { state, mockSendEmail } = vi.hoisted(() => {
  const state = {
    selectResults: [] as unknown[][],
    updates: [] as Array<{ table: unknown; values: Record<string, unknown> }>,
    returning: [] as unknown[][],
    inserts: [] as Array<Record<string, unknown>>,
  };
  return { state, mockSendEmail: vi.fn().mockResolvedValue(undefined) };
});

vi.mock('@expensox/db', () => {
  const otpVerifications = { id: 'otp.id', userId: 'otp.userId', purpose: 'otp.purpose', usedAt: 'otp.usedAt', expiresAt: 'otp.expiresAt', createdAt: 'otp.createdAt', attempts: 'otp.attempts', maxAttempts: 'otp.maxAttempts' };
  const users = { id: 'users.id', tenantId: 'users.tenantId', email: 'users.email', firstName: 'users.firstName' };
  const selectChain = () => {
    const chain: Record<string, unknown> = {};
    chain.from = vi.fn(() => chain);
    chain.where = vi.fn(() => chain);
    chain.orderBy = vi.fn(() => chain);
    chain.limit = vi.fn(() => Promise.resolve(state.selectResults.shift() ?? []));
    return chain;
  };
  const client = {
    select: vi.fn(() => selectChain()),
    update: vi.fn((table: unknown) => ({
      set: vi.fn((values: Record<string, unknown>) => ({
        where: vi.fn(() => {
          state.updates.push({ table, values });
          return Object.assign(Promise.resolve(), {
            returning: vi.fn(() => Promise.resolve(state.returning.shift() ?? [])),
          });
        }),
      })),
    })),
    insert: vi.fn(() => ({
      values: vi.fn((values: Record<string, unknown>) => {
        state.inserts.push(values);
        return Promise.resolve();
      }),
    })),
    delete: vi.fn(() => ({
      where: vi.fn(() => ({
        returning: vi.fn().mockResolvedValue([{ id: 'otp_a' }, { id: 'otp_b' }]),
      })),
    })),
    transaction: vi.fn(async (cb: (tx: unknown) => Promise<unknown>) => cb(client)),
  };
  return {
    createAdminClient: vi.fn(() => client),
    otpVerifications,
    users,
  };
});

vi.mock('drizzle-orm', () => ({
  and: vi.fn(),
  eq: vi.fn(),
  desc: vi.fn(),
  isNull: vi.fn(),
  lt: vi.fn((left: unknown, right: unknown) => ({ lt: [left, right] })),
  sql: vi.fn((strings: TemplateStringsArray) => ({ sql: strings.join('?') })),
}));

vi.mock('../../email/send-email', () => ({ sendEmail: mockSendEmail }));

import { isNull, lt } from 'drizzle-orm';
import { RateLimitedError } from '@expensox/shared';
import { resetAppConfig } from '../../config';
import {
  cleanupExpiredOtps,
  evaluateOtp,
  generateOtpCode,
  getOtpStatus,
  hashOtpCode,
  issueOtp,
  resendOtp,
  secondsRemaining,
  verifyOtp,
} from '../otp-service';
import type { OtpRecord } from '../otp-service';

const NOW = new Date('2026-03-10T12:00:00.000Z');

function makeRecord(overrides: Partial<OtpRecord> = {}): OtpRecord {
  return {
    id: 'otp_1',
    codeHash: hashOtpCode('482913'),
    attempts: 0,
    maxAttempts: 5,
    expiresAt: new Date(NOW.getTime() + 10 * 60_000),
    usedAt: null,
    createdAt: NOW,
    ...overrides,
  };
}

describe('generateOtpCode', () => {
  it('always yields six digits without a leading zero', () => {
    for (let i = 0; i < 200; i++) {
      const code = generateOtpCode();
      expect(code).toMatch(/^[1-9]\d{5}$/);
    }
  });
});

describe('hashOtpCode', () => {
  it('is a deterministic sha256 hex digest', () => {
    expect(hashOtpCode('123456')).toHaveLength(64);
    expect(hashOtpCode('123456')).toBe(hashOtpCode('123456'));
    expect(hashOtpCode('123456')).not.toBe(hashOtpCode('123457'));
  });
});

describe('evaluateOtp', () => {
  it('accepts the right code', () => {
    expect(evaluateOtp(makeRecord(), '482913', NOW)).toEqual({ ok: true });
  });

  it('reports a missing record', () => {
    expect(evaluateOtp(null, '482913', NOW)).toEqual({
      ok: false,
      reason: 'not_found',
      attemptsRemaining: 0,
    });
  });

  it('treats a used record as missing', () => {
    expect(evaluateOtp(makeRecord({ usedAt: NOW }), '482913', NOW)).toMatchObject({
      ok: false,
      reason: 'not_found',
    });
  });

  it('reports expiry before checking the code', () => {
    const record = makeRecord({ expiresAt: new Date(NOW.getTime() - 1000), attempts: 1 });
    expect(evaluateOtp(record, '482913', NOW)).toEqual({
      ok: false,
      reason: 'expired',
      attemptsRemaining: 4,
    });
  });

  it('locks out after the last attempt', () => {
    expect(evaluateOtp(makeRecord({ attempts: 5 }), '482913', NOW)).toEqual({
      ok: false,
      reason: 'too_many_attempts',
      attemptsRemaining: 0,
    });
  });

  it('counts the current try when the code is wrong', () => {
    expect(evaluateOtp(makeRecord({ attempts: 2 }), '111111', NOW)).toEqual({
      ok: false,
      reason: 'invalid_code',
      attemptsRemaining: 2,
    });
  });

  it('rejects codes that are not six digits', () => {
    expect(evaluateOtp(makeRecord(), '48291', NOW)).toMatchObject({ reason: 'invalid_code' });
    expect(evaluateOtp(makeRecord(), 'abcdef', NOW)).toMatchObject({ reason: 'invalid_code' });
  });
});

describe('secondsRemaining', () => {
  it('floors to whole seconds and never goes negative', () => {
    expect(secondsRemaining({ expiresAt: new Date(NOW.getTime() + 90_500) }, NOW)).toBe(90);
    expect(secondsRemaining({ expiresAt: new Date(NOW.getTime() - 5_000) }, NOW)).toBe(0);
  });
});

describe('OTP persistence', () => {
  beforeEach(() => {
    state.selectResults = [];
    state.updates = [];
    state.inserts = [];
    state.returning = [];
    mockSendEmail.mockClear();
    resetAppConfig();
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('issueOtp invalidates open codes, stores a hash and emails the code', async () => {
    const result = await issueOtp({
      tenantId: 'tnt_1',
      userId: 'usr_1',
      email: 'emery@example.com',
      purpose: 'signup',
      name: 'Emery',
    });

    expect(result.delivered).toBe(true);
    expect(result.expiresAt).toBe('2026-03-10T12:10:00.000Z');
    expect(state.updates[0]?.values).toEqual({ usedAt: NOW });

    const inserted = state.inserts[0];
    expect(inserted).toMatchObject({
      id: result.otpId,
      tenantId: 'tnt_1',
      userId: 'usr_1',
      purpose: 'signup',
      attempts: 0,
      maxAttempts: 5,
    });

    const [to, subject] = mockSendEmail.mock.calls[0] ?? [];
    expect(to).toBe('emery@example.com');
    const code = String(subject).slice(0, 6);
    expect(inserted?.codeHash).toBe(hashOtpCode(code));
  });

  it('issueOtp reports a failed delivery without throwing', async () => {
    mockSendEmail.mockRejectedValueOnce(new Error('smtp down'));

    const result = await issueOtp({
      tenantId: 'tnt_1',
      userId: 'usr_1',
      email: 'emery@example.com',
      purpose: 'login',
    });

    expect(result.delivered).toBe(false);
  });

  it('verifyOtp consumes the code and verifies the email on signup', async () => {
    state.selectResults.push([makeRecord({ attempts: 1 })]);
    state.returning.push([{ attempts: 2 }], [{ id: 'otp_1' }]);

    const result = await verifyOtp({ userId: 'usr_1', purpose: 'signup', code: ' 482913 ' });

    expect(result).toEqual({ ok: true });
    expect(state.updates[0]?.values).toEqual({ attempts: { sql: '? + 1' } });
    expect(state.updates[1]?.values).toEqual({ usedAt: NOW, verifiedAt: NOW });
    expect(state.updates[2]?.values).toEqual({ isEmailVerified: true, updatedAt: NOW });
  });

  it('verifyOtp claims the attempt only while attempts remain', async () => {
    state.selectResults.push([makeRecord()]);
    state.returning.push([{ attempts: 1 }]);

    await verifyOtp({ userId: 'usr_1', purpose: 'login', code: '000000' });

    expect(lt).toHaveBeenCalledWith('otp.attempts', 'otp.maxAttempts');
    expect(isNull).toHaveBeenCalledWith('otp.usedAt');
  });

  it('verifyOtp counts a failed attempt', async () => {
    state.selectResults.push([makeRecord()]);
    state.returning.push([{ attempts: 1 }]);

    const result = await verifyOtp({ userId: 'usr_1', purpose: 'login', code: '000000' });

    expect(result).toEqual({ ok: false, reason: 'invalid_code', attemptsRemaining: 4 });
    expect(state.updates).toEqual([
      { table: expect.anything(), values: { attempts: { sql: '? + 1' } } },
    ]);
  });

  it('verifyOtp judges the code against the count the database returned', async () => {
    // Read at 3 of 5; concurrent checks have since pushed it to 4.
    state.selectResults.push([makeRecord({ attempts: 3 })]);
    state.returning.push([{ attempts: 5 }]);

    const result = await verifyOtp({ userId: 'usr_1', purpose: 'login', code: '000000' });

    expect(result).toEqual({ ok: false, reason: 'invalid_code', attemptsRemaining: 0 });
  });

  it('verifyOtp rejects even the right code once a concurrent check took the last attempt', async () => {
    state.selectResults.push([makeRecord({ attempts: 4 })]);
    state.returning.push([]);

    const result = await verifyOtp({ userId: 'usr_1', purpose: 'login', code: '482913' });

    expect(result).toEqual({ ok: false, reason: 'too_many_attempts', attemptsRemaining: 0 });
    expect(state.updates).toHaveLength(1);
  });

  it('verifyOtp does not verify a code another request consumed first', async () => {
    state.selectResults.push([makeRecord()]);
    state.returning.push([{ attempts: 1 }], []);

    const result = await verifyOtp({ userId: 'usr_1', purpose: 'signup', code: '482913' });

    expect(result).toEqual({ ok: false, reason: 'not_found', attemptsRemaining: 0 });
    expect(state.updates.map((u) => u.values)).toEqual([
      { attempts: { sql: '? + 1' } },
      { usedAt: NOW, verifiedAt: NOW },
    ]);
  });

  it('verifyOtp writes nothing when no code exists', async () => {
    state.selectResults.push([]);

    const result = await verifyOtp({ userId: 'usr_1', purpose: 'login', code: '482913' });

    expect(result).toMatchObject({ ok: false, reason: 'not_found' });
    expect(state.updates).toHaveLength(0);
  });

  it('resendOtp refuses while the active code is inside the cooldown', async () => {
    state.selectResults.push(
      [{ id: 'usr_1', tenantId: 'tnt_1', email: 'emery@example.com', firstName: 'Emery' }],
      [makeRecord({ createdAt: new Date(NOW.getTime() - 30_000) })],
    );

    const error = await resendOtp({ userId: 'usr_1', purpose: 'signup' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({ retryAfterSeconds: 90, statusCode: 429 });
  });

  it('resendOtp issues a new code once the cooldown has passed', async () => {
    state.selectResults.push(
      [{ id: 'usr_1', tenantId: 'tnt_1', email: 'emery@example.com', firstName: 'Emery' }],
      [makeRecord({ createdAt: new Date(NOW.getTime() - 121_000) })],
    );

    const result = await resendOtp({ userId: 'usr_1', purpose: 'signup' });

    expect(result.delivered).toBe(true);
    expect(state.inserts).toHaveLength(1);
    expect(mockSendEmail).toHaveBeenCalledTimes(1);
  });

  it('getOtpStatus describes the newest open code', async () => {
    state.selectResults.push([makeRecord({ attempts: 2 })]);

    expect(await getOtpStatus({ userId: 'usr_1', purpose: 'login' })).toEqual({
      exists: true,
      isValid: true,
      secondsRemaining: 600,
      attemptsRemaining: 3,
    });
  });

  it('getOtpStatus reports nothing when no code exists', async () => {
    state.selectResults.push([]);

    expect(await getOtpStatus({ userId: 'usr_1', purpose: 'login' })).toEqual({
      exists: false,
      isValid: false,
      secondsRemaining: 0,
      attemptsRemaining: 0,
    });
  });

  it('cleanupExpiredOtps returns the number of deleted rows', async () => {
    expect(await cleanupExpiredOtps(NOW)).toBe(2);
  });
});
