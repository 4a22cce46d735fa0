import { describe, it, expect, afterEach } from 'vitest';
import { getAppConfig, loadAppConfig, resetAppConfig } from '../config';

describe('loadAppConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadAppConfig({ NODE_ENV: 'test' });

    expect(config.nodeEnv).toBe('test');
    expect(config.auth.tokenTtlSeconds).toBe(28_800);
    expect(config.otp).toEqual({ expiryMinutes: 10, maxAttempts: 5, resendCooldownSeconds: 120 });
    expect(config.defaultCurrency).toBe('USD');
    expect(config.email.resendApiKey).toBeUndefined();
    expect(config.logLevel).toBe('info');
  });

  it('coerces numeric settings and uppercases the currency', () => {
    const config = loadAppConfig({
      NODE_ENV: 'development',
      OTP_EXPIRY_MINUTES: '15',
      OTP_MAX_ATTEMPTS: '3',
      OTP_RESEND_COOLDOWN_SECONDS: '60',
      DEFAULT_CURRENCY: 'eur',
      AUTH_TOKEN_SECRET: 'test-secret-value-1234',
    });

    expect(config.otp).toEqual({ expiryMinutes: 15, maxAttempts: 3, resendCooldownSeconds: 60 });
    expect(config.defaultCurrency).toBe('EUR');
    expect(config.auth.tokenSecret).toBe('test-secret-value-1234');
  });

  it('treats an empty Resend key as unset', () => {
    expect(loadAppConfig({ NODE_ENV: 'test', RESEND_API_KEY: '' }).email.resendApiKey).toBeUndefined();
  });

  it('fails fast on invalid values', () => {
    expect(() => loadAppConfig({ NODE_ENV: 'test', OTP_EXPIRY_MINUTES: '0' })).toThrow(
      /Invalid environment configuration: OTP_EXPIRY_MINUTES/,
    );
  });

  it('requires a token secret in production', () => {
    expect(() => loadAppConfig({ NODE_ENV: 'production' })).toThrow(
      'AUTH_TOKEN_SECRET is required in production',
    );
  });
});

describe('getAppConfig', () => {
  afterEach(() => {
    resetAppConfig();
  });

  it('caches until reset', () => {
    const first = getAppConfig();
    expect(getAppConfig()).toBe(first);
    resetAppConfig();
    expect(getAppConfig()).not.toBe(first);
  });
});
