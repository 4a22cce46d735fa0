import { z } from 'zod';

/**
 * Process configuration, read once from the environment. Scripts load
 * `.env.local` and `.env` with dotenv before anything calls this.
 */
const appConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DATABASE_URL: z.string().optional(),
  DATABASE_URL_ADMIN: z.string().optional(),
  AUTH_TOKEN_SECRET: z.string().min(16).optional(),
  AUTH_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(8 * 60 * 60),
  OTP_EXPIRY_MINUTES: z.coerce.number().int().min(1).max(60).default(10),
  OTP_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(5),
  OTP_RESEND_COOLDOWN_SECONDS: z.coerce.number().int().min(0).default(120),
  DEFAULT_CURRENCY: z.string().length(3).default('USD'),
  EMAIL_FROM: z.string().default('ExpensoX <noreply@expensox.local>'),
  RESEND_API_KEY: z.string().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

const DEV_TOKEN_SECRET = 'expensox-dev-secret-do-not-use-in-production';

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  databaseUrl?: string;
  databaseUrlAdmin?: string;
  auth: {
    tokenSecret: string;
    tokenTtlSeconds: number;
  };
  otp: {
    expiryMinutes: number;
    maxAttempts: number;
    resendCooldownSeconds: number;
  };
  defaultCurrency: string;
  email: {
    from: string;
    resendApiKey?: string;
  };
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

let _config: AppConfig | null = null;

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = appConfigSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  const e = parsed.data;

  if (e.NODE_ENV === 'production' && !e.AUTH_TOKEN_SECRET) {
    throw new Error('AUTH_TOKEN_SECRET is required in production');
  }

  return {
    nodeEnv: e.NODE_ENV,
    databaseUrl: e.DATABASE_URL,
    databaseUrlAdmin: e.DATABASE_URL_ADMIN,
    auth: {
      tokenSecret: e.AUTH_TOKEN_SECRET ?? DEV_TOKEN_SECRET,
      tokenTtlSeconds: e.AUTH_TOKEN_TTL_SECONDS,
    },
    otp: {
      expiryMinutes: e.OTP_EXPIRY_MINUTES,
      maxAttempts: e.OTP_MAX_ATTEMPTS,
      resendCooldownSeconds: e.OTP_RESEND_COOLDOWN_SECONDS,
    },
    defaultCurrency: e.DEFAULT_CURRENCY.toUpperCase(),
    email: {
      from: e.EMAIL_FROM,
      resendApiKey: e.RESEND_API_KEY || undefined,
    },
    logLevel: e.LOG_LEVEL,
  };
}

export function getAppConfig(): AppConfig {
  if (!_config) {
    _config = loadAppConfig();
  }
  return _config;
}

/** Drop the cached config so the next read sees the current environment. */
export function resetAppConfig(): void {
  _config = null;
}
