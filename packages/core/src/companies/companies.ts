import { eq, sql } from 'drizzle-orm';
import { z } from 'zod';
import {
  createAdminClient,
  expenseCategories,
  expenses,
  tenants,
  users,
  withTenant,
} from '@expensox/db';
import {
  ConflictError,
  IDENTITY_EVENTS,
  NotFoundError,
  ValidationError,
  currencyCodeSchema,
  generateSlug,
  generateUlid,
  parseOrThrow,
} from '@expensox/shared';
import type { RequestContext } from '../auth/context';
import { publishWithOutbox } from '../events/publish-with-outbox';
import { buildEvent, buildEventFromContext } from '../events/build-event';
import { getOutboxWriter } from '../events';
import { auditLog, auditLogSystem } from '../audit/helpers';
import { computeChanges } from '../audit/diff';
import { issueOtp } from '../otp/otp-service';
import { assertValidPassword, hashSecret, normalizeEmail } from '../users';
import { findCountry } from './countries';
import { logger } from '../observability/logger';

export const DEFAULT_CATEGORY_NAME = 'General';

export interface CompanyView {
  id: string;
  name: string;
  slug: string;
  country: string;
  currencyCode: string;
  status: string;
  createdAt: string;
  updatedAt: string;
}

export interface SignUpResult {
  tenantId: string;
  userId: string;
  /** When the emailed signup code stops working. */
  otpExpiresAt: string;
}

const nameSchema = z.string().trim().min(1).max(100);

export const signUpCompanySchema = z.object({
  companyName: z.string().trim().min(2).max(120),
  country: z.string().trim().min(2).max(80),
  currencyCode: currencyCodeSchema.optional(),
  adminFirstName: nameSchema,
  adminLastName: nameSchema,
  email: z.string().trim().email().max(255),
  password: z.string().min(1).max(200),
});

export type SignUpCompanyInput = z.input<typeof signUpCompanySchema>;

export const updateCompanySchema = z.object({
  name: z.string().trim().min(2).max(120).optional(),
  country: z.string().trim().min(2).max(80).optional(),
  currencyCode: currencyCodeSchema.optional(),
});

export type UpdateCompanyInput = z.input<typeof updateCompanySchema>;

type TenantRecord = typeof tenants.$inferSelect;

function toView(row: TenantRecord): CompanyView {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    country: row.country,
    currencyCode: row.currencyCode,
    status: row.status,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

function auditable(row: TenantRecord): Record<string, unknown> {
  return { name: row.name, country: row.country, currencyCode: row.currencyCode };
}

/** Slug from the name plus a short id suffix, so two "Acme" signups never collide. */
function companySlug(name: string, tenantId: string): string {
  const base = generateSlug(name) || 'company';
  return `${base}-${tenantId.slice(-6).toLowerCase()}`;
}

/**
 * Creates a company with its first admin. The admin starts unverified and
 * receives a signup code; sign-in asks for it until it is confirmed.
 */
export async function signUpCompany(input: SignUpCompanyInput): Promise<SignUpResult> {
  const parsed = parseOrThrow(signUpCompanySchema, input);
  assertValidPassword(parsed.password);

  const known = findCountry(parsed.country);
  const currencyCode = parsed.currencyCode ?? known?.currencyCode;
  if (!currencyCode) {
    throw new ValidationError('Validation failed', [
      { field: 'currencyCode', message: `No default currency known for ${parsed.country}; choose one` },
    ]);
  }
  const country = known?.country ?? parsed.country;
  const email = normalizeEmail(parsed.email);
  const adminDb = createAdminClient();

  const [existing] = await adminDb
    .select({ id: users.id })
    .from(users)
    .where(eq(users.email, email))
    .limit(1);
  if (existing) {
    throw new ConflictError('A user with this email already exists');
  }

  const tenantId = generateUlid();
  const userId = generateUlid();
  const passwordHash = hashSecret(parsed.password);

  await adminDb.transaction(async (tx) => {
    const now = new Date();
    await tx.insert(tenants).values({
      id: tenantId,
      name: parsed.companyName,
      slug: companySlug(parsed.companyName, tenantId),
      country,
      currencyCode,
      status: 'active',
      createdAt: now,
      updatedAt: now,
    });

    await tx.insert(users).values({
      id: userId,
      tenantId,
      email,
      firstName: parsed.adminFirstName,
      lastName: parsed.adminLastName,
      passwordHash,
      role: 'admin',
      status: 'active',
      isEmailVerified: false,
      createdAt: now,
      updatedAt: now,
    });

    await tx
      .insert(expenseCategories)
      .values({
        id: generateUlid(),
        tenantId,
        name: DEFAULT_CATEGORY_NAME,
        description: 'Default category',
        isActive: true,
      })
      .onConflictDoNothing();

    const companyEvent = buildEvent({
      eventType: IDENTITY_EVENTS.COMPANY_CREATED,
      tenantId,
      actorUserId: userId,
      data: { companyName: parsed.companyName, country, currencyCode, adminUserId: userId },
    });
    await getOutboxWriter().writeEvents(tx, [companyEvent]);
  });

  await auditLogSystem(tenantId, 'company.created', 'company', tenantId, {
    adminUserId: userId,
    country,
    currencyCode,
  });

  const otp = await issueOtp({
    tenantId,
    userId,
    email,
    purpose: 'signup',
    name: parsed.adminFirstName,
  });

  logger.info('Company signed up', { tenantId, userId, otpDelivered: otp.delivered });

  return { tenantId, userId, otpExpiresAt: otp.expiresAt };
}

export async function getCompany(tenantId: string): Promise<CompanyView> {
  return withTenant(tenantId, async (tx) => {
    const [row] = await tx.select().from(tenants).where(eq(tenants.id, tenantId)).limit(1);
    if (!row) throw new NotFoundError('Company', tenantId);
    return toView(row);
  });
}

export async function updateCompany(
  ctx: RequestContext,
  patch: UpdateCompanyInput,
): Promise<CompanyView> {
  const parsed = parseOrThrow(updateCompanySchema, patch);
  const country = parsed.country ? (findCountry(parsed.country)?.country ?? parsed.country) : undefined;

  const { before, after } = await publishWithOutbox(ctx, async (tx) => {
    const [existing] = await tx
      .select()
      .from(tenants)
      .where(eq(tenants.id, ctx.tenantId))
      .limit(1);
    if (!existing) throw new NotFoundError('Company', ctx.tenantId);

    if (parsed.currencyCode && parsed.currencyCode !== existing.currencyCode) {
      const [usage] = await tx
        .select({ count: sql<number>`count(*)::int` })
        .from(expenses)
        .where(eq(expenses.tenantId, ctx.tenantId));
      if (Number(usage?.count ?? 0) > 0) {
        throw new ConflictError('Company currency cannot change once expenses exist');
      }
    }

    const [updated] = await tx
      .update(tenants)
      .set({
        ...(parsed.name !== undefined && { name: parsed.name }),
        ...(country !== undefined && { country }),
        ...(parsed.currencyCode !== undefined && { currencyCode: parsed.currencyCode }),
        updatedAt: new Date(),
      })
      .where(eq(tenants.id, ctx.tenantId))
      .returning();
    if (!updated) throw new NotFoundError('Company', ctx.tenantId);

    const changes = computeChanges(auditable(existing), auditable(updated));
    const events = changes
      ? [buildEventFromContext(ctx, IDENTITY_EVENTS.COMPANY_UPDATED, { changes })]
      : [];

    return { result: { before: existing, after: updated }, events };
  });

  const changes = computeChanges(auditable(before), auditable(after));
  if (changes) {
    await auditLog(ctx, 'company.updated', 'company', ctx.tenantId, changes);
  }
  return toView(after);
}
