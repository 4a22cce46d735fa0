import { randomBytes, randomInt, scryptSync, timingSafeEqual } from 'node:crypto';
import { and, eq, sql } from 'drizzle-orm';
import { z } from 'zod';
import { createAdminClient, tenants, users, withTenant } from '@expensox/db';
import type { Database } from '@expensox/db';
import {
  ConflictError,
  IDENTITY_EVENTS,
  NotFoundError,
  USER_ROLES,
  ValidationError,
  generateUlid,
  isApproverRole,
  parseOrThrow,
} from '@expensox/shared';
import type { Paginated, UserRole } from '@expensox/shared';
import type { RequestContext } from './auth/context';
import { publishWithOutbox } from './events/publish-with-outbox';
import { buildEventFromContext } from './events/build-event';
import { auditLog } from './audit/helpers';
import { computeChanges } from './audit/diff';
import { sendEmail } from './email/send-email';
import { welcomeEmail } from './email/templates';
import { logger, errorFields } from './observability/logger';

export type UserStatus = 'active' | 'inactive';

export interface UserView {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  name: string;
  role: UserRole;
  managerId: string | null;
  managerName: string | null;
  isManagerApprover: boolean;
  status: UserStatus;
  isEmailVerified: boolean;
  twoFactorEnabled: boolean;
  lastLoginAt: string | null;
  createdAt: string;
}

// ── Helpers ──────────────────────────────────────────────────────

export function normalizeEmail(value: string): string {
  return value.trim().toLowerCase();
}

export function hashSecret(secret: string): string {
  const salt = randomBytes(16).toString('hex');
  const digest = scryptSync(secret, salt, 64).toString('hex');
  return `scrypt$${salt}$${digest}`;
}

export function verifySecret(secret: string, hash: string): boolean {
  const [algo, salt, digest] = hash.split('$');
  if (algo !== 'scrypt' || !salt || !digest) return false;
  const candidate = scryptSync(secret, salt, 64);
  const expected = Buffer.from(digest, 'hex');
  if (candidate.length !== expected.length) return false;
  return timingSafeEqual(candidate, expected);
}

/** At least 8 characters with a letter and a digit. Returns the problem, or null. */
export function validatePassword(password: string): string | null {
  if (password.length < 8) return 'Password must be at least 8 characters';
  if (!/[A-Za-z]/.test(password)) return 'Password must contain a letter';
  if (!/\d/.test(password)) return 'Password must contain a digit';
  return null;
}

export function assertValidPassword(password: string, field = 'password'): void {
  const problem = validatePassword(password);
  if (problem) {
    throw new ValidationError('Validation failed', [{ field, message: problem }]);
  }
}

/** Random 12-character password that satisfies `validatePassword`. */
export function generateTemporaryPassword(): string {
  const body = randomBytes(9).toString('base64url').slice(0, 10);
  return `${body}a${randomInt(10)}`;
}

/**
 * Rejects a manager assignment that points at the user or at someone who
 * (transitively) reports to the user.
 */
export function assertNoManagerCycle(
  userId: string,
  managerId: string,
  managerOf: ReadonlyMap<string, string | null>,
): void {
  const visited = new Set<string>();
  let current: string | null = managerId;
  while (current) {
    if (current === userId) {
      throw new ValidationError('Validation failed', [
        { field: 'managerId', message: 'Manager assignment would create a reporting cycle' },
      ]);
    }
    if (visited.has(current)) return;
    visited.add(current);
    current = managerOf.get(current) ?? null;
  }
}

// ── Schemas ──────────────────────────────────────────────────────

const nameSchema = z.string().trim().min(1).max(100);

export const createUserSchema = z.object({
  firstName: nameSchema,
  lastName: nameSchema,
  email: z.string().trim().email().max(255),
  role: z.enum(USER_ROLES).default('employee'),
  managerId: z.string().min(1).nullish(),
  isManagerApprover: z.boolean().default(false),
  password: z.string().min(1).max(200).optional(),
});

export type CreateUserInput = z.input<typeof createUserSchema>;

export const updateUserSchema = z.object({
  firstName: nameSchema.optional(),
  lastName: nameSchema.optional(),
  role: z.enum(USER_ROLES).optional(),
  managerId: z.string().min(1).nullable().optional(),
  isManagerApprover: z.boolean().optional(),
  twoFactorEnabled: z.boolean().optional(),
});

export type UpdateUserInput = z.input<typeof updateUserSchema>;

export const listUsersSchema = z.object({
  role: z.enum(USER_ROLES).optional(),
  status: z.enum(['active', 'inactive']).optional(),
  search: z.string().trim().min(1).max(100).optional(),
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

export type ListUsersInput = z.input<typeof listUsersSchema>;

// ── Internals ────────────────────────────────────────────────────

type UserRecord = typeof users.$inferSelect;

async function loadUser(tx: Database, tenantId: string, userId: string): Promise<UserRecord> {
  const [row] = await tx
    .select()
    .from(users)
    .where(and(eq(users.id, userId), eq(users.tenantId, tenantId)))
    .limit(1);
  if (!row) throw new NotFoundError('User', userId);
  return row;
}

async function assertValidManager(tx: Database, tenantId: string, managerId: string): Promise<void> {
  const [manager] = await tx
    .select({ id: users.id, role: users.role, status: users.status })
    .from(users)
    .where(and(eq(users.id, managerId), eq(users.tenantId, tenantId)))
    .limit(1);
  if (!manager || manager.status !== 'active' || !isApproverRole(manager.role)) {
    throw new ValidationError('Validation failed', [
      { field: 'managerId', message: 'Manager must be an active manager or admin of this company' },
    ]);
  }
}

async function countActiveAdmins(tx: Database, tenantId: string): Promise<number> {
  const [row] = await tx
    .select({ count: sql<number>`count(*)::int` })
    .from(users)
    .where(and(eq(users.tenantId, tenantId), eq(users.role, 'admin'), eq(users.status, 'active')));
  return Number(row?.count ?? 0);
}

async function assertEmailAvailable(email: string): Promise<void> {
  const [existing] = await createAdminClient()
    .select({ id: users.id })
    .from(users)
    .where(eq(users.email, email))
    .limit(1);
  if (existing) {
    throw new ConflictError('A user with this email already exists');
  }
}

function toRole(value: string): UserRole {
  return value === 'admin' || value === 'manager' ? value : 'employee';
}

function toStatus(value: string): UserStatus {
  return value === 'inactive' ? 'inactive' : 'active';
}

function toView(row: UserRecord, managerName: string | null = null): UserView {
  return {
    id: row.id,
    email: row.email,
    firstName: row.firstName,
    lastName: row.lastName,
    name: `${row.firstName} ${row.lastName}`.trim(),
    role: toRole(row.role),
    managerId: row.managerId,
    managerName,
    isManagerApprover: row.isManagerApprover,
    status: toStatus(row.status),
    isEmailVerified: row.isEmailVerified,
    twoFactorEnabled: row.twoFactorEnabled,
    lastLoginAt: row.lastLoginAt ? row.lastLoginAt.toISOString() : null,
    createdAt: row.createdAt.toISOString(),
  };
}

function auditable(row: UserRecord): Record<string, unknown> {
  return {
    firstName: row.firstName,
    lastName: row.lastName,
    role: row.role,
    managerId: row.managerId,
    isManagerApprover: row.isManagerApprover,
    twoFactorEnabled: row.twoFactorEnabled,
    status: row.status,
  };
}

// ── Commands ─────────────────────────────────────────────────────

export async function createUser(ctx: RequestContext, input: CreateUserInput): Promise<UserView> {
  const parsed = parseOrThrow(createUserSchema, input);
  const email = normalizeEmail(parsed.email);

  if (parsed.password) {
    assertValidPassword(parsed.password);
  }
  const password = parsed.password ?? generateTemporaryPassword();
  const temporaryPassword = parsed.password ? null : password;
  const passwordHash = hashSecret(password);

  await assertEmailAvailable(email);

  const { user, companyName } = await publishWithOutbox(ctx, async (tx) => {
    if (parsed.managerId) {
      await assertValidManager(tx, ctx.tenantId, parsed.managerId);
    }

    const [tenant] = await tx
      .select({ name: tenants.name })
      .from(tenants)
      .where(eq(tenants.id, ctx.tenantId))
      .limit(1);

    const now = new Date();
    const [created] = await tx
      .insert(users)
      .values({
        id: generateUlid(),
        tenantId: ctx.tenantId,
        email,
        firstName: parsed.firstName,
        lastName: parsed.lastName,
        passwordHash,
        role: parsed.role,
        managerId: parsed.managerId ?? null,
        isManagerApprover: parsed.isManagerApprover,
        status: 'active',
        isEmailVerified: true,
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    if (!created) throw new Error('User insert returned no row');

    const event = buildEventFromContext(ctx, IDENTITY_EVENTS.USER_CREATED, {
      userId: created.id,
      email,
      role: created.role,
      managerId: created.managerId,
    });

    return {
      result: { user: toView(created), companyName: tenant?.name ?? 'your company' },
      events: [event],
    };
  });

  await auditLog(ctx, 'user.created', 'user', user.id, undefined, { role: user.role });

  const message = welcomeEmail(user.firstName, companyName, temporaryPassword);
  try {
    await sendEmail(user.email, message.subject, message.html);
  } catch (error) {
    logger.error('Welcome email delivery failed', {
      tenantId: ctx.tenantId,
      userId: user.id,
      error: errorFields(error),
    });
  }

  return user;
}

export async function updateUser(
  ctx: RequestContext,
  userId: string,
  patch: UpdateUserInput,
): Promise<UserView> {
  const parsed = parseOrThrow(updateUserSchema, patch);

  const { before, after } = await publishWithOutbox(ctx, async (tx) => {
    const existing = await loadUser(tx, ctx.tenantId, userId);

    if (parsed.managerId !== undefined && parsed.managerId !== null && parsed.managerId !== existing.managerId) {
      if (parsed.managerId === userId) {
        throw new ValidationError('Validation failed', [
          { field: 'managerId', message: 'A user cannot be their own manager' },
        ]);
      }
      await assertValidManager(tx, ctx.tenantId, parsed.managerId);
      const lines = await tx
        .select({ id: users.id, managerId: users.managerId })
        .from(users)
        .where(eq(users.tenantId, ctx.tenantId));
      assertNoManagerCycle(
        userId,
        parsed.managerId,
        new Map(lines.map((l) => [l.id, l.managerId])),
      );
    }

    if (
      parsed.role &&
      parsed.role !== 'admin' &&
      existing.role === 'admin' &&
      existing.status === 'active' &&
      (await countActiveAdmins(tx, ctx.tenantId)) <= 1
    ) {
      throw new ConflictError('Cannot demote the last active admin');
    }

    const [updated] = await tx
      .update(users)
      .set({
        ...(parsed.firstName !== undefined && { firstName: parsed.firstName }),
        ...(parsed.lastName !== undefined && { lastName: parsed.lastName }),
        ...(parsed.role !== undefined && { role: parsed.role }),
        ...(parsed.managerId !== undefined && { managerId: parsed.managerId }),
        ...(parsed.isManagerApprover !== undefined && { isManagerApprover: parsed.isManagerApprover }),
        ...(parsed.twoFactorEnabled !== undefined && { twoFactorEnabled: parsed.twoFactorEnabled }),
        updatedAt: new Date(),
      })
      .where(and(eq(users.id, userId), eq(users.tenantId, ctx.tenantId)))
      .returning();

    if (!updated) throw new NotFoundError('User', userId);

    const event = buildEventFromContext(ctx, IDENTITY_EVENTS.USER_UPDATED, {
      userId,
      changes: computeChanges(auditable(existing), auditable(updated)) ?? {},
    });

    return { result: { before: existing, after: updated }, events: [event] };
  });

  await auditLog(ctx, 'user.updated', 'user', userId, computeChanges(auditable(before), auditable(after)));
  return toView(after);
}

async function setUserStatus(
  ctx: RequestContext,
  userId: string,
  status: UserStatus,
): Promise<UserView> {
  const { before, after } = await publishWithOutbox(ctx, async (tx) => {
    const existing = await loadUser(tx, ctx.tenantId, userId);
    if (existing.status === status) {
      return { result: { before: existing, after: existing }, events: [] };
    }

    if (
      status === 'inactive' &&
      existing.role === 'admin' &&
      (await countActiveAdmins(tx, ctx.tenantId)) <= 1
    ) {
      throw new ConflictError('Cannot deactivate the last active admin');
    }

    const [updated] = await tx
      .update(users)
      .set({ status, updatedAt: new Date() })
      .where(and(eq(users.id, userId), eq(users.tenantId, ctx.tenantId)))
      .returning();
    if (!updated) throw new NotFoundError('User', userId);

    if (status === 'inactive') {
      await tx
        .update(users)
        .set({ managerId: null, updatedAt: new Date() })
        .where(and(eq(users.tenantId, ctx.tenantId), eq(users.managerId, userId)));
    }

    const event = buildEventFromContext(ctx, IDENTITY_EVENTS.USER_UPDATED, {
      userId,
      changes: { status: { old: existing.status, new: status } },
    });
    return { result: { before: existing, after: updated }, events: [event] };
  });

  if (before.status !== after.status) {
    await auditLog(
      ctx,
      status === 'inactive' ? 'user.deactivated' : 'user.reactivated',
      'user',
      userId,
      { status: { old: before.status, new: after.status } },
    );
  }
  return toView(after);
}

export async function deactivateUser(ctx: RequestContext, userId: string): Promise<UserView> {
  if (userId === ctx.user.id) {
    throw new ValidationError('You cannot deactivate your own account');
  }
  return setUserStatus(ctx, userId, 'inactive');
}

export async function reactivateUser(ctx: RequestContext, userId: string): Promise<UserView> {
  return setUserStatus(ctx, userId, 'active');
}

// ── Queries ──────────────────────────────────────────────────────

type UserListRow = {
  id: string;
  email: string;
  first_name: string;
  last_name: string;
  role: string;
  manager_id: string | null;
  manager_name: string | null;
  is_manager_approver: boolean;
  status: string;
  is_email_verified: boolean;
  two_factor_enabled: boolean;
  last_login_at: Date | string | null;
  created_at: Date | string;
};

function mapListRow(r: UserListRow): UserView {
  return {
    id: r.id,
    email: r.email,
    firstName: r.first_name,
    lastName: r.last_name,
    name: `${r.first_name} ${r.last_name}`.trim(),
    role: toRole(r.role),
    managerId: r.manager_id,
    managerName: r.manager_name,
    isManagerApprover: r.is_manager_approver,
    status: toStatus(r.status),
    isEmailVerified: r.is_email_verified,
    twoFactorEnabled: r.two_factor_enabled,
    lastLoginAt: r.last_login_at ? new Date(r.last_login_at).toISOString() : null,
    createdAt: new Date(r.created_at).toISOString(),
  };
}

export async function listUsers(
  tenantId: string,
  input: ListUsersInput = {},
): Promise<Paginated<UserView>> {
  const filters = parseOrThrow(listUsersSchema, input);
  const limit = filters.limit;

  return withTenant(tenantId, async (tx) => {
    const conditions = [sql`u.tenant_id = ${tenantId}`];
    if (filters.role) conditions.push(sql`u.role = ${filters.role}`);
    if (filters.status) conditions.push(sql`u.status = ${filters.status}`);
    if (filters.search) {
      const pattern = `%${filters.search}%`;
      conditions.push(
        sql`(u.email ILIKE ${pattern} OR u.first_name ILIKE ${pattern} OR u.last_name ILIKE ${pattern})`,
      );
    }
    if (filters.cursor) conditions.push(sql`u.id < ${filters.cursor}`);

    const whereClause = conditions.reduce((acc, c) => sql`${acc} AND ${c}`);

    const rows = await tx.execute<UserListRow>(sql`
      SELECT u.id, u.email, u.first_name, u.last_name, u.role, u.manager_id,
             CASE WHEN m.id IS NULL THEN NULL ELSE m.first_name || ' ' || m.last_name END AS manager_name,
             u.is_manager_approver, u.status, u.is_email_verified, u.two_factor_enabled,
             u.last_login_at, u.created_at
      FROM users u
      LEFT JOIN users m ON m.id = u.manager_id AND m.tenant_id = u.tenant_id
      WHERE ${whereClause}
      ORDER BY u.id DESC
      LIMIT ${limit + 1}
    `);

    const all = Array.from(rows);
    const hasMore = all.length > limit;
    const items = all.slice(0, limit).map(mapListRow);
    const last = items[items.length - 1];

    return { items, cursor: hasMore && last ? last.id : null, hasMore };
  });
}

export async function getUser(tenantId: string, userId: string): Promise<UserView> {
  return withTenant(tenantId, async (tx) => {
    const user = await loadUser(tx, tenantId, userId);
    let managerName: string | null = null;
    if (user.managerId) {
      const [manager] = await tx
        .select({ firstName: users.firstName, lastName: users.lastName })
        .from(users)
        .where(and(eq(users.id, user.managerId), eq(users.tenantId, tenantId)))
        .limit(1);
      managerName = manager ? `${manager.firstName} ${manager.lastName}` : null;
    }
    return toView(user, managerName);
  });
}
