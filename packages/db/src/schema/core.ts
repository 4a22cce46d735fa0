import {
  pgTable,
  text,
  boolean,
  integer,
  timestamp,
  jsonb,
  uniqueIndex,
  index,
  primaryKey,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core';
import { generateUlid } from '@expensox/shared';

// ── Tenants (companies) ──────────────────────────────────────────
export const tenants = pgTable('tenants', {
  id: text('id').primaryKey().$defaultFn(generateUlid),
  name: text('name').notNull(),
  slug: text('slug').notNull().unique(),
  country: text('country').notNull(),
  currencyCode: text('currency_code').notNull().default('USD'),
  status: text('status').notNull().default('active'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

// ── Users ────────────────────────────────────────────────────────
export const users = pgTable(
  'users',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    tenantId: text('tenant_id')
      .notNull()
      .references(() => tenants.id),
    email: text('email').notNull().unique(),
    firstName: text('first_name').notNull(),
    lastName: text('last_name').notNull(),
    passwordHash: text('password_hash').notNull(),
    role: text('role').notNull().default('employee'),
    managerId: text('manager_id').references((): AnyPgColumn => users.id),
    isManagerApprover: boolean('is_manager_approver').notNull().default(false),
    status: text('status').notNull().default('active'),
    isEmailVerified: boolean('is_email_verified').notNull().default(false),
    twoFactorEnabled: boolean('two_factor_enabled').notNull().default(false),
    lastLoginAt: timestamp('last_login_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_users_tenant_role').on(table.tenantId, table.role),
    index('idx_users_tenant_manager').on(table.tenantId, table.managerId),
  ],
);

// ── OTP Verifications ────────────────────────────────────────────
export const otpVerifications = pgTable(
  'otp_verifications',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    tenantId: text('tenant_id')
      .notNull()
      .references(() => tenants.id),
    userId: text('user_id')
      .notNull()
      .references(() => users.id),
    purpose: text('purpose').notNull(),
    email: text('email').notNull(),
    codeHash: text('code_hash').notNull(),
    attempts: integer('attempts').notNull().default(0),
    maxAttempts: integer('max_attempts').notNull().default(5),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    usedAt: timestamp('used_at', { withTimezone: true }),
    verifiedAt: timestamp('verified_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_otp_user_purpose').on(table.userId, table.purpose, table.createdAt),
    index('idx_otp_expires').on(table.expiresAt),
  ],
);

// ── Audit Log ────────────────────────────────────────────────────
export const auditLog = pgTable(
  'audit_log',
  {
    id: text('id').notNull().$defaultFn(generateUlid),
    tenantId: text('tenant_id').notNull(),
    actorUserId: text('actor_user_id'),
    actorType: text('actor_type').notNull().default('user'),
    action: text('action').notNull(),
    entityType: text('entity_type').notNull(),
    entityId: text('entity_id').notNull(),
    changes: jsonb('changes'),
    metadata: jsonb('metadata'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.id, table.createdAt] }),
    index('idx_audit_tenant_created').on(table.tenantId, table.createdAt),
    index('idx_audit_entity').on(table.tenantId, table.entityType, table.entityId),
    index('idx_audit_actor').on(table.tenantId, table.actorUserId, table.createdAt),
  ],
);

// ── Event Outbox ─────────────────────────────────────────────────
export const eventOutbox = pgTable(
  'event_outbox',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    tenantId: text('tenant_id').notNull(),
    eventType: text('event_type').notNull(),
    eventId: text('event_id').notNull().unique(),
    idempotencyKey: text('idempotency_key').notNull(),
    payload: jsonb('payload').notNull(),
    occurredAt: timestamp('occurred_at', { withTimezone: true }).notNull().defaultNow(),
    publishedAt: timestamp('published_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_outbox_unpublished').on(table.publishedAt)],
);

// ── Processed Events ─────────────────────────────────────────────
export const processedEvents = pgTable(
  'processed_events',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    tenantId: text('tenant_id'),
    eventId: text('event_id').notNull(),
    consumerName: text('consumer_name').notNull(),
    processedAt: timestamp('processed_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [uniqueIndex('uq_processed_events').on(table.eventId, table.consumerName)],
);
