import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import postgres from 'postgres';
import * as schema from './schema';

type DrizzleDB = ReturnType<typeof drizzle<typeof schema>>;

// Cached on globalThis so Next.js hot reloads reuse one pool.
declare global {
  var __expensox_db: DrizzleDB | undefined;
  var __expensox_admin_db: DrizzleDB | undefined;
}
const globalForDb = globalThis;

function poolMax(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function getDb(): DrizzleDB {
  if (!globalForDb.__expensox_db) {
    const connectionString = process.env.DATABASE_URL;
    if (!connectionString) {
      throw new Error('DATABASE_URL environment variable is required');
    }
    const client = postgres(connectionString, {
      max: poolMax(process.env.DB_POOL_MAX, 5),
      idle_timeout: 20,
      max_lifetime: 300,
      connect_timeout: 10,
      onnotice: (notice) => {
        console.warn(`[pg-notice] ${notice.severity}: ${notice.message}`);
      },
    });
    globalForDb.__expensox_db = drizzle(client, { schema });
  }
  return globalForDb.__expensox_db;
}

/** Lazily connected client; the pool opens on first property access. */
export const db: DrizzleDB = new Proxy({} as DrizzleDB, {
  get(_target, prop, receiver) {
    const instance = getDb();
    const value: unknown = Reflect.get(instance, prop, receiver);
    if (typeof value === 'function') {
      return value.bind(instance);
    }
    return value;
  },
});

/** Either the pooled client or an open transaction. */
export type Database = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

/** Transaction-scoped tenant: `app.current_tenant_id` is visible to RLS policies. */
export async function withTenant<T>(
  tenantId: string,
  callback: (tx: Database) => Promise<T>,
): Promise<T> {
  return db.transaction(async (tx) => {
    await tx.execute(sql`SELECT set_config('app.current_tenant_id', ${tenantId}, true)`);
    return callback(tx);
  });
}

/** Connection that bypasses tenant scoping, for signup, auth lookups and workers. */
export function createAdminClient(): DrizzleDB {
  if (!globalForDb.__expensox_admin_db) {
    const adminUrl = process.env.DATABASE_URL_ADMIN || process.env.DATABASE_URL;
    if (!adminUrl) {
      throw new Error('DATABASE_URL_ADMIN or DATABASE_URL environment variable is required');
    }
    const adminConn = postgres(adminUrl, {
      max: poolMax(process.env.DB_ADMIN_POOL_MAX, 2),
      idle_timeout: 20,
      max_lifetime: 300,
      connect_timeout: 10,
    });
    globalForDb.__expensox_admin_db = drizzle(adminConn, { schema });
  }
  return globalForDb.__expensox_admin_db;
}

export { sql, schema };
