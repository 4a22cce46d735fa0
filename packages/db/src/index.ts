export { db, withTenant, createAdminClient, sql, schema } from './client';
export type { Database } from './client';
export * from './schema';
