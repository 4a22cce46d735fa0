import dotenv from 'dotenv';
import { fileURLToPath } from 'node:url';

const rootEnv = (name: string) => fileURLToPath(new URL(`../../../${name}`, import.meta.url));
dotenv.config({ path: rootEnv('.env.local') });
dotenv.config({ path: rootEnv('.env') });

import { drizzle } from 'drizzle-orm/postgres-js';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import postgres from 'postgres';

// Written by `npm run db:generate` from src/schema
const MIGRATIONS_FOLDER = fileURLToPath(new URL('../migrations', import.meta.url));

function maskPassword(url: string): string {
  return url.replace(/:[^:@/]+@/, ':***@');
}

async function runMigrations(): Promise<void> {
  const url = process.env.DATABASE_URL_ADMIN || process.env.DATABASE_URL;
  if (!url) {
    throw new Error('DATABASE_URL_ADMIN or DATABASE_URL environment variable is required');
  }

  console.log(`Migrating ${maskPassword(url)} from ${MIGRATIONS_FOLDER}`);
  const client = postgres(url, { max: 1, onnotice: () => {} });
  try {
    await migrate(drizzle(client), { migrationsFolder: MIGRATIONS_FOLDER });
    console.log('Migrations complete.');
  } finally {
    await client.end();
  }
}

runMigrations().catch((err: unknown) => {
  console.error('Migration failed:', err);
  process.exit(1);
});
