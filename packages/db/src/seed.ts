import dotenv from 'dotenv';

dotenv.config({ path: '../../.env.local' });
dotenv.config({ path: '../../.env' });

import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { randomBytes, scryptSync } from 'node:crypto';
import { generateUlid, todayIsoDate, monthBounds } from '@expensox/shared';
import {
  tenants,
  users,
  expenseCategories,
  budgets,
  approvalFlows,
  approvalFlowSteps,
  approvalRules,
  exchangeRates,
} from './schema';

// Same `scrypt$salt$digest` layout the auth adapter verifies.
function hashPassword(password: string): string {
  const salt = randomBytes(16).toString('hex');
  return `scrypt$${salt}$${scryptSync(password, salt, 64).toString('hex')}`;
}

const DEMO_PASSWORD = 'Password123';

async function seed() {
  const connectionString = process.env.DATABASE_URL_ADMIN || process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL_ADMIN or DATABASE_URL environment variable is required');
  }
  const client = postgres(connectionString, { max: 1 });
  const db = drizzle(client);

  const tenantId = generateUlid();
  const adminId = generateUlid();
  const managerId = generateUlid();
  const financeId = generateUlid();
  const employeeId = generateUlid();
  const passwordHash = hashPassword(DEMO_PASSWORD);

  await db.transaction(async (tx) => {
    await tx.insert(tenants).values({
      id: tenantId,
      name: 'Demo Company',
      slug: `demo-${tenantId.slice(-6).toLowerCase()}`,
      country: 'United States',
      currencyCode: 'USD',
    });

    const person = (id: string, firstName: string, role: string, manager: string | null) => ({
      id,
      tenantId,
      email: `${firstName.toLowerCase()}.${tenantId.slice(-6).toLowerCase()}@demo.example.com`,
      firstName,
      lastName: 'Demo',
      passwordHash,
      role,
      managerId: manager,
      isEmailVerified: true,
    });
    await tx.insert(users).values(person(adminId, 'Avery', 'admin', null));
    await tx.insert(users).values([
      person(managerId, 'Morgan', 'manager', adminId),
      person(financeId, 'Finley', 'manager', adminId),
    ]);
    await tx.insert(users).values(person(employeeId, 'Emery', 'employee', managerId));

    const categoryIds = new Map<string, string>();
    for (const name of ['General', 'Travel', 'Meals', 'Software']) {
      const id = generateUlid();
      categoryIds.set(name, id);
      await tx.insert(expenseCategories).values({ id, tenantId, name });
    }

    const period = monthBounds(new Date());
    const travelId = categoryIds.get('Travel');
    if (travelId) {
      await tx.insert(budgets).values({
        tenantId,
        categoryId: travelId,
        amount: '5000.00',
        currency: 'USD',
        periodStart: period.start,
        periodEnd: period.end,
        description: 'Monthly travel budget',
      });
    }

    const flowId = generateUlid();
    await tx.insert(approvalFlows).values({
      id: flowId,
      tenantId,
      name: 'Standard',
      description: 'Manager, then finance',
      isManagerApprover: true,
      isDefault: true,
      createdBy: adminId,
    });
    await tx.insert(approvalFlowSteps).values([
      { tenantId, flowId, sequence: 1, name: 'Finance', approverType: 'user', approverUserId: financeId },
      { tenantId, flowId, sequence: 2, name: 'Admin', approverType: 'role', approverRole: 'admin' },
    ]);
    await tx.insert(approvalRules).values({
      tenantId,
      flowId,
      name: 'Admin sign-off or two thirds',
      ruleType: 'hybrid',
      percentageThreshold: '66.67',
      specificApproverId: adminId,
      createdBy: adminId,
    });

    await tx.insert(exchangeRates).values([
      { tenantId, fromCurrency: 'EUR', toCurrency: 'USD', rate: '1.08500000', effectiveDate: todayIsoDate(), createdBy: adminId },
      { tenantId, fromCurrency: 'GBP', toCurrency: 'USD', rate: '1.27000000', effectiveDate: todayIsoDate(), createdBy: adminId },
      { tenantId, fromCurrency: 'INR', toCurrency: 'USD', rate: '0.01200000', effectiveDate: todayIsoDate(), createdBy: adminId },
    ]);
  });

  console.log(`Seeded tenant ${tenantId}; users share the password "${DEMO_PASSWORD}".`);
  await client.end();
}

seed().catch((err: unknown) => {
  console.error('Seed failed:', err);
  process.exit(1);
});
