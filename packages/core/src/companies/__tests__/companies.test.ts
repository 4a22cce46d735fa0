import { describe, it, expect, vi, beforeEach } from 'vitest';

const {
  mockSelectResult,
  mockInsertValues,
  mockWriteEvents,
  mockIssueOtp,
  mockAuditLog,
  mockAuditLogSystem,
  mockTxSelectResults,
  mockUpdateSet,
} = vi.hoisted(() => ({
  mockSelectResult: vi.fn(),
  mockInsertValues: vi.fn(),
  mockWriteEvents: vi.fn().mockResolvedValue(undefined),
  mockIssueOtp: vi.fn(),
  mockAuditLog: vi.fn().mockResolvedValue(undefined),
  mockAuditLogSystem: vi.fn().mockResolvedValue(undefined),
  mockTxSelectResults: vi.fn(),
  mockUpdateSet: vi.fn(),
}));

vi.mock('drizzle-orm', () => ({
  eq: vi.fn((col: unknown, val: unknown) => ({ eq: [col, val] })),
  and: vi.fn((...args: unknown[]) => ({ and: args })),
  sql: vi.fn(() => 'sql'),
}));

vi.mock('@expensox/db', () => {
  const insertTx = {
    insert: vi.fn((table: { _name: string }) => ({
      values: vi.fn((values: Record<string, unknown>) => {
        mockInsertValues(table._name, values);
        const done = Promise.resolve(undefined);
        return Object.assign(done, { onConflictDoNothing: vi.fn().mockResolvedValue(undefined) });
      }),
    })),
  };
  return {
    createAdminClient: vi.fn(() => ({
      select: vi.fn(() => ({
        from: () => ({ where: () => ({ limit: () => mockSelectResult() }) }),
      })),
      transaction: vi.fn(async (cb: (tx: unknown) => Promise<unknown>) => cb(insertTx)),
    })),
    withTenant: vi.fn(),
    tenants: { _name: 'tenants', id: 'tenants.id' },
    users: { _name: 'users', id: 'users.id', email: 'users.email' },
    expenses: { _name: 'expenses', tenantId: 'expenses.tenantId' },
    expenseCategories: { _name: 'expenseCategories' },
  };
});

vi.mock('../../events', () => ({
  getOutboxWriter: () => ({ writeEvents: mockWriteEvents }),
}));

vi.mock('../../events/publish-with-outbox', () => ({
  publishWithOutbox: vi.fn(
    async (_ctx: unknown, fn: (tx: unknown) => Promise<{ result: unknown; events: unknown[] }>) => {
      const tx = {
        select: vi.fn(() => ({
          from: () => {
            const where = () => {
              const rows = mockTxSelectResults();
              return Object.assign(Promise.resolve(rows), { limit: async () => rows });
            };
            return { where };
          },
        })),
        update: vi.fn(() => ({
          set: (values: Record<string, unknown>) => {
            mockUpdateSet(values);
            return { where: () => ({ returning: async () => [{ ...companyRow, ...values }] }) };
          },
        })),
      };
      const { result } = await fn(tx);
      return result;
    },
  ),
}));

vi.mock('../../otp/otp-service', () => ({ issueOtp: mockIssueOtp }));

vi.mock('../../audit/helpers', () => ({
  auditLog: mockAuditLog,
  auditLogSystem: mockAuditLogSystem,
}));

import { ConflictError, ValidationError } from '@expensox/shared';
import type { RequestContext } from '../../auth/context';
import { findCountry, getCurrencyForCountry, listCountries } from '../countries';
import { signUpCompany, updateCompany } from '../companies';

const companyRow = {
  id: 'tenant_1',
  name: 'Northwind Travel',
  slug: 'northwind-travel-abc123',
  country: 'India',
  currencyCode: 'INR',
  status: 'active',
  createdAt: new Date('2026-01-05T09:00:00.000Z'),
  updatedAt: new Date('2026-01-05T09:00:00.000Z'),
};

function createCtx(): RequestContext {
  return {
    user: {
      id: 'user_admin',
      email: 'avery@example.com',
      name: 'Avery Admin',
      tenantId: 'tenant_1',
      role: 'admin',
      managerId: null,
      tenantStatus: 'active',
      membershipStatus: 'active',
    },
    tenantId: 'tenant_1',
    requestId: 'req_1',
  };
}

const signup = {
  companyName: 'Northwind Travel',
  country: 'india',
  adminFirstName: 'Avery',
  adminLastName: 'Quinn',
  email: ' Avery@Northwind.test ',
  password: 'Password123',
};

describe('country lookup', () => {
  it('finds currencies case-insensitively', () => {
    expect(getCurrencyForCountry('india')).toBe('INR');
    expect(getCurrencyForCountry('  United Kingdom ')).toBe('GBP');
    expect(findCountry('GERMANY')).toEqual({ country: 'Germany', currencyCode: 'EUR' });
  });

  it('returns null for unknown countries', () => {
    expect(getCurrencyForCountry('Atlantis')).toBeNull();
  });

  it('lists countries alphabetically', () => {
    const names = listCountries().map((c) => c.country);
    expect(names[0]).toBe('Andorra');
    expect([...names].sort((a, b) => a.localeCompare(b))).toEqual(names);
  });
});

describe('signUpCompany', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockSelectResult.mockResolvedValue([]);
    mockIssueOtp.mockResolvedValue({
      otpId: 'otp_1',
      expiresAt: '2026-03-10T12:10:00.000Z',
      delivered: true,
    });
  });

  it('creates tenant, unverified admin and default category', async () => {
    const result = await signUpCompany(signup);

    const inserts = new Map(mockInsertValues.mock.calls.map(([table, values]) => [table, values]));
    expect(inserts.get('tenants')).toMatchObject({
      id: result.tenantId,
      name: 'Northwind Travel',
      country: 'India',
      currencyCode: 'INR',
      status: 'active',
    });
    expect(inserts.get('users')).toMatchObject({
      id: result.userId,
      tenantId: result.tenantId,
      email: 'avery@northwind.test',
      role: 'admin',
      isEmailVerified: false,
    });
    expect(inserts.get('expenseCategories')).toMatchObject({
      tenantId: result.tenantId,
      name: 'General',
    });
    expect(result.otpExpiresAt).toBe('2026-03-10T12:10:00.000Z');
  });

  it('writes the company event and issues a signup code', async () => {
    const result = await signUpCompany(signup);

    expect(mockWriteEvents).toHaveBeenCalledWith(expect.anything(), [
      expect.objectContaining({
        eventType: 'identity.company.created.v1',
        tenantId: result.tenantId,
        actorUserId: result.userId,
      }),
    ]);
    expect(mockIssueOtp).toHaveBeenCalledWith({
      tenantId: result.tenantId,
      userId: result.userId,
      email: 'avery@northwind.test',
      purpose: 'signup',
      name: 'Avery',
    });
    expect(mockAuditLogSystem).toHaveBeenCalledWith(
      result.tenantId,
      'company.created',
      'company',
      result.tenantId,
      { adminUserId: result.userId, country: 'India', currencyCode: 'INR' },
    );
  });

  it('keeps an explicit currency over the country default', async () => {
    await signUpCompany({ ...signup, currencyCode: 'usd' });
    const tenantInsert = mockInsertValues.mock.calls.find(([table]) => table === 'tenants');
    expect(tenantInsert?.[1]).toMatchObject({ currencyCode: 'USD' });
  });

  it('requires a currency for countries outside the table', async () => {
    await expect(signUpCompany({ ...signup, country: 'Atlantis' })).rejects.toThrow(ValidationError);
    expect(mockInsertValues).not.toHaveBeenCalled();
  });

  it('rejects an email already in use', async () => {
    mockSelectResult.mockResolvedValue([{ id: 'user_other' }]);
    await expect(signUpCompany(signup)).rejects.toThrow(ConflictError);
    expect(mockIssueOtp).not.toHaveBeenCalled();
  });

  it('rejects a weak password', async () => {
    await expect(signUpCompany({ ...signup, password: 'password' })).rejects.toThrow(
      'Validation failed',
    );
  });
});

describe('updateCompany', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('renames the company and audits the change', async () => {
    mockTxSelectResults.mockReturnValueOnce([companyRow]);

    const view = await updateCompany(createCtx(), { name: 'Northwind Trips' });

    expect(view.name).toBe('Northwind Trips');
    expect(mockAuditLog).toHaveBeenCalledWith(
      expect.anything(),
      'company.updated',
      'company',
      'tenant_1',
      { name: { old: 'Northwind Travel', new: 'Northwind Trips' } },
    );
  });

  it('refuses a currency change once expenses exist', async () => {
    mockTxSelectResults.mockReturnValueOnce([companyRow]).mockReturnValueOnce([{ count: 3 }]);

    await expect(updateCompany(createCtx(), { currencyCode: 'USD' })).rejects.toThrow(ConflictError);
    expect(mockUpdateSet).not.toHaveBeenCalled();
  });

  it('allows a currency change before any expense', async () => {
    mockTxSelectResults.mockReturnValueOnce([companyRow]).mockReturnValueOnce([{ count: 0 }]);

    const view = await updateCompany(createCtx(), { currencyCode: 'usd' });

    expect(view.currencyCode).toBe('USD');
  });
});
