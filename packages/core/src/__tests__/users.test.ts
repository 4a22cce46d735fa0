import { describe, expect, it } from 'vitest';
import { ValidationError } from '@expensox/shared';
import {
  assertNoManagerCycle,
  generateTemporaryPassword,
  hashSecret,
  normalizeEmail,
  validatePassword,
  verifySecret,
} from '../users';

describe('user management helpers', () => {
  it('normalizes email', () => {
    expect(normalizeEmail('  Emery.Stone@Example.COM  ')).toBe('emery.stone@example.com');
  });

  it('validates password strength', () => {
    expect(validatePassword('abc123')).toBe('Password must be at least 8 characters');
    expect(validatePassword('12345678')).toBe('Password must contain a letter');
    expect(validatePassword('abcdefgh')).toBe('Password must contain a digit');
    expect(validatePassword('Password123')).toBeNull();
  });

  it('generates temporary passwords that pass validation', () => {
    for (let i = 0; i < 50; i++) {
      const password = generateTemporaryPassword();
      expect(password).toHaveLength(12);
      expect(validatePassword(password)).toBeNull();
    }
  });

  it('hashes and verifies secrets without plaintext storage', () => {
    const hash = hashSecret('MyS3cret!');
    expect(hash.startsWith('scrypt$')).toBe(true);
    expect(hash.includes('MyS3cret!')).toBe(false);
    expect(verifySecret('MyS3cret!', hash)).toBe(true);
    expect(verifySecret('wrong', hash)).toBe(false);
  });

  it('refuses malformed hashes', () => {
    expect(verifySecret('anything', 'bcrypt$abc$def')).toBe(false);
    expect(verifySecret('anything', 'scrypt$')).toBe(false);
  });
});

describe('assertNoManagerCycle', () => {
  // emery -> morgan -> avery (top)
  const managerOf = new Map<string, string | null>([
    ['avery', null],
    ['morgan', 'avery'],
    ['emery', 'morgan'],
    ['finley', 'avery'],
  ]);

  it('allows assigning a manager outside the reporting chain', () => {
    expect(() => assertNoManagerCycle('emery', 'finley', managerOf)).not.toThrow();
  });

  it('rejects making a user their own manager', () => {
    expect(() => assertNoManagerCycle('morgan', 'morgan', managerOf)).toThrow(ValidationError);
  });

  it('rejects assigning someone who reports to the user', () => {
    expect(() => assertNoManagerCycle('avery', 'emery', managerOf)).toThrow(
      ValidationError,
    );
  });

  it('terminates on an existing loop that does not involve the user', () => {
    const looped = new Map<string, string | null>([
      ['a', 'b'],
      ['b', 'a'],
    ]);
    expect(() => assertNoManagerCycle('c', 'a', looped)).not.toThrow();
  });
});
