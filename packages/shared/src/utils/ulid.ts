import { monotonicFactory } from 'ulid';

const CROCKFORD_BASE32 = /^[0123456789ABCDEFGHJKMNPQRSTVWXYZ]{26}$/;

const ulid = monotonicFactory();

export function generateUlid(): string {
  return ulid();
}

export function isValidUlid(value: string): boolean {
  return typeof value === 'string' && CROCKFORD_BASE32.test(value);
}

/** Trailing random characters of a fresh ULID, for human-facing reference numbers. */
export function generateShortCode(length: number = 6): string {
  return generateUlid().slice(-length);
}
