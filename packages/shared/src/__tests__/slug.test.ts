import { describe, it, expect } from 'vitest';
import { generateSlug } from '../utils/slug';
import { monthBounds, toIsoDate } from '../utils/date';

describe('generateSlug', () => {
  it('lowercases and hyphenates company names', () => {
    expect(generateSlug('Acme Travel & Co')).toBe('acme-travel-co');
    expect(generateSlug("O'Brien Consulting")).toBe('obrien-consulting');
    expect(generateSlug(' -Northwind- ')).toBe('northwind');
  });

  it('truncates to 60 characters', () => {
    expect(generateSlug('a'.repeat(100))).toHaveLength(60);
  });
});

describe('date helpers', () => {
  it('formats the UTC calendar date', () => {
    expect(toIsoDate(new Date('2026-03-09T23:59:59Z'))).toBe('2026-03-09');
  });

  it('returns month bounds including leap days', () => {
    expect(monthBounds(new Date('2028-02-10T12:00:00Z'))).toEqual({
      start: '2028-02-01',
      end: '2028-02-29',
    });
    expect(monthBounds(new Date('2026-12-31T00:00:00Z'))).toEqual({
      start: '2026-12-01',
      end: '2026-12-31',
    });
  });
});
