import { describe, expect, it } from 'vitest';
import { normalizeTimestamp, parseTimestamp, toTimestamp, utcDayKey, utcMonthKey } from '@shared/time';

describe('timestamps', () => {
  it('stores UTC with second precision', () => {
    expect(toTimestamp(new Date('2026-03-01T09:15:42.987Z'))).toBe('2026-03-01T09:15:42Z');
  });

  it('reads zone-less values as UTC', () => {
    expect(normalizeTimestamp('2026-03-01T09:00:00')).toBe('2026-03-01T09:00:00Z');
    expect(normalizeTimestamp('2026-03-01 09:00')).toBe('2026-03-01T09:00:00Z');
    expect(normalizeTimestamp('2026-03-01')).toBe('2026-03-01T00:00:00Z');
  });

  it('converts offsets to UTC', () => {
    expect(normalizeTimestamp('2026-03-01T10:30:00+0200')).toBe('2026-03-01T08:30:00Z');
    expect(normalizeTimestamp('2026-03-01T10:30:00-05:00')).toBe('2026-03-01T15:30:00Z');
  });

  it('rejects values that are not dates', () => {
    expect(parseTimestamp('yesterday')).toBeNull();
    expect(parseTimestamp('2026-13-01T00:00:00Z')).toBeNull();
    expect(normalizeTimestamp('')).toBeNull();
  });

  it('rejects days that do not exist instead of rolling them over', () => {
    expect(parseTimestamp('2026-02-30T10:00:00')).toBeNull();
    expect(parseTimestamp('2026-02-29')).toBeNull();
    expect(parseTimestamp('2026-04-31 08:00')).toBeNull();
    expect(normalizeTimestamp('2028-02-29T10:00:00')).toBe('2028-02-29T10:00:00Z');
  });

  it('checks the written day before applying the offset', () => {
    expect(normalizeTimestamp('2026-03-01T01:00:00+05:00')).toBe('2026-02-28T20:00:00Z');
  });

  it('keys days and months on the UTC calendar', () => {
    const late = new Date('2026-01-31T23:30:00Z');
    expect(utcDayKey(late)).toBe('2026-01-31');
    expect(utcMonthKey(late)).toBe('2026-01');
  });
});
