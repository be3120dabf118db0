export const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

const TIMESTAMP_PATTERN = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?)?$/i;

// Stored timestamps are UTC with second precision so that string order is time order.
export function toTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

export function nowTimestamp(): string {
  return toTimestamp(new Date());
}

/**
 * Parse an ISO-8601 style timestamp. Values without a zone designator are read as UTC,
 * and a space is accepted between the date and the time.
 */
export function parseTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) return null;
  const [, day, time, zone] = match;
  let offset = 'Z';
  if (zone && zone.length === 5) offset = `${zone.slice(0, 3)}:${zone.slice(3)}`;
  else if (zone && zone.length === 6) offset = zone;
  if (!isCalendarDay(day)) return null;
  const iso = time ? `${day}T${time}${offset}` : day;
  const ms = Date.parse(iso);
  return Number.isFinite(ms) ? new Date(ms) : null;
}

// Date.parse rolls impossible days (2026-02-30) into the next month.
function isCalendarDay(day: string): boolean {
  const ms = Date.parse(`${day}T00:00:00Z`);
  return Number.isFinite(ms) && utcDayKey(new Date(ms)) === day;
}

export function normalizeTimestamp(value: string): string | null {
  const parsed = parseTimestamp(value);
  return parsed ? toTimestamp(parsed) : null;
}

export function utcDayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function utcMonthKey(date: Date): string {
  return date.toISOString().slice(0, 7);
}
