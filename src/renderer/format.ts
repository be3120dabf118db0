import type { Book, Shelf } from '@shared/types';

export const SHELF_LABELS: Record<Shelf, string> = {
  reading: 'Reading',
  to_read: 'To Read',
  finished: 'Finished'
};

export function bookLabel(book: Pick<Book, 'title' | 'author'>) {
  return `${book.title} - ${book.author}`;
}

export function formatHours(hours: number) {
  return hours.toFixed(1);
}

export function formatMinutes(minutes: number) {
  return String(Math.round(minutes));
}

export function formatPercent(fraction: number) {
  return `${Math.round(Math.min(1, Math.max(0, fraction)) * 100)}%`;
}

/** `2026-03` → `Mar 2026`, read in UTC so the label matches the bucket. */
export function formatMonthLabel(month: string) {
  const date = new Date(`${month}-01T00:00:00Z`);
  if (Number.isNaN(date.getTime())) return month;
  return date.toLocaleDateString('en-US', { month: 'short', year: 'numeric', timeZone: 'UTC' });
}

export function formatTimestamp(value: string) {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return value;
  return date.toLocaleString([], { dateStyle: 'medium', timeStyle: 'short' });
}

export function pickOption<T extends string>(options: readonly T[], value: string, fallback: T): T {
  return options.find((option) => option === value) ?? fallback;
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

/** Whole number within `[min, max]`, or null. Form fields keep their raw text and are read with this on submit. */
export function parseBoundedInt(value: string, min: number, max: number = Number.MAX_SAFE_INTEGER): number | null {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isSafeInteger(n) && n >= min && n <= max ? n : null;
}
