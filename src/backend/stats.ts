import { MS_PER_DAY, MS_PER_HOUR, MS_PER_MINUTE, parseTimestamp, utcDayKey, utcMonthKey } from '@shared/time';
import type {
  Book,
  DailyAggregate,
  GoalProgress,
  Goals,
  MonthlyAggregate,
  ReadingSession,
  ShelfCounts,
  StatsSummary
} from '@shared/types';

type TimedSession = Pick<ReadingSession, 'startTs' | 'endTs' | 'pagesRead'>;
type ShelvedBook = Pick<Book, 'shelf'>;

export const DEFAULT_DAILY_WINDOW = 30;

function startDate(session: TimedSession): Date | null {
  return parseTimestamp(session.startTs);
}

export function sessionDurationMs(session: TimedSession): number {
  const start = parseTimestamp(session.startTs);
  const end = parseTimestamp(session.endTs);
  return start && end ? end.getTime() - start.getTime() : 0;
}

export function totalHours(sessions: TimedSession[]): number {
  return sessions.reduce((acc, session) => acc + sessionDurationMs(session), 0) / MS_PER_HOUR;
}

export function totalPages(sessions: TimedSession[]): number {
  return sessions.reduce((acc, session) => acc + session.pagesRead, 0);
}

export function countBooksByShelf(books: ShelvedBook[]): ShelfCounts {
  const counts: ShelfCounts = { reading: 0, to_read: 0, finished: 0 };
  for (const book of books) {
    counts[book.shelf] += 1;
  }
  return counts;
}

/** Minutes of reading whose session started on the given UTC day (`YYYY-MM-DD`). */
export function minutesOnDay(sessions: TimedSession[], dayKey: string): number {
  let ms = 0;
  for (const session of sessions) {
    const start = startDate(session);
    if (start && utcDayKey(start) === dayKey) {
      ms += sessionDurationMs(session);
    }
  }
  return ms / MS_PER_MINUTE;
}

export function minutesToday(sessions: TimedSession[], now: Date = new Date()): number {
  return minutesOnDay(sessions, utcDayKey(now));
}

export function monthlyAggregates(sessions: TimedSession[]): MonthlyAggregate[] {
  const byMonth = new Map<string, { pages: number; ms: number }>();
  for (const session of sessions) {
    const start = startDate(session);
    if (!start) continue;
    const key = utcMonthKey(start);
    const bucket = byMonth.get(key) ?? { pages: 0, ms: 0 };
    bucket.pages += session.pagesRead;
    bucket.ms += sessionDurationMs(session);
    byMonth.set(key, bucket);
  }
  return [...byMonth.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([month, bucket]) => ({ month, pages: bucket.pages, hours: bucket.ms / MS_PER_HOUR }));
}

export function dailyAggregates(
  sessions: TimedSession[],
  options: { days?: number; now?: Date } = {}
): DailyAggregate[] {
  const days = Math.max(1, Math.floor(options.days ?? DEFAULT_DAILY_WINDOW));
  const now = options.now ?? new Date();
  const byDay = new Map<string, { pages: number; ms: number }>();
  for (let offset = days - 1; offset >= 0; offset -= 1) {
    byDay.set(utcDayKey(new Date(now.getTime() - offset * MS_PER_DAY)), { pages: 0, ms: 0 });
  }
  for (const session of sessions) {
    const start = startDate(session);
    if (!start) continue;
    const bucket = byDay.get(utcDayKey(start));
    if (!bucket) continue;
    bucket.pages += session.pagesRead;
    bucket.ms += sessionDurationMs(session);
  }
  return [...byDay.entries()].map(([day, bucket]) => ({ day, minutes: bucket.ms / MS_PER_MINUTE, pages: bucket.pages }));
}

export function buildStatsSummary(
  books: ShelvedBook[],
  sessions: TimedSession[],
  options: { days?: number; now?: Date } = {}
): StatsSummary {
  const shelfCounts = countBooksByShelf(books);
  const hoursLogged = totalHours(sessions);
  return {
    booksInLibrary: books.length,
    currentlyReading: shelfCounts.reading,
    finished: shelfCounts.finished,
    hoursLogged,
    pagesLogged: totalPages(sessions),
    sessionCount: sessions.length,
    averageSessionMinutes: sessions.length ? (hoursLogged * 60) / sessions.length : 0,
    shelfCounts,
    monthly: monthlyAggregates(sessions),
    daily: dailyAggregates(sessions, options)
  };
}

function ratio(value: number, goal: number) {
  if (goal <= 0) return 0;
  return Math.min(1, value / goal);
}

export function buildGoalProgress(
  goals: Goals,
  books: ShelvedBook[],
  sessions: TimedSession[],
  now: Date = new Date()
): GoalProgress {
  const today = minutesToday(sessions, now);
  const booksFinished = countBooksByShelf(books).finished;
  return {
    minutesToday: today,
    dailyMinutesGoal: goals.dailyMinutes,
    dailyProgress: ratio(today, goals.dailyMinutes),
    booksFinished,
    yearlyBooksGoal: goals.yearlyBooks,
    yearlyProgress: ratio(booksFinished, goals.yearlyBooks)
  };
}
