import { EventEmitter } from 'node:events';
import type { Statement } from 'better-sqlite3';
import type { Database } from './storage';
import type { Goals } from '@shared/types';

type GoalsRow = {
  year: number;
  daily_minutes: number;
  yearly_books: number;
};

export const DEFAULT_DAILY_MINUTES = 30;
export const DEFAULT_YEARLY_BOOKS = 24;

export function defaultGoals(now: Date = new Date()): Goals {
  return { year: now.getUTCFullYear(), dailyMinutes: DEFAULT_DAILY_MINUTES, yearlyBooks: DEFAULT_YEARLY_BOOKS };
}

export class GoalsService extends EventEmitter {
  private db = this.database.connection;
  private getStmt: Statement;
  private upsertStmt: Statement;

  constructor(private database: Database) {
    super();
    this.getStmt = this.db.prepare('SELECT year, daily_minutes, yearly_books FROM goals WHERE id = 1');
    this.upsertStmt = this.db.prepare(`
      INSERT INTO goals(id, year, daily_minutes, yearly_books) VALUES (1, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        year = excluded.year,
        daily_minutes = excluded.daily_minutes,
        yearly_books = excluded.yearly_books
    `);
  }

  get(now: Date = new Date()): Goals {
    const row = this.getStmt.get() as GoalsRow | undefined;
    if (!row) return defaultGoals(now);
    return { year: row.year, dailyMinutes: row.daily_minutes, yearlyBooks: row.yearly_books };
  }

  update(goals: Goals): Goals {
    for (const [key, value] of Object.entries(goals)) {
      if (!Number.isSafeInteger(value)) throw new Error(`Goal ${key} must be a whole number`);
    }
    this.db.transaction(() => {
      this.upsertStmt.run(goals.year, goals.dailyMinutes, goals.yearlyBooks);
    })();
    const next = { year: goals.year, dailyMinutes: goals.dailyMinutes, yearlyBooks: goals.yearlyBooks };
    this.emit('updated', next);
    return next;
  }
}
