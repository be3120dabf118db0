import { EventEmitter } from 'node:events';
import DatabaseDriver, { type Statement } from 'better-sqlite3';
import type { Database } from './storage';
import { MS_PER_MINUTE, normalizeTimestamp, parseTimestamp } from '@shared/time';
import type { ReadingSession, ReadingSessionInput, ReadingSessionWithBook } from '@shared/types';

type SessionRow = {
  id: number;
  book_id: number;
  start_ts: string;
  end_ts: string;
  pages_read: number;
  note: string | null;
};

type SessionWithBookRow = SessionRow & {
  title: string;
  author: string;
};

const LIST_SQL = `
  SELECT s.id, s.book_id, s.start_ts, s.end_ts, s.pages_read, s.note, b.title, b.author
  FROM sessions s
  JOIN books b ON b.id = s.book_id
  ORDER BY s.start_ts DESC, s.id DESC
`;

function durationMinutes(startTs: string, endTs: string): number {
  const start = parseTimestamp(startTs);
  const end = parseTimestamp(endTs);
  return start && end ? (end.getTime() - start.getTime()) / MS_PER_MINUTE : 0;
}

export function isForeignKeyError(error: unknown): boolean {
  return error instanceof DatabaseDriver.SqliteError && error.code === 'SQLITE_CONSTRAINT_FOREIGNKEY';
}

export class SessionService extends EventEmitter {
  private db = this.database.connection;

  private listStmt: Statement;
  private listLimitedStmt: Statement;
  private insertStmt: Statement;

  constructor(private database: Database) {
    super();
    this.listStmt = this.db.prepare(LIST_SQL);
    this.listLimitedStmt = this.db.prepare(`${LIST_SQL} LIMIT ?`);
    this.insertStmt = this.db.prepare(
      'INSERT INTO sessions(book_id, start_ts, end_ts, pages_read, note) VALUES (?, ?, ?, ?, ?)'
    );
  }

  private rowToSession(row: SessionWithBookRow): ReadingSessionWithBook {
    return {
      id: row.id,
      bookId: row.book_id,
      startTs: row.start_ts,
      endTs: row.end_ts,
      pagesRead: row.pages_read,
      note: row.note,
      title: row.title,
      author: row.author,
      durationMinutes: durationMinutes(row.start_ts, row.end_ts)
    };
  }

  private insert(bookId: number, startTs: string, endTs: string, pagesRead: number, note: string | null) {
    try {
      return this.db.transaction(() => this.insertStmt.run(bookId, startTs, endTs, pagesRead, note))();
    } catch (error) {
      if (isForeignKeyError(error)) throw new Error('Book not found');
      throw error;
    }
  }

  list(limit?: number): ReadingSessionWithBook[] {
    const capped = typeof limit === 'number' && Number.isInteger(limit) && limit > 0;
    const rows = this.db.transaction(() =>
      (capped ? this.listLimitedStmt.all(limit) : this.listStmt.all()) as SessionWithBookRow[]
    )();
    return rows.map((row) => this.rowToSession(row));
  }

  add(input: ReadingSessionInput): ReadingSession {
    const startTs = normalizeTimestamp(input.startTs);
    const endTs = normalizeTimestamp(input.endTs);
    if (!startTs || !endTs) {
      throw new Error('Session timestamps must be ISO-8601 dates');
    }
    if (endTs < startTs) {
      throw new Error('Session end must not be before its start');
    }
    const pagesRead = input.pagesRead ?? 0;
    if (!Number.isSafeInteger(pagesRead) || pagesRead < 0) {
      throw new Error('Pages read must be a whole number of at least 0');
    }
    const note = typeof input.note === 'string' && input.note.trim() ? input.note.trim() : null;

    const result = this.insert(input.bookId, startTs, endTs, pagesRead, note);

    const session: ReadingSession = {
      id: Number(result.lastInsertRowid),
      bookId: input.bookId,
      startTs,
      endTs,
      pagesRead,
      note
    };
    this.emit('added', session);
    return session;
  }
}
