import { EventEmitter } from 'node:events';
import type { BookService } from './books';
import type { SessionService } from './sessions';
import type { ActiveSession, ActiveSessionSnapshot, ReadingSession } from '@shared/types';
import { MS_PER_MINUTE, toTimestamp } from '@shared/time';
import { logger } from '@shared/logger';

export type StopSessionPayload = {
  pagesRead?: number;
  note?: string | null;
};

/**
 * Holds the one in-progress reading session. Nothing is written until `stop`,
 * which stores the captured start together with a fresh end; a restart while
 * active loses the record.
 */
export class ReadingSessionTracker extends EventEmitter {
  private current: ActiveSession | null = null;

  constructor(
    private books: BookService,
    private sessions: SessionService,
    private clock: () => Date = () => new Date()
  ) {
    super();
  }

  start(bookId: number): ActiveSession {
    if (this.current) {
      throw new Error('A reading session is already active');
    }
    const book = this.books.getById(bookId);
    if (!book) {
      throw new Error('Book not found');
    }
    const active: ActiveSession = {
      bookId: book.id,
      startTs: toTimestamp(this.clock()),
      label: `${book.title} - ${book.author}`
    };
    this.current = active;
    logger.info('Reading session started for', active.label);
    this.emit('started', active);
    return active;
  }

  getActive(): ActiveSessionSnapshot | null {
    if (!this.current) return null;
    const elapsed = this.clock().getTime() - Date.parse(this.current.startTs);
    return { ...this.current, elapsedMinutes: Math.max(0, Math.floor(elapsed / MS_PER_MINUTE)) };
  }

  stop(payload: StopSessionPayload = {}): ReadingSession | null {
    const active = this.current;
    if (!active) return null;
    const pagesRead = payload.pagesRead ?? 0;
    if (!Number.isSafeInteger(pagesRead) || pagesRead < 0) {
      throw new Error('Pages read must be a whole number of at least 0');
    }

    const endTs = toTimestamp(this.clock());
    // Cleared before the write: a failed insert (book deleted meanwhile) cannot be retried.
    this.current = null;
    const session = this.sessions.add({
      bookId: active.bookId,
      startTs: active.startTs,
      endTs,
      pagesRead,
      note: payload.note ?? null
    });
    logger.info('Reading session stopped for', active.label, `(${session.pagesRead} pages)`);
    this.emit('stopped', session);
    return session;
  }
}
