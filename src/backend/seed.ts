import type { Database } from './storage';
import type { BookInput } from '@shared/types';
import { MS_PER_HOUR, toTimestamp } from '@shared/time';
import { logger } from '@shared/logger';
import { DEFAULT_DAILY_MINUTES, DEFAULT_YEARLY_BOOKS } from './goals';

export const SAMPLE_BOOKS: Array<Required<BookInput>> = [
  { title: 'The Quiet Orchard', author: 'Mara Ellison', isbn: '9780000000011', totalPages: 320, shelf: 'reading' },
  { title: 'Tides of the Northern Sea', author: 'Jon Halvorsen', isbn: '9780000000028', totalPages: 496, shelf: 'to_read' },
  { title: 'Practical Bookbinding', author: 'Ines Carvalho', isbn: '9780000000035', totalPages: 352, shelf: 'finished' }
];

const SAMPLE_SESSION = { pagesRead: 25, note: 'Morning session' };

/**
 * Populate empty tables with a few illustrative rows. Each table is checked on
 * its own, so a library that already has books never gets sample ones.
 */
export function seedSampleData(database: Database, now: Date = new Date()) {
  const db = database.connection;
  const count = (table: 'books' | 'sessions' | 'goals') =>
    (db.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get() as { count: number }).count;

  db.transaction(() => {
    if (count('books') === 0) {
      const insertBook = db.prepare(
        'INSERT INTO books(title, author, isbn, total_pages, shelf, added_at) VALUES (?, ?, ?, ?, ?, ?)'
      );
      const addedAt = toTimestamp(now);
      for (const book of SAMPLE_BOOKS) {
        insertBook.run(book.title, book.author, book.isbn, book.totalPages, book.shelf, addedAt);
      }
      logger.info('Seeded sample books:', SAMPLE_BOOKS.length);
    }

    if (count('sessions') === 0) {
      const row = db.prepare('SELECT id FROM books WHERE title = ? ORDER BY id LIMIT 1').get(SAMPLE_BOOKS[0].title) as
        | { id: number }
        | undefined;
      if (row) {
        db.prepare('INSERT INTO sessions(book_id, start_ts, end_ts, pages_read, note) VALUES (?, ?, ?, ?, ?)').run(
          row.id,
          toTimestamp(new Date(now.getTime() - MS_PER_HOUR)),
          toTimestamp(now),
          SAMPLE_SESSION.pagesRead,
          SAMPLE_SESSION.note
        );
      }
    }

    if (count('goals') === 0) {
      db.prepare('INSERT INTO goals(id, year, daily_minutes, yearly_books) VALUES (1, ?, ?, ?)').run(
        now.getUTCFullYear(),
        DEFAULT_DAILY_MINUTES,
        DEFAULT_YEARLY_BOOKS
      );
    }
  })();
}
