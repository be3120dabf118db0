import DatabaseDriver from 'better-sqlite3';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { isShelf, type BookService } from './books';
import type { SessionService } from './sessions';
import type { ImportResult } from '@shared/types';
import { logger } from '@shared/logger';

const csvRecordsSchema = z.array(z.record(z.string()));

const BOOK_EXPORT_COLUMNS = ['id', 'title', 'author', 'isbn', 'total_pages', 'shelf', 'added_at'];
const SESSION_EXPORT_COLUMNS = ['id', 'book_id', 'title', 'author', 'start_ts', 'end_ts', 'duration_min', 'pages_read', 'note'];

export function parseCsv(text: string): Array<Record<string, string>> {
  const records: unknown = parse(text, {
    columns: (header: string[]) => header.map((name) => name.trim().toLowerCase()),
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
    bom: true
  });
  return csvRecordsSchema.parse(records);
}

function field(record: Record<string, string>, key: string): string {
  return (record[key] ?? '').trim();
}

function parseWholeNumber(value: string): number | null {
  if (!value) return null;
  const n = Number(value);
  return Number.isSafeInteger(n) ? n : null;
}

// Constraint failures and validation errors reject one row; anything else is a storage fault.
function isRowRejection(error: unknown): boolean {
  if (error instanceof DatabaseDriver.SqliteError) return error.code.startsWith('SQLITE_CONSTRAINT');
  return error instanceof Error;
}

export class TransferService {
  constructor(private books: BookService, private sessions: SessionService) { }

  exportBooksCsv(): string {
    const rows = this.books.list('title').map((book) => [
      book.id,
      book.title,
      book.author,
      book.isbn,
      book.totalPages,
      book.shelf,
      book.addedAt
    ]);
    return stringify([BOOK_EXPORT_COLUMNS, ...rows]);
  }

  exportSessionsCsv(): string {
    const rows = this.sessions.list().map((session) => [
      session.id,
      session.bookId,
      session.title,
      session.author,
      session.startTs,
      session.endTs,
      session.durationMinutes,
      session.pagesRead,
      session.note
    ]);
    return stringify([SESSION_EXPORT_COLUMNS, ...rows]);
  }

  /** Every row becomes a book; missing or invalid fields fall back to placeholders. */
  importBooksCsv(text: string): ImportResult {
    let imported = 0;
    for (const record of parseCsv(text)) {
      const totalPages = parseWholeNumber(field(record, 'total_pages'));
      const shelf = field(record, 'shelf');
      this.books.add({
        title: field(record, 'title') || 'Untitled',
        author: field(record, 'author') || 'Unknown',
        isbn: field(record, 'isbn') || null,
        totalPages: totalPages !== null && totalPages >= 1 ? totalPages : null,
        shelf: isShelf(shelf) ? shelf : 'to_read'
      });
      imported += 1;
    }
    logger.info('Imported books from CSV:', imported);
    return { imported, skipped: 0 };
  }

  /** Rows are stored independently; a row that cannot be stored is counted as skipped. */
  importSessionsCsv(text: string): ImportResult {
    let imported = 0;
    let skipped = 0;
    for (const record of parseCsv(text)) {
      const bookId = parseWholeNumber(field(record, 'book_id'));
      const pagesField = field(record, 'pages_read');
      const pagesRead = pagesField ? parseWholeNumber(pagesField) : 0;
      if (bookId === null || pagesRead === null) {
        skipped += 1;
        continue;
      }
      try {
        this.sessions.add({
          bookId,
          startTs: field(record, 'start_ts'),
          endTs: field(record, 'end_ts'),
          pagesRead,
          note: field(record, 'note') || null
        });
        imported += 1;
      } catch (error) {
        if (!isRowRejection(error)) throw error;
        skipped += 1;
      }
    }
    logger.info('Imported sessions from CSV:', imported, 'skipped:', skipped);
    return { imported, skipped };
  }
}
