import { EventEmitter } from 'node:events';
import type { Statement } from 'better-sqlite3';
import type { Database } from './storage';
import { nowTimestamp } from '@shared/time';
import { BOOK_SORT_COLUMNS, SHELVES, type Book, type BookInput, type BookSortColumn, type Shelf, type ShelfCounts } from '@shared/types';

type BookRow = {
  id: number;
  title: string;
  author: string;
  isbn: string | null;
  total_pages: number | null;
  shelf: Shelf;
  added_at: string;
};

const BOOK_COLUMNS = 'id, title, author, isbn, total_pages, shelf, added_at';

export function isShelf(value: unknown): value is Shelf {
  return typeof value === 'string' && (SHELVES as readonly string[]).includes(value);
}

export function resolveSortColumn(value: unknown): BookSortColumn {
  const match = BOOK_SORT_COLUMNS.find((column) => column === value);
  return match ?? 'title';
}

function ensureShelf(value: unknown): Shelf {
  if (value === undefined || value === null) return 'to_read';
  if (isShelf(value)) return value;
  throw new Error('Shelf must be one of reading, to_read, finished');
}

function ensureTotalPages(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new Error('Total pages must be a whole number of at least 1');
  }
  return n;
}

function normalizeInput(input: BookInput) {
  const title = String(input.title ?? '').trim();
  const author = String(input.author ?? '').trim();
  if (!title || !author) {
    throw new Error('Title and author are required');
  }
  const isbn = typeof input.isbn === 'string' && input.isbn.trim() ? input.isbn.trim() : null;
  return {
    title,
    author,
    isbn,
    totalPages: ensureTotalPages(input.totalPages),
    shelf: ensureShelf(input.shelf)
  };
}

export class BookService extends EventEmitter {
  private db = this.database.connection;

  private listStmts: Record<BookSortColumn, Statement>;
  private getByIdStmt: Statement;
  private insertStmt: Statement;
  private updateStmt: Statement;
  private deleteStmt: Statement;
  private countByShelfStmt: Statement;

  constructor(private database: Database) {
    super();
    // One statement per allow-listed column keeps the ORDER BY out of user input.
    this.listStmts = {
      title: this.db.prepare(`SELECT ${BOOK_COLUMNS} FROM books ORDER BY title COLLATE NOCASE, id`),
      author: this.db.prepare(`SELECT ${BOOK_COLUMNS} FROM books ORDER BY author COLLATE NOCASE, id`),
      added_at: this.db.prepare(`SELECT ${BOOK_COLUMNS} FROM books ORDER BY added_at COLLATE NOCASE, id`),
      shelf: this.db.prepare(`SELECT ${BOOK_COLUMNS} FROM books ORDER BY shelf COLLATE NOCASE, id`)
    };
    this.getByIdStmt = this.db.prepare(`SELECT ${BOOK_COLUMNS} FROM books WHERE id = ?`);
    this.insertStmt = this.db.prepare(
      'INSERT INTO books(title, author, isbn, total_pages, shelf, added_at) VALUES (?, ?, ?, ?, ?, ?)'
    );
    this.updateStmt = this.db.prepare(
      'UPDATE books SET title = ?, author = ?, isbn = ?, total_pages = ?, shelf = ? WHERE id = ?'
    );
    this.deleteStmt = this.db.prepare('DELETE FROM books WHERE id = ?');
    this.countByShelfStmt = this.db.prepare('SELECT shelf, COUNT(*) AS count FROM books GROUP BY shelf');
  }

  private rowToBook(row: BookRow): Book {
    return {
      id: row.id,
      title: row.title,
      author: row.author,
      isbn: row.isbn,
      totalPages: row.total_pages,
      shelf: row.shelf,
      addedAt: row.added_at
    };
  }

  list(orderBy: unknown = 'title'): Book[] {
    const stmt = this.listStmts[resolveSortColumn(orderBy)];
    const rows = this.db.transaction(() => stmt.all() as BookRow[])();
    return rows.map((row) => this.rowToBook(row));
  }

  getById(id: number): Book | null {
    const row = this.getByIdStmt.get(id) as BookRow | undefined;
    return row ? this.rowToBook(row) : null;
  }

  add(input: BookInput): Book {
    const next = normalizeInput(input);
    const addedAt = nowTimestamp();
    const result = this.db.transaction(() =>
      this.insertStmt.run(next.title, next.author, next.isbn, next.totalPages, next.shelf, addedAt)
    )();
    const book: Book = { id: Number(result.lastInsertRowid), ...next, addedAt };
    this.emit('added', book);
    return book;
  }

  update(id: number, input: BookInput): Book | null {
    const next = normalizeInput(input);
    const updated = this.db.transaction(() => {
      const existing = this.getById(id);
      if (!existing) return null;
      this.updateStmt.run(next.title, next.author, next.isbn, next.totalPages, next.shelf, id);
      return { ...existing, ...next };
    })();
    if (updated) this.emit('updated', updated);
    return updated;
  }

  remove(id: number): boolean {
    const result = this.db.transaction(() => this.deleteStmt.run(id))();
    const removed = result.changes > 0;
    if (removed) this.emit('removed', { id });
    return removed;
  }

  countByShelf(): ShelfCounts {
    const rows = this.countByShelfStmt.all() as Array<{ shelf: Shelf; count: number }>;
    const counts: ShelfCounts = { reading: 0, to_read: 0, finished: 0 };
    for (const row of rows) {
      if (isShelf(row.shelf)) counts[row.shelf] = row.count;
    }
    return counts;
  }
}
