import fs from 'node:fs';
import path from 'node:path';
import DatabaseDriver, { type Database as BetterSqlite3Database } from 'better-sqlite3';
import { logger } from '@shared/logger';
import { defaultDatabasePath } from './config';

export const IN_MEMORY = ':memory:';

export type DatabaseOptions = {
  filePath?: string;
};

export class Database {
  private driver: BetterSqlite3Database;
  readonly filePath: string;

  constructor(options: DatabaseOptions = {}) {
    this.filePath = options.filePath ?? defaultDatabasePath();
    if (this.filePath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      logger.info('Opening database at', this.filePath);
    }
    this.driver = new DatabaseDriver(this.filePath);
    if (this.filePath !== IN_MEMORY) {
      this.driver.pragma('journal_mode = WAL');
    }
    // Off by default in SQLite; session rows rely on it for the book cascade.
    this.driver.pragma('foreign_keys = ON');
    this.initialise();
  }

  private initialise() {
    const ddl = `
      CREATE TABLE IF NOT EXISTS books (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        title TEXT NOT NULL,
        author TEXT NOT NULL,
        isbn TEXT,
        total_pages INTEGER,
        shelf TEXT NOT NULL DEFAULT 'to_read' CHECK(shelf IN ('reading','to_read','finished')),
        added_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS sessions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        book_id INTEGER NOT NULL,
        start_ts TEXT NOT NULL,
        end_ts TEXT NOT NULL,
        pages_read INTEGER NOT NULL DEFAULT 0 CHECK(pages_read >= 0),
        note TEXT,
        CHECK(end_ts >= start_ts),
        FOREIGN KEY(book_id) REFERENCES books(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS goals (
        id INTEGER PRIMARY KEY CHECK(id = 1),
        year INTEGER NOT NULL,
        daily_minutes INTEGER NOT NULL DEFAULT 30,
        yearly_books INTEGER NOT NULL DEFAULT 24
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_book_id ON sessions(book_id);
      CREATE INDEX IF NOT EXISTS idx_sessions_start_ts ON sessions(start_ts);
    `;

    this.driver.exec(ddl);
  }

  get connection(): BetterSqlite3Database {
    return this.driver;
  }

  async close() {
    this.driver.close();
  }
}
