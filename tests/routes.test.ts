import { describe, expect, it } from 'vitest';
import {
  createBookRoutes,
  createGoalsRoutes,
  createSessionRoutes,
  createSettingsRoutes,
  createStatsRoutes
} from '../src/backend/routes';
import { createTestServices, invokeRoute } from './helpers';

describe('book routes', () => {
  it('creates a book and validates the payload', async () => {
    const { books } = createTestServices();
    const router = createBookRoutes(books);

    const created = await invokeRoute(router, 'post', '/', {
      body: { title: 'Quiet Hours', author: 'L. Moss', isbn: '', totalPages: 240, shelf: 'reading' }
    });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ title: 'Quiet Hours', isbn: null, totalPages: 240, shelf: 'reading' });

    const blank = await invokeRoute(router, 'post', '/', { body: { title: 'Untitled', author: '' } });
    expect(blank).toEqual({ status: 400, body: { error: 'author: Author is required' } });

    const unknownShelf = await invokeRoute(router, 'post', '/', { body: { title: 'A', author: 'B', shelf: 'lost' } });
    expect(unknownShelf.status).toBe(400);

    const endless = await invokeRoute(router, 'post', '/', { body: { title: 'A', author: 'B', totalPages: 1e30 } });
    expect(endless.status).toBe(400);

    const extraField = await invokeRoute(router, 'post', '/', { body: { title: 'A', author: 'B', rating: 5 } });
    expect(extraField.status).toBe(400);
    expect(books.list()).toHaveLength(1);
  });

  it('answers 400 and 404 for bad or unknown ids', async () => {
    const { books } = createTestServices();
    const router = createBookRoutes(books);

    expect(await invokeRoute(router, 'put', '/:id', { params: { id: 'abc' }, body: { title: 'A', author: 'B' } })).toEqual({
      status: 400,
      body: { error: 'Invalid book id' }
    });
    expect(await invokeRoute(router, 'put', '/:id', { params: { id: '42' }, body: { title: 'A', author: 'B' } })).toEqual({
      status: 404,
      body: { error: 'Book not found' }
    });
    expect(await invokeRoute(router, 'delete', '/:id', { params: { id: '42' } })).toEqual({
      status: 404,
      body: { error: 'Book not found' }
    });
  });

  it('updates, lists and deletes', async () => {
    const { books } = createTestServices();
    const router = createBookRoutes(books);
    const book = books.add({ title: 'Draft', author: 'A. Author' });

    const updated = await invokeRoute(router, 'put', '/:id', {
      params: { id: String(book.id) },
      body: { title: 'Final', author: 'A. Author', shelf: 'finished' }
    });
    expect(updated.body).toMatchObject({ id: book.id, title: 'Final', shelf: 'finished' });

    expect((await invokeRoute(router, 'get', '/shelves')).body).toEqual({ reading: 0, to_read: 0, finished: 1 });
    expect(await invokeRoute(router, 'delete', '/:id', { params: { id: String(book.id) } })).toEqual({
      status: 200,
      body: { ok: true }
    });
    expect((await invokeRoute(router, 'get', '/', { query: { orderBy: 'author' } })).body).toEqual([]);
  });
});

describe('session routes', () => {
  it('starts and stops the active session', async () => {
    const services = createTestServices(() => new Date('2026-04-01T08:00:00Z'));
    const router = createSessionRoutes(services);
    const book = services.books.add({ title: 'Quiet Hours', author: 'L. Moss' });

    expect((await invokeRoute(router, 'get', '/active')).body).toEqual({ active: null });
    expect(await invokeRoute(router, 'post', '/stop', { body: {} })).toEqual({
      status: 404,
      body: { error: 'No active reading session' }
    });

    const started = await invokeRoute(router, 'post', '/start', { body: { bookId: book.id } });
    expect(started.body).toEqual({
      active: { bookId: book.id, startTs: '2026-04-01T08:00:00Z', label: 'Quiet Hours - L. Moss', elapsedMinutes: 0 }
    });
    expect((await invokeRoute(router, 'post', '/start', { body: { bookId: book.id } })).status).toBe(409);

    const stopped = await invokeRoute(router, 'post', '/stop', { body: { pagesRead: 25, note: 'Chapter two' } });
    expect(stopped.status).toBe(200);
    expect(stopped.body).toMatchObject({ bookId: book.id, pagesRead: 25, note: 'Chapter two' });
    expect((await invokeRoute(router, 'get', '/active')).body).toEqual({ active: null });
  });

  it('rejects a start for an unknown book', async () => {
    const services = createTestServices();
    const router = createSessionRoutes(services);
    expect(await invokeRoute(router, 'post', '/start', { body: { bookId: 7 } })).toEqual({
      status: 400,
      body: { error: 'Book not found' }
    });
  });

  it('logs manual sessions and clamps the list limit', async () => {
    const services = createTestServices();
    const router = createSessionRoutes(services);
    const book = services.books.add({ title: 'Quiet Hours', author: 'L. Moss' });

    const logged = await invokeRoute(router, 'post', '/', {
      body: { bookId: book.id, startTs: '2026-03-01T09:00:00Z', endTs: '2026-03-01T09:30:00Z', pagesRead: 10 }
    });
    expect(logged.status).toBe(201);
    await invokeRoute(router, 'post', '/', {
      body: { bookId: book.id, startTs: '2026-03-02T09:00:00Z', endTs: '2026-03-02T09:30:00Z' }
    });

    const backwards = await invokeRoute(router, 'post', '/', {
      body: { bookId: book.id, startTs: '2026-03-03T10:00:00Z', endTs: '2026-03-03T09:00:00Z' }
    });
    expect(backwards).toEqual({ status: 400, body: { error: 'Session end must not be before its start' } });

    const limited = await invokeRoute(router, 'get', '/', { query: { limit: '0' } });
    expect(limited.body).toHaveLength(1);
    expect((await invokeRoute(router, 'get', '/')).body).toHaveLength(2);
  });
});

describe('stats and goals routes', () => {
  it('clamps the daily window', async () => {
    const services = createTestServices();
    const router = createStatsRoutes(services);
    const result = await invokeRoute(router, 'get', '/', { query: { days: '500' } });
    expect(result.body).toMatchObject({ booksInLibrary: 0, sessionCount: 0 });
    expect(result.body).toHaveProperty('daily.length', 366);
  });

  it('validates goal bounds and returns progress', async () => {
    const services = createTestServices();
    const router = createGoalsRoutes(services);

    expect(await invokeRoute(router, 'put', '/', { body: { year: 2026, dailyMinutes: 2, yearlyBooks: 10 } })).toEqual({
      status: 400,
      body: { error: 'dailyMinutes: Number must be greater than or equal to 5' }
    });

    const saved = await invokeRoute(router, 'put', '/', { body: { year: 2026, dailyMinutes: 45, yearlyBooks: 10 } });
    expect(saved.status).toBe(200);
    expect(saved.body).toMatchObject({
      goals: { year: 2026, dailyMinutes: 45, yearlyBooks: 10 },
      progress: { minutesToday: 0, dailyMinutesGoal: 45, booksFinished: 0, yearlyBooksGoal: 10, yearlyProgress: 0 }
    });
  });
});

describe('settings routes', () => {
  it('reports the database path and exports CSV attachments', async () => {
    const services = createTestServices();
    const router = createSettingsRoutes({ databasePath: services.database.filePath, transfer: services.transfer });

    expect((await invokeRoute(router, 'get', '/')).body).toEqual({ databasePath: ':memory:' });
    expect(await invokeRoute(router, 'get', '/export/books.csv')).toEqual({
      status: 200,
      body: 'id,title,author,isbn,total_pages,shelf,added_at\n',
      contentType: 'text/csv',
      attachment: 'books_export.csv'
    });
  });

  it('imports CSV text and rejects empty bodies', async () => {
    const services = createTestServices();
    const router = createSettingsRoutes({ databasePath: services.database.filePath, transfer: services.transfer });

    expect(await invokeRoute(router, 'post', '/import/books', { body: 'title,author\nQuiet Hours,L. Moss\n' })).toEqual({
      status: 200,
      body: { imported: 1, skipped: 0 }
    });
    expect(await invokeRoute(router, 'post', '/import/books', { body: '' })).toEqual({
      status: 400,
      body: { error: 'request: CSV file is empty' }
    });
    expect(await invokeRoute(router, 'post', '/import/sessions', { body: {} })).toEqual({
      status: 400,
      body: { error: 'request: Expected CSV text' }
    });
  });
});
