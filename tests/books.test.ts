import { describe, expect, it, vi } from 'vitest';
import { createTestServices } from './helpers';

describe('BookService', () => {
  it('stores a book and lists it back with its fields', () => {
    const { books } = createTestServices();
    const added = books.add({ title: '  Quiet Hours ', author: 'L. Moss', isbn: '9780000000042', totalPages: 240, shelf: 'reading' });

    const [listed] = books.list();
    expect(listed).toEqual(added);
    expect(listed.title).toBe('Quiet Hours');
    expect(listed.isbn).toBe('9780000000042');
    expect(listed.totalPages).toBe(240);
    expect(listed.shelf).toBe('reading');
    expect(listed.addedAt).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/);
  });

  it('defaults the shelf and drops a blank isbn', () => {
    const { books } = createTestServices();
    const book = books.add({ title: 'Field Notes', author: 'P. Hart', isbn: '   ', totalPages: null });
    expect(book.shelf).toBe('to_read');
    expect(book.isbn).toBeNull();
    expect(book.totalPages).toBeNull();
  });

  it('rejects missing titles and invalid page counts', () => {
    const { books } = createTestServices();
    expect(() => books.add({ title: '  ', author: 'Someone' })).toThrow('Title and author are required');
    expect(() => books.add({ title: 'Zero', author: 'Someone', totalPages: 0 })).toThrow(
      'Total pages must be a whole number of at least 1'
    );
    expect(() => books.add({ title: 'Half', author: 'Someone', totalPages: 12.5 })).toThrow(
      'Total pages must be a whole number of at least 1'
    );
    expect(() => books.add({ title: 'Endless', author: 'Someone', totalPages: 2 ** 53 })).toThrow(
      'Total pages must be a whole number of at least 1'
    );
    expect(books.list()).toEqual([]);
  });

  it('orders by an allow-listed column and falls back to title', () => {
    const { books } = createTestServices();
    const beta = books.add({ title: 'beta', author: 'Young' });
    const alpha = books.add({ title: 'Alpha', author: 'Zed' });

    expect(books.list('title').map((book) => book.id)).toEqual([alpha.id, beta.id]);
    expect(books.list('author').map((book) => book.id)).toEqual([beta.id, alpha.id]);
    expect(books.list('pages; DROP TABLE books').map((book) => book.id)).toEqual([alpha.id, beta.id]);
  });

  it('updates a book in place', () => {
    const { books } = createTestServices();
    const onUpdated = vi.fn();
    books.on('updated', onUpdated);
    const book = books.add({ title: 'Draft', author: 'A. Author', totalPages: 100 });

    const updated = books.update(book.id, { title: 'Final', author: 'A. Author', totalPages: 120, shelf: 'finished' });

    expect(updated).toEqual({ ...book, title: 'Final', totalPages: 120, shelf: 'finished', isbn: null });
    expect(books.getById(book.id)).toEqual(updated);
    expect(onUpdated).toHaveBeenCalledWith(updated);
    expect(books.update(book.id + 100, { title: 'Ghost', author: 'Nobody' })).toBeNull();
  });

  it('removes a book together with its sessions', () => {
    const { books, sessions } = createTestServices();
    const book = books.add({ title: 'Short Stories', author: 'K. Lane' });
    sessions.add({ bookId: book.id, startTs: '2026-03-01T09:00:00Z', endTs: '2026-03-01T09:30:00Z', pagesRead: 10 });

    expect(books.remove(book.id)).toBe(true);
    expect(books.remove(book.id)).toBe(false);
    expect(books.list()).toEqual([]);
    expect(sessions.list()).toEqual([]);
  });

  it('counts books per shelf', () => {
    const { books } = createTestServices();
    books.add({ title: 'One', author: 'A', shelf: 'finished' });
    books.add({ title: 'Two', author: 'B', shelf: 'finished' });
    books.add({ title: 'Three', author: 'C', shelf: 'reading' });

    expect(books.countByShelf()).toEqual({ reading: 1, to_read: 0, finished: 2 });
  });
});
