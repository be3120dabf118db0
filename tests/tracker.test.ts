import { describe, expect, it, vi } from 'vitest';
import { createTestServices } from './helpers';

function setup() {
  const clock = { now: new Date('2026-04-01T08:00:00Z') };
  const services = createTestServices(() => clock.now);
  const book = services.books.add({ title: 'Quiet Hours', author: 'L. Moss' });
  return { ...services, clock, book };
}

describe('ReadingSessionTracker', () => {
  it('records one session from start to stop', () => {
    const { tracker, sessions, clock, book } = setup();
    const onStopped = vi.fn();
    tracker.on('stopped', onStopped);

    expect(tracker.start(book.id)).toEqual({ bookId: book.id, startTs: '2026-04-01T08:00:00Z', label: 'Quiet Hours - L. Moss' });

    clock.now = new Date('2026-04-01T08:42:30Z');
    expect(tracker.getActive()?.elapsedMinutes).toBe(42);

    const session = tracker.stop({ pagesRead: 25 });
    expect(session).toEqual({
      id: session?.id,
      bookId: book.id,
      startTs: '2026-04-01T08:00:00Z',
      endTs: '2026-04-01T08:42:30Z',
      pagesRead: 25,
      note: null
    });
    expect(tracker.getActive()).toBeNull();
    expect(sessions.list()).toHaveLength(1);
    expect(onStopped).toHaveBeenCalledWith(session);
  });

  it('refuses a second start while active', () => {
    const { tracker, book } = setup();
    tracker.start(book.id);
    expect(() => tracker.start(book.id)).toThrow('A reading session is already active');
  });

  it('returns null when stopping with nothing active', () => {
    const { tracker, sessions } = setup();
    expect(tracker.stop({ pagesRead: 5 })).toBeNull();
    expect(sessions.list()).toEqual([]);
  });

  it('does not start for an unknown book', () => {
    const { tracker, book } = setup();
    expect(() => tracker.start(book.id + 1)).toThrow('Book not found');
    expect(tracker.getActive()).toBeNull();
  });

  it('keeps the session active when the page count is invalid', () => {
    const { tracker, book } = setup();
    tracker.start(book.id);
    expect(() => tracker.stop({ pagesRead: -3 })).toThrow('Pages read must be a whole number of at least 0');
    expect(tracker.getActive()?.bookId).toBe(book.id);
  });

  it('clears the session when its book was deleted meanwhile', () => {
    const { tracker, books, sessions, book } = setup();
    tracker.start(book.id);
    books.remove(book.id);

    expect(() => tracker.stop({ pagesRead: 4 })).toThrow('Book not found');
    expect(tracker.getActive()).toBeNull();
    expect(sessions.list()).toEqual([]);
  });
});
