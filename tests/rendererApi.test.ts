import { afterEach, describe, expect, it, vi } from 'vitest';
import { createRendererApi, normalizeApiBase } from '../src/renderer/api';
import { formatMonthLabel, formatPercent, parseBoundedInt, pickOption } from '../src/renderer/format';
import { stopAndResync } from '../src/renderer/session';
import { SHELVES } from '@shared/types';

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('renderer api client', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('trims a trailing slash from the api base', () => {
    expect(normalizeApiBase(' http://127.0.0.1:17610/ ')).toBe('http://127.0.0.1:17610');
  });

  it('calls the local api and unwraps the active session', async () => {
    const active = { bookId: 1, startTs: '2026-04-01T08:00:00Z', label: 'Quiet Hours - L. Moss', elapsedMinutes: 3 };
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ active }));
    vi.stubGlobal('fetch', fetchMock);

    const api = createRendererApi('http://127.0.0.1:17610/');
    await expect(api.sessions.start(1)).resolves.toEqual(active);

    expect(fetchMock).toHaveBeenCalledWith('http://127.0.0.1:17610/sessions/start', expect.objectContaining({
      method: 'POST',
      body: JSON.stringify({ bookId: 1 })
    }));
  });

  it('surfaces the error message from a failed request', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ error: 'Book not found' }, 404)));
    const api = createRendererApi();
    await expect(api.books.update(9, { title: 'A', author: 'B' })).rejects.toThrow('Book not found');
  });

  it('sends CSV imports as text', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ imported: 1, skipped: 0 }));
    vi.stubGlobal('fetch', fetchMock);
    const api = createRendererApi();

    await expect(api.settings.importCsv('books', 'title,author\nA,B\n')).resolves.toEqual({ imported: 1, skipped: 0 });
    expect(fetchMock).toHaveBeenCalledWith('/settings/import/books', expect.objectContaining({
      method: 'POST',
      headers: { 'Content-Type': 'text/csv' }
    }));
    expect(api.settings.exportUrl('sessions')).toBe('/settings/export/sessions.csv');
  });
});

describe('stopAndResync', () => {
  it('reloads after a successful stop', async () => {
    const saved = { id: 1, bookId: 1, startTs: '2026-04-01T08:00:00Z', endTs: '2026-04-01T08:30:00Z', pagesRead: 12, note: null };
    const resync = vi.fn().mockResolvedValue(undefined);
    await expect(stopAndResync(vi.fn().mockResolvedValue(saved), { pagesRead: 12 }, resync)).resolves.toEqual(saved);
    expect(resync).toHaveBeenCalledTimes(1);
  });

  it('reloads before reporting a failed stop', async () => {
    const order: string[] = [];
    const stop = vi.fn().mockRejectedValue(new Error('Book not found'));
    const resync = vi.fn(async () => {
      order.push('resync');
    });

    await expect(stopAndResync(stop, { pagesRead: 4 }, resync)).rejects.toThrow('Book not found');
    order.push('rejected');
    expect(order).toEqual(['resync', 'rejected']);
  });
});

describe('renderer formatting', () => {
  it('labels months in UTC', () => {
    expect(formatMonthLabel('2026-03')).toBe('Mar 2026');
    expect(formatMonthLabel('not-a-month')).toBe('not-a-month');
  });

  it('clamps percentages', () => {
    expect(formatPercent(0.456)).toBe('46%');
    expect(formatPercent(1.8)).toBe('100%');
  });

  it('reads whole numbers from form text only when in range', () => {
    expect(parseBoundedInt('2027', 2000, 2100)).toBe(2027);
    expect(parseBoundedInt(' 12 ', 1)).toBe(12);
    expect(parseBoundedInt('202', 2000, 2100)).toBeNull();
    expect(parseBoundedInt('20007', 2000, 2100)).toBeNull();
    expect(parseBoundedInt('', 1)).toBeNull();
    expect(parseBoundedInt('3.5', 1)).toBeNull();
    expect(parseBoundedInt('1e30', 1)).toBeNull();
    expect(parseBoundedInt('0', 0)).toBe(0);
  });

  it('picks only known options', () => {
    expect(pickOption(SHELVES, 'finished', 'to_read')).toBe('finished');
    expect(pickOption(SHELVES, 'lost', 'to_read')).toBe('to_read');
  });
});
