import type { BackendEvent, RendererApi } from '@shared/types';

export function normalizeApiBase(value: string) {
  const trimmed = value.trim();
  return trimmed.endsWith('/') ? trimmed.slice(0, -1) : trimmed;
}

async function fetchJson<T>(apiBase: string, path: string, init?: RequestInit): Promise<T> {
  const response = await fetch(`${apiBase}${path}`, {
    ...init,
    cache: 'no-store',
    headers: {
      'Content-Type': 'application/json',
      ...(init?.headers ?? {})
    }
  });
  if (!response.ok) {
    const payload: unknown = await response.json().catch(() => null);
    const message =
      payload && typeof payload === 'object' && 'error' in payload && typeof payload.error === 'string'
        ? payload.error
        : `Request failed (${response.status})`;
    throw new Error(message);
  }
  return response.json() as Promise<T>;
}

function sendJson<T>(apiBase: string, path: string, method: 'POST' | 'PUT' | 'DELETE', body?: unknown) {
  return fetchJson<T>(apiBase, path, {
    method,
    body: body === undefined ? undefined : JSON.stringify(body)
  });
}

function eventsUrl(apiBase: string) {
  const base = apiBase || window.location.origin;
  return `${base.replace(/^http/, 'ws')}/events`;
}

function isBackendEvent(value: unknown): value is BackendEvent {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string';
}

export function createRendererApi(apiBase = ''): RendererApi {
  const base = normalizeApiBase(apiBase);

  return {
    books: {
      list: (orderBy = 'title') => fetchJson(base, `/books?orderBy=${encodeURIComponent(orderBy)}`),
      shelves: () => fetchJson(base, '/books/shelves'),
      add: (payload) => sendJson(base, '/books', 'POST', payload),
      update: (id, payload) => sendJson(base, `/books/${id}`, 'PUT', payload),
      remove: async (id) => {
        await sendJson<{ ok: boolean }>(base, `/books/${id}`, 'DELETE');
      }
    },
    sessions: {
      recent: (limit = 10) => fetchJson(base, `/sessions?limit=${limit}`),
      active: async () => (await fetchJson<{ active: RendererActive }>(base, '/sessions/active')).active,
      start: async (bookId) => (await sendJson<{ active: RendererActive }>(base, '/sessions/start', 'POST', { bookId })).active,
      stop: (payload) => sendJson(base, '/sessions/stop', 'POST', payload)
    },
    stats: {
      summary: (days = 30) => fetchJson(base, `/stats?days=${days}`)
    },
    goals: {
      get: () => fetchJson(base, '/goals'),
      update: (goals) => sendJson(base, '/goals', 'PUT', goals)
    },
    settings: {
      get: () => fetchJson(base, '/settings'),
      exportUrl: (kind) => `${base}/settings/export/${kind}.csv`,
      importCsv: (kind, csv) =>
        fetchJson(base, `/settings/import/${kind}`, {
          method: 'POST',
          body: csv,
          headers: { 'Content-Type': 'text/csv' }
        })
    },
    events: {
      on: (callback) => {
        const socket = new WebSocket(eventsUrl(base));
        socket.addEventListener('message', (message) => {
          try {
            const data: unknown = JSON.parse(String(message.data));
            if (isBackendEvent(data)) callback(data);
          } catch (error) {
            console.error('Failed to parse backend event', error);
          }
        });
        return () => socket.close();
      }
    }
  };
}

type RendererActive = Awaited<ReturnType<RendererApi['sessions']['active']>>;
