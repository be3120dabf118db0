import { useCallback, useEffect, useState } from 'react';
import type { ActiveSessionSnapshot, Book, ReadingSessionWithBook, RendererApi } from '@shared/types';
import { bookLabel, errorMessage, formatMinutes, formatTimestamp, parseBoundedInt } from '../format';
import { stopAndResync } from '../session';

type Props = {
  api: RendererApi;
  refreshKey: number;
};

const RECENT_LIMIT = 10;

export default function ReadingSession({ api, refreshKey }: Props) {
  const [books, setBooks] = useState<Book[]>([]);
  const [bookId, setBookId] = useState<number | null>(null);
  const [active, setActive] = useState<ActiveSessionSnapshot | null>(null);
  const [recent, setRecent] = useState<ReadingSessionWithBook[]>([]);
  const [pagesRead, setPagesRead] = useState('10');
  const [note, setNote] = useState('');
  const [message, setMessage] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);

  const load = useCallback(async () => {
    try {
      const [nextBooks, nextActive, nextRecent] = await Promise.all([
        api.books.list('title'),
        api.sessions.active(),
        api.sessions.recent(RECENT_LIMIT)
      ]);
      setBooks(nextBooks);
      setActive(nextActive);
      setRecent(nextRecent);
      setError(null);
    } catch (err) {
      setError(errorMessage(err));
    }
  }, [api]);

  useEffect(() => {
    void load();
  }, [load, refreshKey]);

  // Elapsed minutes are computed by the backend; poll while a session runs.
  useEffect(() => {
    if (!active) return;
    const timer = window.setInterval(() => {
      api.sessions.active().then(setActive, (err: unknown) => setError(errorMessage(err)));
    }, 30_000);
    return () => window.clearInterval(timer);
  }, [api, active?.startTs]);

  const selectedId = bookId ?? books[0]?.id ?? null;

  const handleStart = async () => {
    if (selectedId === null) return;
    try {
      setActive(await api.sessions.start(selectedId));
      setMessage('Session started.');
      setError(null);
    } catch (err) {
      setError(errorMessage(err));
    }
  };

  const handleStop = async () => {
    const pages = parseBoundedInt(pagesRead, 0);
    if (pages === null) {
      setError('Pages read must be a whole number of at least 0.');
      return;
    }
    try {
      await stopAndResync(api.sessions.stop, { pagesRead: pages, note: note.trim() || null }, load);
      setNote('');
      setMessage('Session saved.');
    } catch (err) {
      setError(errorMessage(err));
    }
  };

  if (books.length === 0) {
    return (
      <section className="panel">
        <h2>Reading Session</h2>
        <p className="empty-state">Add a book first.</p>
      </section>
    );
  }

  return (
    <section className="panel">
      <h2>Reading Session</h2>
      <label className="field">
        <span className="label">Book</span>
        <select value={selectedId ?? ''} disabled={Boolean(active)} onChange={(e) => setBookId(Number(e.target.value))}>
          {books.map((book) => (
            <option key={book.id} value={book.id}>{bookLabel(book)}</option>
          ))}
        </select>
      </label>

      {!active ? (
        <button type="button" className="primary" onClick={() => void handleStart()}>Start session</button>
      ) : (
        <div className="card">
          <p className="subtle">
            Active session: {active.label} - {active.elapsedMinutes} minutes elapsed.
          </p>
          <label className="field">
            <span className="label">Pages read this session</span>
            <input
              type="number"
              min={0}
              value={pagesRead}
              onChange={(e) => setPagesRead(e.target.value)}
            />
          </label>
          <label className="field">
            <span className="label">Notes</span>
            <textarea value={note} onChange={(e) => setNote(e.target.value)} />
          </label>
          <button type="button" className="primary" onClick={() => void handleStop()}>Stop &amp; log session</button>
        </div>
      )}

      {message && <p className="subtle">{message}</p>}
      {error && <p className="error-text">{error}</p>}

      <hr />
      <p className="eyebrow">Recent sessions</p>
      {recent.length === 0 ? (
        <p className="subtle">No sessions logged yet.</p>
      ) : (
        <table className="data-table">
          <thead>
            <tr>
              <th>Title</th>
              <th>Author</th>
              <th>Start</th>
              <th>End</th>
              <th>Minutes</th>
              <th>Pages</th>
              <th>Note</th>
            </tr>
          </thead>
          <tbody>
            {recent.map((session) => (
              <tr key={session.id}>
                <td>{session.title}</td>
                <td>{session.author}</td>
                <td>{formatTimestamp(session.startTs)}</td>
                <td>{formatTimestamp(session.endTs)}</td>
                <td>{formatMinutes(session.durationMinutes)}</td>
                <td>{session.pagesRead}</td>
                <td>{session.note ?? ''}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </section>
  );
}
