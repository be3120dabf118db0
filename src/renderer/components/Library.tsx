import { useCallback, useEffect, useState, type FormEvent } from 'react';
import { BOOK_SORT_COLUMNS, SHELVES, type Book, type BookSortColumn, type RendererApi, type Shelf } from '@shared/types';
import { SHELF_LABELS, bookLabel, errorMessage, formatTimestamp, parseBoundedInt, pickOption } from '../format';

type Props = {
  api: RendererApi;
  refreshKey: number;
};

type Draft = {
  title: string;
  author: string;
  isbn: string;
  totalPages: string;
  shelf: Shelf;
};

const SORT_LABELS: Record<BookSortColumn, string> = {
  title: 'Title',
  author: 'Author',
  added_at: 'Date added',
  shelf: 'Shelf'
};

function draftFor(book: Book): Draft {
  return {
    title: book.title,
    author: book.author,
    isbn: book.isbn ?? '',
    totalPages: book.totalPages === null ? '' : String(book.totalPages),
    shelf: book.shelf
  };
}

export default function Library({ api, refreshKey }: Props) {
  const [books, setBooks] = useState<Book[]>([]);
  const [loading, setLoading] = useState(true);
  const [orderBy, setOrderBy] = useState<BookSortColumn>('title');
  const [selectedId, setSelectedId] = useState<number | null>(null);
  const [draft, setDraft] = useState<Draft | null>(null);
  const [message, setMessage] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);

  const load = useCallback(async () => {
    setLoading(true);
    try {
      const next = await api.books.list(orderBy);
      setBooks(next);
      setError(null);
    } catch (err) {
      setError(errorMessage(err));
    } finally {
      setLoading(false);
    }
  }, [api, orderBy]);

  useEffect(() => {
    void load();
  }, [load, refreshKey]);

  const selected = books.find((book) => book.id === selectedId) ?? books[0] ?? null;

  useEffect(() => {
    setDraft(selected ? draftFor(selected) : null);
  }, [selected?.id]);

  const counts = SHELVES.map((shelf) => ({ shelf, count: books.filter((book) => book.shelf === shelf).length }));

  const handleSave = async (event: FormEvent) => {
    event.preventDefault();
    if (!selected || !draft) return;
    const totalPages = draft.totalPages.trim() ? parseBoundedInt(draft.totalPages, 1) : null;
    if (draft.totalPages.trim() && totalPages === null) {
      setError('Total pages must be a whole number of at least 1.');
      return;
    }
    try {
      await api.books.update(selected.id, {
        title: draft.title.trim(),
        author: draft.author.trim(),
        isbn: draft.isbn.trim() || null,
        totalPages,
        shelf: draft.shelf
      });
      setMessage('Book updated.');
      setError(null);
      await load();
    } catch (err) {
      setError(errorMessage(err));
    }
  };

  const handleDelete = async () => {
    if (!selected) return;
    try {
      await api.books.remove(selected.id);
      setSelectedId(null);
      setMessage('Book removed.');
      setError(null);
      await load();
    } catch (err) {
      setError(errorMessage(err));
    }
  };

  if (!loading && books.length === 0) {
    return (
      <section className="panel">
        <h2>Library</h2>
        <p className="empty-state">No books yet. Add one from the Add Book tab.</p>
      </section>
    );
  }

  return (
    <section className="panel">
      <div className="panel-header">
        <h2>Library</h2>
        <label className="field inline">
          <span className="label">Sort by</span>
          <select value={orderBy} onChange={(e) => setOrderBy(pickOption(BOOK_SORT_COLUMNS, e.target.value, 'title'))}>
            {BOOK_SORT_COLUMNS.map((column) => (
              <option key={column} value={column}>{SORT_LABELS[column]}</option>
            ))}
          </select>
        </label>
      </div>

      <div className="metric-grid">
        {counts.map(({ shelf, count }) => (
          <div className="card metric" key={shelf}>
            <span className="overview-label">{SHELF_LABELS[shelf]}</span>
            <span className="overview-value">{count}</span>
          </div>
        ))}
      </div>

      <table className="data-table">
        <thead>
          <tr>
            <th>Title</th>
            <th>Author</th>
            <th>ISBN</th>
            <th>Pages</th>
            <th>Shelf</th>
            <th>Added</th>
          </tr>
        </thead>
        <tbody>
          {books.map((book) => (
            <tr key={book.id} className={book.id === selected?.id ? 'selected' : undefined} onClick={() => setSelectedId(book.id)}>
              <td>{book.title}</td>
              <td>{book.author}</td>
              <td>{book.isbn ?? ''}</td>
              <td>{book.totalPages ?? ''}</td>
              <td>{SHELF_LABELS[book.shelf]}</td>
              <td>{formatTimestamp(book.addedAt)}</td>
            </tr>
          ))}
        </tbody>
      </table>

      {selected && draft && (
        <details className="card" open>
          <summary>Edit or remove a book</summary>
          <label className="field">
            <span className="label">Choose a book</span>
            <select value={selected.id} onChange={(e) => setSelectedId(Number(e.target.value))}>
              {books.map((book) => (
                <option key={book.id} value={book.id}>{bookLabel(book)}</option>
              ))}
            </select>
          </label>
          <form className="form-group" onSubmit={(event) => void handleSave(event)}>
            <label className="field">
              <span className="label">Title</span>
              <input value={draft.title} onChange={(e) => setDraft({ ...draft, title: e.target.value })} />
            </label>
            <label className="field">
              <span className="label">Author</span>
              <input value={draft.author} onChange={(e) => setDraft({ ...draft, author: e.target.value })} />
            </label>
            <label className="field">
              <span className="label">ISBN</span>
              <input value={draft.isbn} onChange={(e) => setDraft({ ...draft, isbn: e.target.value })} />
            </label>
            <label className="field">
              <span className="label">Total pages</span>
              <input
                type="number"
                min={1}
                step={1}
                value={draft.totalPages}
                onChange={(e) => setDraft({ ...draft, totalPages: e.target.value })}
              />
            </label>
            <label className="field">
              <span className="label">Shelf</span>
              <select value={draft.shelf} onChange={(e) => setDraft({ ...draft, shelf: pickOption(SHELVES, e.target.value, draft.shelf) })}>
                {SHELVES.map((shelf) => (
                  <option key={shelf} value={shelf}>{SHELF_LABELS[shelf]}</option>
                ))}
              </select>
            </label>
            <div className="card-header-row">
              <button type="submit" className="primary">Save changes</button>
              <button type="button" className="ghost danger" onClick={() => void handleDelete()}>Delete selected book</button>
            </div>
          </form>
        </details>
      )}

      {message && <p className="subtle">{message}</p>}
      {error && <p className="error-text">{error}</p>}
    </section>
  );
}
