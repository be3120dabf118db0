import { useState, type FormEvent } from 'react';
import { SHELVES, type RendererApi, type Shelf } from '@shared/types';
import { SHELF_LABELS, errorMessage, parseBoundedInt, pickOption } from '../format';

type Props = {
  api: RendererApi;
};

export default function AddBook({ api }: Props) {
  const [title, setTitle] = useState('');
  const [author, setAuthor] = useState('');
  const [isbn, setIsbn] = useState('');
  const [pages, setPages] = useState('250');
  const [shelf, setShelf] = useState<Shelf>('to_read');
  const [message, setMessage] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);

  const handleSubmit = async (event: FormEvent) => {
    event.preventDefault();
    if (!title.trim() || !author.trim()) {
      setError('Title and Author are required.');
      setMessage(null);
      return;
    }
    const totalPages = parseBoundedInt(pages, 1);
    if (totalPages === null) {
      setError('Total pages must be a whole number of at least 1.');
      setMessage(null);
      return;
    }
    try {
      const book = await api.books.add({
        title: title.trim(),
        author: author.trim(),
        isbn: isbn.trim() || null,
        totalPages,
        shelf
      });
      setMessage(`Added "${book.title}".`);
      setError(null);
      setTitle('');
      setAuthor('');
      setIsbn('');
    } catch (err) {
      setError(errorMessage(err));
      setMessage(null);
    }
  };

  return (
    <section className="panel">
      <h2>Add Book</h2>
      <form className="form-group" onSubmit={(event) => void handleSubmit(event)}>
        <label className="field">
          <span className="label">Title *</span>
          <input value={title} onChange={(e) => setTitle(e.target.value)} />
        </label>
        <label className="field">
          <span className="label">Author *</span>
          <input value={author} onChange={(e) => setAuthor(e.target.value)} />
        </label>
        <label className="field">
          <span className="label">ISBN</span>
          <input value={isbn} onChange={(e) => setIsbn(e.target.value)} />
        </label>
        <label className="field">
          <span className="label">Total pages</span>
          <input
            type="number"
            min={1}
            value={pages}
            onChange={(e) => setPages(e.target.value)}
          />
        </label>
        <label className="field">
          <span className="label">Shelf</span>
          <select value={shelf} onChange={(e) => setShelf(pickOption(SHELVES, e.target.value, 'to_read'))}>
            {SHELVES.map((value) => (
              <option key={value} value={value}>{SHELF_LABELS[value]}</option>
            ))}
          </select>
        </label>
        <button type="submit" className="primary">Add book</button>
      </form>
      {message && <p className="subtle">{message}</p>}
      {error && <p className="error-text">{error}</p>}
    </section>
  );
}
