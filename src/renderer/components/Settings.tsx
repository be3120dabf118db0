import { useEffect, useState, type ChangeEvent } from 'react';
import type { RendererApi, SettingsSnapshot } from '@shared/types';
import { errorMessage } from '../format';

type Props = {
  api: RendererApi;
};

type ImportKind = 'books' | 'sessions';

export default function Settings({ api }: Props) {
  const [snapshot, setSnapshot] = useState<SettingsSnapshot | null>(null);
  const [message, setMessage] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    api.settings.get().then(setSnapshot, (err: unknown) => setError(errorMessage(err)));
  }, [api]);

  const handleImport = async (kind: ImportKind, event: ChangeEvent<HTMLInputElement>) => {
    const input = event.target;
    const file = input.files?.[0];
    if (!file) return;
    try {
      const result = await api.settings.importCsv(kind, await file.text());
      setMessage(
        kind === 'books'
          ? `Imported ${result.imported} books.`
          : `Imported ${result.imported} sessions (${result.skipped} skipped).`
      );
      setError(null);
    } catch (err) {
      setError(errorMessage(err));
    } finally {
      input.value = '';
    }
  };

  return (
    <section className="panel">
      <h2>Settings &amp; Data</h2>
      <p className="subtle">
        Database path: <code>{snapshot?.databasePath ?? '…'}</code>
      </p>

      <div className="settings-grid">
        <a className="pill ghost" href={api.settings.exportUrl('books')} download="books_export.csv">Export books CSV</a>
        <a className="pill ghost" href={api.settings.exportUrl('sessions')} download="sessions_export.csv">Export sessions CSV</a>
      </div>

      <h3>Import data</h3>
      <div className="settings-grid">
        <label className="field">
          <span className="label">Import books CSV</span>
          <input type="file" accept=".csv,text/csv" onChange={(event) => void handleImport('books', event)} />
        </label>
        <label className="field">
          <span className="label">Import sessions CSV</span>
          <input type="file" accept=".csv,text/csv" onChange={(event) => void handleImport('sessions', event)} />
        </label>
      </div>
      {message && <p className="subtle">{message}</p>}
      {error && <p className="error-text">{error}</p>}
    </section>
  );
}
