import { useEffect, useMemo, useState } from 'react';
import type { RendererApi } from '@shared/types';
import { createRendererApi } from './api';
import Library from './components/Library';
import AddBook from './components/AddBook';
import ReadingSession from './components/ReadingSession';
import Stats from './components/Stats';
import Goals from './components/Goals';
import Settings from './components/Settings';

type View = 'library' | 'add' | 'session' | 'stats' | 'goals' | 'settings';

const TABS: Array<{ view: View; label: string }> = [
  { view: 'library', label: 'Library' },
  { view: 'add', label: 'Add Book' },
  { view: 'session', label: 'Session' },
  { view: 'stats', label: 'Stats' },
  { view: 'goals', label: 'Goals' },
  { view: 'settings', label: 'Settings' }
];

type Props = {
  api?: RendererApi;
};

export default function App({ api: injected }: Props) {
  const api = useMemo(() => injected ?? createRendererApi(import.meta.env.VITE_API_BASE ?? ''), [injected]);
  const [view, setView] = useState<View>('library');
  const [refreshKey, setRefreshKey] = useState(0);

  // Any backend change re-fetches the visible view.
  useEffect(() => api.events.on(() => setRefreshKey((key) => key + 1)), [api]);

  return (
    <div className="app-shell">
      <header className="page-header">
        <h1>Shelfwise</h1>
        <nav className="tabs">
          {TABS.map((tab) => (
            <button
              key={tab.view}
              type="button"
              className={tab.view === view ? 'pill active' : 'pill ghost'}
              onClick={() => setView(tab.view)}
            >
              {tab.label}
            </button>
          ))}
        </nav>
      </header>
      <main>
        {view === 'library' && <Library api={api} refreshKey={refreshKey} />}
        {view === 'add' && <AddBook api={api} />}
        {view === 'session' && <ReadingSession api={api} refreshKey={refreshKey} />}
        {view === 'stats' && <Stats api={api} refreshKey={refreshKey} />}
        {view === 'goals' && <Goals api={api} refreshKey={refreshKey} />}
        {view === 'settings' && <Settings api={api} />}
      </main>
    </div>
  );
}
