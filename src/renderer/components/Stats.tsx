import { useEffect, useState } from 'react';
import type { RendererApi, StatsSummary } from '@shared/types';
import MonthlyChart from './MonthlyChart';
import { errorMessage, formatHours, formatMinutes } from '../format';

type Props = {
  api: RendererApi;
  refreshKey: number;
};

export default function Stats({ api, refreshKey }: Props) {
  const [summary, setSummary] = useState<StatsSummary | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    api.stats.summary().then(
      (next) => {
        setSummary(next);
        setError(null);
      },
      (err: unknown) => setError(errorMessage(err))
    );
  }, [api, refreshKey]);

  if (error) return <section className="panel"><p className="error-text">{error}</p></section>;
  if (!summary) return <section className="panel"><p className="subtle">Loading…</p></section>;

  return (
    <section className="panel">
      <h2>Stats &amp; Insights</h2>
      <div className="metric-grid">
        <div className="card metric">
          <span className="overview-label">Books in library</span>
          <span className="overview-value">{summary.booksInLibrary}</span>
        </div>
        <div className="card metric">
          <span className="overview-label">Currently reading</span>
          <span className="overview-value">{summary.currentlyReading}</span>
        </div>
        <div className="card metric">
          <span className="overview-label">Hours logged</span>
          <span className="overview-value">{formatHours(summary.hoursLogged)}</span>
        </div>
        <div className="card metric">
          <span className="overview-label">Pages logged</span>
          <span className="overview-value">{summary.pagesLogged}</span>
        </div>
      </div>

      {summary.sessionCount === 0 ? (
        <p className="empty-state">Start logging sessions to unlock charts.</p>
      ) : (
        <>
          <p className="subtle">
            {summary.sessionCount} sessions, {formatMinutes(summary.averageSessionMinutes)} minutes on average.
          </p>
          <MonthlyChart
            title="Pages by month"
            variant="bar"
            points={summary.monthly.map((entry) => ({ month: entry.month, value: entry.pages }))}
          />
          <MonthlyChart
            title="Hours by month"
            variant="line"
            format={formatHours}
            points={summary.monthly.map((entry) => ({ month: entry.month, value: entry.hours }))}
          />
        </>
      )}
    </section>
  );
}
