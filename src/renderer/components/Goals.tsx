import { useEffect, useState, type FormEvent } from 'react';
import type { Goals as GoalValues, GoalsView, RendererApi } from '@shared/types';
import { errorMessage, formatMinutes, formatPercent, parseBoundedInt } from '../format';

type Props = {
  api: RendererApi;
  refreshKey: number;
};

type Draft = Record<keyof GoalValues, string>;

const BOUNDS: Record<keyof GoalValues, { label: string; min: number; max: number }> = {
  year: { label: 'Goal year', min: 2000, max: 2100 },
  dailyMinutes: { label: 'Daily minutes goal', min: 5, max: 600 },
  yearlyBooks: { label: 'Yearly books goal', min: 1, max: 200 }
};

function draftFor(goals: GoalValues): Draft {
  return { year: String(goals.year), dailyMinutes: String(goals.dailyMinutes), yearlyBooks: String(goals.yearlyBooks) };
}

function readField(draft: Draft, key: keyof GoalValues): number {
  const { label, min, max } = BOUNDS[key];
  const value = parseBoundedInt(draft[key], min, max);
  if (value === null) throw new Error(`${label} must be a whole number between ${min} and ${max}.`);
  return value;
}

export default function Goals({ api, refreshKey }: Props) {
  const [view, setView] = useState<GoalsView | null>(null);
  const [draft, setDraft] = useState<Draft | null>(null);
  const [message, setMessage] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    api.goals.get().then(
      (next) => {
        setView(next);
        setDraft(draftFor(next.goals));
      },
      (err: unknown) => setError(errorMessage(err))
    );
  }, [api, refreshKey]);

  const handleSubmit = async (event: FormEvent) => {
    event.preventDefault();
    if (!draft) return;
    try {
      const goals: GoalValues = {
        year: readField(draft, 'year'),
        dailyMinutes: readField(draft, 'dailyMinutes'),
        yearlyBooks: readField(draft, 'yearlyBooks')
      };
      const next = await api.goals.update(goals);
      setView(next);
      setMessage('Goals updated.');
      setError(null);
    } catch (err) {
      setError(errorMessage(err));
    }
  };

  if (!view || !draft) {
    return <section className="panel">{error ? <p className="error-text">{error}</p> : <p className="subtle">Loading…</p>}</section>;
  }

  const { progress } = view;

  return (
    <section className="panel">
      <h2>Goals</h2>
      <div className="metric-grid">
        <div className="card metric">
          <span className="overview-label">Today's minutes</span>
          <span className="overview-value">{formatMinutes(progress.minutesToday)}</span>
          <span className="subtle">Goal: {progress.dailyMinutesGoal} minutes ({formatPercent(progress.dailyProgress)})</span>
        </div>
        <div className="card metric">
          <span className="overview-label">Books finished</span>
          <span className="overview-value">{progress.booksFinished}</span>
          <span className="subtle">Goal: {progress.yearlyBooksGoal} this year ({formatPercent(progress.yearlyProgress)})</span>
        </div>
      </div>

      <form className="form-group" onSubmit={(event) => void handleSubmit(event)}>
        <label className="field">
          <span className="label">Goal year</span>
          <input
            type="number"
            min={BOUNDS.year.min}
            max={BOUNDS.year.max}
            value={draft.year}
            onChange={(e) => setDraft({ ...draft, year: e.target.value })}
          />
        </label>
        <label className="field">
          <span className="label">Daily minutes goal</span>
          <input
            type="number"
            min={BOUNDS.dailyMinutes.min}
            max={BOUNDS.dailyMinutes.max}
            step={5}
            value={draft.dailyMinutes}
            onChange={(e) => setDraft({ ...draft, dailyMinutes: e.target.value })}
          />
        </label>
        <label className="field">
          <span className="label">Yearly books goal</span>
          <input
            type="number"
            min={BOUNDS.yearlyBooks.min}
            max={BOUNDS.yearlyBooks.max}
            value={draft.yearlyBooks}
            onChange={(e) => setDraft({ ...draft, yearlyBooks: e.target.value })}
          />
        </label>
        <button type="submit" className="primary">Save goals</button>
      </form>
      {message && <p className="subtle">{message}</p>}
      {error && <p className="error-text">{error}</p>}
    </section>
  );
}
