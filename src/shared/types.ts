export const SHELVES = ['reading', 'to_read', 'finished'] as const;
export type Shelf = (typeof SHELVES)[number];

export const BOOK_SORT_COLUMNS = ['title', 'author', 'added_at', 'shelf'] as const;
export type BookSortColumn = (typeof BOOK_SORT_COLUMNS)[number];

export type Book = {
  id: number;
  title: string;
  author: string;
  isbn: string | null;
  totalPages: number | null;
  shelf: Shelf;
  addedAt: string;
};

export type BookInput = {
  title: string;
  author: string;
  isbn?: string | null;
  totalPages?: number | null;
  shelf?: Shelf;
};

export type ShelfCounts = Record<Shelf, number>;

export type ReadingSession = {
  id: number;
  bookId: number;
  startTs: string;
  endTs: string;
  pagesRead: number;
  note: string | null;
};

export type ReadingSessionWithBook = ReadingSession & {
  title: string;
  author: string;
  durationMinutes: number;
};

export type ReadingSessionInput = {
  bookId: number;
  startTs: string;
  endTs: string;
  pagesRead?: number;
  note?: string | null;
};

export type ActiveSession = {
  bookId: number;
  startTs: string;
  label: string;
};

export type ActiveSessionSnapshot = ActiveSession & {
  elapsedMinutes: number;
};

export type Goals = {
  year: number;
  dailyMinutes: number;
  yearlyBooks: number;
};

export type MonthlyAggregate = {
  month: string;
  pages: number;
  hours: number;
};

export type DailyAggregate = {
  day: string;
  minutes: number;
  pages: number;
};

export type StatsSummary = {
  booksInLibrary: number;
  currentlyReading: number;
  finished: number;
  hoursLogged: number;
  pagesLogged: number;
  sessionCount: number;
  averageSessionMinutes: number;
  shelfCounts: ShelfCounts;
  monthly: MonthlyAggregate[];
  daily: DailyAggregate[];
};

export type GoalProgress = {
  minutesToday: number;
  dailyMinutesGoal: number;
  dailyProgress: number;
  booksFinished: number;
  yearlyBooksGoal: number;
  yearlyProgress: number;
};

export type GoalsView = {
  goals: Goals;
  progress: GoalProgress;
};

export type ImportResult = {
  imported: number;
  skipped: number;
};

export type SettingsSnapshot = {
  databasePath: string;
};

export type BackendEvent =
  | { type: 'books-changed'; payload: { reason: 'added' | 'updated' | 'removed'; id: number } }
  | { type: 'sessions-changed'; payload: { reason: 'added'; id: number } }
  | { type: 'goals-changed'; payload: Goals }
  | { type: 'session-started'; payload: ActiveSession }
  | { type: 'session-stopped'; payload: ReadingSession };

export type RendererApi = {
  books: {
    list(orderBy?: BookSortColumn): Promise<Book[]>;
    shelves(): Promise<ShelfCounts>;
    add(payload: BookInput): Promise<Book>;
    update(id: number, payload: BookInput): Promise<Book>;
    remove(id: number): Promise<void>;
  };
  sessions: {
    recent(limit?: number): Promise<ReadingSessionWithBook[]>;
    active(): Promise<ActiveSessionSnapshot | null>;
    start(bookId: number): Promise<ActiveSessionSnapshot | null>;
    stop(payload: { pagesRead: number; note?: string | null }): Promise<ReadingSession>;
  };
  stats: {
    summary(days?: number): Promise<StatsSummary>;
  };
  goals: {
    get(): Promise<GoalsView>;
    update(goals: Goals): Promise<GoalsView>;
  };
  settings: {
    get(): Promise<SettingsSnapshot>;
    exportUrl(kind: 'books' | 'sessions'): string;
    importCsv(kind: 'books' | 'sessions', csv: string): Promise<ImportResult>;
  };
  events: {
    on(callback: (event: BackendEvent) => void): () => void;
  };
};
