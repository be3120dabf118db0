import { Router } from 'express';
import type { BookService } from '../books';
import type { SessionService } from '../sessions';
import { buildStatsSummary, DEFAULT_DAILY_WINDOW } from '../stats';
import { coerceClampedInt } from './validation';

export type StatsRoutesContext = {
  books: BookService;
  sessions: SessionService;
};

export function createStatsRoutes(ctx: StatsRoutesContext): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const days = coerceClampedInt(req.query.days, DEFAULT_DAILY_WINDOW, { min: 1, max: 366 });
    res.json(buildStatsSummary(ctx.books.list(), ctx.sessions.list(), { days }));
  });

  return router;
}
