import { Router } from 'express';
import type { BookService } from '../books';
import type { GoalsService } from '../goals';
import type { SessionService } from '../sessions';
import { buildGoalProgress } from '../stats';
import type { Goals, GoalsView } from '@shared/types';
import { formatRouteError, z } from './validation';

const goalsSchema = z.object({
  year: z.number().int().min(2000).max(2100),
  dailyMinutes: z.number().int().min(5).max(600),
  yearlyBooks: z.number().int().min(1).max(200)
}).strict() satisfies z.ZodType<Goals>;

export type GoalsRoutesContext = {
  goals: GoalsService;
  books: BookService;
  sessions: SessionService;
};

export function createGoalsRoutes(ctx: GoalsRoutesContext): Router {
  const router = Router();

  const view = (): GoalsView => {
    const goals = ctx.goals.get();
    return { goals, progress: buildGoalProgress(goals, ctx.books.list(), ctx.sessions.list()) };
  };

  router.get('/', (_req, res) => {
    res.json(view());
  });

  router.put('/', (req, res) => {
    try {
      const payload = goalsSchema.parse(req.body);
      ctx.goals.update(payload);
      return res.json(view());
    } catch (error) {
      return res.status(400).json({ error: formatRouteError(error) });
    }
  });

  return router;
}
