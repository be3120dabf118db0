import { Router } from 'express';
import type { SessionService } from '../sessions';
import type { ReadingSessionTracker } from '../tracker';
import { coerceClampedInt, formatRouteError, nullableTrimmedStringSchema, z } from './validation';

const pagesReadSchema = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);

const manualSessionSchema = z.object({
  bookId: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
  startTs: z.string().trim().min(1),
  endTs: z.string().trim().min(1),
  pagesRead: pagesReadSchema.optional(),
  note: nullableTrimmedStringSchema
}).strict();

const startSessionSchema = z.object({
  bookId: z.number().int().positive()
}).strict();

const stopSessionSchema = z.object({
  pagesRead: pagesReadSchema.default(0),
  note: nullableTrimmedStringSchema
}).strict();

export type SessionRoutesContext = {
  sessions: SessionService;
  tracker: ReadingSessionTracker;
};

export function createSessionRoutes(ctx: SessionRoutesContext): Router {
  const router = Router();
  const { sessions, tracker } = ctx;

  router.get('/', (req, res) => {
    const limit = req.query.limit === undefined ? undefined : coerceClampedInt(req.query.limit, 10, { min: 1, max: 500 });
    res.json(sessions.list(limit));
  });

  router.post('/', (req, res) => {
    try {
      const payload = manualSessionSchema.parse(req.body);
      return res.status(201).json(sessions.add(payload));
    } catch (error) {
      return res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.get('/active', (_req, res) => {
    res.json({ active: tracker.getActive() });
  });

  router.post('/start', (req, res) => {
    try {
      const { bookId } = startSessionSchema.parse(req.body);
      if (tracker.getActive()) {
        return res.status(409).json({ error: 'A reading session is already active' });
      }
      tracker.start(bookId);
      return res.json({ active: tracker.getActive() });
    } catch (error) {
      return res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.post('/stop', (req, res) => {
    try {
      const payload = stopSessionSchema.parse(req.body ?? {});
      const session = tracker.stop(payload);
      if (!session) return res.status(404).json({ error: 'No active reading session' });
      return res.json(session);
    } catch (error) {
      return res.status(400).json({ error: formatRouteError(error) });
    }
  });

  return router;
}
