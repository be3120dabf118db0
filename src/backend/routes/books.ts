import { Router } from 'express';
import type { BookService } from '../books';
import { SHELVES } from '@shared/types';
import { formatRouteError, nullableTrimmedStringSchema, parsePositiveInt, z } from './validation';

const bookInputSchema = z.object({
  title: z.string().trim().min(1, 'Title is required'),
  author: z.string().trim().min(1, 'Author is required'),
  isbn: nullableTrimmedStringSchema,
  totalPages: z.number().int().min(1).max(Number.MAX_SAFE_INTEGER).nullable().optional(),
  shelf: z.enum(SHELVES).optional()
}).strict();

export function createBookRoutes(books: BookService): Router {
  const router = Router();

  router.get('/', (req, res) => {
    res.json(books.list(req.query.orderBy));
  });

  router.get('/shelves', (_req, res) => {
    res.json(books.countByShelf());
  });

  router.post('/', (req, res) => {
    try {
      const payload = bookInputSchema.parse(req.body);
      return res.status(201).json(books.add(payload));
    } catch (error) {
      return res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.put('/:id', (req, res) => {
    let id: number;
    try {
      id = parsePositiveInt(req.params.id);
    } catch {
      return res.status(400).json({ error: 'Invalid book id' });
    }
    try {
      const payload = bookInputSchema.parse(req.body);
      const book = books.update(id, payload);
      if (!book) return res.status(404).json({ error: 'Book not found' });
      return res.json(book);
    } catch (error) {
      return res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.delete('/:id', (req, res) => {
    let id: number;
    try {
      id = parsePositiveInt(req.params.id);
    } catch {
      return res.status(400).json({ error: 'Invalid book id' });
    }
    const removed = books.remove(id);
    if (!removed) return res.status(404).json({ error: 'Book not found' });
    return res.json({ ok: true });
  });

  return router;
}
