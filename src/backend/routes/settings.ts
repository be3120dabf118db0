import express, { Router, type Response } from 'express';
import type { TransferService } from '../transfer';
import type { SettingsSnapshot } from '@shared/types';
import { formatRouteError, z } from './validation';

const csvBodySchema = z.string({ invalid_type_error: 'Expected CSV text' }).min(1, 'CSV file is empty');
const csvText = express.text({ type: ['text/csv', 'text/plain', 'application/csv'], limit: '10mb' });

export type SettingsRoutesContext = {
  databasePath: string;
  transfer: TransferService;
};

function sendCsv(res: Response, fileName: string, csv: string) {
  res.type('text/csv').attachment(fileName).send(csv);
}

export function createSettingsRoutes(ctx: SettingsRoutesContext): Router {
  const router = Router();
  const { transfer } = ctx;

  router.get('/', (_req, res) => {
    const snapshot: SettingsSnapshot = { databasePath: ctx.databasePath };
    res.json(snapshot);
  });

  router.get('/export/books.csv', (_req, res) => {
    sendCsv(res, 'books_export.csv', transfer.exportBooksCsv());
  });

  router.get('/export/sessions.csv', (_req, res) => {
    sendCsv(res, 'sessions_export.csv', transfer.exportSessionsCsv());
  });

  router.post('/import/books', csvText, (req, res) => {
    try {
      const text = csvBodySchema.parse(req.body);
      return res.json(transfer.importBooksCsv(text));
    } catch (error) {
      return res.status(400).json({ error: formatRouteError(error) });
    }
  });

  router.post('/import/sessions', csvText, (req, res) => {
    try {
      const text = csvBodySchema.parse(req.body);
      return res.json(transfer.importSessionsCsv(text));
    } catch (error) {
      return res.status(400).json({ error: formatRouteError(error) });
    }
  });

  return router;
}
