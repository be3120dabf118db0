import fs from 'node:fs';
import type { Server } from 'node:http';
import express, { type NextFunction, type Request, type Response } from 'express';
import expressWs from 'express-ws';
import { BookService } from './books';
import { SessionService } from './sessions';
import { GoalsService } from './goals';
import { ReadingSessionTracker } from './tracker';
import { TransferService } from './transfer';
import { WebSocketBroadcaster } from './websocket/broadcaster';
import {
  createBookRoutes,
  createGoalsRoutes,
  createSessionRoutes,
  createSettingsRoutes,
  createStatsRoutes
} from './routes';
import type { Database } from './storage';
import type { AppConfig } from './config';
import { logger } from '@shared/logger';

export type BackendServices = {
  books: BookService;
  sessions: SessionService;
  goals: GoalsService;
  tracker: ReadingSessionTracker;
  transfer: TransferService;
};

export type Backend = BackendServices & {
  broadcaster: WebSocketBroadcaster;
  stop: () => Promise<void>;
  port: number;
};

export function createServices(database: Database, clock?: () => Date): BackendServices {
  const books = new BookService(database);
  const sessions = new SessionService(database);
  const goals = new GoalsService(database);
  const tracker = new ReadingSessionTracker(books, sessions, clock);
  const transfer = new TransferService(books, sessions);
  return { books, sessions, goals, tracker, transfer };
}

function errorStatus(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}

export async function createBackend(
  database: Database,
  config: Pick<AppConfig, 'port' | 'host' | 'staticDir'>
): Promise<Backend> {
  const services = createServices(database);
  const broadcaster = new WebSocketBroadcaster(services);

  const app = express();
  const ws = expressWs(app);

  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/books', createBookRoutes(services.books));
  app.use('/sessions', createSessionRoutes(services));
  app.use('/stats', createStatsRoutes(services));
  app.use('/goals', createGoalsRoutes(services));
  app.use('/settings', createSettingsRoutes({ databasePath: database.filePath, transfer: services.transfer }));

  ws.app.ws('/events', (socket) => {
    broadcaster.handleConnection(socket);
  });

  if (fs.existsSync(config.staticDir)) {
    app.use(express.static(config.staticDir));
  } else {
    logger.warn('UI bundle not found at', config.staticDir, '- serving the API only');
  }

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(error);
    if (status >= 500) {
      logger.error('Request failed', req.method, req.path, error);
    }
    res.status(status).json({ error: status >= 500 ? 'Internal error' : (error instanceof Error ? error.message : 'Bad request') });
  });

  const server: Server = await new Promise((resolve) => {
    const instance = app.listen(config.port, config.host, () => {
      logger.info(`Shelfwise listening on http://${config.host}:${config.port}`);
      resolve(instance);
    });
  });

  const stop = async () => {
    for (const client of ws.getWss().clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => server.close(() => resolve()));
  };

  return {
    ...services,
    broadcaster,
    stop,
    port: config.port
  };
}
