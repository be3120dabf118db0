import { createBackend } from '@backend/server';
import { Database } from '@backend/storage';
import { loadConfig } from '@backend/config';
import { seedSampleData } from '@backend/seed';
import { logger } from '@shared/logger';

let db: Database | null = null;
let stopBackend: (() => Promise<void>) | null = null;

async function bootstrap() {
  const config = loadConfig();

  db = new Database({ filePath: config.databasePath });
  if (config.seedSampleData) {
    seedSampleData(db);
  }

  const backend = await createBackend(db, config);
  stopBackend = backend.stop;
}

async function shutdown(signal: string) {
  logger.info(`Received ${signal}, shutting down`);
  if (stopBackend) {
    await stopBackend();
  }
  await db?.close();
  process.exit(0);
}

bootstrap().catch((error) => {
  logger.error('Failed to bootstrap app', error);
  process.exit(1);
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error) => {
      logger.error('Failed to shut down cleanly', error);
      process.exit(1);
    });
  });
}
