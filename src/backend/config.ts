import path from 'node:path';
import { z } from 'zod';
import { expandHome, getAppDataPath } from '@shared/platform';

export type AppConfig = {
  databasePath: string;
  seedSampleData: boolean;
  port: number;
  host: string;
  staticDir: string;
};

export const DEFAULT_PORT = 17610;
export const DEFAULT_HOST = '127.0.0.1';

const FALSY_FLAGS = new Set(['0', 'false', 'no']);

const optionalSetting = z.preprocess(
  (input) => (typeof input === 'string' && input.trim() === '' ? undefined : input),
  z.string().trim().optional()
);

const envSchema = z.object({
  BOOK_TRACKER_DB: optionalSetting,
  SEED_SAMPLE_DATA: optionalSetting,
  SHELFWISE_PORT: z.preprocess(
    (input) => (typeof input === 'string' && input.trim() === '' ? undefined : input),
    z.coerce.number().int().min(0).max(65535).optional()
  ),
  SHELFWISE_HOST: optionalSetting,
  SHELFWISE_STATIC_DIR: optionalSetting
});

export function defaultDatabasePath(): string {
  return path.join(getAppDataPath(), 'Shelfwise', 'book_tracker.db');
}

export function parseSeedFlag(value: string | undefined): boolean {
  if (value === undefined) return true;
  return !FALSY_FLAGS.has(value.toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    databasePath: path.resolve(expandHome(parsed.BOOK_TRACKER_DB ?? defaultDatabasePath())),
    seedSampleData: parseSeedFlag(parsed.SEED_SAMPLE_DATA),
    port: parsed.SHELFWISE_PORT ?? DEFAULT_PORT,
    host: parsed.SHELFWISE_HOST ?? DEFAULT_HOST,
    staticDir: path.resolve(parsed.SHELFWISE_STATIC_DIR ?? path.join('dist', 'renderer'))
  };
}
