/*
  Minimal application logger. The server and the tests both write to the console,
  so the level is carried as a prefix instead of a separate transport.
*/
export const logger = {
  info: (...args: unknown[]) => console.log('[info]', ...args),
  warn: (...args: unknown[]) => console.warn('[warn]', ...args),
  error: (...args: unknown[]) => console.error('[error]', ...args)
};
