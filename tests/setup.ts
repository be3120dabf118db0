import { beforeEach, vi } from 'vitest';

// Services log every write at info level; keep test output to failures.
beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});
