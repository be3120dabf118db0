import type { ReadingSession, RendererApi } from '@shared/types';

type StopSession = RendererApi['sessions']['stop'];

/**
 * Stop the running session and reload the view either way: the backend drops
 * the active session even when storing it fails (its book was deleted).
 */
export async function stopAndResync(
  stop: StopSession,
  payload: Parameters<StopSession>[0],
  resync: () => Promise<void>
): Promise<ReadingSession> {
  try {
    return await stop(payload);
  } finally {
    await resync();
  }
}
