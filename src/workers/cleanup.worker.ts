import { Worker } from 'bullmq';
import { connection, QUEUE_NAMES } from '../config/queue';
import { SessionService } from '../services/session.service';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export function startCleanupWorker(sessions: SessionService): Worker<Record<string, never>, { evicted: number }> {
  return new Worker<Record<string, never>, { evicted: number }>(
    QUEUE_NAMES.SESSION_CLEANUP,
    async () => {
      try {
        const evicted = sessions.cleanupExpired();
        logger.info('Session cleanup completed', { evicted });
        return { evicted };
      } catch (error) {
        logger.error('Session cleanup failed', { error: errorMessage(error) });
        throw error;
      }
    },
    {
      connection,
      concurrency: 1,
    }
  );
}
