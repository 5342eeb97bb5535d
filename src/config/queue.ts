import { Queue, JobsOptions } from 'bullmq';
import type { ConnectionOptions as TlsOptions } from 'tls';
import { env } from './env';
import { NotificationTemplate } from '../types/capabilities';
import { logger } from '../utils/logger';

export const QUEUE_NAMES = {
  NOTIFICATION: 'notification',
  SESSION_CLEANUP: 'session-cleanup',
} as const;

export interface RedisConnection {
  host: string;
  port: number;
  password?: string;
  tls?: TlsOptions;
}

export function parseRedisUrl(url: string): RedisConnection {
  const parsed = new URL(url);
  const result: RedisConnection = {
    host: parsed.hostname,
    port: Number(parsed.port || 6379),
    password: parsed.password || undefined,
  };
  if (parsed.protocol === 'rediss:') {
    result.tls = {};
  }
  return result;
}

function watch<T extends Queue>(queue: T): T {
  queue.on('error', (err: Error) => {
    logger.error('Queue error', { queue: queue.name, error: err.message });
  });
  return queue;
}

export const connection = parseRedisUrl(env.REDIS_URL);

export interface NotificationJobData {
  recipient: string;
  template: NotificationTemplate;
  data: Record<string, unknown>;
}

export const NOTIFICATION_JOB_OPTIONS: JobsOptions = {
  attempts: 3,
  backoff: { type: 'exponential', delay: 1000 },
  removeOnComplete: 100,
  removeOnFail: 500,
};

export const SESSION_CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

export function createNotificationQueue(): Queue<NotificationJobData> {
  return watch(
    new Queue<NotificationJobData>(QUEUE_NAMES.NOTIFICATION, {
      connection,
      defaultJobOptions: NOTIFICATION_JOB_OPTIONS,
    })
  );
}

export function createCleanupQueue(): Queue {
  return watch(
    new Queue(QUEUE_NAMES.SESSION_CLEANUP, {
      connection,
      defaultJobOptions: { removeOnComplete: 10, removeOnFail: 50 },
    })
  );
}

/** Registers the hourly expired-session sweep; re-registering is a no-op. */
export async function scheduleSessionCleanup(queue: Pick<Queue, 'add'>): Promise<void> {
  await queue.add(
    'sweep',
    {},
    {
      repeat: { every: SESSION_CLEANUP_INTERVAL_MS },
      jobId: 'session-cleanup',
    }
  );
}
