jest.mock('bullmq', () => ({
  Queue: jest.fn().mockImplementation((name: string, options: unknown) => ({
    name,
    options,
    on: jest.fn(),
    add: jest.fn(),
  })),
  Worker: jest.fn().mockImplementation((name: string, processor: unknown, options: unknown) => ({
    name,
    processor,
    options,
    on: jest.fn(),
  })),
}));

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import {
  NOTIFICATION_JOB_OPTIONS,
  QUEUE_NAMES,
  SESSION_CLEANUP_INTERVAL_MS,
  createCleanupQueue,
  createNotificationQueue,
  parseRedisUrl,
  scheduleSessionCleanup,
} from '../../src/config/queue';
import { startCleanupWorker } from '../../src/workers/cleanup.worker';
import { SessionService } from '../../src/services/session.service';
import { MemoryRecordStore } from '../../src/services/store/memory.store';

const bull: { Queue: jest.Mock; Worker: jest.Mock } = jest.requireMock('bullmq');

describe('Queue Configuration', () => {
  beforeEach(() => {
    bull.Queue.mockClear();
    bull.Worker.mockClear();
  });

  it('should define queue names', () => {
    expect(QUEUE_NAMES).toEqual({ NOTIFICATION: 'notification', SESSION_CLEANUP: 'session-cleanup' });
  });

  it('should parse redis urls', () => {
    expect(parseRedisUrl('redis://localhost:6379')).toEqual({ host: 'localhost', port: 6379, password: undefined });
    expect(parseRedisUrl('rediss://:test-secret@cache.internal:6380')).toEqual({
      host: 'cache.internal',
      port: 6380,
      password: 'test-secret',
      tls: {},
    });
    expect(parseRedisUrl('redis://cache.internal').port).toBe(6379);
  });

  it('should retry notification jobs with exponential backoff', () => {
    createNotificationQueue();

    const [name, options] = bull.Queue.mock.calls[0];
    expect(name).toBe('notification');
    expect(options.defaultJobOptions).toBe(NOTIFICATION_JOB_OPTIONS);
    expect(NOTIFICATION_JOB_OPTIONS).toEqual({
      attempts: 3,
      backoff: { type: 'exponential', delay: 1000 },
      removeOnComplete: 100,
      removeOnFail: 500,
    });
  });

  it('should log queue errors', () => {
    const queue = createCleanupQueue();

    expect(queue.on).toHaveBeenCalledWith('error', expect.any(Function));
  });

  it('should schedule the hourly session sweep under a fixed job id', async () => {
    const queue = { add: jest.fn().mockResolvedValue({ id: 'repeat:session-cleanup' }) };

    await scheduleSessionCleanup(queue);

    expect(queue.add).toHaveBeenCalledWith('sweep', {}, { repeat: { every: SESSION_CLEANUP_INTERVAL_MS }, jobId: 'session-cleanup' });
    expect(SESSION_CLEANUP_INTERVAL_MS).toBe(3600000);
  });

  it('should evict expired sessions from the cleanup worker', async () => {
    let now = new Date('2026-06-10T09:00:00.000Z');
    const sessions = new SessionService(new MemoryRecordStore(), { timeoutMinutes: 30, historyLimit: 20, clock: () => now });
    await sessions.save(sessions.createInitial('s-1'));

    startCleanupWorker(sessions);
    const [name, processor] = bull.Worker.mock.calls[0];
    expect(name).toBe('session-cleanup');

    now = new Date('2026-06-10T10:00:00.000Z');
    await expect(processor({})).resolves.toEqual({ evicted: 1 });
    expect(sessions.cachedCount).toBe(0);
  });
});
