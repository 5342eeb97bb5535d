import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { connectRedis } from './config/redis';
import { scheduleSessionCleanup } from './config/queue';
import { createContainer } from './container';
import { createApp } from './app';
import { startNotificationWorker } from './workers/notification.worker';
import { startCleanupWorker } from './workers/cleanup.worker';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';

// Initialize Sentry
if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

// Start
async function start() {
  try {
    await connectRedis();

    const container = await createContainer();
    startNotificationWorker(container.channels);
    startCleanupWorker(container.sessions);

    scheduleSessionCleanup(container.cleanupQueue).catch((err) => {
      logger.warn('Failed to schedule session cleanup', { error: errorMessage(err) });
    });

    const app = createApp(container, { apiKeys: env.API_KEYS, sentry: Boolean(env.SENTRY_DSN) });
    app.listen(Number(env.PORT), () => {
      logger.info(`Server running on port ${env.PORT}`, { env: env.NODE_ENV });
    });
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }
}

void start();
