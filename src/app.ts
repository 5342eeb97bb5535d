import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { Container } from './container';
import { errorHandler } from './middleware/errorHandler';
import { createApiKeyAuth } from './middleware/auth';
import { createAdminRouter } from './routes/admin.routes';
import { createChatRouter } from './routes/chat.routes';
import { createFinanceRouter } from './routes/finance.routes';
import { createRecordsRouter } from './routes/records.routes';

export interface AppOptions {
  apiKeys?: string;
  sentry: boolean;
}

export function createApp(container: Container, options: AppOptions): Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '100kb' }));

  // Rate limiting
  const limiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  // Auth (skips health)
  app.use(createApiKeyAuth(options.apiKeys));

  // Routes
  app.use('/api/chat', createChatRouter(container.agent, container.sessions));
  app.use('/api/finance', createFinanceRouter(container.finance));
  app.use('/api/records', createRecordsRouter(container.transactions));
  app.use('/api/admin', createAdminRouter(container.sessions));

  // Health check (no auth)
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Error handler
  if (options.sentry) {
    Sentry.setupExpressErrorHandler(app);
  }
  app.use(errorHandler);

  return app;
}
