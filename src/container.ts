import Anthropic from '@anthropic-ai/sdk';
import { Queue } from 'bullmq';
import vehicles from './data/vehicles.json';
import { env } from './config/env';
import { NotificationJobData, createCleanupQueue, createNotificationQueue } from './config/queue';
import { RecordStore, TextCompletion } from './types/capabilities';
import { AgentService } from './services/agent.service';
import { AnthropicService } from './services/anthropic.service';
import { SearchCacheService } from './services/cache.service';
import { DatabaseService } from './services/database.service';
import { FinanceService } from './services/finance.service';
import { IntentService } from './services/intent.service';
import { NotificationService } from './services/notification.service';
import { ProviderDirectoryService } from './services/provider.service';
import { RoutingService } from './services/routing.service';
import { InventorySearchService } from './services/search.service';
import { SessionService } from './services/session.service';
import { TransactionService } from './services/transaction.service';
import { TwilioService } from './services/twilio.service';
import { ValuationService } from './services/valuation.service';
import { SendGridAdapter } from './services/email/sendgrid.adapter';
import { MemoryRecordStore } from './services/store/memory.store';
import { AcquisitionMachine } from './services/machines/acquisition.machine';
import { ServiceBookingMachine } from './services/machines/service.machine';
import { ConsignmentMachine } from './services/machines/consignment.machine';
import { NotificationChannels } from './workers/notification.worker';
import { logger } from './utils/logger';

export interface Container {
  store: RecordStore;
  agent: AgentService;
  sessions: SessionService;
  transactions: TransactionService;
  finance: FinanceService;
  channels: NotificationChannels;
  notificationQueue: Queue<NotificationJobData>;
  cleanupQueue: Queue;
}

async function createStore(): Promise<RecordStore> {
  if (env.DATABASE_URL) {
    return new DatabaseService();
  }

  const store = new MemoryRecordStore();
  for (const vehicle of vehicles) {
    await store.put('vehicles', vehicle.id, vehicle);
  }
  logger.warn('DATABASE_URL not set, using in-memory record store', { vehicles: vehicles.length });
  return store;
}

function createCompletion(): TextCompletion | null {
  if (!env.ANTHROPIC_API_KEY) {
    logger.warn('ANTHROPIC_API_KEY not set, replies use drafts only');
    return null;
  }

  const client = new Anthropic({ apiKey: env.ANTHROPIC_API_KEY });
  return new AnthropicService(client, {
    model: env.ANTHROPIC_MODEL,
    timeoutMs: env.COMPLETION_TIMEOUT_MS,
  });
}

function createChannels(): NotificationChannels {
  const sms =
    env.TWILIO_ACCOUNT_SID && env.TWILIO_AUTH_TOKEN && env.TWILIO_PHONE_NUMBER
      ? new TwilioService({
          accountSid: env.TWILIO_ACCOUNT_SID,
          authToken: env.TWILIO_AUTH_TOKEN,
          fromNumber: env.TWILIO_PHONE_NUMBER,
        })
      : null;

  return {
    email: new SendGridAdapter(env.SENDGRID_API_KEY, env.SENDGRID_FROM_EMAIL),
    sms,
  };
}

/** Wires every service from the environment. Nothing below this reads `env`. */
export async function createContainer(): Promise<Container> {
  const store = await createStore();
  const completion = createCompletion();
  const notificationQueue = createNotificationQueue();
  const cleanupQueue = createCleanupQueue();

  const finance = new FinanceService();
  const valuations = new ValuationService();
  const search = new InventorySearchService(store, new SearchCacheService(env.SEARCH_CACHE_TTL_SECONDS));

  const sessions = new SessionService(store, {
    timeoutMinutes: env.SESSION_TIMEOUT_MINUTES,
    historyLimit: env.SESSION_HISTORY_LIMIT,
  });
  const transactions = new TransactionService(store, new NotificationService(notificationQueue), valuations);

  const agent = new AgentService({
    sessions,
    router: new RoutingService(completion),
    intents: new IntentService(),
    machines: {
      acquisition: new AcquisitionMachine(search, finance),
      service: new ServiceBookingMachine(new ProviderDirectoryService()),
      consignment: new ConsignmentMachine(valuations),
    },
    transactions,
    completion,
  });

  return {
    store,
    agent,
    sessions,
    transactions,
    finance,
    channels: createChannels(),
    notificationQueue,
    cleanupQueue,
  };
}
