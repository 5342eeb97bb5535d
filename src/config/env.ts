import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const envSchema = z.object({
  PORT: z.string().default('3000'),
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  DATABASE_URL: optionalString,
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-latest'),
  COMPLETION_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  SESSION_TIMEOUT_MINUTES: z.coerce.number().int().positive().default(60),
  SESSION_HISTORY_LIMIT: z.coerce.number().int().positive().default(20),
  SEARCH_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(300),
  SENDGRID_API_KEY: optionalString,
  SENDGRID_FROM_EMAIL: optionalString,
  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_PHONE_NUMBER: optionalString,
  API_KEYS: optionalString,
  SENTRY_DSN: z.string().optional(),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;

