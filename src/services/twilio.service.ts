import twilio from 'twilio';
import { logger } from '../utils/logger';
import { ServiceError, errorMessage, toError } from '../utils/errors';

export interface SmsSender {
  sendSMS(to: string, message: string): Promise<string>;
}

export interface TwilioOptions {
  accountSid: string;
  authToken: string;
  fromNumber: string;
  retryDelayMs?: number;
}

type TwilioClient = ReturnType<typeof twilio>;

const NON_RETRYABLE_CODES = new Set([21211, 21614]);

function codeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

export class TwilioService implements SmsSender {
  private readonly client: TwilioClient;
  private readonly retryDelayMs: number;

  constructor(private readonly options: TwilioOptions) {
    this.client = twilio(options.accountSid, options.authToken);
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async sendSMS(to: string, message: string): Promise<string> {
    const maxRetries = 3;
    let lastError: Error = new Error('no attempts made');

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        const result = await this.client.messages.create({
          to,
          from: this.options.fromNumber,
          body: message,
        });

        logger.info('SMS sent', { to, messageSid: result.sid });
        return result.sid;
      } catch (error) {
        lastError = toError(error);

        // Don't retry on invalid number
        const code = codeOf(error);
        if (code !== undefined && NON_RETRYABLE_CODES.has(code)) {
          throw new ServiceError('Twilio', 'sendSMS', lastError, false);
        }

        if (attempt < maxRetries) {
          logger.warn('Twilio send failed, retrying', { attempt, error: errorMessage(error) });
          await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs * attempt));
        }
      }
    }

    throw new ServiceError('Twilio', 'sendSMS', lastError, false);
  }
}
