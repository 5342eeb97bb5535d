import { APIConnectionTimeoutError } from '@anthropic-ai/sdk';
import { ConversationTurn, TextCompletion } from '../types/capabilities';
import { CompletionTimeoutError, ServiceError, errorMessage, toError } from '../utils/errors';
import { logger } from '../utils/logger';

interface MessageRequest {
  model: string;
  system: string;
  messages: { role: 'user' | 'assistant'; content: string }[];
  temperature: number;
  max_tokens: number;
}

interface MessageResponse {
  content: { type: string; text?: string }[];
  usage?: { input_tokens: number; output_tokens: number };
}

/** The slice of the Anthropic client this service calls; the SDK client satisfies it. */
export interface MessagesClient {
  messages: {
    create(body: MessageRequest, options?: { timeout?: number; maxRetries?: number }): Promise<MessageResponse>;
  };
}

export interface AnthropicOptions {
  model: string;
  timeoutMs: number;
  maxRetries?: number;
  maxTurns?: number;
  retryDelayMs?: number;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export class AnthropicService implements TextCompletion {
  private readonly maxRetries: number;
  private readonly maxTurns: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly client: MessagesClient,
    private readonly options: AnthropicOptions
  ) {
    this.maxRetries = options.maxRetries ?? 3;
    this.maxTurns = options.maxTurns ?? 10;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async complete(systemContext: string, turns: ConversationTurn[]): Promise<string> {
    const messages = this.toMessages(turns);
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.client.messages.create(
          {
            model: this.options.model,
            system: systemContext,
            messages,
            temperature: 0.7,
            max_tokens: 400,
          },
          { timeout: this.options.timeoutMs, maxRetries: 0 }
        );

        const content = response.content
          .map((block) => (block.type === 'text' ? block.text ?? '' : ''))
          .join('')
          .trim();

        logger.debug('Completion generated', {
          attempt,
          tokens: { prompt: response.usage?.input_tokens ?? 0, completion: response.usage?.output_tokens ?? 0 },
        });
        return content;
      } catch (error) {
        lastError = toError(error);

        if (error instanceof APIConnectionTimeoutError) {
          logger.warn('Completion timed out', { attempt, timeoutMs: this.options.timeoutMs });
          throw new CompletionTimeoutError(this.options.timeoutMs);
        }

        const status = statusOf(error);
        if (status === 429) {
          const delay = Math.pow(2, attempt) * this.retryDelayMs;
          logger.warn('Anthropic rate limited, backing off', { attempt, delay });
          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }

        if (status === 400 || status === 401) {
          throw new ServiceError('Anthropic', 'complete', lastError, false);
        }

        logger.error('Anthropic error', { attempt, error: errorMessage(error) });
      }
    }

    throw new ServiceError('Anthropic', 'complete', lastError ?? new Error('no attempts made'), true);
  }

  /** Last turns only, starting from a customer turn as the API requires. */
  private toMessages(turns: ConversationTurn[]): MessageRequest['messages'] {
    const recent = turns.slice(-this.maxTurns);
    const firstUser = recent.findIndex((turn) => turn.role === 'user');
    return (firstUser >= 0 ? recent.slice(firstUser) : []).map((turn) => ({ role: turn.role, content: turn.content }));
  }
}
