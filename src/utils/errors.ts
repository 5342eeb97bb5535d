export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, message, true);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/** A record-store write failed. The turn must be retried; session state is left untouched. */
export class PersistenceError extends ServiceError {
  constructor(operation: string, originalError: Error) {
    super('RecordStore', operation, originalError, true);
    Object.setPrototypeOf(this, PersistenceError.prototype);
  }
}

export class CompletionTimeoutError extends ServiceError {
  constructor(timeoutMs: number) {
    super('Anthropic', 'complete', new Error(`timed out after ${timeoutMs}ms`), true);
    Object.setPrototypeOf(this, CompletionTimeoutError.prototype);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorMessage(value: unknown): string {
  return toError(value).message;
}
