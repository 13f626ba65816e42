/**
 * Error types shared across the bot.
 */

/**
 * Normalize any thrown value to a log-friendly message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Operation exceeded its time budget.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, operation?: string) {
    super(
      operation
        ? `${operation} timed out after ${String(timeoutMs)}ms`
        : `Operation timed out after ${String(timeoutMs)}ms`
    );
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Storage read/write failed for a key.
 */
export class StorageError extends Error {
  readonly key: string;

  constructor(key: string, cause: unknown) {
    super(`Storage operation failed for "${key}": ${errorMessage(cause)}`, { cause });
    this.name = 'StorageError';
    this.key = key;
  }
}

/**
 * User is already subscribed to the topic.
 */
export class DuplicateSubscriptionError extends Error {
  readonly topic: string;

  constructor(topic: string) {
    super(`Already subscribed to "${topic}"`);
    this.name = 'DuplicateSubscriptionError';
    this.topic = topic;
  }
}

/**
 * User has no subscription for the topic.
 */
export class SubscriptionNotFoundError extends Error {
  readonly topic: string;

  constructor(topic: string) {
    super(`Subscription "${topic}" not found`);
    this.name = 'SubscriptionNotFoundError';
    this.topic = topic;
  }
}

/**
 * Topic failed validation (empty or too long).
 */
export class InvalidTopicError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTopicError';
  }
}

/**
 * Configuration file or environment is invalid.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Node system error carrying an errno code such as ENOENT.
 */
export function isErrnoError(error: unknown, code: string): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * No user with the given internal id.
 */
export class UserNotFoundError extends Error {
  readonly userId: number;

  constructor(userId: number) {
    super(`User ${String(userId)} not found`);
    this.name = 'UserNotFoundError';
    this.userId = userId;
  }
}

export type NewsErrorCode =
  | 'RATE_LIMITED'
  | 'AUTH_FAILED'
  | 'PROVIDER_ERROR'
  | 'TIMEOUT'
  | 'NETWORK_ERROR'
  | 'NO_PROVIDER';

/**
 * No news provider could serve a request.
 */
export class NewsProviderError extends Error {
  readonly code: NewsErrorCode;
  readonly retryable: boolean;

  constructor(code: NewsErrorCode, message: string, retryable = false) {
    super(message);
    this.name = 'NewsProviderError';
    this.code = code;
    this.retryable = retryable;
  }
}
