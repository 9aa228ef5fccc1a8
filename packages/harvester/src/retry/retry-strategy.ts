import { isAxiosError, isCancel } from 'axios';
import { HttpStatusError, ParseFailure } from '../errors.js';
import type { ErrorClass, RetryDecision, RetryStrategyConfig } from './types.js';

const DEFAULT_CONFIG: RetryStrategyConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  jitterMs: 250,
};

const NETWORK_CODES = new Set([
  'ECONNABORTED',
  'ECONNREFUSED',
  'ECONNRESET',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'ETIMEDOUT',
  'ERR_NETWORK',
]);

const RETRYABLE: ReadonlySet<ErrorClass> = new Set([
  'network',
  'server',
  'rate-limited',
]);

export class RetryStrategy {
  private readonly config: RetryStrategyConfig;

  constructor(config?: Partial<RetryStrategyConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  classify(error: unknown): ErrorClass {
    if (isCancel(error)) {
      return 'aborted';
    }

    if (error instanceof Error && error.name === 'AbortError') {
      return 'aborted';
    }

    if (error instanceof ParseFailure) {
      return 'parse';
    }

    if (error instanceof HttpStatusError) {
      if (error.status === 429) {
        return 'rate-limited';
      }

      return error.status >= 500 ? 'server' : 'client';
    }

    if (isAxiosError(error)) {
      if (error.code && NETWORK_CODES.has(error.code)) {
        return 'network';
      }

      if (!error.response) {
        return 'network';
      }
    }

    const message =
      error instanceof Error ? error.message.toLowerCase() : String(error);

    if (
      message.includes('timeout') ||
      message.includes('econnreset') ||
      message.includes('econnrefused') ||
      message.includes('socket hang up') ||
      message.includes('network')
    ) {
      return 'network';
    }

    return 'system';
  }

  /**
   * `attempt` is zero-based: the decision after the first failed attempt is
   * `decide(errorClass, 0)` and waits `baseDelayMs`.
   */
  decide(errorClass: ErrorClass, attempt: number): RetryDecision {
    const shouldRetry =
      RETRYABLE.has(errorClass) && attempt + 1 < this.config.maxAttempts;

    return {
      shouldRetry,
      delayMs: shouldRetry ? this.backoff(attempt) : 0,
      errorClass,
    };
  }

  private backoff(attempt: number): number {
    const jitter =
      this.config.jitterMs > 0 ? Math.random() * this.config.jitterMs : 0;
    return this.config.baseDelayMs * Math.pow(2, attempt) + jitter;
  }
}
