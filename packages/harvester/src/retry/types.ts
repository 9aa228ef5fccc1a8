type ErrorClass =
  | 'network'
  | 'server'
  | 'rate-limited'
  | 'client'
  | 'parse'
  | 'aborted'
  | 'system';

type RetryDecision = {
  shouldRetry: boolean;
  delayMs: number;
  errorClass: ErrorClass;
};

type RetryStrategyConfig = {
  /** Total attempts per URL, the first one included. */
  maxAttempts: number;
  baseDelayMs: number;
  jitterMs: number;
};

export type { ErrorClass, RetryDecision, RetryStrategyConfig };
