export const BACKOFF_STRATEGIES = ['exponential', 'linear', 'constant'] as const;

export type BackoffStrategy = (typeof BACKOFF_STRATEGIES)[number];

export interface RetryConfig {
  /**
   * Master switch; with `false` every request is sent exactly once
   */
  enabled: boolean;

  /**
   * Extra attempts after the first one
   */
  maxRetries: number;

  /**
   * Retry 4xx responses other than 429
   */
  retryClientErrors: boolean;

  backoffStrategy: BackoffStrategy;

  /**
   * Delay before the first retry in milliseconds
   */
  baseDelayMs: number;

  /**
   * Cap for any single delay in milliseconds
   */
  maxDelayMs: number;
}
