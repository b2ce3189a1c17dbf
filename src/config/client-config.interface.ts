import type { RateLimitConfig } from '../modules/rate-limiter/interfaces/rate-limiter.interface.js';
import type { RetryConfig } from '../modules/transport/interfaces/retry.interface.js';
import type { IdempotencyConfig } from '../modules/idempotency/interfaces/idempotency.interface.js';

/**
 * Resolved client configuration
 */
export interface ClientConfig {
  /**
   * Bearer token. May be omitted when every request passes its own key.
   */
  apiKey?: string;

  /**
   * Scheme and host, e.g. https://api.ahasend.com
   */
  baseUrl: string;

  userAgent: string;

  /**
   * Log request and response lines at debug level
   */
  debug: boolean;

  /**
   * Transport timeout per attempt in seconds
   */
  timeoutSecs: number;

  /**
   * Headers added to every request
   */
  defaultHeaders: Record<string, string>;

  rateLimiting: {
    /**
     * Global kill switch
     */
    enabled: boolean;
    general: RateLimitConfig;
    statistics: RateLimitConfig;
    sendMessage: RateLimitConfig;
  };

  retry: RetryConfig;

  idempotency: IdempotencyConfig;
}

/**
 * Programmatic overrides; nested sections merge field by field
 */
export interface ClientConfigOverrides {
  apiKey?: string;
  baseUrl?: string;
  userAgent?: string;
  debug?: boolean;
  timeoutSecs?: number;
  defaultHeaders?: Record<string, string>;
  rateLimiting?: {
    enabled?: boolean;
    general?: Partial<RateLimitConfig>;
    statistics?: Partial<RateLimitConfig>;
    sendMessage?: Partial<RateLimitConfig>;
  };
  retry?: Partial<RetryConfig>;
  idempotency?: Partial<IdempotencyConfig>;
}
