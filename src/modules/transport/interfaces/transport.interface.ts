import type { RetryConfig } from './retry.interface.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryValue = string | number | boolean | Date | readonly (string | number)[] | null | undefined;

export type QueryParams = Record<string, QueryValue>;

/**
 * Per-call options accepted by every API method
 */
export interface RequestOptions {
  /**
   * Cancels the rate-limit wait, the request and any retry backoff
   */
  signal?: AbortSignal;

  /**
   * Overall deadline for the call, rate-limit wait and retries included
   */
  timeoutMs?: number;

  headers?: Record<string, string>;

  /**
   * Sent as `Idempotency-Key`; takes precedence over auto-generation
   */
  idempotencyKey?: string;

  /**
   * Bearer token for this call only
   */
  apiKey?: string;

  retry?: Partial<RetryConfig>;

  skipRateLimit?: boolean;
}

export interface ApiRequest {
  method: HttpMethod;

  /**
   * Path with `{name}` placeholders, e.g. `/v2/accounts/{account_id}/messages`
   */
  path: string;

  pathParams?: Record<string, string>;
  query?: QueryParams;
  body?: unknown;
  options?: RequestOptions;
}

export interface ApiResponse<T> {
  status: number;
  headers: Record<string, string>;
  data: T;
  requestId?: string;
}
