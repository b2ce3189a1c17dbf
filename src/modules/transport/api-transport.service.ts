import { Injectable, Inject, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import type { AxiosResponse } from 'axios';
import { firstValueFrom } from 'rxjs';
import { CLIENT_CONFIG } from '../../config/client-config.provider.js';
import type { ClientConfig } from '../../config/client-config.interface.js';
import { ApiError, NetworkError } from '../../common/errors/api.errors.js';
import {
  RequestCancelledError,
  createDeadlineSignal,
  isWaitAbortedError,
  toWaitError,
} from '../../common/errors/cancellation.errors.js';
import { ErrorExtractor } from '../../common/utils/error-extractor.util.js';
import { buildPath } from '../../common/utils/path-builder.util.js';
import { buildQueryString } from '../../common/utils/query.util.js';
import { IDEMPOTENCY_KEY_HEADER } from '../../common/constants/app.constants.js';
import { RateLimiterService } from '../rate-limiter/rate-limiter.service.js';
import { IdempotencyService } from '../idempotency/idempotency.service.js';
import { RetryHandlerService } from './retry-handler.service.js';
import type { RetryConfig } from './interfaces/retry.interface.js';
import type { ApiRequest, ApiResponse, HttpMethod } from './interfaces/transport.interface.js';

/**
 * Sends API requests: path building, headers and auth, idempotency keys,
 * deadlines, client-side rate limiting, retries and error mapping.
 */
@Injectable()
export class ApiTransportService {
  private readonly logger = new Logger(ApiTransportService.name);

  constructor(
    private readonly httpService: HttpService,
    @Inject(CLIENT_CONFIG) private readonly config: ClientConfig,
    private readonly rateLimiter: RateLimiterService,
    private readonly idempotency: IdempotencyService,
    private readonly retryHandler: RetryHandlerService,
  ) {}

  public async execute<T>(request: ApiRequest): Promise<ApiResponse<T>> {
    const { method, options = {} } = request;

    const path = buildPath(request.path, request.pathParams);
    const query = buildQueryString(request.query);
    const url = query ? `${path}?${query}` : path;
    const headers = this.buildHeaders(request, path);

    const signal =
      options.timeoutMs !== undefined
        ? createDeadlineSignal(options.timeoutMs, options.signal)
        : options.signal;

    if (!options.skipRateLimit) {
      await this.rateLimiter.waitForToken(method, path, signal);
    }

    const retryConfig: RetryConfig = { ...this.config.retry, ...options.retry };

    return this.retryHandler.executeWithRetry<ApiResponse<T>>({
      operation: () => this.send<T>(method, url, path, request.body, headers, signal),
      config: retryConfig,
      shouldRetry: error => this.shouldRetry(error, retryConfig),
      onRetry: (attempt, error, delayMs) => {
        this.logger.warn(
          `${method} ${path} failed (${ErrorExtractor.extractErrorMessage(error)}), ` +
            `retry ${attempt}/${retryConfig.maxRetries} in ${delayMs}ms`,
        );
      },
      signal,
    });
  }

  /**
   * Retry 429, 5xx, network failures and in-progress conflicts;
   * other 4xx only when `retryClientErrors` is set
   */
  public shouldRetry(error: unknown, config: RetryConfig): boolean {
    if (isWaitAbortedError(error)) {
      return false;
    }
    if (error instanceof NetworkError) {
      return true;
    }
    if (error instanceof ApiError && error.statusCode !== undefined) {
      if (error.isRetryable()) {
        return true;
      }
      return config.retryClientErrors && error.statusCode >= 400 && error.statusCode < 500;
    }
    return false;
  }

  private buildHeaders(request: ApiRequest, path: string): Record<string, string> {
    const { method, body, options = {} } = request;
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': this.config.userAgent,
      ...this.config.defaultHeaders,
    };

    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const requestHeaders = options.headers ?? {};
    const authorization = findHeader(requestHeaders, 'Authorization');
    const apiKey = options.apiKey || this.config.apiKey;

    if (authorization) {
      headers['Authorization'] = authorization;
    } else if (apiKey) {
      headers['Authorization'] = `Bearer ${apiKey}`;
    } else {
      throw new ApiError({
        type: 'authentication',
        message: 'No API key provided. Set it in the client configuration or in the request options',
        method,
        endpoint: path,
      });
    }

    const idempotencyKey =
      method === 'POST'
        ? this.idempotency.ensureKey(options.idempotencyKey)
        : options.idempotencyKey;
    if (idempotencyKey) {
      headers[IDEMPOTENCY_KEY_HEADER] = idempotencyKey;
    }

    for (const [name, value] of Object.entries(requestHeaders)) {
      if (name.toLowerCase() !== 'authorization') {
        headers[name] = value;
      }
    }

    return headers;
  }

  private async send<T>(
    method: HttpMethod,
    url: string,
    path: string,
    body: unknown,
    headers: Record<string, string>,
    signal: AbortSignal | undefined,
  ): Promise<ApiResponse<T>> {
    const startedAt = Date.now();
    if (this.config.debug) {
      this.logger.debug(`--> ${method} ${url}`);
    }

    let response: AxiosResponse<T>;
    try {
      response = await firstValueFrom(
        this.httpService.request<T>({
          method,
          url,
          baseURL: this.config.baseUrl,
          data: body,
          headers,
          timeout: this.config.timeoutSecs * 1000,
          signal,
          validateStatus: () => true,
        }),
      );
    } catch (error) {
      if (signal?.aborted) {
        throw toWaitError(signal);
      }
      if (ErrorExtractor.isAbortError(error)) {
        throw new RequestCancelledError(undefined, { cause: error });
      }
      throw new NetworkError(`${method} ${path}`, error);
    }

    const responseHeaders = normalizeHeaders(response.headers);
    const requestId = responseHeaders['x-request-id'];

    if (this.config.debug) {
      this.logger.debug(`<-- ${response.status} ${method} ${url} (${Date.now() - startedAt}ms)`);
    }

    if (response.status < 200 || response.status >= 300) {
      throw ApiError.fromResponse({
        statusCode: response.status,
        body: response.data,
        requestId,
        retryAfterHeader: responseHeaders['retry-after'],
        method,
        endpoint: path,
      });
    }

    return {
      status: response.status,
      headers: responseHeaders,
      data: response.data,
      requestId,
    };
  }
}

function findHeader(headers: Record<string, string>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  return Object.entries(headers).find(([key]) => key.toLowerCase() === wanted)?.[1];
}

/**
 * Lower-cased string headers; multi-value headers are joined with ", "
 */
function normalizeHeaders(headers: AxiosResponse['headers']): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string' || typeof value === 'number') {
      result[name.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      result[name.toLowerCase()] = value.join(', ');
    }
  }
  return result;
}
