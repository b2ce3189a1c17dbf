import axios from 'axios';
import { HttpService } from '@nestjs/axios';
import { AhaSendClient } from './ahasend.client.js';
import { loadClientConfig } from './config/client.config.js';
import type { ClientConfigOverrides } from './config/client-config.interface.js';
import { RateLimiterService } from './modules/rate-limiter/rate-limiter.service.js';
import type { Clock } from './modules/rate-limiter/token-bucket.js';
import { IdempotencyService } from './modules/idempotency/idempotency.service.js';
import { RetryHandlerService } from './modules/transport/retry-handler.service.js';
import { ApiTransportService } from './modules/transport/api-transport.service.js';
import { MessagesApi } from './modules/api/messages.api.js';
import { StatisticsApi } from './modules/api/statistics.api.js';
import { DomainsApi } from './modules/api/domains.api.js';
import { SuppressionsApi } from './modules/api/suppressions.api.js';
import { WebhooksApi } from './modules/api/webhooks.api.js';
import { UtilityApi } from './modules/api/utility.api.js';
import { AccountsApi } from './modules/api/accounts.api.js';
import { ApiKeysApi } from './modules/api/api-keys.api.js';
import { RoutesApi } from './modules/api/routes.api.js';
import { SmtpCredentialsApi } from './modules/api/smtp-credentials.api.js';

export interface CreateClientOptions {
  /**
   * Defaults to an `HttpService` over a fresh axios instance
   */
  httpService?: HttpService;

  /**
   * Environment to read AHASEND_* variables from; defaults to `process.env`
   */
  env?: Record<string, string | undefined>;

  /**
   * Time source for the rate limiter
   */
  clock?: Clock;
}

/**
 * Build a client without a Nest application. Each call gets its own rate limiter.
 */
export function createAhaSendClient(
  overrides?: ClientConfigOverrides,
  options: CreateClientOptions = {},
): AhaSendClient {
  const config = loadClientConfig(overrides, options.env);
  const httpService = options.httpService ?? new HttpService(axios.create());

  const rateLimiter = new RateLimiterService(config, options.clock);
  const idempotency = new IdempotencyService(config);
  const transport = new ApiTransportService(
    httpService,
    config,
    rateLimiter,
    idempotency,
    new RetryHandlerService(),
  );

  return new AhaSendClient(
    new MessagesApi(transport),
    new StatisticsApi(transport),
    new DomainsApi(transport),
    new SuppressionsApi(transport),
    new WebhooksApi(transport),
    new UtilityApi(transport),
    new AccountsApi(transport),
    new ApiKeysApi(transport),
    new RoutesApi(transport),
    new SmtpCredentialsApi(transport),
    rateLimiter,
    idempotency,
  );
}
