import { Module, type DynamicModule, type Provider } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { AhaSendClient } from './ahasend.client.js';
import { CLIENT_CONFIG, createClientConfigProvider } from './config/client-config.provider.js';
import type { ClientConfigOverrides } from './config/client-config.interface.js';
import { RateLimiterService } from './modules/rate-limiter/rate-limiter.service.js';
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

const API_PROVIDERS = [
  MessagesApi,
  StatisticsApi,
  DomainsApi,
  SuppressionsApi,
  WebhooksApi,
  UtilityApi,
  AccountsApi,
  ApiKeysApi,
  RoutesApi,
  SmtpCredentialsApi,
];

export interface AhaSendModuleOptions {
  /**
   * Applied over defaults, the YAML file and AHASEND_* variables
   */
  config?: ClientConfigOverrides;

  /**
   * Register the module globally
   */
  isGlobal?: boolean;
}

/**
 * Module for the AhaSend client
 */
@Module({})
export class AhaSendModule {
  /**
   * Register the client; configuration is resolved once, when the module is instantiated
   */
  static forRoot(options: AhaSendModuleOptions = {}): DynamicModule {
    const providers: Provider[] = [
      createClientConfigProvider(options.config),
      RateLimiterService,
      IdempotencyService,
      RetryHandlerService,
      ApiTransportService,
      ...API_PROVIDERS,
      AhaSendClient,
    ];

    return {
      module: AhaSendModule,
      global: options.isGlobal ?? false,
      imports: [HttpModule],
      providers,
      exports: [CLIENT_CONFIG, AhaSendClient, RateLimiterService, ...API_PROVIDERS],
    };
  }
}
