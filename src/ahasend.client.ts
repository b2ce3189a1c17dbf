import { Injectable } from '@nestjs/common';
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
import { RateLimiterService } from './modules/rate-limiter/rate-limiter.service.js';
import { IdempotencyService } from './modules/idempotency/idempotency.service.js';
import type { IdempotencyKeyBuilder } from './modules/idempotency/idempotency-key.builder.js';
import type { IdempotencyConfig } from './modules/idempotency/interfaces/idempotency.interface.js';
import { WebhookVerifier } from './modules/webhooks/webhook-verifier.js';
import type { WebhookVerifierOptions } from './modules/webhooks/interfaces/webhook-event.interface.js';
import {
  EndpointType,
  type CustomerRateLimitConfig,
  type RateLimitStatus,
} from './modules/rate-limiter/interfaces/rate-limiter.interface.js';

/**
 * Entry point to the AhaSend API.
 *
 * Groups the resource APIs and exposes the client-side rate limiter and
 * idempotency settings shared by every request this instance sends.
 */
@Injectable()
export class AhaSendClient {
  constructor(
    public readonly messages: MessagesApi,
    public readonly statistics: StatisticsApi,
    public readonly domains: DomainsApi,
    public readonly suppressions: SuppressionsApi,
    public readonly webhooks: WebhooksApi,
    public readonly utility: UtilityApi,
    public readonly accounts: AccountsApi,
    public readonly apiKeys: ApiKeysApi,
    public readonly routes: RoutesApi,
    public readonly smtpCredentials: SmtpCredentialsApi,
    private readonly rateLimiter: RateLimiterService,
    private readonly idempotency: IdempotencyService,
  ) {}

  public setGeneralRateLimit(requestsPerSecond: number, burstCapacity: number): void {
    this.rateLimiter.setRateLimit(EndpointType.General, requestsPerSecond, burstCapacity);
  }

  public setStatisticsRateLimit(requestsPerSecond: number, burstCapacity: number): void {
    this.rateLimiter.setRateLimit(EndpointType.Statistics, requestsPerSecond, burstCapacity);
  }

  public setSendMessageRateLimit(requestsPerSecond: number, burstCapacity: number): void {
    this.rateLimiter.setRateLimit(EndpointType.SendMessage, requestsPerSecond, burstCapacity);
  }

  public setCustomRateLimit(
    endpointType: EndpointType,
    requestsPerSecond: number,
    burstCapacity: number,
  ): void {
    this.rateLimiter.setRateLimit(endpointType, requestsPerSecond, burstCapacity);
  }

  public enableRateLimit(endpointType: EndpointType, enabled: boolean): void {
    this.rateLimiter.enableRateLimit(endpointType, enabled);
  }

  /**
   * Turn client-side rate limiting on or off for every category
   */
  public setGlobalRateLimit(enabled: boolean): void {
    this.rateLimiter.setGlobalEnabled(enabled);
  }

  public getRateLimitStatus(endpointType: EndpointType): RateLimitStatus {
    return this.rateLimiter.getStatus(endpointType);
  }

  public getAllRateLimitStatuses(): RateLimitStatus[] {
    return this.rateLimiter.getAllStatuses();
  }

  public configureCustomerRateLimits(config: CustomerRateLimitConfig): void {
    this.rateLimiter.configure(config);
  }

  public generateIdempotencyKey(): string {
    return this.idempotency.generateKey();
  }

  public newIdempotencyKeyBuilder(baseKey?: string): IdempotencyKeyBuilder {
    return this.idempotency.newKeyBuilder(baseKey);
  }

  public getIdempotencyConfig(): IdempotencyConfig {
    return this.idempotency.getConfig();
  }

  public setIdempotencyConfig(config: Partial<IdempotencyConfig>): void {
    this.idempotency.setConfig(config);
  }

  /**
   * Verifier for deliveries signed with a webhook's or route's secret
   */
  public newWebhookVerifier(secret: string, options?: WebhookVerifierOptions): WebhookVerifier {
    return new WebhookVerifier(secret, options);
  }
}
