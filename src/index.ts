import 'reflect-metadata';

export { AhaSendClient } from './ahasend.client.js';
export { AhaSendModule, type AhaSendModuleOptions } from './ahasend.module.js';
export { createAhaSendClient, type CreateClientOptions } from './client.factory.js';

export { loadClientConfig, createDefaultClientConfig } from './config/client.config.js';
export { CLIENT_CONFIG } from './config/client-config.provider.js';
export type { ClientConfig, ClientConfigOverrides } from './config/client-config.interface.js';
export { ConfigValidationError, type ValidationResult } from './config/validators/config-validator.js';
export { validateRateLimitConfig } from './config/validators/rate-limiting-validator.js';

export { TokenBucket, type Clock } from './modules/rate-limiter/token-bucket.js';
export { RateLimiterService, RATE_LIMITER_CLOCK } from './modules/rate-limiter/rate-limiter.service.js';
export { classifyEndpoint } from './modules/rate-limiter/endpoint-classifier.js';
export {
  EndpointType,
  ENDPOINT_TYPES,
  type RateLimitConfig,
  type CustomerRateLimitConfig,
  type RateLimitStatus,
} from './modules/rate-limiter/interfaces/rate-limiter.interface.js';

export { IdempotencyService } from './modules/idempotency/idempotency.service.js';
export { IdempotencyKeyBuilder } from './modules/idempotency/idempotency-key.builder.js';
export type { IdempotencyConfig } from './modules/idempotency/interfaces/idempotency.interface.js';

export { ApiTransportService } from './modules/transport/api-transport.service.js';
export { RetryHandlerService } from './modules/transport/retry-handler.service.js';
export type { RetryConfig, BackoffStrategy } from './modules/transport/interfaces/retry.interface.js';
export type {
  ApiRequest,
  ApiResponse,
  HttpMethod,
  QueryParams,
  RequestOptions,
} from './modules/transport/interfaces/transport.interface.js';

export { MessagesApi } from './modules/api/messages.api.js';
export { StatisticsApi } from './modules/api/statistics.api.js';
export { DomainsApi } from './modules/api/domains.api.js';
export { SuppressionsApi } from './modules/api/suppressions.api.js';
export { WebhooksApi } from './modules/api/webhooks.api.js';
export { UtilityApi } from './modules/api/utility.api.js';
export { AccountsApi } from './modules/api/accounts.api.js';
export { ApiKeysApi } from './modules/api/api-keys.api.js';
export { RoutesApi } from './modules/api/routes.api.js';
export { SmtpCredentialsApi } from './modules/api/smtp-credentials.api.js';
export * from './modules/api/dto/message.dto.js';
export * from './modules/api/dto/domain.dto.js';
export * from './modules/api/dto/suppression.dto.js';
export * from './modules/api/dto/webhook.dto.js';
export * from './modules/api/dto/account.dto.js';
export * from './modules/api/dto/api-key.dto.js';
export * from './modules/api/dto/route.dto.js';
export * from './modules/api/dto/smtp-credential.dto.js';
export type * from './modules/api/interfaces/common.interface.js';
export type * from './modules/api/interfaces/message.interface.js';
export type * from './modules/api/interfaces/statistics.interface.js';
export type * from './modules/api/interfaces/domain.interface.js';
export type * from './modules/api/interfaces/suppression.interface.js';
export type * from './modules/api/interfaces/webhook.interface.js';
export type * from './modules/api/interfaces/account.interface.js';
export type * from './modules/api/interfaces/api-key.interface.js';
export type * from './modules/api/interfaces/route.interface.js';
export type * from './modules/api/interfaces/smtp-credential.interface.js';

export {
  WebhookVerifier,
  isMessageEvent,
  isSuppressionEvent,
  isDomainEvent,
  isRouteEvent,
  getMessageEventData,
} from './modules/webhooks/webhook-verifier.js';
export {
  MESSAGE_EVENT_TYPES,
  WEBHOOK_EVENT_TYPES,
  type MessageEventType,
  type WebhookEventType,
  type MessageEventData,
  type MessageClickedEventData,
  type SuppressionEventData,
  type DomainEventData,
  type RouteAttachment,
  type RouteEventData,
  type MessageEvent,
  type MessageClickedEvent,
  type SuppressionCreatedEvent,
  type DomainDnsErrorEvent,
  type RouteMessageEvent,
  type WebhookEvent,
  type WebhookHeaders,
  type WebhookVerifierOptions,
} from './modules/webhooks/interfaces/webhook-event.interface.js';
export { WebhookVerificationError, type WebhookErrorCode } from './common/errors/webhook.errors.js';

export { paginate, collectAll } from './common/pagination/paginate.js';
export type {
  PaginatedResponse,
  PaginationInfo,
  PaginationParams,
} from './common/pagination/pagination.interface.js';

export { ApiError, NetworkError, isRetryableError, type ApiErrorType } from './common/errors/api.errors.js';
export {
  RequestCancelledError,
  DeadlineExceededError,
  createDeadlineSignal,
  isWaitAbortedError,
} from './common/errors/cancellation.errors.js';
