import { Injectable, Inject, Logger, Optional } from '@nestjs/common';
import { CLIENT_CONFIG } from '../../config/client-config.provider.js';
import type { ClientConfig } from '../../config/client-config.interface.js';
import {
  RateLimitConfigValidator,
  RateLimitingValidator,
} from '../../config/validators/rate-limiting-validator.js';
import {
  EndpointType,
  ENDPOINT_TYPES,
  type CustomerRateLimitConfig,
  type RateLimitConfig,
  type RateLimitStatus,
} from './interfaces/rate-limiter.interface.js';
import { TokenBucket, type Clock } from './token-bucket.js';
import { classifyEndpoint } from './endpoint-classifier.js';

/**
 * Optional injection token for the time source used by every bucket
 */
export const RATE_LIMITER_CLOCK = 'AHASEND_RATE_LIMITER_CLOCK';

const CUSTOMER_KEYS: ReadonlyArray<[keyof CustomerRateLimitConfig, EndpointType]> = [
  ['general', EndpointType.General],
  ['statistics', EndpointType.Statistics],
  ['sendMessage', EndpointType.SendMessage],
];

/**
 * Client-side rate limiter with one token bucket per endpoint category.
 *
 * The bucket set is fixed at construction. Limits are updated in place, so
 * requests already waiting observe new limits without being re-queued.
 */
@Injectable()
export class RateLimiterService {
  private readonly logger = new Logger(RateLimiterService.name);
  private readonly bucketValidator: RateLimitConfigValidator = new RateLimitConfigValidator();
  private readonly rateLimitingValidator: RateLimitingValidator = new RateLimitingValidator();

  private readonly buckets: Map<EndpointType, TokenBucket>;
  private globalEnabled: boolean;

  constructor(
    @Inject(CLIENT_CONFIG) config: ClientConfig,
    @Optional() @Inject(RATE_LIMITER_CLOCK) clock?: Clock,
  ) {
    const { rateLimiting } = config;
    const now = clock ?? Date.now;

    this.globalEnabled = rateLimiting.enabled;
    this.buckets = new Map([
      [EndpointType.General, new TokenBucket(rateLimiting.general, now)],
      [EndpointType.Statistics, new TokenBucket(rateLimiting.statistics, now)],
      [EndpointType.SendMessage, new TokenBucket(rateLimiting.sendMessage, now)],
    ]);

    if (this.globalEnabled) {
      this.logger.log(
        `Rate limiting enabled: general ${rateLimiting.general.requestsPerSecond}/s, ` +
          `statistics ${rateLimiting.statistics.requestsPerSecond}/s, ` +
          `send_message ${rateLimiting.sendMessage.requestsPerSecond}/s`,
      );
    }
  }

  public classify(method: string, path: string): EndpointType {
    return classifyEndpoint(method, path);
  }

  /**
   * Admit one request to the bucket for its category.
   *
   * Resolves immediately while limiting is globally disabled. Otherwise waits for a
   * token; rejects with `DeadlineExceededError` or `RequestCancelledError` when
   * `signal` aborts first.
   */
  public async waitForToken(method: string, path: string, signal?: AbortSignal): Promise<void> {
    if (!this.globalEnabled) {
      return;
    }

    const endpointType = this.classify(method, path);
    const bucket = this.getBucket(endpointType);

    if (bucket.tryAcquire()) {
      return;
    }

    this.logger.debug(`Waiting for ${endpointType} token: ${method.toUpperCase()} ${path}`);
    await bucket.waitForToken(signal, () => !this.globalEnabled);
  }

  /**
   * Non-blocking admission check; consumes a token on success
   */
  public tryAcquire(method: string, path: string): boolean {
    if (!this.globalEnabled) {
      return true;
    }
    return this.getBucket(this.classify(method, path)).tryAcquire();
  }

  /**
   * Replace the limits of one category and enable it
   * @throws ConfigValidationError for negative or fractional values
   */
  public setRateLimit(
    endpointType: EndpointType,
    requestsPerSecond: number,
    burstCapacity: number,
  ): void {
    const config: RateLimitConfig = { requestsPerSecond, burstCapacity, enabled: true };
    this.bucketValidator.validate(config, endpointType);

    this.getBucket(endpointType).updateConfig(config);
    this.logger.log(`Rate limit for ${endpointType} set to ${requestsPerSecond}/s, burst ${burstCapacity}`);
  }

  public enableRateLimit(endpointType: EndpointType, enabled: boolean): void {
    this.getBucket(endpointType).setEnabled(enabled);
  }

  /**
   * Global kill switch. Turning it off also releases requests already waiting,
   * the same way disabling a single category does.
   */
  public setGlobalEnabled(enabled: boolean): void {
    this.globalEnabled = enabled;

    if (!enabled) {
      for (const bucket of this.buckets.values()) {
        bucket.wake();
      }
    }
    this.logger.log(`Rate limiting ${enabled ? 'enabled' : 'disabled'} globally`);
  }

  public isEnabled(): boolean {
    return this.globalEnabled;
  }

  /**
   * Apply per-category overrides. All of them are validated before any is applied.
   */
  public configure(customer: CustomerRateLimitConfig): void {
    this.rateLimitingValidator.validateCustomer(customer, 'customer');

    for (const [key, endpointType] of CUSTOMER_KEYS) {
      const config = customer[key];
      if (config !== undefined) {
        this.getBucket(endpointType).updateConfig(config);
      }
    }
  }

  public getStatus(endpointType: EndpointType): RateLimitStatus {
    return this.getBucket(endpointType).getStatus(endpointType);
  }

  public getAllStatuses(): RateLimitStatus[] {
    return ENDPOINT_TYPES.map(endpointType => this.getStatus(endpointType));
  }

  private getBucket(endpointType: EndpointType): TokenBucket {
    const bucket = this.buckets.get(endpointType);
    if (!bucket) {
      throw new Error(`Unknown endpoint type: ${String(endpointType)}`);
    }
    return bucket;
  }
}
