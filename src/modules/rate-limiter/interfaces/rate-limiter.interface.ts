/**
 * Endpoint categories with distinct rate limits
 */
export const EndpointType = {
  /**
   * Everything not matched by a more specific category
   */
  General: 'general',
  /**
   * `/statistics/*` queries
   */
  Statistics: 'statistics',
  /**
   * `POST .../messages` (sending)
   */
  SendMessage: 'send_message',
} as const;

export type EndpointType = (typeof EndpointType)[keyof typeof EndpointType];

export const ENDPOINT_TYPES: readonly EndpointType[] = [
  EndpointType.General,
  EndpointType.Statistics,
  EndpointType.SendMessage,
];

/**
 * Configuration of a single token bucket
 */
export interface RateLimitConfig {
  /**
   * Tokens added per second. 0 means the bucket never refills.
   */
  requestsPerSecond: number;

  /**
   * Maximum tokens held (burst size)
   */
  burstCapacity: number;

  enabled: boolean;
}

/**
 * Per-category overrides applied in one call
 */
export interface CustomerRateLimitConfig {
  general?: RateLimitConfig;
  statistics?: RateLimitConfig;
  sendMessage?: RateLimitConfig;
}

/**
 * Read-only snapshot of a bucket
 */
export interface RateLimitStatus {
  readonly endpointType: EndpointType;
  readonly enabled: boolean;
  readonly requestsPerSecond: number;
  readonly burstCapacity: number;

  /**
   * Whole tokens available at the time of the snapshot
   */
  readonly tokensAvailable: number;

  /**
   * When the bucket will be full again; null if already full or never refilling
   */
  readonly nextRefillAt: Date | null;
}
