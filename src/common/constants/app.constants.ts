/**
 * Global client constants
 */

/**
 * Default API base URL
 */
export const DEFAULT_BASE_URL = 'https://api.ahasend.com';

/**
 * Default User-Agent header value
 */
export const DEFAULT_USER_AGENT = 'AhaSend-Node-Client/0.1';

/**
 * Default per-request transport timeout in seconds
 */
export const DEFAULT_TIMEOUT_SECS = 30;

/**
 * Upper bound for a single rate limiter sleep in milliseconds (1 minute).
 * Keeps timer delays far below the setTimeout overflow limit for very slow buckets.
 */
export const MAX_TOKEN_WAIT_MS = 60_000;

/**
 * Extra delay added to computed token wake-ups so the refill has landed when the waiter re-checks
 */
export const TOKEN_WAKE_SLACK_MS = 1;

/**
 * Header carrying idempotency keys
 */
export const IDEMPOTENCY_KEY_HEADER = 'Idempotency-Key';

/**
 * Percentage of jitter applied to exponential retry delays (+/-)
 */
export const RETRY_JITTER_PERCENT = 25;

/**
 * Page size requested by list endpoints when the caller sets none
 */
export const DEFAULT_PAGE_LIMIT = 100;

/**
 * Webhook signature headers, lower-cased
 */
export const WEBHOOK_ID_HEADER = 'webhook-id';
export const WEBHOOK_TIMESTAMP_HEADER = 'webhook-timestamp';
export const WEBHOOK_SIGNATURE_HEADER = 'webhook-signature';

/**
 * Version prefix of entries in the signature header, followed by `=` or `,`
 */
export const WEBHOOK_SIGNATURE_VERSION = 'v1';

/**
 * Default maximum age of an incoming webhook in milliseconds (5 minutes)
 */
export const DEFAULT_WEBHOOK_TOLERANCE_MS = 5 * 60_000;
