export type WebhookErrorCode =
  | 'missing_headers'
  | 'invalid_timestamp'
  | 'timestamp_expired'
  | 'invalid_signature'
  | 'invalid_payload'
  | 'unknown_event_type';

const MESSAGES: Record<WebhookErrorCode, string> = {
  missing_headers: 'Missing required webhook headers',
  invalid_timestamp: 'Invalid webhook timestamp',
  timestamp_expired: 'Webhook timestamp expired',
  invalid_signature: 'Invalid webhook signature',
  invalid_payload: 'Invalid webhook payload',
  unknown_event_type: 'Unknown webhook event type',
};

/**
 * Raised when an incoming webhook fails verification or cannot be parsed
 */
export class WebhookVerificationError extends Error {
  constructor(
    public readonly code: WebhookErrorCode,
    detail?: string,
    options?: { cause?: unknown },
  ) {
    super(detail === undefined ? MESSAGES[code] : `${MESSAGES[code]}: ${detail}`, options);
    this.name = 'WebhookVerificationError';
  }
}
