/**
 * Message event types that carry {@link MessageEventData}
 */
export const MESSAGE_EVENT_TYPES = [
  'message.reception',
  'message.delivered',
  'message.transient_error',
  'message.failed',
  'message.bounced',
  'message.suppressed',
  'message.opened',
] as const;

export type MessageEventType = (typeof MESSAGE_EVENT_TYPES)[number];

export const WEBHOOK_EVENT_TYPES = [
  ...MESSAGE_EVENT_TYPES,
  'message.clicked',
  'suppression.created',
  'domain.dns_error',
  'route.message',
] as const;

export type WebhookEventType = (typeof WEBHOOK_EVENT_TYPES)[number];

export interface MessageEventData {
  account_id: string;
  event: string;
  from: string;
  recipient: string;
  subject: string;
  message_id_header: string;
  id: string;
  user_agent?: string;
  ip?: string;
  is_bot?: string;
}

export interface MessageClickedEventData {
  account_id: string;
  event: string;
  from: string;
  recipient: string;
  subject: string;
  message_id_header: string;
  id: string;
  url: string;
  user_agent: string;
  ip: string;
  is_bot: boolean;
}

export interface SuppressionEventData {
  account_id: string;
  recipient: string;
  created_at: string;
  expires_at: string;
  reason: string;
  sending_domain: string;
}

export interface DomainEventData {
  domain: string;
  account_id: string;
  spf_valid: boolean;
  dkim_valid: boolean;
  dmarc_valid: boolean;
  dns_last_checked_at: string;
}

export interface RouteAttachment {
  filename: string;
  content_type: string;
  content_id?: string;
  /**
   * Base64 content
   */
  data: string;
}

export interface RouteEventData {
  id: string;
  from: string;
  reply_to?: string;
  to: string;
  subject: string;
  message_id: string;
  size: number;
  spam_score?: number;
  bounce: boolean;
  cc?: string;
  date?: string;
  in_reply_to?: string;
  references?: string;
  auto_submitted?: string;
  html_body: string;
  plain_body: string;
  reply_from_plain_body?: string;
  attachments?: RouteAttachment[];
  headers?: Record<string, string>;
}

interface BaseWebhookEvent<TType extends WebhookEventType, TData> {
  type: TType;
  /**
   * RFC 3339
   */
  timestamp: string;
  data: TData;
}

export interface MessageEvent extends BaseWebhookEvent<MessageEventType, MessageEventData> {
  webhook_id?: string;
}

export interface MessageClickedEvent
  extends BaseWebhookEvent<'message.clicked', MessageClickedEventData> {
  webhook_id?: string;
}

export interface SuppressionCreatedEvent
  extends BaseWebhookEvent<'suppression.created', SuppressionEventData> {
  webhook_id?: string;
}

export interface DomainDnsErrorEvent extends BaseWebhookEvent<'domain.dns_error', DomainEventData> {
  webhook_id?: string;
}

export interface RouteMessageEvent extends BaseWebhookEvent<'route.message', RouteEventData> {
  route_id?: string;
}

export type WebhookEvent =
  | MessageEvent
  | MessageClickedEvent
  | SuppressionCreatedEvent
  | DomainDnsErrorEvent
  | RouteMessageEvent;

/**
 * Header map as Node's `IncomingHttpHeaders` or a plain object; names match case-insensitively
 */
export type WebhookHeaders = Record<string, string | string[] | undefined>;

export interface WebhookVerifierOptions {
  /**
   * Maximum accepted age of a webhook in milliseconds. Defaults to 5 minutes.
   */
  toleranceMs?: number;

  /**
   * Time source in epoch milliseconds
   */
  clock?: () => number;
}
