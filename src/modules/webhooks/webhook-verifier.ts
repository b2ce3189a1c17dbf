import { createHmac, timingSafeEqual } from 'node:crypto';
import {
  DEFAULT_WEBHOOK_TOLERANCE_MS,
  WEBHOOK_ID_HEADER,
  WEBHOOK_SIGNATURE_HEADER,
  WEBHOOK_SIGNATURE_VERSION,
  WEBHOOK_TIMESTAMP_HEADER,
} from '../../common/constants/app.constants.js';
import { WebhookVerificationError } from '../../common/errors/webhook.errors.js';
import { ErrorExtractor } from '../../common/utils/error-extractor.util.js';
import {
  MESSAGE_EVENT_TYPES,
  WEBHOOK_EVENT_TYPES,
  type DomainDnsErrorEvent,
  type MessageClickedEvent,
  type MessageEvent,
  type MessageEventData,
  type RouteMessageEvent,
  type SuppressionCreatedEvent,
  type WebhookEvent,
  type WebhookEventType,
  type WebhookHeaders,
  type WebhookVerifierOptions,
} from './interfaces/webhook-event.interface.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isKnownEventType(type: unknown): type is WebhookEventType {
  return WEBHOOK_EVENT_TYPES.some(known => known === type);
}

function hasEventEnvelope(value: unknown): value is WebhookEvent {
  return (
    isRecord(value) &&
    isKnownEventType(value.type) &&
    typeof value.timestamp === 'string' &&
    isRecord(value.data)
  );
}

function readHeader(headers: WebhookHeaders, name: string): string | undefined {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name) {
      return Array.isArray(value) ? value[0] : value;
    }
  }
  return undefined;
}

function stripVersion(signature: string): string {
  for (const separator of ['=', ',']) {
    const prefix = `${WEBHOOK_SIGNATURE_VERSION}${separator}`;
    if (signature.startsWith(prefix)) {
      return signature.slice(prefix.length);
    }
  }
  return signature;
}

/**
 * Verifies incoming AhaSend webhooks (Standard Webhooks signing scheme).
 *
 * The signed content is `${webhook-id}.${webhook-timestamp}.${body}`, signed with
 * HMAC-SHA256 keyed by the secret as given and encoded as base64. The signature
 * header may list several space-separated signatures; any match passes.
 * Only age is checked: timestamps in the future are accepted.
 */
export class WebhookVerifier {
  private readonly secret: Buffer;
  private toleranceMs: number;
  private readonly clock: () => number;

  constructor(secret: string, options: WebhookVerifierOptions = {}) {
    this.secret = Buffer.from(secret, 'utf8');
    this.toleranceMs = options.toleranceMs ?? DEFAULT_WEBHOOK_TOLERANCE_MS;
    this.clock = options.clock ?? Date.now;
  }

  public setTolerance(toleranceMs: number): void {
    this.toleranceMs = toleranceMs;
  }

  public getTolerance(): number {
    return this.toleranceMs;
  }

  /**
   * @param payload Raw request body, exactly as received
   * @throws WebhookVerificationError
   */
  public verify(payload: string | Buffer, headers: WebhookHeaders): void {
    const id = readHeader(headers, WEBHOOK_ID_HEADER);
    const timestamp = readHeader(headers, WEBHOOK_TIMESTAMP_HEADER);
    const signatureHeader = readHeader(headers, WEBHOOK_SIGNATURE_HEADER);

    if (!id || !timestamp || !signatureHeader) {
      throw new WebhookVerificationError('missing_headers');
    }

    const seconds = /^[+-]?\d+$/.test(timestamp) ? Number(timestamp) : Number.NaN;
    if (!Number.isSafeInteger(seconds)) {
      throw new WebhookVerificationError('invalid_timestamp', timestamp);
    }

    if (this.clock() - seconds * 1000 > this.toleranceMs) {
      throw new WebhookVerificationError('timestamp_expired');
    }

    const expected = Buffer.from(this.sign(id, timestamp, payload), 'utf8');

    const matched = signatureHeader.split(' ').some(entry => {
      const candidate = Buffer.from(stripVersion(entry), 'utf8');
      return candidate.length === expected.length && timingSafeEqual(candidate, expected);
    });

    if (!matched) {
      throw new WebhookVerificationError('invalid_signature');
    }
  }

  /**
   * Verify, then decode the body into a typed event
   * @throws WebhookVerificationError
   */
  public parse(payload: string | Buffer, headers: WebhookHeaders): WebhookEvent {
    this.verify(payload, headers);

    let body: unknown;
    try {
      body = JSON.parse(typeof payload === 'string' ? payload : payload.toString('utf8'));
    } catch (error) {
      throw new WebhookVerificationError(
        'invalid_payload',
        ErrorExtractor.extractErrorMessage(error),
        { cause: error },
      );
    }

    if (!isRecord(body)) {
      throw new WebhookVerificationError('invalid_payload', 'expected a JSON object');
    }

    if (!isKnownEventType(body.type)) {
      throw new WebhookVerificationError('unknown_event_type', String(body.type));
    }

    if (!hasEventEnvelope(body)) {
      throw new WebhookVerificationError('invalid_payload', 'missing timestamp or data');
    }

    return body;
  }

  /**
   * Signature for the given message, without the version prefix
   */
  public sign(id: string, timestamp: string, payload: string | Buffer): string {
    return createHmac('sha256', this.secret)
      .update(`${id}.${timestamp}.`)
      .update(payload)
      .digest('base64');
  }
}

/**
 * Any `message.*` event, clicks included
 */
export function isMessageEvent(
  event: WebhookEvent,
): event is MessageEvent | MessageClickedEvent {
  return event.type === 'message.clicked' || MESSAGE_EVENT_TYPES.some(type => type === event.type);
}

export function isSuppressionEvent(event: WebhookEvent): event is SuppressionCreatedEvent {
  return event.type === 'suppression.created';
}

export function isDomainEvent(event: WebhookEvent): event is DomainDnsErrorEvent {
  return event.type === 'domain.dns_error';
}

export function isRouteEvent(event: WebhookEvent): event is RouteMessageEvent {
  return event.type === 'route.message';
}

/**
 * Message data of any message event except `message.clicked`, whose data has its own shape
 */
export function getMessageEventData(event: WebhookEvent): MessageEventData | undefined {
  return event.type !== 'message.clicked' && isMessageEvent(event) ? event.data : undefined;
}
