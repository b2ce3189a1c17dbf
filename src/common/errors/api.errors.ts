export type ApiErrorType =
  | 'authentication'
  | 'permission'
  | 'validation'
  | 'not_found'
  | 'conflict'
  | 'rate_limit'
  | 'idempotency'
  | 'server'
  | 'network'
  | 'unknown';

const STATUS_TEXT: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  409: 'Conflict',
  412: 'Precondition Failed',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
  504: 'Gateway Timeout',
};

const NOT_FOUND_RESOURCES: Array<[needle: string, resource: string]> = [
  ['domain', 'domain'],
  ['message', 'message'],
  ['api key', 'api_key'],
  ['api_key', 'api_key'],
  ['webhook', 'webhook'],
  ['suppression', 'suppression'],
  ['account', 'account'],
  ['route', 'route'],
  ['smtp', 'smtp_credential'],
];

/**
 * Map an HTTP status code to an error category
 */
export function determineErrorType(statusCode: number): ApiErrorType {
  switch (statusCode) {
    case 400:
      return 'validation';
    case 401:
      return 'authentication';
    case 403:
      return 'permission';
    case 404:
      return 'not_found';
    case 409:
      return 'conflict';
    case 412:
      return 'idempotency';
    case 429:
      return 'rate_limit';
    default:
      return statusCode >= 500 ? 'server' : 'unknown';
  }
}

export interface ApiErrorParams {
  type: ApiErrorType;
  message: string;
  statusCode?: number;
  requestId?: string;
  retryAfter?: number;
  field?: string;
  resource?: string;
  method?: string;
  endpoint?: string;
  body?: unknown;
  cause?: unknown;
}

/**
 * Structured error returned for non-2xx API responses and client-side request problems
 */
export class ApiError extends Error {
  public readonly type: ApiErrorType;
  public readonly statusCode?: number;
  public readonly requestId?: string;
  public readonly retryAfter?: number;
  public readonly field?: string;
  public readonly resource?: string;
  public readonly method?: string;
  public readonly endpoint?: string;
  public readonly body?: unknown;
  public readonly suggestions: string[];

  constructor(params: ApiErrorParams) {
    super(params.message, { cause: params.cause });
    this.name = 'ApiError';
    this.type = params.type;
    this.statusCode = params.statusCode;
    this.requestId = params.requestId;
    this.retryAfter = params.retryAfter;
    this.field = params.field;
    this.resource = params.resource;
    this.method = params.method;
    this.endpoint = params.endpoint;
    this.body = params.body;
    this.suggestions = buildSuggestions(this);
  }

  /**
   * Build an error from an HTTP response
   */
  public static fromResponse(params: {
    statusCode: number;
    body: unknown;
    requestId?: string;
    retryAfterHeader?: string;
    method?: string;
    endpoint?: string;
  }): ApiError {
    const type = determineErrorType(params.statusCode);
    const message = extractMessage(params.body) ?? STATUS_TEXT[params.statusCode] ?? `HTTP ${params.statusCode}`;

    let retryAfter: number | undefined;
    if (type === 'rate_limit' && params.retryAfterHeader !== undefined) {
      const seconds = Number.parseInt(params.retryAfterHeader, 10);
      retryAfter = Number.isNaN(seconds) ? undefined : seconds;
    }

    return new ApiError({
      type,
      message,
      statusCode: params.statusCode,
      requestId: params.requestId,
      retryAfter,
      field: type === 'validation' ? extractField(message) : undefined,
      resource: type === 'not_found' ? extractResource(message) : undefined,
      method: params.method,
      endpoint: params.endpoint,
      body: params.body,
    });
  }

  public override toString(): string {
    const parts = [`${this.type} error (HTTP ${this.statusCode ?? 0}): ${this.message}`];
    if (this.field) parts.push(`field: ${this.field}`);
    if (this.resource) parts.push(`resource: ${this.resource}`);
    if (this.method && this.endpoint) parts.push(`${this.method} ${this.endpoint}`);
    return parts.join(' | ');
  }

  public isRetryable(): boolean {
    switch (this.type) {
      case 'rate_limit':
      case 'server':
      case 'network':
        return true;
      case 'conflict': {
        // The API answers 409 while a request with the same idempotency key is still running
        const msg = this.message.toLowerCase();
        return msg.includes('in progress') || msg.includes('processing');
      }
      default:
        return false;
    }
  }

  /**
   * Scope named by a permission error, e.g. "requires scope: messages:send:all"
   */
  public requiredScope(): string | undefined {
    if (this.type !== 'permission') {
      return undefined;
    }
    const match = /(?:scope|permission):\s*(\S+)/i.exec(this.message);
    return match?.[1];
  }
}

/**
 * Transport-level failure (connection refused, reset, DNS...). Always retryable.
 */
export class NetworkError extends Error {
  constructor(
    public readonly operation: string,
    cause: unknown,
  ) {
    super(
      `Network error during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'NetworkError';
  }

  public isRetryable(): boolean {
    return true;
  }
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof ApiError || error instanceof NetworkError) {
    return error.isRetryable();
  }
  return false;
}

function extractMessage(body: unknown): string | undefined {
  if (typeof body === 'string') {
    const trimmed = body.trim();
    return trimmed && trimmed.length < 1000 ? trimmed : undefined;
  }
  if (body && typeof body === 'object' && 'message' in body) {
    const { message } = body;
    if (typeof message === 'string' && message.trim()) {
      return message;
    }
  }
  return undefined;
}

function extractField(message: string): string | undefined {
  const lower = message.toLowerCase();
  if (!lower.includes('invalid') && !lower.includes('missing')) {
    return undefined;
  }

  // "missing field: subject"
  const colon = message.indexOf(':');
  if (colon >= 0) {
    const field = message.slice(colon + 1).trim();
    return field || undefined;
  }

  // "invalid email address"
  const invalid = /^invalid (\S+)/.exec(lower);
  return invalid?.[1];
}

function extractResource(message: string): string | undefined {
  const lower = message.toLowerCase();
  return NOT_FOUND_RESOURCES.find(([needle]) => lower.includes(needle))?.[1];
}

function buildSuggestions(error: ApiError): string[] {
  const suggestions: string[] = [];

  switch (error.type) {
    case 'authentication':
      suggestions.push(
        'Check that your API key is valid and properly formatted',
        "Verify the Authorization header is set: 'Bearer <your-api-key>'",
      );
      break;
    case 'permission': {
      suggestions.push('Check that your API key has the required scopes for this operation');
      const scope = error.requiredScope();
      if (scope) suggestions.push(`Required scope: ${scope}`);
      break;
    }
    case 'validation':
      if (error.field) {
        suggestions.push(`Check the '${error.field}' field in your request`);
      } else {
        suggestions.push('Review your request parameters for missing or invalid values');
      }
      if (error.method === 'POST' && error.endpoint?.includes('/messages')) {
        suggestions.push("Ensure either 'text_content' or 'html_content' is provided");
      }
      break;
    case 'not_found':
      suggestions.push(
        error.resource
          ? `Verify the ${error.resource} ID is correct and that you have access to it`
          : 'Double-check the resource ID or identifier',
      );
      break;
    case 'rate_limit':
      suggestions.push('Reduce the frequency of your API requests');
      if (error.retryAfter !== undefined && error.retryAfter > 0) {
        suggestions.push(`Wait ${error.retryAfter} seconds before retrying`);
      }
      break;
    case 'server':
      suggestions.push('Temporary server issue, try again in a few moments');
      if (error.requestId) {
        suggestions.push(`Include this request ID when contacting support: ${error.requestId}`);
      }
      break;
    case 'conflict':
      suggestions.push('The resource may already exist or be in a conflicting state');
      break;
    case 'idempotency':
      suggestions.push(
        'Use a unique idempotency key for each logical request',
        'Idempotency keys expire after 24 hours',
      );
      break;
    default:
      break;
  }

  return suggestions;
}
