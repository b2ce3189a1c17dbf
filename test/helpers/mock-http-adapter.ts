import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { HttpService } from '@nestjs/axios';

export interface MockResponseSpec {
  status: number;
  headers?: Record<string, string>;
  data?: unknown;
}

/**
 * Reply that fails at the transport level, e.g. `{ networkError: 'ECONNRESET' }`
 */
export interface MockNetworkFailure {
  networkError: string;
}

export type MockReply = MockResponseSpec | MockNetworkFailure;

export interface RecordedRequest {
  method: string;
  /**
   * Path without query string
   */
  path: string;
  query: URLSearchParams;
  baseURL?: string;
  timeout?: number;
  /**
   * Lower-cased header names
   */
  headers: Record<string, string>;
  body: unknown;
}

function keyOf(method: string, path: string): string {
  return `${method.toUpperCase()} ${path}`;
}

function isNetworkFailure(reply: MockReply): reply is MockNetworkFailure {
  return 'networkError' in reply;
}

/**
 * In-process stand-in for the AhaSend API behind a real axios instance.
 * Replies are keyed by method and path; the last queued reply repeats.
 */
export class MockHttpAdapter {
  public readonly requests: RecordedRequest[] = [];
  private readonly replies = new Map<string, MockReply[]>();

  public setResponse(params: { method: string; path: string; response: MockReply }): void {
    this.setResponses({ method: params.method, path: params.path, responses: [params.response] });
  }

  public setResponses(params: { method: string; path: string; responses: MockReply[] }): void {
    this.replies.set(keyOf(params.method, params.path), [...params.responses]);
  }

  public getCallCount(params: { method: string; path: string }): number {
    const key = keyOf(params.method, params.path);
    return this.requests.filter(req => keyOf(req.method, req.path) === key).length;
  }

  public lastRequest(): RecordedRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  public createHttpService(): HttpService {
    return new HttpService(axios.create({ adapter: config => this.handle(config) }));
  }

  private async handle(config: InternalAxiosRequestConfig): Promise<AxiosResponse> {
    const method = (config.method ?? 'get').toUpperCase();
    const [path = '', search = ''] = (config.url ?? '').split('?');

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(config.headers.toJSON())) {
      if (typeof value === 'string') {
        headers[name.toLowerCase()] = value;
      }
    }

    const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : config.data;

    this.requests.push({
      method,
      path,
      query: new URLSearchParams(search),
      baseURL: config.baseURL,
      timeout: config.timeout,
      headers,
      body,
    });

    const key = keyOf(method, path);
    const queue = this.replies.get(key);
    const reply = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    if (!reply) {
      throw new Error(`MockHttpAdapter: no mocked response for ${key}`);
    }

    if (isNetworkFailure(reply)) {
      throw new AxiosError(`connect ${reply.networkError}`, reply.networkError, config);
    }

    return {
      status: reply.status,
      statusText: '',
      headers: reply.headers ?? {},
      data: reply.data ?? '',
      config,
    };
  }
}
