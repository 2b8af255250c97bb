import { HttpStatusError } from './errors.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  baseUrl: string;
  /** Applied only when a request carries no signal of its own. */
  timeoutMs?: number;
  headers?: Record<string, string>;
  fetch?: FetchLike;
}

export interface HttpRequest {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: Headers;
  body: string;
}

/**
 * Thin fetch wrapper bound to the target's base address. One instance is
 * shared by every worker and is never mutated after construction.
 */
export class HttpClient {
  readonly baseUrl: string;
  readonly timeoutMs?: number;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.headers = { ...options.headers };
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /** Returns a copy bound to the same address with a different default timeout. */
  withTimeout(timeoutMs: number): HttpClient {
    return new HttpClient({
      baseUrl: this.baseUrl,
      timeoutMs,
      headers: this.headers,
      fetch: this.fetchImpl,
    });
  }

  url(path: string): string {
    return `${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
  }

  async send(path: string, request: HttpRequest = {}): Promise<Response> {
    const signal = request.signal
      ?? (this.timeoutMs !== undefined ? AbortSignal.timeout(this.timeoutMs) : undefined);

    return this.fetchImpl(this.url(path), {
      method: request.method ?? 'GET',
      headers: { ...this.headers, ...request.headers },
      body: request.body,
      signal,
    });
  }

  /** Sends a request, reads the body, and throws HttpStatusError on a non-2xx status. */
  async request(path: string, request: HttpRequest = {}): Promise<HttpResponse> {
    const method = request.method ?? 'GET';
    const response = await this.send(path, request);
    const body = await response.text();

    if (!response.ok) {
      throw new HttpStatusError(method, path, response.status);
    }

    return { status: response.status, headers: response.headers, body };
  }
}
