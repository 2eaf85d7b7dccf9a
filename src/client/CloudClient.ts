import { z } from 'zod';
import { classifyResponse, type ResponseSpec } from './classify.js';
import { ClientClosedError, InterruptedError } from './errors.js';
import { getElement, getElements, type PageQuery } from './paginate.js';
import { toTooManyRequestsError } from './rate-limit.js';
import { createGotTransport, DEFAULT_REQUEST_TIMEOUT_MS } from './transport.js';
import { createLogger, type Logger } from '../logger.js';
import type {
  ApiRequest,
  ApiRequestInit,
  ApiResponse,
  CallOptions,
  CloudClientOptions,
  HttpHeaders,
  HttpTransport,
  QueryParams,
  TransportResponse,
} from './types.js';

// The protocol, hostname and port of the REST API server
export const REST_SERVER = 'https://api.digitalocean.com';

const ClientOptionsSchema = z.object({
  accessToken: z
    .string()
    .min(1, 'accessToken may not be empty')
    .refine((token) => token === token.trim(), 'accessToken may not contain leading or trailing whitespace'),
  baseUrl: z.string().url().default(REST_SERVER),
  requestTimeoutMs: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  maxConcurrentRequests: z.number().int().positive().default(5),
});

function appendQuery(url: URL, query: QueryParams): void {
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    if (typeof value === 'object') {
      for (const item of value) url.searchParams.append(key, item);
    } else {
      url.searchParams.append(key, String(value));
    }
  }
}

function parseBody(text: string): unknown {
  if (text.trim() === '') return undefined;
  try {
    return JSON.parse(text);
  } catch {
    // Not JSON; classifiers fall back to the raw text
    return undefined;
  }
}

function toApiResponse(raw: TransportResponse): ApiResponse {
  const headers: HttpHeaders = {};
  for (const [name, value] of Object.entries(raw.headers)) headers[name.toLowerCase()] = value;
  return {
    status: raw.status,
    headers,
    text: raw.body,
    body: parseBody(raw.body),
    httpVersion: raw.httpVersion,
  };
}

/**
 * CloudClient — the shared request pipeline every resource module goes through.
 *
 * Design constraints:
 *   - One instance = one access token; options are immutable after construction
 *   - Safe to share between concurrent operations; at most maxConcurrentRequests in flight
 *   - No automatic retries: 429 surfaces as TooManyRequestsError, network failures as TransientIoError
 *   - close() releases the transport exactly once; later calls reject with ClientClosedError
 *
 * Primitives for resource modules:
 *   - createRequest() / send()
 *   - getResource()
 *   - getElements() / getElement()
 *   - destroyResource()
 */
export class CloudClient {
  readonly baseUrl: string;
  readonly logger: Logger;
  private readonly accessToken: string;
  private readonly transport: HttpTransport;
  private closed = false;

  // Concurrency semaphore
  private readonly maxConcurrent: number;
  private inFlight = 0;
  private readonly queue: Array<() => void> = [];

  constructor(options: CloudClientOptions) {
    const parsed = ClientOptionsSchema.parse({
      accessToken: options.accessToken,
      baseUrl: options.baseUrl,
      requestTimeoutMs: options.requestTimeoutMs,
      maxConcurrentRequests: options.maxConcurrentRequests,
    });
    this.accessToken = parsed.accessToken;
    this.baseUrl = parsed.baseUrl;
    this.maxConcurrent = parsed.maxConcurrentRequests;
    this.logger = options.logger ?? createLogger('client');
    this.transport = options.transport ?? createGotTransport({ timeoutMs: parsed.requestTimeoutMs });
  }

  // Acquire a concurrency slot. An abort while queued gives up the place in the queue.
  private async acquire(signal?: AbortSignal): Promise<void> {
    if (this.inFlight < this.maxConcurrent) {
      this.inFlight++;
      return;
    }
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.queue.indexOf(waiter);
        if (index !== -1) this.queue.splice(index, 1);
        reject(new InterruptedError(undefined, { cause: signal?.reason }));
      };
      const waiter = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      this.queue.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  // Release a concurrency slot and unblock next queued request
  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // Hand the slot directly to the next waiter (inFlight count stays the same)
      next();
    } else {
      this.inFlight--;
    }
  }

  private ensureOpen(): void {
    if (this.closed) throw new ClientClosedError();
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Releases pooled connections. Idempotent; queued requests are woken up and
   * reject with ClientClosedError.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.transport.close();
    for (const waiter of this.queue.splice(0)) {
      this.inFlight++;
      waiter();
    }
  }

  // Resolves a path such as 'v2/kubernetes/clusters' against the API server. Absolute URLs pass through.
  resolve(path: string): string {
    return new URL(path, this.baseUrl).toString();
  }

  /**
   * Builds an authenticated request. Nothing is sent until send().
   */
  createRequest(url: string, init: ApiRequestInit = {}): ApiRequest {
    this.ensureOpen();
    const target = new URL(url, this.baseUrl);
    if (init.query) appendQuery(target, init.query);
    const headers: HttpHeaders = {
      'Authorization': `Bearer ${this.accessToken}`,
      'Accept': 'application/json',
    };
    let body: string | undefined;
    if (init.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(init.body);
    }
    return {
      method: init.method ?? 'GET',
      url: target.toString(),
      headers,
      ...(body !== undefined && { body }),
      ...(init.timeoutMs !== undefined && { timeoutMs: init.timeoutMs }),
    };
  }

  /**
   * Sends one request and returns the response, whatever its status, except:
   *   - 429 throws TooManyRequestsError with the computed sleep duration
   *   - network failures and timeouts throw TransientIoError
   *   - an aborted signal throws InterruptedError, also while waiting for a concurrency slot
   *   - a request cut off by close() throws ClientClosedError
   */
  async send(request: ApiRequest, options: CallOptions = {}): Promise<ApiResponse> {
    this.ensureOpen();
    if (options.signal?.aborted) {
      throw new InterruptedError(undefined, { cause: options.signal.reason });
    }
    await this.acquire(options.signal);
    try {
      this.ensureOpen();
      if (options.signal?.aborted) {
        throw new InterruptedError(undefined, { cause: options.signal.reason });
      }
      let raw: TransportResponse;
      try {
        raw = await this.transport.request({
          method: request.method,
          url: request.url,
          headers: { ...request.headers },
          ...(request.body !== undefined && { body: request.body }),
          ...(request.timeoutMs !== undefined && { timeoutMs: request.timeoutMs }),
          ...(options.signal !== undefined && { signal: options.signal }),
        });
      } catch (error) {
        // close() tore down the connection under this request
        if (this.closed) throw new ClientClosedError({ cause: error });
        throw error;
      }
      const response = toApiResponse(raw);
      this.logger.debug({ method: request.method, url: request.url, status: response.status }, 'HTTP request');
      if (response.status === 429) throw toTooManyRequestsError(response.headers);
      return response;
    } finally {
      this.release();
    }
  }

  /**
   * Sends a request and classifies the response.
   */
  async execute<T>(request: ApiRequest, spec: ResponseSpec<T>, options: CallOptions = {}): Promise<T> {
    const response = await this.send(request, options);
    return classifyResponse(request, response, spec);
  }

  /**
   * getResource — fetches a single resource. 200 → map(body); 404 → ResourceNotFoundError(notFound).
   */
  async getResource<T>(
    url: string,
    map: (body: unknown) => T,
    options: CallOptions & { notFound: string },
  ): Promise<T> {
    const request = this.createRequest(url);
    return this.execute(request, { success: { 200: (r) => map(r.body) }, notFound: options.notFound }, options);
  }

  async getElements<T>(url: string, query: QueryParams, page: PageQuery<T>, options: CallOptions = {}): Promise<T[]> {
    this.ensureOpen();
    return getElements(this, url, query, page, options);
  }

  async getElement<T>(
    url: string,
    query: QueryParams,
    page: PageQuery<T>,
    options: CallOptions = {},
  ): Promise<T | undefined> {
    this.ensureOpen();
    return getElement(this, url, query, page, options);
  }

  /**
   * destroyResource — deletes a resource. A 404 means it was already gone and counts as success.
   */
  async destroyResource(url: string, options: CallOptions = {}): Promise<void> {
    const request = this.createRequest(url, { method: 'DELETE' });
    await this.execute<void>(request, { success: { 204: () => undefined, 404: () => undefined } }, options);
  }
}
