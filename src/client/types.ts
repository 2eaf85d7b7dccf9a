import type { Logger } from '../logger.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

// Array values are sent as repeated parameters (?tag=a&tag=b)
export type QueryParams = Record<string, string | number | boolean | readonly string[] | undefined>;

// What the transport sends on the wire
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: string;
  // Overrides the transport's default timeout for the whole request
  timeoutMs?: number;
  signal?: AbortSignal;
}

// Header names are lower-case
export interface TransportResponse {
  status: number;
  headers: HttpHeaders;
  body: string;
  httpVersion?: string;
}

/**
 * The seam between the client and the network. The default implementation is
 * createGotTransport(); tests plug in an in-process fake.
 */
export interface HttpTransport {
  request(req: TransportRequest): Promise<TransportResponse>;
  // Releases pooled connections. Called once, by CloudClient.close().
  close(): void;
}

export interface ApiRequest {
  readonly method: HttpMethod;
  // Absolute URL, query string included
  readonly url: string;
  readonly headers: Readonly<HttpHeaders>;
  // Serialized JSON body
  readonly body?: string;
  readonly timeoutMs?: number;
}

export interface ApiRequestInit {
  method?: HttpMethod;
  // Serialized with JSON.stringify
  body?: unknown;
  query?: QueryParams;
  timeoutMs?: number;
}

export interface ApiResponse {
  readonly status: number;
  readonly headers: Readonly<HttpHeaders>;
  readonly text: string;
  // Parsed JSON, or undefined when the body is empty or not JSON
  readonly body: unknown;
  readonly httpVersion?: string;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface CloudClientOptions {
  accessToken: string;
  baseUrl?: string;
  transport?: HttpTransport;
  logger?: Logger;
  // Connect and idle timeout of the default transport
  requestTimeoutMs?: number;
  maxConcurrentRequests?: number;
}
