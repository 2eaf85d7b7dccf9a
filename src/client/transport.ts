import { Agent as HttpAgent } from 'node:http';
import { Agent as HttpsAgent } from 'node:https';
import got, { RequestError } from 'got';
import { InterruptedError, TransientIoError } from './errors.js';
import type { HttpHeaders, HttpTransport, TransportRequest, TransportResponse } from './types.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface GotTransportOptions {
  // Applied to both connecting and socket inactivity
  timeoutMs?: number;
}

function normalizeHeaders(raw: Record<string, string | string[] | undefined>): HttpHeaders {
  const headers: HttpHeaders = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    headers[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return headers;
}

/**
 * createGotTransport — got-backed HttpTransport with its own keep-alive pool.
 *
 * got's retries are disabled (retry policy belongs to callers and the polling
 * loop) and HTTP error statuses are returned rather than thrown, so the
 * classifier sees every response. Network failures and timeouts become
 * TransientIoError; an aborted signal becomes InterruptedError.
 */
export function createGotTransport(options: GotTransportOptions = {}): HttpTransport {
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const agent = {
    http: new HttpAgent({ keepAlive: true }),
    https: new HttpsAgent({ keepAlive: true }),
  };

  const instance = got.extend({
    agent,
    retry: { limit: 0 },
    throwHttpErrors: false,
    followRedirect: false,
    timeout: { connect: timeoutMs, socket: timeoutMs },
  });

  return {
    async request(req: TransportRequest): Promise<TransportResponse> {
      try {
        const response = await instance(req.url, {
          method: req.method,
          headers: req.headers,
          ...(req.body !== undefined && { body: req.body }),
          ...(req.timeoutMs !== undefined && { timeout: { request: req.timeoutMs } }),
          ...(req.signal !== undefined && { signal: req.signal }),
        });
        return {
          status: response.statusCode,
          headers: normalizeHeaders(response.headers),
          body: response.body,
          httpVersion: response.httpVersion,
        };
      } catch (error) {
        if (req.signal?.aborted) {
          throw new InterruptedError(undefined, { cause: error });
        }
        if (error instanceof RequestError) {
          throw new TransientIoError(`${req.method} ${req.url} failed: ${error.message}`, { cause: error });
        }
        throw error;
      }
    },

    close(): void {
      agent.http.destroy();
      agent.https.destroy();
    },
  };
}
