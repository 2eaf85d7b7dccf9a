/**
 * classify.ts — Maps an HTTP status and JSON body to a result or a typed error.
 *
 * Some domain failures ("a cluster with this name already exists", "… already
 * in progress") are only reported as free text inside a generic 4xx body, so
 * 412 and 422 messages are matched against known phrases. Resource modules
 * pass their own phrases in the ResponseSpec; those are checked first, then
 * the catalogs below:
 *
 *   412 known phrase   → typed error
 *   412 unknown phrase → UnexpectedResponseError (the catalog is not known to be complete)
 *   422 known phrase   → typed error
 *   422 unknown phrase → UnprocessableEntityError
 *   unlisted status    → UnexpectedResponseError
 */

import { STATUS_CODES } from 'node:http';
import { z } from 'zod';
import {
  AccessDeniedError,
  CloudApiError,
  InvalidParameterError,
  NameConflictError,
  OperationInProgressError,
  ResourceNotFoundError,
  UnexpectedResponseError,
  UnprocessableEntityError,
  UnsupportedCombinationError,
} from './errors.js';
import { toTooManyRequestsError } from './rate-limit.js';
import type { ApiRequest, ApiResponse } from './types.js';

// {"id": "unprocessable_entity", "message": "a cluster with this name already exists"}
export const ErrorBodySchema = z.object({
  id: z.string().optional(),
  message: z.string(),
});

export interface MessageRule {
  match: string | RegExp;
  toError: (message: string) => Error;
}

export interface ResponseSpec<T> {
  // Expected statuses and how to extract the payload for each
  success: Partial<Record<number, (response: ApiResponse) => T>>;
  // Label for ResourceNotFoundError, e.g. "Kubernetes cluster: abc". Without it a 404 is unexpected.
  notFound?: string;
  // Checked before the built-in catalogs
  preconditionFailed?: readonly MessageRule[];
  unprocessable?: readonly MessageRule[];
}

export const PRECONDITION_FAILED_RULES: readonly MessageRule[] = [
  {
    match: /is not (?:available|supported) in (?:this|the selected|the requested) region/i,
    toError: (message) => new UnsupportedCombinationError(message),
  },
];

export const UNPROCESSABLE_ENTITY_RULES: readonly MessageRule[] = [
  { match: /already exists/i, toError: (message) => new NameConflictError(message) },
  { match: /already in progress/i, toError: (message) => new OperationInProgressError(message) },
  { match: /^invalid /i, toError: (message) => new InvalidParameterError(message) },
];

function matches(rule: MessageRule, message: string): boolean {
  return typeof rule.match === 'string' ? rule.match === message : rule.match.test(message);
}

function findRule(rules: readonly MessageRule[], message: string): MessageRule | undefined {
  return rules.find((rule) => matches(rule, message));
}

function redact(name: string, value: string): string {
  if (name.toLowerCase() !== 'authorization') return value;
  const space = value.indexOf(' ');
  return space === -1 ? '[redacted]' : `${value.slice(0, space)} [redacted]`;
}

/**
 * Renders a request the way it went on the wire, one "< " prefixed line per
 * header and body line. The bearer token is redacted.
 */
export function describeRequest(request: ApiRequest): string {
  const lines = [`< HTTP ${request.method} ${request.url}`];
  const headers = Object.entries(request.headers);
  if (headers.length > 0) {
    lines.push('<');
    for (const [name, value] of headers) lines.push(`< ${name}: ${redact(name, value)}`);
  }
  if (request.body) {
    lines.push('<');
    for (const line of request.body.split('\n')) lines.push(`< ${line}`);
  }
  return lines.join('\n') + '\n';
}

// Status line, headers and, when present, the body.
export function describeResponse(response: ApiResponse): string {
  const reason = STATUS_CODES[response.status] ?? 'Unknown';
  const lines = [`HTTP/${response.httpVersion ?? '1.1'} ${response.status} ("${reason}")`];
  for (const [name, value] of Object.entries(response.headers)) lines.push(`${name}: ${value}`);
  if (response.text) {
    lines.push('');
    lines.push(response.text);
  }
  return lines.join('\n');
}

export function unexpectedResponse(request: ApiRequest, response: ApiResponse, cause?: unknown): UnexpectedResponseError {
  return new UnexpectedResponseError(
    describeRequest(request),
    describeResponse(response),
    response.status,
    request.url,
    cause === undefined ? undefined : { cause },
  );
}

/**
 * Extracts the provider's error message. A body without one is itself a contract violation.
 */
export function getErrorMessage(request: ApiRequest, response: ApiResponse): string {
  const parsed = ErrorBodySchema.safeParse(response.body);
  if (!parsed.success) throw unexpectedResponse(request, response, parsed.error);
  return parsed.data.message;
}

/**
 * classifyResponse — returns the payload for an expected status or throws the
 * typed error for a known failure. Anything else is a defect.
 *
 * Extractor failures (such as a schema mismatch) are contract violations and
 * are rethrown as UnexpectedResponseError, unless the extractor itself raised
 * a typed CloudApiError.
 */
export function classifyResponse<T>(request: ApiRequest, response: ApiResponse, spec: ResponseSpec<T>): T {
  const extract = spec.success[response.status];
  if (extract) {
    try {
      return extract(response);
    } catch (error) {
      if (error instanceof CloudApiError || error instanceof UnexpectedResponseError) throw error;
      throw unexpectedResponse(request, response, error);
    }
  }

  switch (response.status) {
    case 401:
      throw new AccessDeniedError(getErrorMessage(request, response));
    case 404:
      if (spec.notFound !== undefined) throw new ResourceNotFoundError(spec.notFound);
      break;
    case 412: {
      const message = getErrorMessage(request, response);
      const rule = findRule([...(spec.preconditionFailed ?? []), ...PRECONDITION_FAILED_RULES], message);
      if (rule) throw rule.toError(message);
      break;
    }
    case 422: {
      const message = getErrorMessage(request, response);
      const rule = findRule([...(spec.unprocessable ?? []), ...UNPROCESSABLE_ENTITY_RULES], message);
      throw rule ? rule.toError(message) : new UnprocessableEntityError(message);
    }
    case 429:
      throw toTooManyRequestsError({ ...response.headers });
  }
  throw unexpectedResponse(request, response);
}
