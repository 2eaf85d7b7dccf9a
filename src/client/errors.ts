/**
 * errors.ts — Typed error taxonomy for the DigitalOcean client core.
 *
 * Every recoverable provider condition extends CloudApiError.
 * UnexpectedResponseError does NOT extend it: it marks a broken provider
 * contract or a client bug and must reach the top of the stack.
 */

import type { RateLimitState } from './rate-limit.js';

export class CloudApiError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CloudApiError';
  }
}

// Network failure or transport-level timeout. Always safe to retry.
export class TransientIoError extends CloudApiError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransientIoError';
  }
}

// The caller's AbortSignal fired during a request or a wait.
export class InterruptedError extends CloudApiError {
  constructor(message = 'The operation was interrupted', options?: ErrorOptions) {
    super(message, options);
    this.name = 'InterruptedError';
  }
}

// 401 — the provider's message is surfaced verbatim.
export class AccessDeniedError extends CloudApiError {
  constructor(message: string) {
    super(message);
    this.name = 'AccessDeniedError';
  }
}

// 404 on a single-resource endpoint. `resource` names what was looked up, e.g. "Kubernetes cluster: abc".
export class ResourceNotFoundError extends CloudApiError {
  readonly resource: string;
  constructor(resource: string) {
    super(`Resource not found. ${resource}`);
    this.name = 'ResourceNotFoundError';
    this.resource = resource;
  }
}

/**
 * 429 — the client exceeded the provider's rate limit.
 *
 * `sleepDurationMs` is the wait computed when the response was received;
 * getSleepDuration() recomputes it relative to a later instant.
 */
export class TooManyRequestsError extends CloudApiError {
  readonly requestsPerMinute: number;
  readonly requestsPerHour: number;
  // Epoch millis at which the Retry-After wait ends; null when the server sent none
  readonly retryAfterAt: number | null;
  readonly resetAt: number;
  readonly sleepDurationMs: number;
  private readonly recordedAt: number;

  constructor(state: RateLimitState, sleepDurationMs: number, recordedAt = Date.now()) {
    super(`The client must wait ${sleepDurationMs}ms to make another request`);
    this.name = 'TooManyRequestsError';
    this.requestsPerMinute = state.requestsPerMinute;
    this.requestsPerHour = state.requestsPerHour;
    this.retryAfterAt = state.retryAfterMs > 0 ? recordedAt + state.retryAfterMs : null;
    this.resetAt = state.resetAt;
    this.sleepDurationMs = sleepDurationMs;
    this.recordedAt = recordedAt;
  }

  getSleepDuration(now = Date.now()): number {
    return Math.max(0, this.sleepDurationMs - (now - this.recordedAt));
  }
}

/**
 * 412 — each parameter is valid on its own but the server rejects the combination
 * (for example a droplet size that is not offered in the requested region).
 */
export class UnsupportedCombinationError extends CloudApiError {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedCombinationError';
  }
}

// The server is busy with another operation on the same resource.
export class OperationInProgressError extends CloudApiError {
  constructor(message: string) {
    super(message);
    this.name = 'OperationInProgressError';
  }
}

// 412 — the resource is referenced by others and cannot be changed.
export class ResourceConflictError extends CloudApiError {
  constructor(message: string) {
    super(message);
    this.name = 'ResourceConflictError';
  }
}

// 422 — a resource with the requested name already exists. Consumed by createOrGetExisting().
export class NameConflictError extends CloudApiError {
  constructor(message: string) {
    super(message);
    this.name = 'NameConflictError';
  }
}

// 422 — the server rejected a parameter value, e.g. "invalid size".
export class InvalidParameterError extends CloudApiError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidParameterError';
  }
}

// 422 with a message that is not in the known catalog.
export class UnprocessableEntityError extends CloudApiError {
  constructor(message: string) {
    super(message);
    this.name = 'UnprocessableEntityError';
  }
}

/**
 * The requested name is reserved by a resource that cannot be retrieved.
 *
 * While deletion is in progress the provider keeps the name reserved but hides
 * the resource from list and get calls. Deletion may take up to 15 minutes.
 */
export class PendingDeletionError extends CloudApiError {
  constructor(message: string) {
    super(message);
    this.name = 'PendingDeletionError';
  }
}

// A polling loop exhausted its time budget before reaching the target state.
export class OperationTimeoutError extends CloudApiError {
  readonly quotaMs: number;
  constructor(quotaMs: number, options?: ErrorOptions) {
    super(`Operation failed after ${quotaMs}ms`, options);
    this.name = 'OperationTimeoutError';
    this.quotaMs = quotaMs;
  }
}

// A droplet action (rename, power off, …) finished in the "errored" status.
export class ActionFailedError extends CloudApiError {
  readonly actionId: number;
  readonly actionType: string;
  constructor(actionId: number, actionType: string) {
    super(`Droplet action ${actionType} (${actionId}) errored`);
    this.name = 'ActionFailedError';
    this.actionId = actionId;
    this.actionType = actionType;
  }
}

// The client was closed; its transport can no longer be used.
export class ClientClosedError extends CloudApiError {
  constructor(options?: ErrorOptions) {
    super('client was closed', options);
    this.name = 'ClientClosedError';
  }
}

/**
 * A status/body combination outside the known taxonomy.
 *
 * This is a defect: either the provider changed its API or the client is wrong.
 * The message embeds the full request and response.
 */
export class UnexpectedResponseError extends Error {
  readonly status: number;
  readonly url: string;
  constructor(requestText: string, responseText: string, status: number, url: string, options?: ErrorOptions) {
    super(`Unexpected response: ${responseText}\nRequest: ${requestText}`, options);
    this.name = 'UnexpectedResponseError';
    this.status = status;
    this.url = url;
  }
}
