/**
 * poll.ts — Polls a resource until it reaches a target state or the time budget runs out.
 *
 * Each iteration fetches the resource once:
 *   - target state reached        → return the freshly fetched resource
 *   - budget exhausted            → OperationTimeoutError quoting the original budget
 *   - otherwise                   → sleep (geometric backoff, capped by the time left) and repeat
 *
 * 429 and transient I/O failures are retried inside the loop: a rate-limited
 * fetch sleeps for the duration the server asked for. Any other error ends the
 * loop. Progress is logged at most once per progress interval however tight
 * the backoff is.
 */

import { DEFAULT_POLL_DELAY, RetryDelay, sleep, type RetryDelayOptions } from './backoff.js';
import {
  OperationTimeoutError,
  ResourceNotFoundError,
  TooManyRequestsError,
  TransientIoError,
} from './errors.js';
import { TimeLimit } from './time-limit.js';
import type { CallOptions } from './types.js';
import { createLogger, type Logger } from '../logger.js';

export const PROGRESS_INTERVAL_MS = 30_000;

export type PollLogger = Pick<Logger, 'info' | 'debug'>;

export interface PollSettings {
  // Human-readable name used in log lines, e.g. 'Kubernetes cluster "test-1"'
  resourceName: string;
  timeoutMs: number;
  delay?: RetryDelayOptions;
  progressIntervalMs?: number;
  logger?: PollLogger;
  signal?: AbortSignal;
}

// Optional knobs resource modules pass through to the loop
export type PollTuning = Pick<PollSettings, 'delay' | 'progressIntervalMs' | 'logger' | 'signal'>;

export interface WaitForStateOptions<T, S> extends PollSettings {
  target: S;
  // Fetches the current resource; a missing resource throws ResourceNotFoundError
  fetch: (options: CallOptions) => Promise<T>;
  getState: (resource: T) => S;
}

export interface WaitForDeletionOptions<T, S> extends PollSettings {
  fetch: (options: CallOptions) => Promise<T>;
  getState: (resource: T) => S;
  // Some resources report a terminal "deleted" state before they disappear
  deletedState?: S;
  // How the finished state reads in progress logs; 'destroyed' by default
  describeTarget?: string;
}

interface PollLoop<T, S> extends PollSettings {
  fetch: (options: CallOptions) => Promise<T>;
  getState: (resource: T) => S;
  isDone: (state: S) => boolean;
  notFoundIsDone: boolean;
  describeTarget: string;
}

let defaultLogger: PollLogger | undefined;

function getDefaultLogger(): PollLogger {
  defaultLogger ??= createLogger('poll');
  return defaultLogger;
}

type Outcome<T> = { done: true; resource: T | undefined } | { done: false; state?: unknown; failure?: unknown; waitMs?: number };

async function pollOnce<T, S>(loop: PollLoop<T, S>, log: PollLogger): Promise<Outcome<T>> {
  try {
    const resource = await loop.fetch({ signal: loop.signal });
    const state = loop.getState(resource);
    if (loop.isDone(state)) return { done: true, resource };
    return { done: false, state };
  } catch (error) {
    if (error instanceof ResourceNotFoundError && loop.notFoundIsDone) {
      return { done: true, resource: undefined };
    }
    if (error instanceof TooManyRequestsError) {
      log.debug({ resource: loop.resourceName, waitMs: error.getSleepDuration() }, 'Rate limited while polling');
      return { done: false, failure: error, waitMs: error.getSleepDuration() };
    }
    if (error instanceof TransientIoError) {
      log.debug({ resource: loop.resourceName, err: error }, 'Transient failure while polling');
      return { done: false, failure: error };
    }
    throw error;
  }
}

async function runPollLoop<T, S>(loop: PollLoop<T, S>): Promise<T | undefined> {
  const log = loop.logger ?? getDefaultLogger();
  const timeLimit = new TimeLimit(loop.timeoutMs);
  const retryDelay = new RetryDelay(loop.delay ?? DEFAULT_POLL_DELAY);
  const progressIntervalMs = loop.progressIntervalMs ?? PROGRESS_INTERVAL_MS;
  let lastProgressAt: number | null = null;

  while (true) {
    const outcome = await pollOnce(loop, log);
    if (outcome.done) {
      if (lastProgressAt !== null) log.info(`${loop.resourceName} is ${loop.describeTarget}`);
      return outcome.resource;
    }
    if (timeLimit.isExpired()) {
      throw new OperationTimeoutError(
        timeLimit.getTimeQuota(),
        outcome.failure === undefined ? undefined : { cause: outcome.failure },
      );
    }

    const now = Date.now();
    if (outcome.state !== undefined && (lastProgressAt === null || now - lastProgressAt >= progressIntervalMs)) {
      log.info(
        { resource: loop.resourceName, state: outcome.state },
        `Waiting for ${loop.resourceName} to change from ${String(outcome.state)} to ${loop.describeTarget}`,
      );
      lastProgressAt = now;
    }

    const timeLeft = timeLimit.getTimeLeft();
    if (outcome.waitMs !== undefined && outcome.waitMs > 0) {
      await sleep(Math.min(outcome.waitMs, timeLeft), loop.signal);
    } else {
      await retryDelay.sleep(loop.signal, timeLeft);
    }
  }
}

/**
 * waitForState — resolves with the resource once getState(resource) === target.
 * ResourceNotFoundError propagates.
 */
export async function waitForState<T, S>(options: WaitForStateOptions<T, S>): Promise<T> {
  const resource = await runPollLoop<T, S>({
    ...options,
    isDone: (state) => state === options.target,
    notFoundIsDone: false,
    describeTarget: String(options.target),
  });
  // notFoundIsDone is false, so the loop only finishes with a fetched resource
  if (resource === undefined) throw new ResourceNotFoundError(options.resourceName);
  return resource;
}

/**
 * waitForDeletion — resolves once the resource is gone: the server answers 404
 * or reports `deletedState`. The result is the resource as last reported in
 * `deletedState`, or undefined after a 404.
 */
export function waitForDeletion<T, S>(options: WaitForDeletionOptions<T, S>): Promise<T | undefined> {
  const { deletedState } = options;
  return runPollLoop<T, S>({
    ...options,
    isDone: (state) => deletedState !== undefined && state === deletedState,
    notFoundIsDone: true,
    describeTarget: options.describeTarget ?? 'destroyed',
  });
}
