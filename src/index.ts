/**
 * src/index.ts — Public entry point.
 *
 *   import { createClientFromEnv, createCluster, waitForClusterState } from 'do-cloud-client';
 */

export { CloudClient, REST_SERVER } from './client/CloudClient.js';
export { createGotTransport, DEFAULT_REQUEST_TIMEOUT_MS } from './client/transport.js';
export type { GotTransportOptions } from './client/transport.js';
export type {
  ApiRequest,
  ApiRequestInit,
  ApiResponse,
  CallOptions,
  CloudClientOptions,
  HttpHeaders,
  HttpMethod,
  HttpTransport,
  QueryParams,
  TransportRequest,
  TransportResponse,
} from './client/types.js';

export * from './client/errors.js';

export { DEFAULT_POLL_DELAY, RetryDelay, sleep } from './client/backoff.js';
export type { RetryDelayOptions } from './client/backoff.js';
export { TimeLimit } from './client/time-limit.js';
export { getSleepDuration, parseRateLimit, parseRetryAfter, withRateLimit } from './client/rate-limit.js';
export type { RateLimitState, WithRateLimitOptions } from './client/rate-limit.js';

export {
  classifyResponse,
  describeRequest,
  describeResponse,
  PRECONDITION_FAILED_RULES,
  UNPROCESSABLE_ENTITY_RULES,
} from './client/classify.js';
export type { MessageRule, ResponseSpec } from './client/classify.js';
export { getElement, getElements, MAX_ENTRIES_PER_PAGE } from './client/paginate.js';
export type { PageQuery } from './client/paginate.js';
export { conflictedWith, created, createOrGetExisting } from './client/create-result.js';
export type { CreateOrGetExistingOptions, CreateResult } from './client/create-result.js';
export { PROGRESS_INTERVAL_MS, waitForDeletion, waitForState } from './client/poll.js';
export type { PollSettings, PollTuning, WaitForDeletionOptions, WaitForStateOptions } from './client/poll.js';

export {
  createCluster,
  destroyCluster,
  findCluster,
  getCluster,
  listClusters,
  waitForClusterDestroyed,
  waitForClusterState,
} from './client/kubernetes.js';
export type { ClusterRef, KubernetesClusterRequest, NodePoolRequest } from './client/kubernetes.js';
export {
  createDatabase,
  destroyDatabase,
  findDatabase,
  getDatabase,
  listDatabases,
  waitForDatabaseDestroyed,
  waitForDatabaseStatus,
} from './client/databases.js';
export type { DatabaseRef, DatabaseRequest } from './client/databases.js';
export {
  createDroplet,
  destroyDroplet,
  findDroplet,
  getDroplet,
  getDropletAction,
  getDropletImage,
  getDropletReadiness,
  listDroplets,
  listDropletSizes,
  renameDroplet,
  waitForDropletAction,
  waitForDropletDestroyed,
  waitForDropletReady,
} from './client/droplets.js';
export type { DropletReadiness, DropletRef, DropletRequest } from './client/droplets.js';
export {
  deleteDanglingImages,
  destroyImage,
  findDanglingImages,
  findImageByTag,
  findRepository,
  getActiveGarbageCollection,
  getRegistry,
  listImages,
  listRepositories,
  REGISTRY_PRECONDITION_RULES,
  startGarbageCollection,
  waitForGarbageCollection,
} from './client/registry.js';
export type { ImageRef } from './client/registry.js';
export { findProject, getDefaultProject, getProject, listProjects } from './client/projects.js';
export { getDefaultVpcId, listVpcs } from './client/vpcs.js';
export { getCurrentDropletHostname, getCurrentDropletId, getCurrentDropletRegion } from './client/metadata.js';

export * from './client/schemas/index.js';

export { ConfigError, createClientFromEnv, loadConfig } from './config.js';
export type { CloudConfig } from './config.js';
export { createLogger, logger } from './logger.js';
export type { Logger } from './logger.js';
