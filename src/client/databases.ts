/**
 * databases.ts — Managed database cluster operations.
 *
 * Endpoints:
 *   POST   v2/databases       → create
 *   GET    v2/databases       → list (paginated)
 *   GET    v2/databases/{id}  → get
 *   DELETE v2/databases/{id}  → destroy
 */

import type { MessageRule } from './classify.js';
import type { CloudClient } from './CloudClient.js';
import { createOrGetExisting, type CreateResult } from './create-result.js';
import { NameConflictError } from './errors.js';
import { waitForDeletion, waitForState, type PollTuning } from './poll.js';
import {
  DatabaseEnvelopeSchema,
  DatabaseSchema,
  type Database,
  type DatabaseEngine,
  type DatabaseStatus,
} from './schemas/index.js';
import type { CallOptions } from './types.js';

const DATABASES_PATH = 'v2/databases';

export interface DatabaseRequest {
  name: string;
  engine: DatabaseEngine;
  // Engine version, e.g. '16'; the server picks its default when omitted
  version?: string;
  // Size slug, e.g. 'db-s-1vcpu-1gb'
  size: string;
  region: string;
  nodeCount: number;
  vpcId?: string;
  tags?: string[];
}

export type DatabaseRef = Pick<Database, 'id' | 'name'>;

const CREATE_UNPROCESSABLE_RULES: readonly MessageRule[] = [
  { match: /cluster name is not available/i, toError: (message) => new NameConflictError(message) },
];

function toServerRequest(request: DatabaseRequest): Record<string, unknown> {
  return {
    name: request.name,
    engine: request.engine,
    size: request.size,
    region: request.region,
    num_nodes: request.nodeCount,
    ...(request.version !== undefined && { version: request.version }),
    ...(request.vpcId !== undefined && { private_network_uuid: request.vpcId }),
    ...(request.tags !== undefined && { tags: request.tags }),
  };
}

function describe(name: string): string {
  return `Database cluster "${name}"`;
}

/**
 * 422 "cluster name is not available" resolves to the existing cluster;
 * "invalid size" surfaces as InvalidParameterError.
 */
export function createDatabase(
  client: CloudClient,
  request: DatabaseRequest,
  options: CallOptions = {},
): Promise<CreateResult<Database>> {
  return createOrGetExisting({
    create: () =>
      client.execute(
        client.createRequest(client.resolve(DATABASES_PATH), { method: 'POST', body: toServerRequest(request) }),
        {
          success: { 201: (r) => DatabaseEnvelopeSchema.parse(r.body) },
          unprocessable: CREATE_UNPROCESSABLE_RULES,
        },
        options,
      ),
    findExisting: () => findDatabase(client, (database) => database.name === request.name, options),
    description: describe(request.name),
  });
}

export function getDatabase(client: CloudClient, id: string, options: CallOptions = {}): Promise<Database> {
  return client.getResource(
    client.resolve(`${DATABASES_PATH}/${encodeURIComponent(id)}`),
    (body) => DatabaseEnvelopeSchema.parse(body),
    { ...options, notFound: `Database cluster: ${id}` },
  );
}

export function listDatabases(
  client: CloudClient,
  predicate?: (database: Database) => boolean,
  options: CallOptions = {},
): Promise<Database[]> {
  return client.getElements(
    client.resolve(DATABASES_PATH),
    {},
    { key: 'databases', map: (element) => DatabaseSchema.parse(element), predicate },
    options,
  );
}

export function findDatabase(
  client: CloudClient,
  predicate: (database: Database) => boolean,
  options: CallOptions = {},
): Promise<Database | undefined> {
  return client.getElement(
    client.resolve(DATABASES_PATH),
    {},
    { key: 'databases', map: (element) => DatabaseSchema.parse(element), predicate },
    options,
  );
}

export function waitForDatabaseStatus(
  client: CloudClient,
  database: DatabaseRef,
  status: DatabaseStatus,
  timeoutMs: number,
  tuning: PollTuning = {},
): Promise<Database> {
  return waitForState({
    ...tuning,
    resourceName: describe(database.name),
    timeoutMs,
    target: status,
    fetch: (options) => getDatabase(client, database.id, options),
    getState: (fetched) => fetched.status,
  });
}

export function destroyDatabase(client: CloudClient, id: string, options: CallOptions = {}): Promise<void> {
  return client.destroyResource(client.resolve(`${DATABASES_PATH}/${encodeURIComponent(id)}`), options);
}

// Databases have no "deleted" status; the cluster is gone once GET answers 404.
export async function waitForDatabaseDestroyed(
  client: CloudClient,
  database: DatabaseRef,
  timeoutMs: number,
  tuning: PollTuning = {},
): Promise<void> {
  await waitForDeletion<Database, DatabaseStatus>({
    ...tuning,
    resourceName: describe(database.name),
    timeoutMs,
    fetch: (options) => getDatabase(client, database.id, options),
    getState: (fetched) => fetched.status,
  });
}
