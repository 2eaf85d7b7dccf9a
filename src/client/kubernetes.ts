/**
 * kubernetes.ts — Kubernetes cluster operations.
 *
 * Endpoints:
 *   POST   v2/kubernetes/clusters                                                 → create
 *   GET    v2/kubernetes/clusters                                                 → list (paginated)
 *   GET    v2/kubernetes/clusters/{id}                                            → get
 *   DELETE v2/kubernetes/clusters/{id}/destroy_with_associated_resources/dangerous → destroy
 *
 * A cluster name is unique per account. Creating a cluster whose name is taken
 * returns the existing cluster (see create-result.ts).
 */

import type { CloudClient } from './CloudClient.js';
import { createOrGetExisting, type CreateResult } from './create-result.js';
import { waitForDeletion, waitForState, type PollTuning } from './poll.js';
import {
  KubernetesClusterEnvelopeSchema,
  KubernetesClusterSchema,
  type KubernetesCluster,
  type KubernetesClusterState,
} from './schemas/index.js';
import type { CallOptions } from './types.js';

const CLUSTERS_PATH = 'v2/kubernetes/clusters';

export interface NodePoolRequest {
  name: string;
  // Droplet size slug, e.g. 's-2vcpu-4gb'
  size: string;
  count: number;
  tags?: string[];
  autoScale?: boolean;
  minNodes?: number;
  maxNodes?: number;
}

export interface KubernetesClusterRequest {
  name: string;
  region: string;
  // Version slug, e.g. '1.29.1-do.0', or 'latest'
  version: string;
  nodePools: NodePoolRequest[];
  vpcId?: string;
  tags?: string[];
  autoUpgrade?: boolean;
  surgeUpgrade?: boolean;
  highAvailability?: boolean;
}

// Identifies a cluster in log lines and polling
export type ClusterRef = Pick<KubernetesCluster, 'id' | 'name'>;

function toServerNodePool(pool: NodePoolRequest): Record<string, unknown> {
  return {
    name: pool.name,
    size: pool.size,
    count: pool.count,
    ...(pool.tags !== undefined && { tags: pool.tags }),
    ...(pool.autoScale !== undefined && { auto_scale: pool.autoScale }),
    ...(pool.minNodes !== undefined && { min_nodes: pool.minNodes }),
    ...(pool.maxNodes !== undefined && { max_nodes: pool.maxNodes }),
  };
}

function toServerRequest(request: KubernetesClusterRequest): Record<string, unknown> {
  return {
    name: request.name,
    region: request.region,
    version: request.version,
    node_pools: request.nodePools.map(toServerNodePool),
    ...(request.vpcId !== undefined && { vpc_uuid: request.vpcId }),
    ...(request.tags !== undefined && { tags: request.tags }),
    ...(request.autoUpgrade !== undefined && { auto_upgrade: request.autoUpgrade }),
    ...(request.surgeUpgrade !== undefined && { surge_upgrade: request.surgeUpgrade }),
    ...(request.highAvailability !== undefined && { ha: request.highAvailability }),
  };
}

function describe(name: string): string {
  return `Kubernetes cluster "${name}"`;
}

export function createCluster(
  client: CloudClient,
  request: KubernetesClusterRequest,
  options: CallOptions = {},
): Promise<CreateResult<KubernetesCluster>> {
  return createOrGetExisting({
    create: () =>
      client.execute(
        client.createRequest(client.resolve(CLUSTERS_PATH), { method: 'POST', body: toServerRequest(request) }),
        { success: { 201: (r) => KubernetesClusterEnvelopeSchema.parse(r.body) } },
        options,
      ),
    findExisting: () => findCluster(client, (cluster) => cluster.name === request.name, options),
    description: describe(request.name),
  });
}

export function getCluster(client: CloudClient, id: string, options: CallOptions = {}): Promise<KubernetesCluster> {
  return client.getResource(
    client.resolve(`${CLUSTERS_PATH}/${encodeURIComponent(id)}`),
    (body) => KubernetesClusterEnvelopeSchema.parse(body),
    { ...options, notFound: `Kubernetes cluster: ${id}` },
  );
}

export function listClusters(
  client: CloudClient,
  predicate?: (cluster: KubernetesCluster) => boolean,
  options: CallOptions = {},
): Promise<KubernetesCluster[]> {
  return client.getElements(
    client.resolve(CLUSTERS_PATH),
    {},
    { key: 'kubernetes_clusters', map: (element) => KubernetesClusterSchema.parse(element), predicate },
    options,
  );
}

export function findCluster(
  client: CloudClient,
  predicate: (cluster: KubernetesCluster) => boolean,
  options: CallOptions = {},
): Promise<KubernetesCluster | undefined> {
  return client.getElement(
    client.resolve(CLUSTERS_PATH),
    {},
    { key: 'kubernetes_clusters', map: (element) => KubernetesClusterSchema.parse(element), predicate },
    options,
  );
}

/**
 * Polls until the cluster reports `state`. Resolves with the cluster as last fetched.
 * Waiting for 'deleted' also finishes when the cluster is gone, and then resolves undefined.
 */
export function waitForClusterState(
  client: CloudClient,
  cluster: ClusterRef,
  state: 'deleted',
  timeoutMs: number,
  tuning?: PollTuning,
): Promise<KubernetesCluster | undefined>;
export function waitForClusterState(
  client: CloudClient,
  cluster: ClusterRef,
  state: Exclude<KubernetesClusterState, 'deleted'>,
  timeoutMs: number,
  tuning?: PollTuning,
): Promise<KubernetesCluster>;
export function waitForClusterState(
  client: CloudClient,
  cluster: ClusterRef,
  state: KubernetesClusterState,
  timeoutMs: number,
  tuning?: PollTuning,
): Promise<KubernetesCluster | undefined>;
export function waitForClusterState(
  client: CloudClient,
  cluster: ClusterRef,
  state: KubernetesClusterState,
  timeoutMs: number,
  tuning: PollTuning = {},
): Promise<KubernetesCluster | undefined> {
  if (state === 'deleted') return waitForClusterDestroyed(client, cluster, timeoutMs, tuning);
  return waitForState({
    ...tuning,
    resourceName: describe(cluster.name),
    timeoutMs,
    target: state,
    fetch: (options) => getCluster(client, cluster.id, options),
    getState: (fetched) => fetched.state,
  });
}

// Destroys the cluster together with its load balancers and volumes. A cluster that is already gone is not an error.
export function destroyCluster(client: CloudClient, id: string, options: CallOptions = {}): Promise<void> {
  return client.destroyResource(
    client.resolve(`${CLUSTERS_PATH}/${encodeURIComponent(id)}/destroy_with_associated_resources/dangerous`),
    options,
  );
}

// Resolves with the cluster if it was last seen in the 'deleted' state, or undefined once it is gone
export function waitForClusterDestroyed(
  client: CloudClient,
  cluster: ClusterRef,
  timeoutMs: number,
  tuning: PollTuning = {},
): Promise<KubernetesCluster | undefined> {
  return waitForDeletion<KubernetesCluster, KubernetesClusterState>({
    ...tuning,
    resourceName: describe(cluster.name),
    timeoutMs,
    fetch: (options) => getCluster(client, cluster.id, options),
    getState: (fetched) => fetched.state,
    deletedState: 'deleted',
  });
}
