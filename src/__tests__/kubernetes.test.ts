import { describe, it, expect } from 'vitest';
import { PendingDeletionError, ResourceNotFoundError, UnexpectedResponseError } from '../client/errors.js';
import {
  createCluster,
  destroyCluster,
  getCluster,
  listClusters,
  waitForClusterDestroyed,
  waitForClusterState,
  type KubernetesClusterRequest,
} from '../client/kubernetes.js';
import { clusterJson, createTestClient, empty, FAST_POLL, FakeTransport, json, TEST_API } from './helpers/fakeTransport.js';

const CLUSTERS_URL = `${TEST_API}/v2/kubernetes/clusters`;

const request: KubernetesClusterRequest = {
  name: 'test-1',
  region: 'nyc1',
  version: '1.29.1-do.0',
  nodePools: [{ name: 'workers', size: 's-2vcpu-4gb', count: 3 }],
};

const nameTaken = () => json(422, { id: 'unprocessable_entity', message: 'a cluster with this name already exists' });

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

describe('createCluster', () => {
  it('sends the cluster request in the API format', async () => {
    const transport = new FakeTransport().enqueue(json(201, { kubernetes_cluster: clusterJson() }));
    const client = createTestClient(transport);

    await createCluster(client, { ...request, vpcId: 'vpc-1', tags: ['ci'], highAvailability: true });

    expect(transport.requests[0]?.method).toBe('POST');
    expect(transport.requests[0]?.url).toBe(CLUSTERS_URL);
    expect(JSON.parse(transport.requests[0]?.body ?? '')).toEqual({
      name: 'test-1',
      region: 'nyc1',
      version: '1.29.1-do.0',
      node_pools: [{ name: 'workers', size: 's-2vcpu-4gb', count: 3 }],
      vpc_uuid: 'vpc-1',
      tags: ['ci'],
      ha: true,
    });
  });

  it('returns created, then the same cluster when the name is taken', async () => {
    const transport = new FakeTransport().enqueue(
      json(201, { kubernetes_cluster: clusterJson({ id: 'abc' }) }),
      nameTaken(),
      json(200, {
        kubernetes_clusters: [clusterJson({ id: 'other', name: 'test-2' }), clusterJson({ id: 'abc' })],
        links: {},
      }),
    );
    const client = createTestClient(transport);

    const first = await createCluster(client, request);
    const second = await createCluster(client, request);

    expect(first.kind).toBe('created');
    expect(first.resource.id).toBe('abc');
    expect(second.kind).toBe('conflicted');
    expect(second.resource.id).toBe(first.resource.id);
    expect(transport.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      `POST ${CLUSTERS_URL}`,
      `POST ${CLUSTERS_URL}`,
      `GET ${CLUSTERS_URL}?per_page=200`,
    ]);
  });

  it('reports a taken name with no visible cluster as pending deletion', async () => {
    const transport = new FakeTransport().enqueue(nameTaken(), json(200, { kubernetes_clusters: [], links: {} }));
    const client = createTestClient(transport);
    await expect(createCluster(client, request)).rejects.toBeInstanceOf(PendingDeletionError);
  });

  it('treats a 200 answer to a create as a defect', async () => {
    const client = createTestClient(new FakeTransport().enqueue(json(200, { kubernetes_cluster: clusterJson() })));
    await expect(createCluster(client, request)).rejects.toBeInstanceOf(UnexpectedResponseError);
  });
});

// ---------------------------------------------------------------------------
// Read
// ---------------------------------------------------------------------------

describe('getCluster / listClusters', () => {
  it('normalizes the cluster', async () => {
    const transport = new FakeTransport().enqueue(json(200, { kubernetes_cluster: clusterJson({ state: 'running' }) }));
    const client = createTestClient(transport);

    const cluster = await getCluster(client, 'abc');

    expect(transport.requests[0]?.url).toBe(`${CLUSTERS_URL}/abc`);
    expect(cluster).toEqual({
      id: 'abc',
      name: 'test-1',
      region: 'nyc1',
      version: '1.29.1-do.0',
      vpcId: 'vpc-1',
      endpoint: 'https://abc.k8s.ondigitalocean.com',
      tags: ['k8s'],
      nodePools: [{ id: 'pool-1', name: 'workers', size: 's-2vcpu-4gb', count: 3, tags: [], autoScale: false }],
      state: 'running',
      statusMessage: '',
      createdAt: '2026-01-01T00:00:00Z',
      updatedAt: '2026-01-01T00:05:00Z',
    });
  });

  it('maps 404 to ResourceNotFoundError', async () => {
    const client = createTestClient(new FakeTransport().enqueue(json(404, { id: 'not_found', message: 'nope' })));
    await expect(getCluster(client, 'abc')).rejects.toThrow('Resource not found. Kubernetes cluster: abc');
  });

  it('treats an unknown cluster state as a defect', async () => {
    const client = createTestClient(
      new FakeTransport().enqueue(json(200, { kubernetes_cluster: clusterJson({ state: 'melting' }) })),
    );
    await expect(getCluster(client, 'abc')).rejects.toBeInstanceOf(UnexpectedResponseError);
  });

  it('filters the list with the predicate', async () => {
    const transport = new FakeTransport().enqueue(
      json(200, {
        kubernetes_clusters: [clusterJson({ id: 'a', state: 'running' }), clusterJson({ id: 'b', state: 'error' })],
        links: {},
      }),
    );
    const client = createTestClient(transport);
    const clusters = await listClusters(client, (cluster) => cluster.state === 'error');
    expect(clusters.map((cluster) => cluster.id)).toEqual(['b']);
  });
});

// ---------------------------------------------------------------------------
// Polling
// ---------------------------------------------------------------------------

describe('waitForClusterState', () => {
  it('creates, re-creates and waits for a cluster to run', async () => {
    const transport = new FakeTransport().enqueue(
      json(201, { kubernetes_cluster: clusterJson({ id: 'abc' }) }),
      nameTaken(),
      json(200, { kubernetes_clusters: [clusterJson({ id: 'abc' })], links: {} }),
      json(200, { kubernetes_cluster: clusterJson({ id: 'abc', state: 'provisioning' }) }),
      json(200, { kubernetes_cluster: clusterJson({ id: 'abc', state: 'provisioning' }) }),
      json(200, { kubernetes_cluster: clusterJson({ id: 'abc', state: 'running' }) }),
    );
    const client = createTestClient(transport);
    const started = Date.now();

    const created = await createCluster(client, request);
    const again = await createCluster(client, request);
    const running = await waitForClusterState(client, again.resource, 'running', 5 * 60_000, { delay: FAST_POLL });

    expect(created).toMatchObject({ kind: 'created', resource: { id: 'abc' } });
    expect(again).toMatchObject({ kind: 'conflicted', resource: { id: 'abc' } });
    expect(running.state).toBe('running');
    // Three polls, two sleeps in between
    expect(transport.requests.slice(3).map((r) => r.url)).toEqual([
      `${CLUSTERS_URL}/abc`,
      `${CLUSTERS_URL}/abc`,
      `${CLUSTERS_URL}/abc`,
    ]);
    expect(Date.now() - started).toBeLessThan(5 * 60_000);
  });
});

// ---------------------------------------------------------------------------
// Destroy
// ---------------------------------------------------------------------------

describe('destroyCluster / waitForClusterDestroyed', () => {
  it('destroys the cluster with its associated resources', async () => {
    const transport = new FakeTransport().enqueue(empty(204));
    const client = createTestClient(transport);
    await destroyCluster(client, 'abc');
    expect(transport.requests[0]?.method).toBe('DELETE');
    expect(transport.requests[0]?.url).toBe(`${CLUSTERS_URL}/abc/destroy_with_associated_resources/dangerous`);
  });

  it('waits until the cluster is gone', async () => {
    const transport = new FakeTransport().enqueue(
      json(200, { kubernetes_cluster: clusterJson({ state: 'deleting' }) }),
      json(404, { id: 'not_found', message: 'cluster not found' }),
    );
    const client = createTestClient(transport);
    await expect(
      waitForClusterDestroyed(client, { id: 'abc', name: 'test-1' }, 60_000, { delay: FAST_POLL }),
    ).resolves.toBeUndefined();
    expect(transport.requests).toHaveLength(2);
  });

  it('accepts the deleted state as gone', async () => {
    const transport = new FakeTransport().enqueue(json(200, { kubernetes_cluster: clusterJson({ state: 'deleted' }) }));
    const client = createTestClient(transport);
    await expect(
      waitForClusterDestroyed(client, { id: 'abc', name: 'test-1' }, 60_000, { delay: FAST_POLL }),
    ).resolves.toMatchObject({ id: 'abc', state: 'deleted' });
    expect(transport.requests).toHaveLength(1);
  });

  it('resolves a wait for the deleted state once the cluster is gone', async () => {
    const transport = new FakeTransport().enqueue(
      json(200, { kubernetes_cluster: clusterJson({ state: 'deleting' }) }),
      json(404, { id: 'not_found', message: 'cluster not found' }),
    );
    const client = createTestClient(transport);
    await expect(
      waitForClusterState(client, { id: 'abc', name: 'test-1' }, 'deleted', 60_000, { delay: FAST_POLL }),
    ).resolves.toBeUndefined();
    expect(transport.requests).toHaveLength(2);
  });

  it('resolves a wait for the deleted state with the cluster reporting it', async () => {
    const client = createTestClient(
      new FakeTransport().enqueue(json(200, { kubernetes_cluster: clusterJson({ state: 'deleted' }) })),
    );
    await expect(
      waitForClusterState(client, { id: 'abc', name: 'test-1' }, 'deleted', 60_000, { delay: FAST_POLL }),
    ).resolves.toMatchObject({ state: 'deleted' });
  });

  it('does not treat a missing cluster as running', async () => {
    const client = createTestClient(new FakeTransport().enqueue(json(404, { id: 'not_found', message: 'gone' })));
    await expect(
      waitForClusterState(client, { id: 'abc', name: 'test-1' }, 'running', 60_000, { delay: FAST_POLL }),
    ).rejects.toBeInstanceOf(ResourceNotFoundError);
  });
});
