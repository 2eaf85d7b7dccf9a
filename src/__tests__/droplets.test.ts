import { describe, it, expect } from 'vitest';
import { ActionFailedError, InvalidParameterError, UnprocessableEntityError } from '../client/errors.js';
import {
  createDroplet,
  destroyDroplet,
  getDropletImage,
  getDropletReadiness,
  listDropletSizes,
  renameDroplet,
  waitForDropletDestroyed,
  waitForDropletReady,
  type DropletRequest,
} from '../client/droplets.js';
import { DropletSchema } from '../client/schemas/index.js';
import { createTestClient, dropletJson, empty, FAST_POLL, FakeTransport, json, TEST_API } from './helpers/fakeTransport.js';

const DROPLETS_URL = `${TEST_API}/v2/droplets`;

const request: DropletRequest = {
  name: 'web-1',
  size: 's-1vcpu-1gb',
  image: 'ubuntu-24-04-x64',
  region: 'nyc1',
};

const actionJson = (status: string) => ({
  action: { id: 9, status, type: 'rename', started_at: '2026-01-01T00:00:00Z', completed_at: null },
});

describe('createDroplet', () => {
  it('sends the droplet request and returns the new droplet', async () => {
    const transport = new FakeTransport().enqueue(json(202, { droplet: dropletJson() }));
    const client = createTestClient(transport);

    const result = await createDroplet(client, { ...request, sshKeys: [42], vpcId: 'vpc-1', withDropletAgent: true });

    expect(transport.requests[0]?.method).toBe('POST');
    expect(transport.requests[0]?.url).toBe(DROPLETS_URL);
    expect(JSON.parse(transport.requests[0]?.body ?? '')).toEqual({
      name: 'web-1',
      size: 's-1vcpu-1gb',
      image: 'ubuntu-24-04-x64',
      region: 'nyc1',
      ssh_keys: [42],
      vpc_uuid: 'vpc-1',
      with_droplet_agent: true,
    });
    expect(result).toEqual({
      kind: 'created',
      resource: {
        id: 101,
        name: 'web-1',
        status: 'new',
        size: 's-1vcpu-1gb',
        region: 'nyc1',
        image: { id: 7, name: '24.04 (LTS) x64', slug: 'ubuntu-24-04-x64' },
        addresses: [],
        vpcId: 'vpc-1',
        tags: ['web'],
        features: ['droplet_agent'],
        memoryMb: 1024,
        vcpus: 1,
        diskGb: 25,
        createdAt: '2026-01-01T00:00:00Z',
      },
    });
  });

  it('rejects a disk smaller than the image', async () => {
    const message = 'Cannot create a droplet with a smaller disk than the image.';
    const client = createTestClient(new FakeTransport().enqueue(json(422, { id: 'unprocessable_entity', message })));
    const pending = createDroplet(client, { ...request, size: 's-1vcpu-512mb-10gb' });
    await expect(pending).rejects.toBeInstanceOf(InvalidParameterError);
    await expect(pending).rejects.toThrow(message);
  });

  it('keeps other 422 messages generic', async () => {
    const client = createTestClient(
      new FakeTransport().enqueue(json(422, { id: 'unprocessable_entity', message: 'You specified an invalid ssh key' })),
    );
    await expect(createDroplet(client, request)).rejects.toBeInstanceOf(UnprocessableEntityError);
  });
});

describe('waitForDropletReady', () => {
  it('waits for the droplet to be active with an IPv4 address', async () => {
    const transport = new FakeTransport().enqueue(
      json(200, { droplet: dropletJson({ status: 'new' }) }),
      json(200, { droplet: dropletJson({ status: 'active' }) }),
      json(200, { droplet: dropletJson({ status: 'active', ipv4: ['203.0.113.10'] }) }),
    );
    const client = createTestClient(transport);

    const droplet = await waitForDropletReady(client, { id: 101, name: 'web-1' }, 60_000, { delay: FAST_POLL });

    expect(droplet.addresses).toEqual([{ address: '203.0.113.10', type: 'public', version: 4 }]);
    expect(transport.requests).toHaveLength(3);
    expect(transport.requests[0]?.url).toBe(`${DROPLETS_URL}/101`);
  });

  it('reports an active droplet without an address as not ready', () => {
    expect(getDropletReadiness(DropletSchema.parse(dropletJson({ status: 'active' })))).toBe('assigning addresses');
    expect(getDropletReadiness(DropletSchema.parse(dropletJson({ status: 'off', ipv4: ['203.0.113.10'] })))).toBe(
      'off',
    );
  });
});

describe('renameDroplet', () => {
  it('starts a rename action and waits for it to complete', async () => {
    const transport = new FakeTransport().enqueue(
      json(201, actionJson('in-progress')),
      json(200, actionJson('in-progress')),
      json(200, actionJson('completed')),
    );
    const client = createTestClient(transport);

    const action = await renameDroplet(client, { id: 101, name: 'web-1' }, 'web-2', 60_000, { delay: FAST_POLL });

    expect(action).toMatchObject({ id: 9, type: 'rename', status: 'completed' });
    expect(transport.requests[0]?.url).toBe(`${DROPLETS_URL}/101/actions`);
    expect(JSON.parse(transport.requests[0]?.body ?? '')).toEqual({ type: 'rename', name: 'web-2' });
    expect(transport.requests[1]?.url).toBe(`${DROPLETS_URL}/101/actions/9`);
    expect(transport.requests).toHaveLength(3);
  });

  it('fails when the action errors', async () => {
    const transport = new FakeTransport().enqueue(json(201, actionJson('in-progress')), json(200, actionJson('errored')));
    const client = createTestClient(transport);

    const error = await renameDroplet(client, { id: 101, name: 'web-1' }, 'web-2', 60_000, { delay: FAST_POLL }).catch(
      (e: unknown) => e,
    );
    expect(error).toBeInstanceOf(ActionFailedError);
    expect(error).toHaveProperty('actionId', 9);
    expect(transport.requests).toHaveLength(2);
  });
});

describe('destroyDroplet / waitForDropletDestroyed', () => {
  it('deletes the droplet and waits until it is gone', async () => {
    const transport = new FakeTransport().enqueue(
      empty(204),
      json(200, { droplet: dropletJson({ status: 'active', ipv4: ['203.0.113.10'] }) }),
      json(404, { id: 'not_found', message: 'The resource you were accessing could not be found.' }),
    );
    const client = createTestClient(transport);

    await destroyDroplet(client, 101);
    await waitForDropletDestroyed(client, { id: 101, name: 'web-1' }, 60_000, { delay: FAST_POLL });

    expect(transport.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      `DELETE ${DROPLETS_URL}/101`,
      `GET ${DROPLETS_URL}/101`,
      `GET ${DROPLETS_URL}/101`,
    ]);
  });
});

describe('sizes and images', () => {
  it('lists the available sizes', async () => {
    const size = (slug: string, available: boolean) => ({
      slug,
      memory: 1024,
      vcpus: 1,
      disk: 25,
      transfer: 1,
      price_monthly: 6,
      price_hourly: 0.00893,
      regions: ['nyc1'],
      available,
      description: 'Basic',
    });
    const transport = new FakeTransport().enqueue(
      json(200, { sizes: [size('s-1vcpu-1gb', true), size('s-8vcpu-16gb', false)], links: {} }),
    );
    const client = createTestClient(transport);

    const sizes = await listDropletSizes(client, (candidate) => candidate.available);

    expect(sizes.map((s) => s.slug)).toEqual(['s-1vcpu-1gb']);
    expect(sizes[0]?.priceMonthly).toBe(6);
    expect(transport.requests[0]?.url).toBe(`${TEST_API}/v2/sizes?per_page=200`);
  });

  it('looks an image up by slug', async () => {
    const transport = new FakeTransport().enqueue(
      json(200, {
        image: {
          id: 7,
          name: '24.04 (LTS) x64',
          distribution: 'Ubuntu',
          slug: 'ubuntu-24-04-x64',
          public: true,
          regions: ['nyc1'],
          min_disk_size: 7,
          type: 'base',
        },
      }),
    );
    const client = createTestClient(transport);

    await expect(getDropletImage(client, 'ubuntu-24-04-x64')).resolves.toEqual({
      id: 7,
      name: '24.04 (LTS) x64',
      distribution: 'Ubuntu',
      slug: 'ubuntu-24-04-x64',
      isPublic: true,
      regions: ['nyc1'],
      minDiskSizeGb: 7,
    });
    expect(transport.requests[0]?.url).toBe(`${TEST_API}/v2/images/ubuntu-24-04-x64`);
  });
});
