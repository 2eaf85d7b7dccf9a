/**
 * droplets.ts — Droplet operations.
 *
 * Endpoints:
 *   POST   v2/droplets                          → create
 *   GET    v2/droplets                          → list (paginated)
 *   GET    v2/droplets/{id}                     → get
 *   DELETE v2/droplets/{id}                     → destroy
 *   POST   v2/droplets/{id}/actions             → start an action (rename)
 *   GET    v2/droplets/{id}/actions/{actionId}  → action status
 *   GET    v2/sizes                             → droplet sizes (paginated)
 *   GET    v2/images/{id or slug}               → image
 *
 * Droplet names are not unique, so a create never conflicts with an existing droplet.
 */

import type { MessageRule } from './classify.js';
import type { CloudClient } from './CloudClient.js';
import { created, type CreateResult } from './create-result.js';
import { ActionFailedError, InvalidParameterError } from './errors.js';
import { waitForDeletion, waitForState, type PollTuning } from './poll.js';
import {
  ActionEnvelopeSchema,
  DropletEnvelopeSchema,
  DropletImageEnvelopeSchema,
  DropletSchema,
  DropletSizeSchema,
  type Action,
  type Droplet,
  type DropletImage,
  type DropletSize,
  type DropletStatus,
} from './schemas/index.js';
import type { CallOptions } from './types.js';

const DROPLETS_PATH = 'v2/droplets';

export interface DropletRequest {
  name: string;
  // Size slug, e.g. 's-1vcpu-1gb'
  size: string;
  // Image slug ('ubuntu-24-04-x64') or id
  image: string | number;
  region: string;
  // SSH key ids or fingerprints
  sshKeys?: Array<string | number>;
  backups?: boolean;
  monitoring?: boolean;
  vpcId?: string;
  tags?: string[];
  userData?: string;
  withDropletAgent?: boolean;
}

export type DropletRef = Pick<Droplet, 'id' | 'name'>;

// An active droplet is only usable once it has an IPv4 address
export type DropletReadiness = DropletStatus | 'assigning addresses';

const CREATE_UNPROCESSABLE_RULES: readonly MessageRule[] = [
  { match: /smaller disk than the image/i, toError: (message) => new InvalidParameterError(message) },
];

function toServerRequest(request: DropletRequest): Record<string, unknown> {
  return {
    name: request.name,
    size: request.size,
    image: request.image,
    region: request.region,
    ...(request.sshKeys !== undefined && { ssh_keys: request.sshKeys }),
    ...(request.backups !== undefined && { backups: request.backups }),
    ...(request.monitoring !== undefined && { monitoring: request.monitoring }),
    ...(request.vpcId !== undefined && { vpc_uuid: request.vpcId }),
    ...(request.tags !== undefined && { tags: request.tags }),
    ...(request.userData !== undefined && { user_data: request.userData }),
    ...(request.withDropletAgent !== undefined && { with_droplet_agent: request.withDropletAgent }),
  };
}

function describe(name: string): string {
  return `Droplet "${name}"`;
}

function dropletPath(id: number): string {
  return `${DROPLETS_PATH}/${encodeURIComponent(String(id))}`;
}

export function getDropletReadiness(droplet: Droplet): DropletReadiness {
  if (droplet.status === 'active' && !droplet.addresses.some((address) => address.version === 4)) {
    return 'assigning addresses';
  }
  return droplet.status;
}

/**
 * The server answers 202 while the droplet is still 'new'. A disk smaller than
 * the image surfaces as InvalidParameterError.
 */
export async function createDroplet(
  client: CloudClient,
  request: DropletRequest,
  options: CallOptions = {},
): Promise<CreateResult<Droplet>> {
  const droplet = await client.execute(
    client.createRequest(client.resolve(DROPLETS_PATH), { method: 'POST', body: toServerRequest(request) }),
    {
      success: { 202: (r) => DropletEnvelopeSchema.parse(r.body) },
      unprocessable: CREATE_UNPROCESSABLE_RULES,
    },
    options,
  );
  return created(droplet);
}

export function getDroplet(client: CloudClient, id: number, options: CallOptions = {}): Promise<Droplet> {
  return client.getResource(client.resolve(dropletPath(id)), (body) => DropletEnvelopeSchema.parse(body), {
    ...options,
    notFound: `Droplet: ${id}`,
  });
}

export function listDroplets(
  client: CloudClient,
  predicate?: (droplet: Droplet) => boolean,
  options: CallOptions = {},
): Promise<Droplet[]> {
  return client.getElements(
    client.resolve(DROPLETS_PATH),
    {},
    { key: 'droplets', map: (element) => DropletSchema.parse(element), predicate },
    options,
  );
}

export function findDroplet(
  client: CloudClient,
  predicate: (droplet: Droplet) => boolean,
  options: CallOptions = {},
): Promise<Droplet | undefined> {
  return client.getElement(
    client.resolve(DROPLETS_PATH),
    {},
    { key: 'droplets', map: (element) => DropletSchema.parse(element), predicate },
    options,
  );
}

// Polls until the droplet is active and has an IPv4 address.
export function waitForDropletReady(
  client: CloudClient,
  droplet: DropletRef,
  timeoutMs: number,
  tuning: PollTuning = {},
): Promise<Droplet> {
  return waitForState<Droplet, DropletReadiness>({
    ...tuning,
    resourceName: describe(droplet.name),
    timeoutMs,
    target: 'active',
    fetch: (options) => getDroplet(client, droplet.id, options),
    getState: getDropletReadiness,
  });
}

export function getDropletAction(
  client: CloudClient,
  dropletId: number,
  actionId: number,
  options: CallOptions = {},
): Promise<Action> {
  return client.getResource(
    client.resolve(`${dropletPath(dropletId)}/actions/${encodeURIComponent(String(actionId))}`),
    (body) => ActionEnvelopeSchema.parse(body),
    { ...options, notFound: `Droplet action: ${actionId}` },
  );
}

/**
 * Polls an action until it completes. An action that errors ends the wait with ActionFailedError.
 */
export function waitForDropletAction(
  client: CloudClient,
  droplet: DropletRef,
  action: Pick<Action, 'id' | 'type'>,
  timeoutMs: number,
  tuning: PollTuning = {},
): Promise<Action> {
  return waitForState<Action, Action['status']>({
    ...tuning,
    resourceName: `${action.type} of ${describe(droplet.name)}`,
    timeoutMs,
    target: 'completed',
    fetch: async (options) => {
      const current = await getDropletAction(client, droplet.id, action.id, options);
      if (current.status === 'errored') throw new ActionFailedError(current.id, current.type);
      return current;
    },
    getState: (current) => current.status,
  });
}

export async function renameDroplet(
  client: CloudClient,
  droplet: DropletRef,
  name: string,
  timeoutMs: number,
  tuning: PollTuning = {},
): Promise<Action> {
  const action = await client.execute(
    client.createRequest(client.resolve(`${dropletPath(droplet.id)}/actions`), {
      method: 'POST',
      body: { type: 'rename', name },
    }),
    { success: { 201: (r) => ActionEnvelopeSchema.parse(r.body) } },
    tuning.signal === undefined ? {} : { signal: tuning.signal },
  );
  return waitForDropletAction(client, droplet, action, timeoutMs, tuning);
}

export function destroyDroplet(client: CloudClient, id: number, options: CallOptions = {}): Promise<void> {
  return client.destroyResource(client.resolve(dropletPath(id)), options);
}

export async function waitForDropletDestroyed(
  client: CloudClient,
  droplet: DropletRef,
  timeoutMs: number,
  tuning: PollTuning = {},
): Promise<void> {
  await waitForDeletion<Droplet, DropletStatus>({
    ...tuning,
    resourceName: describe(droplet.name),
    timeoutMs,
    fetch: (options) => getDroplet(client, droplet.id, options),
    getState: (fetched) => fetched.status,
  });
}

export function listDropletSizes(
  client: CloudClient,
  predicate?: (size: DropletSize) => boolean,
  options: CallOptions = {},
): Promise<DropletSize[]> {
  return client.getElements(
    client.resolve('v2/sizes'),
    {},
    { key: 'sizes', map: (element) => DropletSizeSchema.parse(element), predicate },
    options,
  );
}

export function getDropletImage(
  client: CloudClient,
  idOrSlug: string | number,
  options: CallOptions = {},
): Promise<DropletImage> {
  return client.getResource(
    client.resolve(`v2/images/${encodeURIComponent(String(idOrSlug))}`),
    (body) => DropletImageEnvelopeSchema.parse(body),
    { ...options, notFound: `Image: ${idOrSlug}` },
  );
}
