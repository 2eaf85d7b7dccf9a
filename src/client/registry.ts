/**
 * registry.ts — Container registry operations.
 *
 * Endpoints:
 *   GET    v2/registry                                              → the account's registry
 *   GET    v2/registry/{registry}/repositoriesV2                    → repositories (paginated)
 *   GET    v2/registry/{registry}/repositories/{repo}/digests       → images (paginated)
 *   DELETE v2/registry/{registry}/repositories/{repo}/digests/{dig} → delete an image
 *   POST   v2/registry/{registry}/garbage-collection                → start garbage collection
 *   GET    v2/registry/{registry}/garbage-collection                → active garbage collection
 *
 * Deleting an image only unlinks it; the storage is reclaimed by garbage
 * collection. While garbage collection runs, deletes fail with 412.
 */

import type { MessageRule, ResponseSpec } from './classify.js';
import type { CloudClient } from './CloudClient.js';
import { OperationInProgressError, ResourceConflictError, ResourceNotFoundError } from './errors.js';
import { waitForDeletion, type PollTuning } from './poll.js';
import {
  GarbageCollectionEnvelopeSchema,
  RegistryEnvelopeSchema,
  RegistryImageSchema,
  RepositorySchema,
  type GarbageCollection,
  type Registry,
  type RegistryImage,
  type Repository,
} from './schemas/index.js';
import type { CallOptions } from './types.js';

const REGISTRY_PATH = 'v2/registry';

// Garbage collection statuses after which it no longer blocks deletes
const FINISHED_GARBAGE_COLLECTION = new Set(['succeeded', 'failed', 'cancelled']);

export const REGISTRY_PRECONDITION_RULES: readonly MessageRule[] = [
  {
    match: /not available while garbage collection is running/i,
    toError: (message) => new OperationInProgressError(message),
  },
  {
    match: /referenced by one or more other manifests/i,
    toError: (message) => new ResourceConflictError(message),
  },
];

export type ImageRef = Pick<RegistryImage, 'registryName' | 'repository' | 'digest'>;

function registryPath(registryName: string): string {
  return `${REGISTRY_PATH}/${encodeURIComponent(registryName)}`;
}

function imagesPath(registryName: string, repository: string): string {
  return `${registryPath(registryName)}/repositories/${encodeURIComponent(repository)}/digests`;
}

export function getRegistry(client: CloudClient, options: CallOptions = {}): Promise<Registry> {
  return client.getResource(client.resolve(REGISTRY_PATH), (body) => RegistryEnvelopeSchema.parse(body), {
    ...options,
    notFound: 'Container registry',
  });
}

export function listRepositories(
  client: CloudClient,
  registryName: string,
  predicate?: (repository: Repository) => boolean,
  options: CallOptions = {},
): Promise<Repository[]> {
  return client.getElements(
    client.resolve(`${registryPath(registryName)}/repositoriesV2`),
    {},
    { key: 'repositories', map: (element) => RepositorySchema.parse(element), predicate },
    options,
  );
}

export function findRepository(
  client: CloudClient,
  registryName: string,
  name: string,
  options: CallOptions = {},
): Promise<Repository | undefined> {
  return client.getElement(
    client.resolve(`${registryPath(registryName)}/repositoriesV2`),
    {},
    { key: 'repositories', map: (element) => RepositorySchema.parse(element), predicate: (r) => r.name === name },
    options,
  );
}

export function listImages(
  client: CloudClient,
  registryName: string,
  repository: string,
  predicate?: (image: RegistryImage) => boolean,
  options: CallOptions = {},
): Promise<RegistryImage[]> {
  return client.getElements(
    client.resolve(imagesPath(registryName, repository)),
    {},
    { key: 'manifests', map: (element) => RegistryImageSchema.parse(element), predicate },
    options,
  );
}

export function findImageByTag(
  client: CloudClient,
  registryName: string,
  repository: string,
  tag: string,
  options: CallOptions = {},
): Promise<RegistryImage | undefined> {
  return client.getElement(
    client.resolve(imagesPath(registryName, repository)),
    {},
    { key: 'manifests', map: (element) => RegistryImageSchema.parse(element), predicate: (i) => i.tags.includes(tag) },
    options,
  );
}

/**
 * Deletes an image. An image that is already gone is not an error.
 *
 * A running garbage collection raises OperationInProgressError; an image still
 * referenced by a manifest list raises ResourceConflictError.
 */
export async function destroyImage(client: CloudClient, image: ImageRef, options: CallOptions = {}): Promise<void> {
  const request = client.createRequest(
    client.resolve(`${imagesPath(image.registryName, image.repository)}/${encodeURIComponent(image.digest)}`),
    { method: 'DELETE' },
  );
  const spec: ResponseSpec<void> = {
    success: { 204: () => undefined, 404: () => undefined },
    preconditionFailed: REGISTRY_PRECONDITION_RULES,
  };
  await client.execute(request, spec, options);
}

/**
 * Returns the untagged images that no tagged image reaches through its blobs,
 * in an order that deletes manifest lists before the manifests they reference.
 */
export function findDanglingImages(images: readonly RegistryImage[]): RegistryImage[] {
  const byDigest = new Map(images.map((image) => [image.digest, image] as const));
  const reachable = new Set<string>();
  const pending = images.filter((image) => image.tags.length > 0).map((image) => image.digest);
  while (pending.length > 0) {
    const digest = pending.pop();
    if (digest === undefined || reachable.has(digest)) continue;
    reachable.add(digest);
    pending.push(...(byDigest.get(digest)?.blobDigests ?? []));
  }

  const dangling = images.filter((image) => !reachable.has(image.digest));
  const referenced = new Set(dangling.flatMap((image) => image.blobDigests));
  return [
    ...dangling.filter((image) => !referenced.has(image.digest)),
    ...dangling.filter((image) => referenced.has(image.digest)),
  ];
}

export function startGarbageCollection(
  client: CloudClient,
  registryName: string,
  options: CallOptions = {},
): Promise<GarbageCollection> {
  return client.execute(
    client.createRequest(client.resolve(`${registryPath(registryName)}/garbage-collection`), { method: 'POST' }),
    {
      success: { 201: (r) => GarbageCollectionEnvelopeSchema.parse(r.body) },
      preconditionFailed: REGISTRY_PRECONDITION_RULES,
    },
    options,
  );
}

// The garbage collection currently running; 404 when there is none.
export function getActiveGarbageCollection(
  client: CloudClient,
  registryName: string,
  options: CallOptions = {},
): Promise<GarbageCollection> {
  return client.getResource(
    client.resolve(`${registryPath(registryName)}/garbage-collection`),
    (body) => GarbageCollectionEnvelopeSchema.parse(body),
    { ...options, notFound: `Garbage collection of registry ${registryName}` },
  );
}

/**
 * Polls until the garbage collection is finished. Resolves with its final
 * report, or undefined once the registry no longer lists it as active.
 */
export function waitForGarbageCollection(
  client: CloudClient,
  garbageCollection: Pick<GarbageCollection, 'id' | 'registryName'>,
  timeoutMs: number,
  tuning: PollTuning = {},
): Promise<GarbageCollection | undefined> {
  const label = `Garbage collection ${garbageCollection.id}`;
  return waitForDeletion<GarbageCollection, string>({
    ...tuning,
    resourceName: label,
    timeoutMs,
    fetch: async (options) => {
      const active = await getActiveGarbageCollection(client, garbageCollection.registryName, options);
      // A newer run replaced ours
      if (active.id !== garbageCollection.id) throw new ResourceNotFoundError(label);
      return active;
    },
    getState: (active) => (FINISHED_GARBAGE_COLLECTION.has(active.status) ? 'finished' : active.status),
    deletedState: 'finished',
    describeTarget: 'finished',
  });
}

/**
 * Deletes every dangling image of the repository, then reclaims their storage
 * with a garbage collection. Resolves with the deleted images.
 */
export async function deleteDanglingImages(
  client: CloudClient,
  registryName: string,
  repository: string,
  timeoutMs: number,
  tuning: PollTuning = {},
): Promise<RegistryImage[]> {
  const options: CallOptions = tuning.signal === undefined ? {} : { signal: tuning.signal };
  const dangling = findDanglingImages(await listImages(client, registryName, repository, undefined, options));
  if (dangling.length === 0) return [];

  for (const image of dangling) {
    await destroyImage(client, image, options);
  }
  const garbageCollection = await startGarbageCollection(client, registryName, options);
  await waitForGarbageCollection(client, garbageCollection, timeoutMs, tuning);
  return dangling;
}
