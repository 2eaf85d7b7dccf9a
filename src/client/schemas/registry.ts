/**
 * registry.ts — Zod schemas for the container registry.
 *
 * An image is a manifest identified by its digest. A manifest list (multi-arch
 * image) references its per-platform manifests through `blobs`, the same way a
 * manifest references its layers.
 */

import { z } from 'zod';

export const RegistrySchema = z
  .object({
    name: z.string(),
    region: z.string().optional(),
    storage_usage_bytes: z.number().int().optional(),
    created_at: z.string(),
  })
  .transform((raw) => ({
    name: raw.name,
    region: raw.region ?? null,
    storageUsageBytes: raw.storage_usage_bytes ?? 0,
    createdAt: raw.created_at,
  }));

export type Registry = z.output<typeof RegistrySchema>;

export const RegistryEnvelopeSchema = z.object({ registry: RegistrySchema }).transform((body) => body.registry);

export const RepositorySchema = z
  .object({
    registry_name: z.string(),
    name: z.string(),
    tag_count: z.number().int().default(0),
    manifest_count: z.number().int().default(0),
  })
  .transform((raw) => ({
    registryName: raw.registry_name,
    name: raw.name,
    tagCount: raw.tag_count,
    manifestCount: raw.manifest_count,
  }));

export type Repository = z.output<typeof RepositorySchema>;

export const RegistryImageSchema = z
  .object({
    digest: z.string(),
    registry_name: z.string(),
    repository: z.string(),
    compressed_size_bytes: z.number().int().default(0),
    size_bytes: z.number().int().default(0),
    updated_at: z.string().optional(),
    tags: z.array(z.string()).nullish(),
    blobs: z.array(z.object({ digest: z.string() })).nullish(),
  })
  .transform((raw) => ({
    digest: raw.digest,
    registryName: raw.registry_name,
    repository: raw.repository,
    compressedSizeBytes: raw.compressed_size_bytes,
    sizeBytes: raw.size_bytes,
    updatedAt: raw.updated_at ?? null,
    tags: raw.tags ?? [],
    blobDigests: (raw.blobs ?? []).map((blob) => blob.digest),
  }));

export type RegistryImage = z.output<typeof RegistryImageSchema>;

export const GarbageCollectionSchema = z
  .object({
    uuid: z.string(),
    registry_name: z.string(),
    status: z.string(),
    created_at: z.string().optional(),
    blobs_deleted: z.number().int().optional(),
    freed_bytes: z.number().int().optional(),
  })
  .transform((raw) => ({
    id: raw.uuid,
    registryName: raw.registry_name,
    status: raw.status,
    createdAt: raw.created_at ?? null,
    blobsDeleted: raw.blobs_deleted ?? 0,
    freedBytes: raw.freed_bytes ?? 0,
  }));

export type GarbageCollection = z.output<typeof GarbageCollectionSchema>;

export const GarbageCollectionEnvelopeSchema = z
  .object({ garbage_collection: GarbageCollectionSchema })
  .transform((body) => body.garbage_collection);
