/**
 * droplet.ts — Zod schemas for droplets, droplet sizes, images and actions.
 *
 * Field name mapping (raw API → normalized):
 *   size_slug       → size
 *   region.slug     → region
 *   networks.v4/v6  → addresses (flattened, tagged with the IP version)
 *   vpc_uuid        → vpcId
 *   memory / disk   → memoryMb / diskGb
 *   created_at      → createdAt
 */

import { z } from 'zod';

export const DropletStatusSchema = z.enum(['new', 'active', 'off', 'archive']);

export type DropletStatus = z.infer<typeof DropletStatusSchema>;

const NetworkAddressSchema = z.object({
  ip_address: z.string(),
  type: z.enum(['public', 'private']),
});

export const DropletSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    memory: z.number().int(),
    vcpus: z.number().int(),
    disk: z.number().int(),
    status: DropletStatusSchema,
    size_slug: z.string(),
    region: z.object({ slug: z.string() }),
    image: z
      .object({
        id: z.number().int(),
        name: z.string(),
        slug: z.string().nullish(),
      })
      .optional(),
    networks: z
      .object({
        v4: z.array(NetworkAddressSchema).default([]),
        v6: z.array(NetworkAddressSchema).default([]),
      })
      .default({}),
    vpc_uuid: z.string().optional(),
    tags: z.array(z.string()).default([]),
    features: z.array(z.string()).default([]),
    created_at: z.string(),
  })
  .transform((raw) => ({
    id: raw.id,
    name: raw.name,
    status: raw.status,
    size: raw.size_slug,
    region: raw.region.slug,
    image: raw.image === undefined ? null : { id: raw.image.id, name: raw.image.name, slug: raw.image.slug ?? null },
    addresses: [
      ...raw.networks.v4.map((a) => ({ address: a.ip_address, type: a.type, version: 4 as const })),
      ...raw.networks.v6.map((a) => ({ address: a.ip_address, type: a.type, version: 6 as const })),
    ],
    vpcId: raw.vpc_uuid ?? null,
    tags: raw.tags,
    features: raw.features,
    memoryMb: raw.memory,
    vcpus: raw.vcpus,
    diskGb: raw.disk,
    createdAt: raw.created_at,
  }));

export type Droplet = z.output<typeof DropletSchema>;

export const DropletEnvelopeSchema = z.object({ droplet: DropletSchema }).transform((body) => body.droplet);

export const DropletSizeSchema = z
  .object({
    slug: z.string(),
    memory: z.number().int(),
    vcpus: z.number().int(),
    disk: z.number().int(),
    price_monthly: z.number(),
    price_hourly: z.number(),
    regions: z.array(z.string()).default([]),
    available: z.boolean(),
    description: z.string().default(''),
  })
  .transform((raw) => ({
    slug: raw.slug,
    memoryMb: raw.memory,
    vcpus: raw.vcpus,
    diskGb: raw.disk,
    priceMonthly: raw.price_monthly,
    priceHourly: raw.price_hourly,
    regions: raw.regions,
    available: raw.available,
    description: raw.description,
  }));

export type DropletSize = z.output<typeof DropletSizeSchema>;

export const DropletImageSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    distribution: z.string().default(''),
    slug: z.string().nullish(),
    public: z.boolean().default(false),
    regions: z.array(z.string()).default([]),
    min_disk_size: z.number().int().nullish(),
  })
  .transform((raw) => ({
    id: raw.id,
    name: raw.name,
    distribution: raw.distribution,
    slug: raw.slug ?? null,
    isPublic: raw.public,
    regions: raw.regions,
    minDiskSizeGb: raw.min_disk_size ?? null,
  }));

export type DropletImage = z.output<typeof DropletImageSchema>;

export const DropletImageEnvelopeSchema = z.object({ image: DropletImageSchema }).transform((body) => body.image);

export const ActionStatusSchema = z.enum(['in-progress', 'completed', 'errored']);

export type ActionStatus = z.infer<typeof ActionStatusSchema>;

export const ActionSchema = z
  .object({
    id: z.number().int(),
    status: ActionStatusSchema,
    type: z.string(),
    started_at: z.string().nullish(),
    completed_at: z.string().nullish(),
  })
  .transform((raw) => ({
    id: raw.id,
    status: raw.status,
    type: raw.type,
    startedAt: raw.started_at ?? null,
    completedAt: raw.completed_at ?? null,
  }));

export type Action = z.output<typeof ActionSchema>;

export const ActionEnvelopeSchema = z.object({ action: ActionSchema }).transform((body) => body.action);
