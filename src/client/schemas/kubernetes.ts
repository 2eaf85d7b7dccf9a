/**
 * kubernetes.ts — Zod schemas for Kubernetes clusters.
 *
 * Field name mapping (raw API → normalized):
 *   vpc_uuid      → vpcId
 *   status.state  → state
 *   status.message → statusMessage
 *   created_at    → createdAt
 *   updated_at    → updatedAt
 */

import { z } from 'zod';

export const KubernetesClusterStateSchema = z.enum([
  'running',
  'provisioning',
  'degraded',
  'error',
  'deleted',
  'upgrading',
  'deleting',
]);

export type KubernetesClusterState = z.infer<typeof KubernetesClusterStateSchema>;

const NodePoolSchema = z.object({
  id: z.string(),
  name: z.string(),
  size: z.string(),
  count: z.number().int(),
  tags: z.array(z.string()).default([]),
  auto_scale: z.boolean().default(false),
});

export const KubernetesClusterSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    region: z.string(),
    version: z.string(),
    vpc_uuid: z.string().optional(),
    endpoint: z.string().default(''),
    tags: z.array(z.string()).default([]),
    node_pools: z.array(NodePoolSchema).default([]),
    status: z.object({
      state: KubernetesClusterStateSchema,
      message: z.string().optional(),
    }),
    created_at: z.string(),
    updated_at: z.string().optional(),
  })
  .transform((raw) => ({
    id: raw.id,
    name: raw.name,
    region: raw.region,
    version: raw.version,
    vpcId: raw.vpc_uuid ?? null,
    endpoint: raw.endpoint,
    tags: raw.tags,
    nodePools: raw.node_pools.map((pool) => ({
      id: pool.id,
      name: pool.name,
      size: pool.size,
      count: pool.count,
      tags: pool.tags,
      autoScale: pool.auto_scale,
    })),
    state: raw.status.state,
    statusMessage: raw.status.message ?? '',
    createdAt: raw.created_at,
    updatedAt: raw.updated_at ?? raw.created_at,
  }));

export type KubernetesCluster = z.output<typeof KubernetesClusterSchema>;

// Single-resource responses wrap the cluster: { "kubernetes_cluster": {...} }
export const KubernetesClusterEnvelopeSchema = z
  .object({ kubernetes_cluster: KubernetesClusterSchema })
  .transform((body) => body.kubernetes_cluster);
