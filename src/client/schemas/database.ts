/**
 * database.ts — Zod schemas for managed database clusters.
 *
 * Field name mapping (raw API → normalized):
 *   num_nodes        → nodeCount
 *   private_network_uuid → vpcId
 *   created_at       → createdAt
 */

import { z } from 'zod';

export const DatabaseStatusSchema = z.enum(['creating', 'online', 'resizing', 'migrating', 'forking']);

export type DatabaseStatus = z.infer<typeof DatabaseStatusSchema>;

export const DatabaseEngineSchema = z.enum(['pg', 'mysql', 'redis', 'valkey', 'mongodb', 'kafka', 'opensearch']);

export type DatabaseEngine = z.infer<typeof DatabaseEngineSchema>;

export const DatabaseSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    engine: DatabaseEngineSchema,
    version: z.string().default(''),
    size: z.string(),
    region: z.string(),
    num_nodes: z.number().int(),
    status: DatabaseStatusSchema,
    private_network_uuid: z.string().optional(),
    tags: z.array(z.string()).nullish(),
    created_at: z.string(),
  })
  .transform((raw) => ({
    id: raw.id,
    name: raw.name,
    engine: raw.engine,
    version: raw.version,
    size: raw.size,
    region: raw.region,
    nodeCount: raw.num_nodes,
    status: raw.status,
    vpcId: raw.private_network_uuid ?? null,
    tags: raw.tags ?? [],
    createdAt: raw.created_at,
  }));

export type Database = z.output<typeof DatabaseSchema>;

export const DatabaseEnvelopeSchema = z
  .object({ database: DatabaseSchema })
  .transform((body) => body.database);
