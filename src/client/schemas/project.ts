/**
 * project.ts — Zod schemas for projects.
 */

import { z } from 'zod';

export const ProjectSchema = z
  .object({
    id: z.string(),
    owner_uuid: z.string().optional(),
    name: z.string(),
    description: z.string().default(''),
    purpose: z.string().default(''),
    environment: z.string().default(''),
    is_default: z.boolean().default(false),
    created_at: z.string(),
    updated_at: z.string().optional(),
  })
  .transform((raw) => ({
    id: raw.id,
    ownerId: raw.owner_uuid ?? null,
    name: raw.name,
    description: raw.description,
    purpose: raw.purpose,
    environment: raw.environment,
    isDefault: raw.is_default,
    createdAt: raw.created_at,
    updatedAt: raw.updated_at ?? null,
  }));

export type Project = z.output<typeof ProjectSchema>;

export const ProjectEnvelopeSchema = z.object({ project: ProjectSchema }).transform((body) => body.project);
