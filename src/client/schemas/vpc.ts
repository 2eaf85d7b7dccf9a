/**
 * vpc.ts — Zod schema for virtual private clouds.
 */

import { z } from 'zod';

export const VpcSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    region: z.string(),
    ip_range: z.string().default(''),
    default: z.boolean(),
  })
  .transform((raw) => ({
    id: raw.id,
    name: raw.name,
    region: raw.region,
    ipRange: raw.ip_range,
    isDefault: raw.default,
  }));

export type Vpc = z.output<typeof VpcSchema>;
