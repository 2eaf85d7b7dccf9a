/**
 * metadata.ts — Queries the droplet metadata service.
 *
 * The service only exists inside a droplet and answers within milliseconds, so
 * requests use a 1 second timeout instead of the client default. Outside a
 * droplet (no answer, or a non-200 answer) every lookup resolves to undefined.
 */

import type { CloudClient } from './CloudClient.js';
import { TransientIoError } from './errors.js';
import type { CallOptions } from './types.js';

export const DROPLET_METADATA = 'http://169.254.169.254';
export const METADATA_TIMEOUT_MS = 1_000;

async function getMetadataValue(client: CloudClient, path: string, options: CallOptions): Promise<string | undefined> {
  const request = client.createRequest(`${DROPLET_METADATA}/metadata/v1/${path}`, {
    timeoutMs: METADATA_TIMEOUT_MS,
  });
  try {
    const response = await client.send(request, options);
    if (response.status !== 200) return undefined;
    return response.text.trim();
  } catch (error) {
    if (!(error instanceof TransientIoError)) throw error;
    client.logger.debug({ err: error, path }, 'Metadata service unavailable; not running inside a droplet');
    return undefined;
  }
}

// The ID of the droplet this process runs on
export async function getCurrentDropletId(client: CloudClient, options: CallOptions = {}): Promise<number | undefined> {
  const value = await getMetadataValue(client, 'id', options);
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  const id = Number(value);
  return Number.isSafeInteger(id) && id > 0 ? id : undefined;
}

export function getCurrentDropletHostname(client: CloudClient, options: CallOptions = {}): Promise<string | undefined> {
  return getMetadataValue(client, 'hostname', options);
}

// Region slug, e.g. 'nyc3'
export function getCurrentDropletRegion(client: CloudClient, options: CallOptions = {}): Promise<string | undefined> {
  return getMetadataValue(client, 'region', options);
}
