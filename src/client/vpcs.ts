/**
 * vpcs.ts — VPC lookups.
 */

import type { CloudClient } from './CloudClient.js';
import { VpcSchema, type Vpc } from './schemas/index.js';
import type { CallOptions } from './types.js';

export function listVpcs(client: CloudClient, options: CallOptions = {}): Promise<Vpc[]> {
  return client.getElements(
    client.resolve('v2/vpcs'),
    {},
    { key: 'vpcs', map: (element) => VpcSchema.parse(element) },
    options,
  );
}

// Every region has one default VPC once the account has created a resource there; before that there is none.
export async function getDefaultVpcId(
  client: CloudClient,
  region: string,
  options: CallOptions = {},
): Promise<string | undefined> {
  const vpc = await client.getElement(
    client.resolve('v2/vpcs'),
    {},
    {
      key: 'vpcs',
      map: (element) => VpcSchema.parse(element),
      predicate: (candidate) => candidate.isDefault && candidate.region === region,
    },
    options,
  );
  return vpc?.id;
}
