/**
 * schemas/index.ts — Re-exports all resource schemas and TypeScript types.
 *
 * Import from this file for all schema/type access:
 *   import { KubernetesClusterSchema, KubernetesCluster, DatabaseSchema, ... } from './schemas/index.js';
 */

export {
  KubernetesClusterSchema,
  KubernetesClusterEnvelopeSchema,
  KubernetesClusterStateSchema,
} from './kubernetes.js';
export type { KubernetesCluster, KubernetesClusterState } from './kubernetes.js';

export { DatabaseSchema, DatabaseEnvelopeSchema, DatabaseStatusSchema, DatabaseEngineSchema } from './database.js';
export type { Database, DatabaseStatus, DatabaseEngine } from './database.js';

export { VpcSchema } from './vpc.js';
export type { Vpc } from './vpc.js';

export {
  ActionEnvelopeSchema,
  ActionSchema,
  ActionStatusSchema,
  DropletEnvelopeSchema,
  DropletImageEnvelopeSchema,
  DropletImageSchema,
  DropletSchema,
  DropletSizeSchema,
  DropletStatusSchema,
} from './droplet.js';
export type { Action, ActionStatus, Droplet, DropletImage, DropletSize, DropletStatus } from './droplet.js';

export {
  GarbageCollectionEnvelopeSchema,
  GarbageCollectionSchema,
  RegistryEnvelopeSchema,
  RegistryImageSchema,
  RegistrySchema,
  RepositorySchema,
} from './registry.js';
export type { GarbageCollection, Registry, RegistryImage, Repository } from './registry.js';

export { ProjectEnvelopeSchema, ProjectSchema } from './project.js';
export type { Project } from './project.js';
