/**
 * projects.ts — Project lookups.
 *
 *   GET v2/projects          → list (paginated)
 *   GET v2/projects/{id}     → get
 *   GET v2/projects/default  → the project new resources land in
 */

import type { CloudClient } from './CloudClient.js';
import { ProjectEnvelopeSchema, ProjectSchema, type Project } from './schemas/index.js';
import type { CallOptions } from './types.js';

const PROJECTS_PATH = 'v2/projects';

export function listProjects(
  client: CloudClient,
  predicate?: (project: Project) => boolean,
  options: CallOptions = {},
): Promise<Project[]> {
  return client.getElements(
    client.resolve(PROJECTS_PATH),
    {},
    { key: 'projects', map: (element) => ProjectSchema.parse(element), predicate },
    options,
  );
}

export function findProject(
  client: CloudClient,
  predicate: (project: Project) => boolean,
  options: CallOptions = {},
): Promise<Project | undefined> {
  return client.getElement(
    client.resolve(PROJECTS_PATH),
    {},
    { key: 'projects', map: (element) => ProjectSchema.parse(element), predicate },
    options,
  );
}

export function getProject(client: CloudClient, id: string, options: CallOptions = {}): Promise<Project> {
  return client.getResource(
    client.resolve(`${PROJECTS_PATH}/${encodeURIComponent(id)}`),
    (body) => ProjectEnvelopeSchema.parse(body),
    { ...options, notFound: `Project: ${id}` },
  );
}

export function getDefaultProject(client: CloudClient, options: CallOptions = {}): Promise<Project> {
  return client.getResource(
    client.resolve(`${PROJECTS_PATH}/default`),
    (body) => ProjectEnvelopeSchema.parse(body),
    { ...options, notFound: 'Default project' },
  );
}
