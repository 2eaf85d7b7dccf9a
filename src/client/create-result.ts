/**
 * create-result.ts — "create or return the existing one" semantics.
 *
 * Creating a resource whose name is taken is not an error: the caller receives
 * the live resource that holds the name. The result always carries a real
 * resource; when none can be found the name belongs to a resource that is
 * being deleted and PendingDeletionError is thrown instead.
 */

import { NameConflictError, PendingDeletionError } from './errors.js';

export type CreateResult<T> =
  | { readonly kind: 'created'; readonly resource: T }
  | { readonly kind: 'conflicted'; readonly resource: T };

export function created<T>(resource: T): CreateResult<T> {
  return { kind: 'created', resource };
}

export function conflictedWith<T>(resource: T): CreateResult<T> {
  return { kind: 'conflicted', resource };
}

export interface CreateOrGetExistingOptions<T> {
  // Issues the create call; throws NameConflictError when the name is taken
  create: () => Promise<T>;
  // Looks up the resource holding the name
  findExisting: () => Promise<T | undefined>;
  // Used in the PendingDeletionError message, e.g. 'Kubernetes cluster "test-1"'
  description: string;
}

export async function createOrGetExisting<T>(options: CreateOrGetExistingOptions<T>): Promise<CreateResult<T>> {
  let resource: T;
  try {
    resource = await options.create();
  } catch (error) {
    if (!(error instanceof NameConflictError)) throw error;
    const existing = await options.findExisting();
    if (existing === undefined) {
      throw new PendingDeletionError(
        `${options.description} conflicts with a resource that cannot be retrieved; ` +
        `it is probably pending deletion. Server message: ${error.message}`,
      );
    }
    return conflictedWith(existing);
  }
  return created(resource);
}
