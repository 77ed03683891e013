import type { ResourceType } from '../types/share-link.js';

/**
 * Ownership lookups supplied by the persistence layer that owns the
 * resources themselves.
 */
export interface ResourceCollaborator {
  /** `undefined` when the resource does not exist. */
  getOwner(resourceId: string): Promise<string | undefined>;
  /** `false` for missing and soft-deleted resources alike. */
  exists(resourceId: string): Promise<boolean>;
}

/** One collaborator per resource type. */
export type ResourceDirectory = Readonly<
  Record<ResourceType, ResourceCollaborator>
>;
