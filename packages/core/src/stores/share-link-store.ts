import type { ResourceType, ShareLink } from '../types/share-link.js';

export type CreateShareLinkResult =
  | { status: 'created'; link: ShareLink }
  | { status: 'existing'; link: ShareLink }
  | { status: 'token_conflict' };

/**
 * Persistence for share links. Rows are never deleted.
 */
export interface ShareLinkStore {
  /**
   * Atomically insert `candidate` unless the resource already has an active
   * link, in which case that link is returned untouched. A candidate whose
   * token already exists is rejected with `token_conflict` and nothing is
   * written.
   */
  createIfNoActive(
    candidate: ShareLink,
    now: number,
  ): Promise<CreateShareLinkResult>;
  findByToken(token: string): Promise<ShareLink | undefined>;
  findActive(
    resourceType: ResourceType,
    resourceId: string,
    now: number,
  ): Promise<ShareLink | undefined>;
  /** Every link issued for the resource, newest first. */
  listByResource(
    resourceType: ResourceType,
    resourceId: string,
  ): Promise<Array<ShareLink>>;
  /**
   * Set `revokedAt` on every link of the resource that is not yet revoked.
   * @returns the number of links that changed
   */
  revokeAll(
    resourceType: ResourceType,
    resourceId: string,
    revokedAt: Date,
  ): Promise<number>;
  touch(token: string, accessedAt: Date): Promise<void>;
}
