import {
  isActiveShareLink,
  resourceKey,
  type CreateShareLinkResult,
  type ResourceType,
  type ShareLink,
  type ShareLinkStore,
} from '@tokengate/core';

function cloneLink(link: ShareLink): ShareLink {
  return {
    ...link,
    createdAt: new Date(link.createdAt),
    expiresAt: link.expiresAt && new Date(link.expiresAt),
    revokedAt: link.revokedAt && new Date(link.revokedAt),
    lastAccessedAt: link.lastAccessedAt && new Date(link.lastAccessedAt),
  };
}

/**
 * Share links held in process memory.
 *
 * Every mutating method does its read and its write without an `await` in
 * between, so calls cannot interleave on the event loop.
 */
export class InMemoryShareLinkStore implements ShareLinkStore {
  private readonly byToken = new Map<string, ShareLink>();
  /** Tokens per resource key, oldest first. */
  private readonly byResource = new Map<string, Array<string>>();

  async createIfNoActive(
    candidate: ShareLink,
    now: number,
  ): Promise<CreateShareLinkResult> {
    const existing = this.activeLink(
      candidate.resourceType,
      candidate.resourceId,
      now,
    );
    if (existing) {
      return { status: 'existing', link: cloneLink(existing) };
    }
    if (this.byToken.has(candidate.token)) {
      return { status: 'token_conflict' };
    }

    const link = cloneLink(candidate);
    this.byToken.set(link.token, link);
    const key = resourceKey(link.resourceType, link.resourceId);
    const tokens = this.byResource.get(key) ?? [];
    tokens.push(link.token);
    this.byResource.set(key, tokens);

    return { status: 'created', link: cloneLink(link) };
  }

  async findByToken(token: string): Promise<ShareLink | undefined> {
    const link = this.byToken.get(token);
    return link && cloneLink(link);
  }

  async findActive(
    resourceType: ResourceType,
    resourceId: string,
    now: number,
  ): Promise<ShareLink | undefined> {
    const link = this.activeLink(resourceType, resourceId, now);
    return link && cloneLink(link);
  }

  async listByResource(
    resourceType: ResourceType,
    resourceId: string,
  ): Promise<Array<ShareLink>> {
    return this.linksOf(resourceType, resourceId).reverse().map(cloneLink);
  }

  async revokeAll(
    resourceType: ResourceType,
    resourceId: string,
    revokedAt: Date,
  ): Promise<number> {
    let revoked = 0;
    for (const link of this.linksOf(resourceType, resourceId)) {
      if (link.revokedAt === null) {
        link.revokedAt = new Date(revokedAt);
        revoked++;
      }
    }
    return revoked;
  }

  async touch(token: string, accessedAt: Date): Promise<void> {
    const link = this.byToken.get(token);
    if (link) {
      link.lastAccessedAt = new Date(accessedAt);
    }
  }

  /** Number of links held, revoked and expired included. */
  size(): number {
    return this.byToken.size;
  }

  clear(): void {
    this.byToken.clear();
    this.byResource.clear();
  }

  private linksOf(
    resourceType: ResourceType,
    resourceId: string,
  ): Array<ShareLink> {
    const tokens =
      this.byResource.get(resourceKey(resourceType, resourceId)) ?? [];
    const links: Array<ShareLink> = [];
    for (const token of tokens) {
      const link = this.byToken.get(token);
      if (link) links.push(link);
    }
    return links;
  }

  private activeLink(
    resourceType: ResourceType,
    resourceId: string,
    now: number,
  ): ShareLink | undefined {
    return this.linksOf(resourceType, resourceId).find((link) =>
      isActiveShareLink(link, now),
    );
  }
}
