/**
 * Resource types that can be shared through a public link.
 * Adding a type requires a matching entry in every `ResourceDirectory`.
 */
export const RESOURCE_TYPES = ['resume', 'cover_letter'] as const;

export type ResourceType = (typeof RESOURCE_TYPES)[number];

export function isResourceType(value: unknown): value is ResourceType {
  return (
    typeof value === 'string' &&
    RESOURCE_TYPES.some((type) => type === value)
  );
}

export interface ShareLink {
  /** Opaque, URL-safe token handed out in the public URL. */
  token: string;
  resourceType: ResourceType;
  resourceId: string;
  /** Recorded owner of the resource at the time the link was minted. */
  ownerId: string;
  createdAt: Date;
  /** `null` means the link never expires. */
  expiresAt: Date | null;
  /** Set once by revoke and never cleared. */
  revokedAt: Date | null;
  lastAccessedAt: Date | null;
}

/** What a successful public resolve hands back to the read path. */
export interface ShareReference {
  resourceType: ResourceType;
  resourceId: string;
}

/**
 * A link is active while it is neither revoked nor past its expiry.
 * Expiry is derived from the clock and never written.
 */
export function isActiveShareLink(
  link: ShareLink,
  now: number = Date.now(),
): boolean {
  if (link.revokedAt !== null) {
    return false;
  }
  return link.expiresAt === null || link.expiresAt.getTime() > now;
}

export function resourceKey(
  resourceType: ResourceType,
  resourceId: string,
): string {
  return `${resourceType}#${resourceId}`;
}
