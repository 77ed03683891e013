import type { Logger } from 'pino';
import {
  ConfigurationError,
  GatewayInternalError,
  NotFoundError,
  NotOwnerError,
} from '../errors/gateway-error.js';
import type { ShareLinkStore } from '../stores/share-link-store.js';
import {
  RandomTokenGenerator,
  type TokenGenerator,
} from '../tokens/token-generator.js';
import type { Principal } from '../types/principal.js';
import {
  isActiveShareLink,
  type ResourceType,
  type ShareLink,
  type ShareReference,
} from '../types/share-link.js';
import { createLogger } from '../utils/logger.js';
import type { ResourceDirectory } from './resource-collaborator.js';

export const DEFAULT_SHARE_TTL_MS = 30 * 24 * 60 * 60 * 1000;
export const DEFAULT_MAX_TOKEN_ATTEMPTS = 5;

export interface ShareRegistryOptions {
  store: ShareLinkStore;
  resources: ResourceDirectory;
  tokenGenerator?: TokenGenerator;
  /** TTL applied when a caller does not pass one. `null` disables expiry. */
  defaultTtlMs?: number | null;
  maxTokenAttempts?: number;
  logger?: Logger;
}

export interface CreateShareLinkOptions {
  /**
   * Lifetime of a newly minted link. Omit for the registry default, pass
   * `null` for a link that never expires. Ignored when an active link
   * already exists.
   */
  ttlMs?: number | null;
}

export class ShareRegistry {
  private readonly store: ShareLinkStore;
  private readonly resources: ResourceDirectory;
  private readonly tokenGenerator: TokenGenerator;
  private readonly defaultTtlMs: number | null;
  private readonly maxTokenAttempts: number;
  private readonly logger: Logger;

  constructor({
    store,
    resources,
    tokenGenerator = new RandomTokenGenerator(),
    defaultTtlMs = DEFAULT_SHARE_TTL_MS,
    maxTokenAttempts = DEFAULT_MAX_TOKEN_ATTEMPTS,
    logger,
  }: ShareRegistryOptions) {
    assertTtl(defaultTtlMs);
    this.store = store;
    this.resources = resources;
    this.tokenGenerator = tokenGenerator;
    this.defaultTtlMs = defaultTtlMs;
    this.maxTokenAttempts = maxTokenAttempts;
    this.logger = logger ?? createLogger('share-registry');
  }

  /**
   * Returns the resource's active link, minting one if there is none.
   * Concurrent callers for the same resource all receive the same token.
   */
  async createOrGetLink(
    resourceType: ResourceType,
    resourceId: string,
    principal: Principal,
    options: CreateShareLinkOptions = {},
  ): Promise<ShareLink> {
    const ownerId = await this.authorize(resourceType, resourceId, principal);
    const ttlMs =
      options.ttlMs === undefined ? this.defaultTtlMs : options.ttlMs;
    assertTtl(ttlMs);

    for (let attempt = 0; attempt < this.maxTokenAttempts; attempt++) {
      const now = Date.now();
      const candidate: ShareLink = {
        token: this.tokenGenerator.generate(),
        resourceType,
        resourceId,
        ownerId,
        createdAt: new Date(now),
        expiresAt: ttlMs === null ? null : new Date(now + ttlMs),
        revokedAt: null,
        lastAccessedAt: null,
      };

      const result = await this.store.createIfNoActive(candidate, now);

      switch (result.status) {
        case 'created':
          this.logger.info(
            { resourceType, resourceId, expiresAt: result.link.expiresAt },
            'Share link created',
          );
          return result.link;
        case 'existing':
          return result.link;
        case 'token_conflict':
          this.logger.warn(
            { resourceType, resourceId, attempt },
            'Share token collision, generating a new token',
          );
      }
    }

    throw new GatewayInternalError(
      `Could not mint a unique share token after ${this.maxTokenAttempts} attempts`,
    );
  }

  /**
   * Resolves a public token to the resource it grants access to.
   *
   * Unknown, revoked, expired and mistyped tokens, and tokens whose resource
   * has since been deleted, all fail with the same {@link NotFoundError}.
   */
  async resolve(
    token: string,
    expectedType?: ResourceType,
  ): Promise<ShareReference> {
    const now = Date.now();
    const link = await this.store.findByToken(token);

    if (
      !link ||
      !isActiveShareLink(link, now) ||
      (expectedType !== undefined && link.resourceType !== expectedType)
    ) {
      throw new NotFoundError();
    }

    const exists = await this.resources[link.resourceType].exists(
      link.resourceId,
    );
    if (!exists) {
      throw new NotFoundError();
    }

    void this.store.touch(token, new Date(now)).catch((error: unknown) => {
      this.logger.warn(
        { err: error, resourceType: link.resourceType },
        'Failed to record share link access',
      );
    });

    return { resourceType: link.resourceType, resourceId: link.resourceId };
  }

  /**
   * Revokes every unrevoked link of the resource.
   * @returns the number of links revoked; `0` when there was nothing to do
   */
  async revoke(
    resourceType: ResourceType,
    resourceId: string,
    principal: Principal,
  ): Promise<number> {
    await this.authorize(resourceType, resourceId, principal);
    const revoked = await this.store.revokeAll(
      resourceType,
      resourceId,
      new Date(Date.now()),
    );

    if (revoked > 0) {
      this.logger.info(
        { resourceType, resourceId, revoked },
        'Share links revoked',
      );
    }
    return revoked;
  }

  async getActiveLink(
    resourceType: ResourceType,
    resourceId: string,
    principal: Principal,
  ): Promise<ShareLink | undefined> {
    await this.authorize(resourceType, resourceId, principal);
    return this.store.findActive(resourceType, resourceId, Date.now());
  }

  /** Full link history of a resource, revoked and expired links included. */
  async listLinks(
    resourceType: ResourceType,
    resourceId: string,
    principal: Principal,
  ): Promise<Array<ShareLink>> {
    await this.authorize(resourceType, resourceId, principal);
    return this.store.listByResource(resourceType, resourceId);
  }

  private async authorize(
    resourceType: ResourceType,
    resourceId: string,
    principal: Principal,
  ): Promise<string> {
    const ownerId = await this.resources[resourceType].getOwner(resourceId);
    if (ownerId === undefined) {
      throw new NotFoundError();
    }
    if (ownerId !== principal.id && principal.isAdmin !== true) {
      throw new NotOwnerError();
    }
    return ownerId;
  }
}

function assertTtl(ttlMs: number | null): void {
  if (ttlMs !== null && (!Number.isFinite(ttlMs) || ttlMs <= 0)) {
    throw new ConfigurationError('Share TTL must be a positive number or null');
  }
}
