import type { Logger } from 'pino';
import type { GovernanceConfig } from './config/governance-config.js';
import { Gateway } from './gateway/gateway.js';
import { UsageLedger } from './ledger/usage-ledger.js';
import { RateLimiter } from './rate-limit/rate-limiter.js';
import type { ResourceDirectory } from './share/resource-collaborator.js';
import { ShareRegistry } from './share/share-registry.js';
import type { RateLimitStore } from './stores/rate-limit-store.js';
import type { ShareLinkStore } from './stores/share-link-store.js';
import type { UsageLedgerStore } from './stores/usage-ledger-store.js';
import { RandomTokenGenerator } from './tokens/token-generator.js';

/** The three stores every back end package hands out together. */
export interface GovernanceStores {
  shareLinks: ShareLinkStore;
  rateLimit: RateLimitStore;
  ledger: UsageLedgerStore;
}

export interface CreateGovernanceOptions {
  config: GovernanceConfig;
  stores: GovernanceStores;
  resources: ResourceDirectory;
  /** Parent logger; each service logs through a named child. */
  logger?: Logger;
}

export interface Governance {
  shareRegistry: ShareRegistry;
  rateLimiter: RateLimiter;
  ledger: UsageLedger;
  gateway: Gateway;
}

/** Builds the services from a validated config and one set of stores. */
export function createGovernance({
  config,
  stores,
  resources,
  logger,
}: CreateGovernanceOptions): Governance {
  const child = (name: string) => logger?.child({ name });

  const shareRegistry = new ShareRegistry({
    store: stores.shareLinks,
    resources,
    tokenGenerator: new RandomTokenGenerator({
      byteLength: config.share.tokenBytes,
    }),
    defaultTtlMs: config.share.defaultTtlMs,
    logger: child('share-registry'),
  });
  const rateLimiter = new RateLimiter({
    store: stores.rateLimit,
    classes: config.operationClasses,
    logger: child('rate-limiter'),
  });
  const ledger = new UsageLedger({
    store: stores.ledger,
    pricing: config.pricing,
    maxErrorMessageLength: config.ledger.maxErrorMessageLength,
    logger: child('usage-ledger'),
  });
  const gateway = new Gateway({
    rateLimiter,
    ledger,
    deferredRetry: { retries: config.ledger.deferredRetries },
    logger: child('gateway'),
  });

  return { shareRegistry, rateLimiter, ledger, gateway };
}
