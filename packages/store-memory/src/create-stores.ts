import { InMemoryRateLimitStore } from './in-memory-rate-limit-store.js';
import type { InMemoryRateLimitStoreOptions } from './in-memory-rate-limit-store.js';
import { InMemoryShareLinkStore } from './in-memory-share-link-store.js';
import { InMemoryUsageLedgerStore } from './in-memory-usage-ledger-store.js';

export interface InMemoryStores {
  shareLinks: InMemoryShareLinkStore;
  rateLimit: InMemoryRateLimitStore;
  ledger: InMemoryUsageLedgerStore;
  destroy(): void;
}

export interface CreateInMemoryStoresOptions {
  rateLimit?: InMemoryRateLimitStoreOptions;
}

export function createInMemoryStores(
  options: CreateInMemoryStoresOptions = {},
): InMemoryStores {
  const shareLinks = new InMemoryShareLinkStore();
  const rateLimit = new InMemoryRateLimitStore(options.rateLimit);
  const ledger = new InMemoryUsageLedgerStore();

  return {
    shareLinks,
    rateLimit,
    ledger,
    destroy() {
      rateLimit.destroy();
      shareLinks.clear();
    },
  };
}
