export { InMemoryShareLinkStore } from './in-memory-share-link-store.js';
export { InMemoryRateLimitStore } from './in-memory-rate-limit-store.js';
export { InMemoryUsageLedgerStore } from './in-memory-usage-ledger-store.js';
export { createInMemoryStores } from './create-stores.js';
export type { InMemoryRateLimitStoreOptions } from './in-memory-rate-limit-store.js';
export type {
  InMemoryStores,
  CreateInMemoryStoresOptions,
} from './create-stores.js';

// Re-export the store interfaces from the core package for convenience
export type {
  ShareLinkStore,
  RateLimitStore,
  UsageLedgerStore,
  RateLimitConfig,
} from '@tokengate/core';
