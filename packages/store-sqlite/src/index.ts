export { SQLiteShareLinkStore } from './sqlite-share-link-store.js';
export { SQLiteRateLimitStore } from './sqlite-rate-limit-store.js';
export { SQLiteUsageLedgerStore } from './sqlite-usage-ledger-store.js';
export { createSQLiteStores } from './create-stores.js';
export type { SQLiteShareLinkStoreOptions } from './sqlite-share-link-store.js';
export type { SQLiteRateLimitStoreOptions } from './sqlite-rate-limit-store.js';
export type { SQLiteUsageLedgerStoreOptions } from './sqlite-usage-ledger-store.js';
export type { SQLiteConnectionOptions } from './connection.js';
export type {
  CreateSQLiteStoresOptions,
  SQLiteStores,
} from './create-stores.js';
export * from './schema.js';

// Re-export the store interfaces from the core package for convenience
export type {
  ShareLinkStore,
  RateLimitStore,
  UsageLedgerStore,
  RateLimitConfig,
} from '@tokengate/core';
