export {
  DynamoDBShareLinkStore,
  type DynamoDBShareLinkStoreOptions,
} from './dynamodb-share-link-store.js';
export {
  DynamoDBRateLimitStore,
  type DynamoDBRateLimitStoreOptions,
} from './dynamodb-rate-limit-store.js';
export {
  DynamoDBUsageLedgerStore,
  type DynamoDBUsageLedgerStoreOptions,
} from './dynamodb-usage-ledger-store.js';
export type { DynamoDBStoreOptions } from './dynamodb-store-base.js';
export {
  createDynamoDBStores,
  type CreateDynamoDBStoresOptions,
  type DynamoDBStores,
} from './create-stores.js';
export {
  DEFAULT_TABLE_NAME,
  TABLE_SCHEMA,
  TTL_ATTRIBUTE,
  createTable,
  ensureTable,
} from './table.js';
