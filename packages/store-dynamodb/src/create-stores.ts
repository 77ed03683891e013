import {
  DynamoDBClient,
  type DynamoDBClientConfig,
} from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { DynamoDBRateLimitStore } from './dynamodb-rate-limit-store.js';
import { DynamoDBShareLinkStore } from './dynamodb-share-link-store.js';
import { DynamoDBUsageLedgerStore } from './dynamodb-usage-ledger-store.js';
import { DEFAULT_TABLE_NAME, ensureTable } from './table.js';

export interface CreateDynamoDBStoresOptions {
  /** Existing DynamoDB client to share. If omitted, one is created. */
  client?: DynamoDBDocumentClient | DynamoDBClient;
  /** AWS region (used only when creating a new client). */
  region?: string;
  /** DynamoDB table name. Defaults to `'tokengate'`. */
  tableName?: string;
  /** Create the table once, before any store touches it. */
  ensureTableExists?: boolean;
}

export interface DynamoDBStores {
  shareLinks: DynamoDBShareLinkStore;
  rateLimit: DynamoDBRateLimitStore;
  ledger: DynamoDBUsageLedgerStore;
  /** Resolves once the table is usable. */
  ready: Promise<void>;
  /** Close all stores and destroy the shared client (if factory-created). */
  close(): Promise<void>;
}

/**
 * Creates all DynamoDB-backed stores sharing a single client and table.
 *
 * When no `client` is provided the factory creates a `DynamoDBClient` and
 * will destroy it when `close()` is called. When an existing client is
 * passed in, it is **not** destroyed and the caller retains ownership.
 */
export function createDynamoDBStores(
  options: CreateDynamoDBStoresOptions = {},
): DynamoDBStores {
  const tableName = options.tableName ?? DEFAULT_TABLE_NAME;

  let docClient: DynamoDBDocumentClient;
  let rawClient: DynamoDBClient | undefined;
  let isClientManaged = false;

  if (options.client instanceof DynamoDBDocumentClient) {
    docClient = options.client;
  } else if (options.client instanceof DynamoDBClient) {
    rawClient = options.client;
    docClient = DynamoDBDocumentClient.from(options.client);
  } else {
    const config: DynamoDBClientConfig = {};
    if (options.region) config.region = options.region;
    rawClient = new DynamoDBClient(config);
    docClient = DynamoDBDocumentClient.from(rawClient);
    isClientManaged = true;
  }

  const ready = options.ensureTableExists
    ? ensureTable(
        rawClient ??
          new DynamoDBClient(options.region ? { region: options.region } : {}),
        tableName,
      )
    : Promise.resolve();

  const shareLinks = new DynamoDBShareLinkStore({
    client: docClient,
    tableName,
    ready,
  });
  const rateLimit = new DynamoDBRateLimitStore({
    client: docClient,
    tableName,
    ready,
  });
  const ledger = new DynamoDBUsageLedgerStore({
    client: docClient,
    tableName,
    ready,
  });

  return {
    shareLinks,
    rateLimit,
    ledger,
    ready,
    async close() {
      await shareLinks.close();
      await rateLimit.close();
      await ledger.close();
      if (isClientManaged && rawClient) {
        rawClient.destroy();
      }
    },
  };
}
