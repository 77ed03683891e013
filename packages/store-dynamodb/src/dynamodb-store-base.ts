import {
  DynamoDBClient,
  type DynamoDBClientConfig,
} from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { describeMissingTable } from './dynamodb-utils.js';
import { DEFAULT_TABLE_NAME, ensureTable } from './table.js';

export interface DynamoDBStoreOptions {
  /** Existing client to use. If omitted, one is created and owned by the store. */
  client?: DynamoDBDocumentClient | DynamoDBClient;
  /** AWS region (used only when creating a new client). */
  region?: string;
  tableName?: string;
  /** Create the table on first use when it does not exist yet. */
  ensureTableExists?: boolean;
  /**
   * Table readiness shared with other stores. Takes precedence over
   * `ensureTableExists`; every operation waits for it.
   */
  ready?: Promise<void>;
}

/**
 * Client ownership, table bootstrap and closed-state checks shared by the
 * DynamoDB stores.
 */
export abstract class DynamoDBStoreBase {
  protected readonly docClient: DynamoDBDocumentClient;
  protected readonly tableName: string;
  private readonly rawClient: DynamoDBClient | undefined;
  private readonly isClientManaged: boolean;
  private readonly readyPromise: Promise<void>;
  private isDestroyed = false;

  protected constructor(
    private readonly storeName: string,
    {
      client,
      region,
      tableName = DEFAULT_TABLE_NAME,
      ensureTableExists = false,
      ready,
    }: DynamoDBStoreOptions,
  ) {
    this.tableName = tableName;

    if (client instanceof DynamoDBDocumentClient) {
      this.docClient = client;
      this.isClientManaged = false;
    } else if (client instanceof DynamoDBClient) {
      this.docClient = DynamoDBDocumentClient.from(client);
      this.isClientManaged = false;
    } else {
      const config: DynamoDBClientConfig = {};
      if (region) config.region = region;
      this.rawClient = new DynamoDBClient(config);
      this.docClient = DynamoDBDocumentClient.from(this.rawClient);
      this.isClientManaged = true;
    }

    if (ready) {
      this.readyPromise = ready;
    } else if (ensureTableExists) {
      const rawForTable =
        this.rawClient ??
        (client instanceof DynamoDBClient
          ? client
          : new DynamoDBClient(region ? { region } : {}));
      this.readyPromise = ensureTable(rawForTable, this.tableName);
    } else {
      this.readyPromise = Promise.resolve();
    }
  }

  /**
   * Runs one store operation once the table is ready, naming the table when
   * it turns out to be missing.
   */
  protected async run<T>(operation: () => Promise<T>): Promise<T> {
    if (this.isDestroyed) {
      throw new Error(`${this.storeName} has been destroyed`);
    }

    await this.readyPromise;

    try {
      return await operation();
    } catch (error: unknown) {
      throw describeMissingTable(error, this.tableName);
    }
  }

  async close(): Promise<void> {
    this.isDestroyed = true;

    if (this.isClientManaged && this.rawClient) {
      this.rawClient.destroy();
    }
  }
}
